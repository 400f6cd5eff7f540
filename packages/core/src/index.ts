export { FILTER_ACTION, FILTER_OPTION, SELECTOR_TYPE, isInstructionKeyword, isMetadataKey, isOptionKind } from "./catalog.js";
export {
  DecodingError,
  FilterListError,
  FilterParseError,
  MalformedHeaderError,
  MalformedInstructionError,
  MalformedOptionError,
  UnknownOptionError,
  type ParseErrorCode
} from "./errors.js";
export { decodeLine, parseLine } from "./parser.js";
export { parseDomainList, parseFilter, type ParseFilterOptions } from "./filter.js";
export { collectFilterList, parseFilterList, parseFilterListText } from "./filterlist.js";
export { formatLine, lineToDict, type DomainListDict, type LineDict, type OptionValueDict } from "./serialize.js";
export { getBlocks, type FiltersBlock } from "./blocks.js";
export { aggregateStats, checkRegexpSelector, collectRegexpIssues, countFilterList } from "./stats.js";
export type * from "./types.js";
