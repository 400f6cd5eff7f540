import { FILTER_ACTION, SELECTOR_TYPE, isFlagOption, isOptionKind } from "./catalog.js";
import { MalformedOptionError, UnknownOptionError } from "./errors.js";
import type {
  DomainRestriction,
  FilterAction,
  FilterLine,
  FilterOption,
  OptionKind,
  ParseLineOptions,
  Selector
} from "./types.js";

const EXCEPTION_MARKER = "@@";
const OPTIONS_SEPARATOR = "$";

// The domain prefix of a hiding filter never contains URL pattern characters,
// so the lazy prefix picks the first marker that can start a selector.
const HIDING_FILTER = /^([^/*|@"!]*?)#([@?])?#(.+)$/;
const OPTION_TOKEN = /^(~?)([\w-]+)(?:=(.*))?$/;

export type ParseFilterOptions = Pick<ParseLineOptions, "onUnknownOption">;

/**
 * Parses the text of a filter rule. `text` is expected to be trimmed already;
 * `raw` is the untrimmed line it came from.
 *
 * Any text is a valid URL pattern, so this only throws for option blocks that
 * name options outside the catalog or give them values of the wrong shape.
 */
export function parseFilter(text: string, options: ParseFilterOptions = {}, raw = text): FilterLine {
  const onUnknownOption = options.onUnknownOption ?? "error";
  const exception = text.startsWith(EXCEPTION_MARKER);
  const body = exception ? text.slice(EXCEPTION_MARKER.length) : text;

  const hiding = HIDING_FILTER.exec(body);
  if (hiding) {
    const [, domains = "", marker, value = ""] = hiding;
    const action: FilterAction = exception || marker === "@" ? FILTER_ACTION.SHOW : FILTER_ACTION.HIDE;
    const selector: Selector = {
      type: marker === "?" ? SELECTOR_TYPE.XCSS : SELECTOR_TYPE.CSS,
      value
    };
    const filterOptions: FilterOption[] =
      domains.length === 0 ? [] : [{ kind: "domain", value: parseDomainList(domains, ",") }];

    return { type: "filter", raw, text, selector, action, options: filterOptions };
  }

  const { pattern, tokens } = splitOptionBlock(body);

  return {
    type: "filter",
    raw,
    text,
    selector: isRegexpBody(pattern)
      ? { type: SELECTOR_TYPE.URL_REGEXP, value: pattern.slice(1, -1) }
      : { type: SELECTOR_TYPE.URL_PATTERN, value: pattern },
    action: exception ? FILTER_ACTION.ALLOW : FILTER_ACTION.BLOCK,
    options: parseOptionTokens(tokens, raw, onUnknownOption)
  };
}

/**
 * Splits off the trailing option block. The last `$` only counts as the
 * separator when everything after it reads as a comma-separated option list
 * naming at least one known option; otherwise it belongs to the pattern.
 */
function splitOptionBlock(body: string): { pattern: string; tokens: string[] } {
  const separatorIndex = body.lastIndexOf(OPTIONS_SEPARATOR);
  if (separatorIndex === -1) {
    return { pattern: body, tokens: [] };
  }

  const tokens = body
    .slice(separatorIndex + 1)
    .split(",")
    .map((token) => token.trim());

  if (!tokens.every((token) => OPTION_TOKEN.test(token)) || !tokens.some(namesKnownOption)) {
    return { pattern: body, tokens: [] };
  }

  return { pattern: body.slice(0, separatorIndex), tokens };
}

function namesKnownOption(token: string): boolean {
  const name = OPTION_TOKEN.exec(token)?.[2];
  return name !== undefined && isOptionKind(name.toLowerCase());
}

function isRegexpBody(pattern: string): boolean {
  return pattern.length >= 2 && pattern.startsWith("/") && pattern.endsWith("/");
}

function parseOptionTokens(tokens: string[], line: string, onUnknownOption: "error" | "skip"): FilterOption[] {
  const parsed: FilterOption[] = [];

  for (const token of tokens) {
    const match = OPTION_TOKEN.exec(token);
    if (!match) {
      throw new MalformedOptionError(line, `malformed option ${JSON.stringify(token)}`);
    }

    const [, negation, name = "", value] = match;
    const kind = name.toLowerCase();
    if (!isOptionKind(kind)) {
      if (onUnknownOption === "skip") {
        continue;
      }
      throw new UnknownOptionError(line, name);
    }

    parsed.push(makeOption(kind, negation === "~", value, line));
  }

  return parsed;
}

function makeOption(kind: OptionKind, negated: boolean, value: string | undefined, line: string): FilterOption {
  if (isFlagOption(kind)) {
    if (value !== undefined) {
      throw new MalformedOptionError(line, `option ${JSON.stringify(kind)} does not take a value`);
    }
    return { kind, value: !negated };
  }

  if (negated) {
    throw new MalformedOptionError(line, `option ${JSON.stringify(kind)} cannot be negated`);
  }
  if (value === undefined || value.length === 0) {
    throw new MalformedOptionError(line, `option ${JSON.stringify(kind)} requires a value`);
  }

  switch (kind) {
    case "domain":
      return { kind, value: parseDomainList(value, "|") };
    case "sitekey":
      return { kind, value: value.split("|") };
    default:
      return { kind, value };
  }
}

export function parseDomainList(list: string, separator: string): DomainRestriction[] {
  return list.split(separator).map((item) =>
    item.startsWith("~") ? { domain: item.slice(1), included: false } : { domain: item, included: true }
  );
}
