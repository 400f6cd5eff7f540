import regjsparser from "regjsparser";

import { isOptionKind } from "./catalog.js";
import type {
  FilterCounts,
  FilterLine,
  FilterListStats,
  GlobalStats,
  LineType,
  ParseResult,
  RegexpIssue
} from "./types.js";

const LINE_TYPES: LineType[] = ["emptyline", "comment", "metadata", "instruction", "header", "filter"];

const REGEXP_FEATURES = {
  lookbehind: true,
  namedGroups: true,
  unicodePropertyEscape: true,
  unicodeSet: true,
  modifiers: true
} as const;

export function countFilterList(results: Iterable<ParseResult>): FilterListStats {
  const stats = makeEmptyStats();

  for (const result of results) {
    stats.lines += 1;

    if (!result.ok) {
      stats.failures += 1;
      continue;
    }

    const { line } = result;
    stats.byType[line.type] += 1;

    if (line.type !== "filter") {
      continue;
    }

    countFilter(stats.filters, line);

    if (line.selector.type === "url-regexp") {
      stats.regexp.total += 1;
      const reason = checkRegexpSelector(line);
      if (reason !== undefined) {
        stats.regexp.invalid += 1;
        stats.invalidRegexps.push({ pattern: line.selector.value, lineNumber: result.lineNumber, reason });
      }
    }
  }

  return stats;
}

/**
 * Returns why a regexp selector would not compile, or `undefined` when it
 * does or the filter has no regexp selector. Regexp filters match case-insensitively unless they set `match-case`.
 */
export function checkRegexpSelector(filter: FilterLine): string | undefined {
  if (filter.selector.type !== "url-regexp") {
    return undefined;
  }
  const matchCase = filter.options.some((option) => option.kind === "match-case" && option.value === true);

  try {
    regjsparser.parse(filter.selector.value, matchCase ? "" : "i", REGEXP_FEATURES);
    return undefined;
  } catch (error) {
    return error instanceof Error ? error.message : String(error);
  }
}

export function aggregateStats(lists: FilterListStats[]): GlobalStats {
  const global: GlobalStats = { lists: lists.length, ...makeEmptyCounts() };

  for (const list of lists) {
    global.lines += list.lines;
    global.failures += list.failures;
    global.regexp.total += list.regexp.total;
    global.regexp.invalid += list.regexp.invalid;

    for (const type of LINE_TYPES) {
      global.byType[type] += list.byType[type];
    }

    mergeFilterCounts(global.filters, list.filters);
  }

  return global;
}

export function collectRegexpIssues(lists: FilterListStats[]): RegexpIssue[] {
  return lists.flatMap((list) => list.invalidRegexps);
}

function countFilter(counts: FilterCounts, filter: FilterLine): void {
  counts.total += 1;
  counts.byAction[filter.action] += 1;
  counts.bySelector[filter.selector.type] += 1;

  for (const option of filter.options) {
    counts.options[option.kind] = (counts.options[option.kind] ?? 0) + 1;
  }
}

function mergeFilterCounts(target: FilterCounts, incoming: FilterCounts): void {
  target.total += incoming.total;

  target.byAction.block += incoming.byAction.block;
  target.byAction.allow += incoming.byAction.allow;
  target.byAction.hide += incoming.byAction.hide;
  target.byAction.show += incoming.byAction.show;

  target.bySelector["url-pattern"] += incoming.bySelector["url-pattern"];
  target.bySelector["url-regexp"] += incoming.bySelector["url-regexp"];
  target.bySelector.css += incoming.bySelector.css;
  target.bySelector["extended-css"] += incoming.bySelector["extended-css"];

  for (const [kind, count] of Object.entries(incoming.options)) {
    if (isOptionKind(kind) && count !== undefined) {
      target.options[kind] = (target.options[kind] ?? 0) + count;
    }
  }
}

function makeEmptyStats(): FilterListStats {
  return { ...makeEmptyCounts(), invalidRegexps: [] };
}

function makeEmptyCounts(): Omit<FilterListStats, "invalidRegexps"> {
  return {
    lines: 0,
    failures: 0,
    byType: {
      emptyline: 0,
      comment: 0,
      metadata: 0,
      instruction: 0,
      header: 0,
      filter: 0
    },
    filters: {
      total: 0,
      byAction: {
        block: 0,
        allow: 0,
        hide: 0,
        show: 0
      },
      bySelector: {
        "url-pattern": 0,
        "url-regexp": 0,
        css: 0,
        "extended-css": 0
      },
      options: {}
    },
    regexp: {
      total: 0,
      invalid: 0
    }
  };
}
