import { describe, expect, test } from "vitest";

import {
  aggregateStats,
  checkRegexpSelector,
  collectRegexpIssues,
  countFilterList,
  parseFilter,
  parseFilterListText
} from "../src/index.js";

describe("stats helpers", () => {
  test("counts lines, filters and options", () => {
    const stats = countFilterList(
      parseFilterListText(
        [
          "[Adblock Plus 2.0]",
          "! Title: demo",
          "! comment",
          "",
          "%include other.txt%",
          "||ads.example.com^$script,third-party",
          "@@||ads.example.com/ok^$script",
          "/banner[0-9]+/",
          "/broken(/",
          "example.com##.ad",
          "#@#.ad",
          "#?#div:-abp-has(.ad)",
          "%bad%"
        ].join("\n")
      )
    );

    expect(stats.lines).toBe(13);
    expect(stats.failures).toBe(1);
    expect(stats.byType).toEqual({
      emptyline: 1,
      comment: 1,
      metadata: 1,
      instruction: 1,
      header: 1,
      filter: 7
    });
    expect(stats.filters.byAction).toEqual({ block: 3, allow: 1, hide: 2, show: 1 });
    expect(stats.filters.bySelector).toEqual({
      "url-pattern": 2,
      "url-regexp": 2,
      css: 2,
      "extended-css": 1
    });
    expect(stats.filters.options).toEqual({ script: 2, "third-party": 1, domain: 1 });
    expect(stats.regexp).toEqual({ total: 2, invalid: 1 });
    expect(stats.invalidRegexps).toHaveLength(1);
    expect(stats.invalidRegexps[0]).toMatchObject({ pattern: "broken(", lineNumber: 9 });
  });

  test("checks regexp selectors", () => {
    expect(checkRegexpSelector(parseFilter("/ddd|f?a[s]d/"))).toBeUndefined();
    expect(checkRegexpSelector(parseFilter("/(?<=ads)\\.js/$match-case"))).toBeUndefined();
    expect(typeof checkRegexpSelector(parseFilter("/ads(/"))).toBe("string");
  });

  test("leaves non-regexp selectors alone", () => {
    expect(checkRegexpSelector(parseFilter("##.ad("))).toBeUndefined();
    expect(checkRegexpSelector(parseFilter("ads("))).toBeUndefined();
  });

  test("aggregates list stats", () => {
    const first = countFilterList(parseFilterListText("ads\n/x(/\n! note"));
    const second = countFilterList(parseFilterListText("##.banner\nads$image"));

    const global = aggregateStats([first, second]);

    expect(global.lists).toBe(2);
    expect(global.lines).toBe(5);
    expect(global.byType.filter).toBe(4);
    expect(global.byType.comment).toBe(1);
    expect(global.filters.total).toBe(4);
    expect(global.filters.byAction).toEqual({ block: 3, allow: 0, hide: 1, show: 0 });
    expect(global.filters.options).toEqual({ image: 1 });
    expect(global.regexp).toEqual({ total: 1, invalid: 1 });
    expect(global).not.toHaveProperty("invalidRegexps");

    expect(collectRegexpIssues([first, second])).toEqual([
      expect.objectContaining({ pattern: "x(", lineNumber: 2 })
    ]);
  });
});
