import { describe, expect, test } from "vitest";

import {
  FilterListError,
  FilterParseError,
  MalformedInstructionError,
  collectFilterList,
  parseFilterList,
  parseFilterListText
} from "../src/index.js";

describe("parseFilterList", () => {
  test("yields one line per input, in order", () => {
    const results = [...parseFilterList(["! foo", "! Title: bar"])];

    expect(results).toEqual([
      { ok: true, lineNumber: 1, line: { type: "comment", raw: "! foo", text: "foo" } },
      { ok: true, lineNumber: 2, line: { type: "metadata", raw: "! Title: bar", key: "Title", value: "bar" } }
    ]);
  });

  test("continues past a failing line", () => {
    const results = parseFilterList(["! good", "%bad%", "! also good"]);

    const first = results.next();
    expect(first.value).toMatchObject({ ok: true, line: { type: "comment", text: "good" } });

    const second = results.next();
    expect(second.done).toBe(false);
    expect(second.value).toMatchObject({ ok: false, lineNumber: 2 });
    if (!second.done && !second.value.ok) {
      expect(second.value.error).toBeInstanceOf(MalformedInstructionError);
      expect(second.value.error.line).toBe("%bad%");
    }

    const third = results.next();
    expect(third.value).toMatchObject({ ok: true, lineNumber: 3, line: { type: "comment", text: "also good" } });
    expect(results.next().done).toBe(true);
  });

  test("is lazy", () => {
    let pulled = 0;
    function* source(): Generator<string> {
      for (const line of ["ads", "%bad%", "tracker"]) {
        pulled += 1;
        yield line;
      }
    }

    const results = parseFilterList(source());
    results.next();
    expect(pulled).toBe(1);
  });

  test("accepts raw bytes", () => {
    const encoder = new TextEncoder();
    const lines = [...parseFilterList([encoder.encode("! Title: Müll"), encoder.encode("##.ad")])];

    expect(lines.map((result) => (result.ok ? result.line.type : "error"))).toEqual(["metadata", "filter"]);
    expect(lines[0]).toMatchObject({ ok: true, line: { value: "Müll" } });
  });

  test("recognises headers anywhere unless positional", () => {
    const results = [...parseFilterList(["ads", "[Adblock Plus 2.0]"])];
    expect(results[1]).toMatchObject({ ok: true, line: { type: "header" } });
  });

  describe("positional", () => {
    test("only the opening block carries header and metadata", () => {
      const results = [
        ...parseFilterList(
          ["[Adblock Plus 2.0]", "! Title: demo", "! Expires: 4 days", "! plain comment", "! Version: 1", "ads"],
          { positional: true }
        )
      ];

      expect(results.map((result) => (result.ok ? result.line.type : "error"))).toEqual([
        "header",
        "metadata",
        "metadata",
        "comment",
        "comment",
        "filter"
      ]);
    });

    test("a header after the first line is a filter", () => {
      const results = [...parseFilterList(["! Title: demo", "[Adblock Plus 2.0]"], { positional: true })];
      expect(results[1]).toMatchObject({
        ok: true,
        line: { type: "filter", selector: { type: "url-pattern", value: "[Adblock Plus 2.0]" } }
      });
    });

    test("a failing line closes the metadata block", () => {
      const results = [...parseFilterList(["! Title: demo", "%bad%", "! Version: 1"], { positional: true })];
      expect(results.map((result) => (result.ok ? result.line.type : "error"))).toEqual([
        "metadata",
        "error",
        "comment"
      ]);
    });
  });

  test("passes the unknown-option policy through", () => {
    const strict = [...parseFilterList(["ads$script,bogus"])];
    expect(strict[0]?.ok).toBe(false);

    const lenient = [...parseFilterList(["ads$script,bogus"], { onUnknownOption: "skip" })];
    expect(lenient[0]).toMatchObject({
      ok: true,
      line: { type: "filter", options: [{ kind: "script", value: true }] }
    });
  });

  test("errors thrown into the generator propagate", () => {
    const results = parseFilterList(["ads", "tracker"]);
    results.next();
    expect(() => results.throw(new FilterParseError("decoding", "injected", "tracker"))).toThrow(FilterParseError);
  });
});

describe("parseFilterListText", () => {
  test("splits on line breaks and ignores the final newline", () => {
    const results = [...parseFilterListText("[Adblock Plus 2.0]\r\n! Title: demo\n\nads\n")];

    expect(results.map((result) => (result.ok ? result.line.type : "error"))).toEqual([
      "header",
      "metadata",
      "emptyline",
      "filter"
    ]);
  });
});

describe("collectFilterList", () => {
  test("returns every line", () => {
    expect(collectFilterList(["! foo", "ads"]).map((line) => line.type)).toEqual(["comment", "filter"]);
  });

  test("throws with the line number of the first failure", () => {
    expect(() => collectFilterList(["! foo", "ads", "%foo bar%"])).toThrow(
      'error at line 3: unrecognized instruction "foo": "%foo bar%"'
    );

    try {
      collectFilterList(["%bad%"]);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(FilterListError);
      if (error instanceof FilterListError) {
        expect(error.lineNumber).toBe(1);
        expect(error.cause).toBeInstanceOf(MalformedInstructionError);
      }
    }
  });
});
