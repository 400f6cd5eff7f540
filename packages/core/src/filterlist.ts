import { FilterListError, FilterParseError } from "./errors.js";
import { parseLine } from "./parser.js";
import type { Line, LinePosition, ParseFilterListOptions, ParseResult, RawLine } from "./types.js";

/**
 * Lazily classifies each line of a filter list. A line that fails yields a
 * failure result in its place and the sequence carries on with the next one.
 *
 * With `positional`, the header is only recognised on the first line and
 * metadata only in the block of metadata lines that opens the list.
 */
export function* parseFilterList(
  lines: Iterable<RawLine>,
  options: ParseFilterListOptions = {}
): Generator<ParseResult, void, undefined> {
  const positional = options.positional ?? false;
  const onUnknownOption = options.onUnknownOption ?? "error";
  let metadataClosed = false;
  let lineNumber = 0;

  for (const input of lines) {
    lineNumber += 1;
    const position = positional ? positionFor(lineNumber, metadataClosed) : undefined;

    let result: ParseResult;
    try {
      const line = parseLine(input, { position, onUnknownOption });
      if (line.type !== "metadata" && line.type !== "header") {
        metadataClosed = true;
      }
      result = { ok: true, lineNumber, line };
    } catch (error) {
      if (!(error instanceof FilterParseError)) {
        throw error;
      }
      metadataClosed = true;
      result = { ok: false, lineNumber, error };
    }
    yield result;
  }
}

export function parseFilterListText(
  content: string,
  options: ParseFilterListOptions = {}
): Generator<ParseResult, void, undefined> {
  const lines = content.split(/\r?\n/);
  if (lines.length > 1 && lines[lines.length - 1] === "") {
    lines.pop();
  }
  return parseFilterList(lines, options);
}

/**
 * Parses a whole list, throwing on the first line that fails.
 */
export function collectFilterList(lines: Iterable<RawLine>, options: ParseFilterListOptions = {}): Line[] {
  const parsed: Line[] = [];

  for (const result of parseFilterList(lines, options)) {
    if (!result.ok) {
      throw new FilterListError(result.lineNumber, result.error);
    }
    parsed.push(result.line);
  }

  return parsed;
}

function positionFor(lineNumber: number, metadataClosed: boolean): LinePosition {
  if (lineNumber === 1) {
    return "start";
  }
  return metadataClosed ? "body" : "metadata";
}
