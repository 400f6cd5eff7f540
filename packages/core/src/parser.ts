import { isInstructionKeyword, isMetadataKey } from "./catalog.js";
import { DecodingError, MalformedHeaderError, MalformedInstructionError } from "./errors.js";
import { parseFilter } from "./filter.js";
import type { Line, LinePosition, ParseLineOptions, RawLine } from "./types.js";

const COMMENT_PREFIX = "!";
const INSTRUCTION_DELIMITER = "%";
const HEADER_PREFIX = "[Adblock Plus ";
const HEADER_SUFFIX = "]";

const METADATA = /^!\s*(\w+)\s*:\s*(.*)$/;
const INSTRUCTION_BODY = /^(\S+)(?:\s+([\s\S]*))?$/;
const HEADER_LIKE = /^\[\s*adblock/i;

const utf8 = new TextDecoder("utf-8", { fatal: true });
const lenientUtf8 = new TextDecoder("utf-8");

export function parseLine(input: RawLine, options: ParseLineOptions = {}): Line {
  const raw = decodeLine(input);
  const position = options.position;
  const stripped = raw.trim();

  if (stripped.length === 0) {
    return { type: "emptyline", raw };
  }

  if (stripped.startsWith(COMMENT_PREFIX)) {
    return parseComment(raw, stripped, position !== "body");
  }

  if (
    stripped.length >= 2 &&
    stripped.startsWith(INSTRUCTION_DELIMITER) &&
    stripped.endsWith(INSTRUCTION_DELIMITER)
  ) {
    return parseInstruction(raw, stripped);
  }

  if (recognizesHeader(position) && HEADER_LIKE.test(stripped) && stripped.endsWith(HEADER_SUFFIX)) {
    return parseHeader(raw, stripped);
  }

  return parseFilter(stripped, options, raw);
}

export function decodeLine(input: RawLine): string {
  if (typeof input === "string") {
    return input;
  }

  try {
    return utf8.decode(input);
  } catch (error) {
    if (error instanceof TypeError) {
      throw new DecodingError(lenientUtf8.decode(input));
    }
    throw error;
  }
}

function recognizesHeader(position: LinePosition | undefined): boolean {
  return position === undefined || position === "start";
}

function parseComment(raw: string, stripped: string, allowMetadata: boolean): Line {
  const metadata = allowMetadata ? METADATA.exec(stripped) : null;
  if (metadata) {
    const [, key = "", value = ""] = metadata;
    if (isMetadataKey(key)) {
      return { type: "metadata", raw, key, value: value.trim() };
    }
  }

  const content = stripped.slice(COMMENT_PREFIX.length);
  return { type: "comment", raw, text: content.startsWith(" ") ? content.slice(1) : content };
}

function parseInstruction(raw: string, stripped: string): Line {
  const inner = stripped.slice(INSTRUCTION_DELIMITER.length, -INSTRUCTION_DELIMITER.length);
  const match = INSTRUCTION_BODY.exec(inner);
  if (!match) {
    throw new MalformedInstructionError(raw);
  }

  const [, word = "", rest = ""] = match;
  if (!isInstructionKeyword(word)) {
    throw new MalformedInstructionError(raw, `unrecognized instruction ${JSON.stringify(word)}`);
  }

  const target = rest.trim();
  if (target.length === 0) {
    throw new MalformedInstructionError(raw, `instruction ${JSON.stringify(word)} requires a target`);
  }

  return { type: "instruction", raw, instruction: word, target };
}

function parseHeader(raw: string, stripped: string): Line {
  const version = stripped.slice(HEADER_PREFIX.length, -HEADER_SUFFIX.length);
  if (!stripped.startsWith(HEADER_PREFIX) || version.trim().length === 0) {
    throw new MalformedHeaderError(raw);
  }

  return { type: "header", raw, version: stripped.slice(1, -HEADER_SUFFIX.length) };
}
