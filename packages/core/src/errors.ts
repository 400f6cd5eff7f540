export type ParseErrorCode =
  | "malformed-instruction"
  | "malformed-header"
  | "unknown-option"
  | "malformed-option"
  | "decoding";

/**
 * Raised when a single line cannot be classified. `line` holds the offending
 * text as it was given.
 */
export class FilterParseError extends Error {
  readonly line: string;
  readonly reason: string;
  readonly code: ParseErrorCode;

  constructor(code: ParseErrorCode, reason: string, line: string) {
    super(`${reason}: ${JSON.stringify(line)}`);
    this.name = "FilterParseError";
    this.code = code;
    this.reason = reason;
    this.line = line;
  }
}

export class MalformedInstructionError extends FilterParseError {
  constructor(line: string, reason = "malformed instruction") {
    super("malformed-instruction", reason, line);
    this.name = "MalformedInstructionError";
  }
}

export class MalformedHeaderError extends FilterParseError {
  constructor(line: string) {
    super("malformed-header", "malformed header", line);
    this.name = "MalformedHeaderError";
  }
}

export class UnknownOptionError extends FilterParseError {
  readonly option: string;

  constructor(line: string, option: string) {
    super("unknown-option", `unknown option ${JSON.stringify(option)}`, line);
    this.name = "UnknownOptionError";
    this.option = option;
  }
}

export class MalformedOptionError extends FilterParseError {
  constructor(line: string, reason: string) {
    super("malformed-option", reason, line);
    this.name = "MalformedOptionError";
  }
}

export class DecodingError extends FilterParseError {
  constructor(line: string) {
    super("decoding", "line is not valid UTF-8", line);
    this.name = "DecodingError";
  }
}

export class FilterListError extends Error {
  readonly lineNumber: number;

  constructor(lineNumber: number, cause: FilterParseError) {
    super(`error at line ${lineNumber}: ${cause.message}`, { cause });
    this.name = "FilterListError";
    this.lineNumber = lineNumber;
  }
}
