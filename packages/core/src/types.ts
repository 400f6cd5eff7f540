import type { FilterParseError } from "./errors.js";

export type SelectorType = "url-pattern" | "url-regexp" | "css" | "extended-css";
export type FilterAction = "block" | "allow" | "hide" | "show";

export type FlagOptionKind =
  | "other"
  | "script"
  | "image"
  | "stylesheet"
  | "object"
  | "subdocument"
  | "document"
  | "websocket"
  | "webrtc"
  | "ping"
  | "xmlhttprequest"
  | "object-subrequest"
  | "media"
  | "font"
  | "popup"
  | "genericblock"
  | "elemhide"
  | "generichide"
  | "background"
  | "xbl"
  | "dtd"
  | "match-case"
  | "third-party"
  | "collapse"
  | "donottrack";

export type StringOptionKind = "csp" | "rewrite";
export type OptionKind = FlagOptionKind | "domain" | "sitekey" | StringOptionKind;

/** Shape of the value an option kind takes. */
export type OptionValueShape = "flag" | "domains" | "strings" | "string";

export type MetadataKey = "Homepage" | "Title" | "Expires" | "Checksum" | "Redirect" | "Version";
export type InstructionKeyword = "include";

export interface Selector {
  readonly type: SelectorType;
  readonly value: string;
}

export interface DomainRestriction {
  readonly domain: string;
  readonly included: boolean;
}

export interface FlagOption {
  readonly kind: FlagOptionKind;
  readonly value: boolean;
}

export interface DomainOption {
  readonly kind: "domain";
  readonly value: readonly DomainRestriction[];
}

export interface SitekeyOption {
  readonly kind: "sitekey";
  readonly value: readonly string[];
}

export interface StringOption {
  readonly kind: StringOptionKind;
  readonly value: string;
}

export type FilterOption = FlagOption | DomainOption | SitekeyOption | StringOption;

interface LineBase {
  /** The decoded input line, untouched. */
  readonly raw: string;
}

export interface EmptyLine extends LineBase {
  readonly type: "emptyline";
}

export interface CommentLine extends LineBase {
  readonly type: "comment";
  readonly text: string;
}

export interface MetadataLine extends LineBase {
  readonly type: "metadata";
  readonly key: MetadataKey;
  readonly value: string;
}

export interface InstructionLine extends LineBase {
  readonly type: "instruction";
  readonly instruction: InstructionKeyword;
  readonly target: string;
}

export interface HeaderLine extends LineBase {
  readonly type: "header";
  readonly version: string;
}

export interface FilterLine extends LineBase {
  readonly type: "filter";
  readonly text: string;
  readonly selector: Selector;
  readonly action: FilterAction;
  readonly options: readonly FilterOption[];
}

export type Line = EmptyLine | CommentLine | MetadataLine | InstructionLine | HeaderLine | FilterLine;
export type LineType = Line["type"];

/**
 * Where a line sits in its list. Omitted means every category is recognised
 * regardless of position.
 */
export type LinePosition = "start" | "metadata" | "body";

export interface ParseLineOptions {
  position?: LinePosition;
  onUnknownOption?: "error" | "skip";
}

export interface ParseFilterListOptions {
  positional?: boolean;
  onUnknownOption?: "error" | "skip";
}

export type RawLine = string | Uint8Array;

export type ParseResult =
  | { ok: true; lineNumber: number; line: Line }
  | { ok: false; lineNumber: number; error: FilterParseError };

export interface RegexpIssue {
  pattern: string;
  lineNumber: number;
  reason: string;
}

export interface FilterCounts {
  total: number;
  byAction: Record<FilterAction, number>;
  bySelector: Record<SelectorType, number>;
  options: Partial<Record<OptionKind, number>>;
}

export interface FilterListStats {
  lines: number;
  failures: number;
  byType: Record<LineType, number>;
  filters: FilterCounts;
  regexp: {
    total: number;
    invalid: number;
  };
  invalidRegexps: RegexpIssue[];
}

export interface GlobalStats extends Omit<FilterListStats, "invalidRegexps"> {
  lists: number;
}
