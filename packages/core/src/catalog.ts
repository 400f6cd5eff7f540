import type {
  FilterAction,
  FlagOptionKind,
  InstructionKeyword,
  MetadataKey,
  OptionKind,
  OptionValueShape,
  SelectorType
} from "./types.js";

export const SELECTOR_TYPE = {
  URL_PATTERN: "url-pattern",
  URL_REGEXP: "url-regexp",
  CSS: "css",
  XCSS: "extended-css"
} as const satisfies Record<string, SelectorType>;

export const FILTER_ACTION = {
  BLOCK: "block",
  ALLOW: "allow",
  HIDE: "hide",
  SHOW: "show"
} as const satisfies Record<string, FilterAction>;

export const FILTER_OPTION = {
  // Resource types.
  OTHER: "other",
  SCRIPT: "script",
  IMAGE: "image",
  STYLESHEET: "stylesheet",
  OBJECT: "object",
  SUBDOCUMENT: "subdocument",
  DOCUMENT: "document",
  WEBSOCKET: "websocket",
  WEBRTC: "webrtc",
  PING: "ping",
  XMLHTTPREQUEST: "xmlhttprequest",
  OBJECT_SUBREQUEST: "object-subrequest",
  MEDIA: "media",
  FONT: "font",
  POPUP: "popup",
  GENERICBLOCK: "genericblock",
  ELEMHIDE: "elemhide",
  GENERICHIDE: "generichide",
  // Deprecated resource types.
  BACKGROUND: "background",
  XBL: "xbl",
  DTD: "dtd",
  // Everything else.
  MATCH_CASE: "match-case",
  DOMAIN: "domain",
  THIRD_PARTY: "third-party",
  COLLAPSE: "collapse",
  SITEKEY: "sitekey",
  DONOTTRACK: "donottrack",
  CSP: "csp",
  REWRITE: "rewrite"
} as const satisfies Record<string, OptionKind>;

const OPTION_SHAPES: Record<OptionKind, OptionValueShape> = {
  other: "flag",
  script: "flag",
  image: "flag",
  stylesheet: "flag",
  object: "flag",
  subdocument: "flag",
  document: "flag",
  websocket: "flag",
  webrtc: "flag",
  ping: "flag",
  xmlhttprequest: "flag",
  "object-subrequest": "flag",
  media: "flag",
  font: "flag",
  popup: "flag",
  genericblock: "flag",
  elemhide: "flag",
  generichide: "flag",
  background: "flag",
  xbl: "flag",
  dtd: "flag",
  "match-case": "flag",
  "third-party": "flag",
  collapse: "flag",
  donottrack: "flag",
  domain: "domains",
  sitekey: "strings",
  csp: "string",
  rewrite: "string"
};

const METADATA_KEYS: readonly MetadataKey[] = ["Homepage", "Title", "Expires", "Checksum", "Redirect", "Version"];
const INSTRUCTIONS: readonly InstructionKeyword[] = ["include"];

export function isOptionKind(name: string): name is OptionKind {
  return Object.prototype.hasOwnProperty.call(OPTION_SHAPES, name);
}

export function isFlagOption(kind: OptionKind): kind is FlagOptionKind {
  return OPTION_SHAPES[kind] === "flag";
}

export function isMetadataKey(key: string): key is MetadataKey {
  return METADATA_KEYS.some((known) => known === key);
}

export function isInstructionKeyword(word: string): word is InstructionKeyword {
  return INSTRUCTIONS.some((known) => known === word);
}
