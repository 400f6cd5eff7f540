import type { FilterAction, FilterOption, Line, Selector } from "./types.js";

export interface DomainListDict {
  include: string[];
  exclude: string[];
}

export type OptionValueDict = boolean | string | string[] | DomainListDict;

export type LineDict =
  | { type: "emptyline" }
  | { type: "comment"; text: string }
  | { type: "metadata"; key: string; value: string }
  | { type: "instruction"; instruction: string; target: string }
  | { type: "header"; version: string }
  | {
      type: "filter";
      text: string;
      selector: Selector;
      action: FilterAction;
      options: Record<string, OptionValueDict>;
    };

/**
 * Renders a line in its canonical form. Filters keep their own text; the
 * other line types are rebuilt from their fields. The output reads back as the
 * same line type when parsed at the position the line came from: a body
 * comment such as `! Title: x` becomes metadata only where metadata is allowed.
 */
export function formatLine(line: Line): string {
  switch (line.type) {
    case "emptyline":
      return "";
    case "comment":
      return `! ${line.text}`;
    case "metadata":
      return `! ${line.key}: ${line.value}`;
    case "instruction":
      return `%${line.instruction} ${line.target}%`;
    case "header":
      return `[${line.version}]`;
    case "filter":
      return line.text;
  }
}

export function lineToDict(line: Line): LineDict {
  switch (line.type) {
    case "emptyline":
      return { type: line.type };
    case "comment":
      return { type: line.type, text: line.text };
    case "metadata":
      return { type: line.type, key: line.key, value: line.value };
    case "instruction":
      return { type: line.type, instruction: line.instruction, target: line.target };
    case "header":
      return { type: line.type, version: line.version };
    case "filter":
      return {
        type: line.type,
        text: line.text,
        selector: { type: line.selector.type, value: line.selector.value },
        action: line.action,
        options: optionsToDict(line.options)
      };
  }
}

function optionsToDict(options: readonly FilterOption[]): Record<string, OptionValueDict> {
  const output: Record<string, OptionValueDict> = {};

  for (const option of options) {
    switch (option.kind) {
      case "domain":
        output[option.kind] = {
          include: option.value.filter((entry) => entry.included).map((entry) => entry.domain),
          exclude: option.value.filter((entry) => !entry.included).map((entry) => entry.domain)
        };
        break;
      case "sitekey":
        output[option.kind] = [...option.value];
        break;
      default:
        output[option.kind] = option.value;
    }
  }

  return output;
}
