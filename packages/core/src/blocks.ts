import type { CommentLine, FilterLine, Line } from "./types.js";

const VARIABLE = /^:(\w+)=(.*)$/;

export interface FiltersBlock {
  description: string;
  variables: Record<string, string>;
  filters: FilterLine[];
}

/**
 * Groups filters with the comments written above them. Comments shaped like
 * `:name=value` set block variables; the rest make up the description.
 */
export function* getBlocks(lines: Iterable<Line>): Generator<FiltersBlock, void, undefined> {
  let comments: CommentLine[] = [];
  let filters: FilterLine[] = [];

  for (const line of lines) {
    if (line.type === "comment") {
      if (filters.length > 0) {
        yield makeBlock(comments, filters);
        comments = [];
        filters = [];
      }
      comments.push(line);
    } else if (line.type === "filter") {
      filters.push(line);
    }
  }

  if (filters.length > 0) {
    yield makeBlock(comments, filters);
  }
}

function makeBlock(comments: CommentLine[], filters: FilterLine[]): FiltersBlock {
  const variables: Record<string, string> = {};
  const description: string[] = [];

  for (const comment of comments) {
    const match = VARIABLE.exec(comment.text);
    if (match) {
      const [, name = "", value = ""] = match;
      variables[name] = value;
      continue;
    }
    description.push(comment.text);
  }

  return { description: description.join("\n"), variables, filters };
}
