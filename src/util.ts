import { InvalidSpecificationError } from "./errors";

// istanbul ignore next
export function assertUnreachable(value: never): never {
  console.error("shouldnt have gotten (", value, ")");
  throw new InvalidSpecificationError();
}

/*
 * outerIndex: index of string in interpolation
 * index: position in string
 * length: length of matched pattern
 * NOTE: an interpolated value sits at index 0 of the string that follows it
 * and has a length of 0.
 */
export type TokenPosition = {
  index: number;
  outerIndex: number;
  length: number;
};

// eslint-disable-next-line no-template-curly-in-string
const INTERPOLATION = "${...}";

/**
 * Renders an interval literal on one line with the token at `pos` underlined.
 */
export function showInContext(
  strs: readonly string[],
  pos: TokenPosition
): string {
  let line = "";
  let start = 0;
  for (const [i, str] of strs.entries()) {
    if (i > 0) line += INTERPOLATION;
    if (i === pos.outerIndex) start = line.length + pos.index;
    line += str.replace(/\s/g, " ");
  }

  let width = pos.length;
  if (width === 0 && pos.index === 0 && pos.outerIndex > 0) {
    start -= INTERPOLATION.length;
    width = INTERPOLATION.length;
  }

  return [line, " ".repeat(start) + "^".repeat(Math.max(width, 1))].join("\n");
}
