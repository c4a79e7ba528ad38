import moo from "moo";
import type { Token as MooToken } from "moo";
import { ExtendedReal, fromNumber, infinity, negInfinity } from "./extended-real";
import { TokenPosition } from "./util";

type TokenContent =
  | { type: "startToken"; value: "[" | "(" }
  | { type: "endToken"; value: "]" | ")" }
  | { type: "literal"; value: "," | "//" }
  | { type: "value"; value: ExtendedReal };

export type Token = TokenContent & TokenPosition;

export class LexerError {
  constructor(public readonly message: string, public readonly pos: TokenPosition) {}
}

const baseTokenizer = moo.compile({
  ws: { match: /\s+/u, lineBreaks: true },
  number: /[-+]?(?:[0-9]+\.[0-9]+|[0-9]+)(?:[eE][-+]?[0-9]+)?/u,
  keyword: [":neg_infinity", ":infinity"],
  startToken: ["[", "("],
  endToken: ["]", ")"],
  literal: ["//", ","],
  error: moo.error,
});

function toValue(value: unknown, pos: TokenPosition): ExtendedReal {
  const real = typeof value === "number" ? fromNumber(value) : null;
  if (!real) {
    throw new LexerError(`Expected a number, received ${String(value)}`, pos);
  }
  return real;
}

function content(tok: MooToken, pos: TokenPosition): TokenContent | null {
  switch (tok.type) {
    case "ws":
      return null;
    case "number": {
      const value = Number(tok.value);
      if (!Number.isFinite(value)) {
        throw new LexerError("Number out of range", pos);
      }
      return { type: "value", value: toValue(value, pos) };
    }
    case "keyword":
      return {
        type: "value",
        value: tok.value === ":infinity" ? infinity : negInfinity,
      };
    case "startToken":
      if (tok.value === "[" || tok.value === "(") {
        return { type: "startToken", value: tok.value };
      }
      break;
    case "endToken":
      if (tok.value === "]" || tok.value === ")") {
        return { type: "endToken", value: tok.value };
      }
      break;
    case "literal":
      if (tok.value === "," || tok.value === "//") {
        return { type: "literal", value: tok.value };
      }
      break;
  }
  throw new LexerError("No match for token", pos);
}

/**
 * Tokenizes the pieces of an interval literal. Interpolated values are spliced
 * in as `value` tokens, so `${lo}` may stand wherever a bound or step can.
 */
export function tokenize(
  strs: readonly string[],
  interps: readonly unknown[]
): Token[] {
  const tokens: Token[] = [];
  for (const [outerIndex, str] of strs.entries()) {
    baseTokenizer.reset(str);
    let tok: MooToken | undefined;
    while ((tok = baseTokenizer.next())) {
      const pos = { index: tok.offset, outerIndex, length: tok.text.length };
      const next = content(tok, pos);
      if (next) tokens.push({ ...next, ...pos });
    }

    if (outerIndex < interps.length) {
      const pos = { index: 0, outerIndex: outerIndex + 1, length: 0 };
      tokens.push({
        type: "value",
        value: toValue(interps[outerIndex], pos),
        ...pos,
      });
    }
  }
  return tokens;
}
