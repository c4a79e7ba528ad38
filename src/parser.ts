import { IntervalSyntaxError } from "./errors";
import { ExtendedReal, printExtendedReal } from "./extended-real";
import { Bracket, Interval, makeInterval } from "./interval";
import { LexerError, Token, tokenize } from "./lexer";
import { showInContext, TokenPosition } from "./util";

type EofToken = { type: "eof" } & TokenPosition;

const describeToken = (token: Token | EofToken) => {
  switch (token.type) {
    case "eof":
      return "(end of input)";
    case "value":
      return printExtendedReal(token.value);
    default:
      return `"${token.value}"`;
  }
};

class InternalParseError {
  constructor(
    public readonly message: string,
    public readonly pos: TokenPosition
  ) {}
}

class MatchError extends InternalParseError {
  constructor(expected: string, received: Token | EofToken) {
    super(`Expected ${expected}, received ${describeToken(received)}`, received);
  }
}

class ParseState {
  private index = 0;
  constructor(private readonly tokens: Token[]) {}
  next(): Token | EofToken {
    return this.tokens[this.index++] ?? this.eofToken();
  }
  peek(): Token | EofToken {
    return this.tokens[this.index] ?? this.eofToken();
  }
  done(): void {
    if (this.index < this.tokens.length) {
      throw new MatchError("end of input", this.peek());
    }
  }
  private eofToken(): EofToken {
    const lastToken = this.tokens[this.tokens.length - 1];
    return lastToken
      ? {
          type: "eof",
          index: lastToken.index + lastToken.length,
          outerIndex: lastToken.outerIndex,
          length: 1,
        }
      : { type: "eof", index: 0, outerIndex: 0, length: 1 };
  }
}

function leftBracket(state: ParseState): Bracket {
  const token = state.next();
  if (token.type !== "startToken") throw new MatchError(`"[" or "("`, token);
  return token.value === "[" ? "inclusive" : "exclusive";
}

function rightBracket(state: ParseState): Bracket {
  const token = state.next();
  if (token.type !== "endToken") throw new MatchError(`"]" or ")"`, token);
  return token.value === "]" ? "inclusive" : "exclusive";
}

function literal(state: ParseState, value: "," | "//"): void {
  const token = state.next();
  if (token.type !== "literal" || token.value !== value) {
    throw new MatchError(`"${value}"`, token);
  }
}

function bound(state: ParseState): ExtendedReal {
  const token = state.next();
  if (token.type !== "value") throw new MatchError("a number", token);
  return token.value;
}

function step(state: ParseState): number | null {
  const token = state.peek();
  if (token.type === "eof") return null;
  literal(state, "//");
  const value = state.next();
  if (value.type !== "value" || value.value.type !== "finite") {
    throw new MatchError("a finite step", value);
  }
  return value.value.value;
}

// interval := left min "," max right ("//" step)?
function parseTokens(state: ParseState): Interval {
  const left = leftBracket(state);
  const min = bound(state);
  literal(state, ",");
  const max = bound(state);
  const right = rightBracket(state);
  const stepValue = step(state);
  state.done();
  return makeInterval(left, right, min, max, stepValue);
}

export function parse(
  strs: readonly string[],
  interps: readonly unknown[] = []
): Interval {
  try {
    return parseTokens(new ParseState(tokenize(strs, interps)));
  } catch (e) {
    if (e instanceof InternalParseError || e instanceof LexerError) {
      const context = showInContext(strs, e.pos);
      throw new IntervalSyntaxError(e.message, e.pos, context);
    }
    throw e;
  }
}

export function parseInterval(text: string): Interval {
  return parse([text]);
}

/**
 * Builds an interval from a literal such as `[1, 10)//2`. Numbers may be
 * interpolated wherever a bound or step is expected:
 *
 *     interval`[${lo}, ${hi})//${step}`
 */
export function interval(
  strs: TemplateStringsArray,
  ...interps: unknown[]
): Interval {
  return parse(strs.raw, interps);
}
