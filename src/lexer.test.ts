import { finite, infinity, negInfinity } from "./extended-real";
import { Token, tokenize } from "./lexer";

function tok(strs: TemplateStringsArray, ...interps: unknown[]) {
  return tokenize(strs.raw, interps);
}

function strip(token: Token) {
  return { type: token.type, value: token.value };
}

test("basic tokens", () => {
  expect(tok`[1, 10)//2`.map(strip)).toEqual([
    { type: "startToken", value: "[" },
    { type: "value", value: finite(1) },
    { type: "literal", value: "," },
    { type: "value", value: finite(10) },
    { type: "endToken", value: ")" },
    { type: "literal", value: "//" },
    { type: "value", value: finite(2) },
  ]);
});

test("signed numbers and exponents", () => {
  expect(tok`(-2.5, +1e3]//-0.25`.map(strip)).toEqual([
    { type: "startToken", value: "(" },
    { type: "value", value: finite(-2.5) },
    { type: "literal", value: "," },
    { type: "value", value: finite(1000) },
    { type: "endToken", value: "]" },
    { type: "literal", value: "//" },
    { type: "value", value: finite(-0.25) },
  ]);
});

test("infinity keywords", () => {
  expect(tok`(:neg_infinity,:infinity)`.map(strip)).toEqual([
    { type: "startToken", value: "(" },
    { type: "value", value: negInfinity },
    { type: "literal", value: "," },
    { type: "value", value: infinity },
    { type: "endToken", value: ")" },
  ]);
});

test("token positions", () => {
  const [, , , max] = tok`[1, 10]`;
  expect(max).toEqual({
    type: "value",
    value: finite(10),
    index: 4,
    outerIndex: 0,
    length: 2,
  });
});

test("interpolation", () => {
  const tokens = tok`(${-Infinity}, ${5}]`;
  expect(tokens.map(strip)).toEqual([
    { type: "startToken", value: "(" },
    { type: "value", value: negInfinity },
    { type: "literal", value: "," },
    { type: "value", value: finite(5) },
    { type: "endToken", value: "]" },
  ]);
  expect(tokens[3]).toMatchObject({ index: 0, outerIndex: 2, length: 0 });
});

test("lexer errors", () => {
  expect(() => tok`[1; 2]`).toThrow();
  expect(() => tok`[1., 2]`).toThrow();
  expect(() => tok`[1, 1e400]`).toThrow();
  expect(() => tok`[${"1"}, 2]`).toThrow();
  expect(() => tok`[${NaN}, 2]`).toThrow();
});
