import { InvalidSpecificationError } from "./errors";
import { assertUnreachable } from "./util";

export type ExtendedReal =
  | { type: "negInfinity" }
  | { type: "finite"; value: number }
  | { type: "infinity" };

export type Finite = Extract<ExtendedReal, { type: "finite" }>;

export const negInfinity: ExtendedReal = { type: "negInfinity" };
export const infinity: ExtendedReal = { type: "infinity" };

export function finite(value: number): Finite {
  if (!Number.isFinite(value)) {
    throw new InvalidSpecificationError(`${value} is not a finite number`);
  }
  return { type: "finite", value };
}

export const isFinite = (x: ExtendedReal): x is Finite => x.type === "finite";

/** Maps JS `±Infinity` onto the symbolic bounds. NaN maps to `null`. */
export function fromNumber(value: number): ExtendedReal | null {
  if (Number.isNaN(value)) return null;
  if (value === Infinity) return infinity;
  if (value === -Infinity) return negInfinity;
  return finite(value);
}

const rank = (x: ExtendedReal) =>
  x.type === "negInfinity" ? -1 : x.type === "infinity" ? 1 : 0;

export function compare(left: ExtendedReal, right: ExtendedReal): number {
  if (left.type === "finite" && right.type === "finite") {
    return Math.sign(left.value - right.value);
  }
  return Math.sign(rank(left) - rank(right));
}

// floats always carry a fractional part or an exponent, e.g. 1.0, 2.5, 1e+21
export function printFloat(value: number): string {
  const str = String(value);
  return /[.e]/.test(str) ? str : `${str}.0`;
}

export function printExtendedReal(x: ExtendedReal): string {
  switch (x.type) {
    case "negInfinity":
      return ":neg_infinity";
    case "infinity":
      return ":infinity";
    case "finite":
      return printFloat(x.value);
    // istanbul ignore next
    default:
      return assertUnreachable(x);
  }
}
