import {
  InvalidBoundError,
  InvalidStepError,
  RangeOrderError,
  ZeroStepError,
} from "./errors";
import { ExtendedReal, fromNumber } from "./extended-real";
import { enumerate, reduce } from "./enumerate";
import type { Outcome, Reducer, Signal } from "./enumerate";
import { contains } from "./membership";
import type { MembershipOptions } from "./membership";
import { print } from "./print";
import { size } from "./size";
import type { Count } from "./size";

export type Bracket = "inclusive" | "exclusive";

/** A bound may be given symbolically or as a JS number (`±Infinity` included). */
export type Bound = ExtendedReal | number;

function toBound(bound: Bound, side: "min" | "max"): ExtendedReal {
  if (typeof bound !== "number" && bound.type !== "finite") return bound;
  const real = fromNumber(typeof bound === "number" ? bound : bound.value);
  if (!real) throw new InvalidBoundError(side);
  return real;
}

function toStep(step: number | null | undefined): number | null {
  if (step === null || step === undefined) return null;
  if (!Number.isFinite(step)) {
    throw new InvalidStepError(step);
  }
  if (step === 0) throw new ZeroStepError();
  return step;
}

/**
 * An immutable interval of the extended reals, optionally discretized by a
 * signed step. Without a step the interval is continuous and only supports
 * membership and size queries.
 */
export class Interval implements Iterable<number> {
  readonly min: ExtendedReal;
  readonly max: ExtendedReal;
  readonly step: number | null;
  constructor(
    readonly left: Bracket,
    readonly right: Bracket,
    min: Bound,
    max: Bound,
    step?: number | null
  ) {
    this.min = toBound(min, "min");
    this.max = toBound(max, "max");
    if (
      this.min.type === "finite" &&
      this.max.type === "finite" &&
      this.max.value < this.min.value
    ) {
      throw new RangeOrderError(this.min.value, this.max.value);
    }
    this.step = toStep(step);
    Object.freeze(this);
  }
  size(): Count {
    return size(this);
  }
  has(query: number | Interval, options?: MembershipOptions): boolean {
    return contains(this, query, options);
  }
  reduce<A>(signal: Signal<A>, fn: Reducer<A>): Outcome<A> {
    return reduce(this, signal, fn);
  }
  [Symbol.iterator](): Iterator<number> {
    return enumerate(this)[Symbol.iterator]();
  }
  toString(): string {
    return print(this);
  }
}

export function makeInterval(
  left: Bracket,
  right: Bracket,
  min: Bound,
  max: Bound,
  step?: number | null
): Interval {
  return new Interval(left, right, min, max, step);
}
