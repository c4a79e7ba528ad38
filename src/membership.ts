import { ExtendedReal } from "./extended-real";
import type { Bracket, Interval } from "./interval";
import { size } from "./size";
import { assertUnreachable } from "./util";

export type MembershipOptions = {
  /**
   * Absolute slack allowed on the grid-alignment remainder. Defaults to 0, an
   * exact floating-point remainder, so steps such as 0.1 that have no exact
   * binary form reject points they would enumerate.
   */
  tolerance?: number;
};

function aboveMin(left: Bracket, min: ExtendedReal, x: number): boolean {
  switch (min.type) {
    case "negInfinity":
      return true;
    case "infinity":
      return false;
    case "finite":
      switch (left) {
        case "inclusive":
          return x >= min.value;
        case "exclusive":
          return x > min.value;
        default:
          return assertUnreachable(left);
      }
    default:
      return assertUnreachable(min);
  }
}

function belowMax(right: Bracket, max: ExtendedReal, x: number): boolean {
  switch (max.type) {
    case "infinity":
      return true;
    case "negInfinity":
      return false;
    case "finite":
      switch (right) {
        case "inclusive":
          return x <= max.value;
        case "exclusive":
          return x < max.value;
        default:
          return assertUnreachable(right);
      }
    default:
      return assertUnreachable(max);
  }
}

function isMultiple(x: number, step: number, tolerance: number): boolean {
  const remainder = Math.abs(x % step);
  return (
    remainder <= tolerance || Math.abs(step) - remainder <= tolerance
  );
}

function isEmpty(interval: Interval): boolean {
  const count = size(interval);
  return count.type === "exact" && count.value === 0;
}

/**
 * Whether `x` is a point of the interval. Bounds are checked directly; with a
 * step and two finite bounds, `x - min` must also be a multiple of the step.
 */
export function containsPoint(
  interval: Interval,
  x: number,
  { tolerance = 0 }: MembershipOptions = {}
): boolean {
  if (!Number.isFinite(x) || isEmpty(interval)) return false;

  const { left, right, min, max, step } = interval;
  if (!aboveMin(left, min, x) || !belowMax(right, max, x)) return false;

  if (step === null || min.type !== "finite" || max.type !== "finite") {
    return true;
  }
  return isMultiple(x - min.value, step, tolerance);
}

// an infinite endpoint is only covered by the same infinite endpoint
function containsBound(
  outer: Interval,
  bound: ExtendedReal,
  options: MembershipOptions
): boolean {
  switch (bound.type) {
    case "finite":
      return containsPoint(outer, bound.value, options);
    case "negInfinity":
      return outer.min.type === "negInfinity" && !isEmpty(outer);
    case "infinity":
      return outer.max.type === "infinity" && !isEmpty(outer);
    // istanbul ignore next
    default:
      return assertUnreachable(bound);
  }
}

/**
 * Whether `inner` is a subset of `outer`. Only the endpoints of `inner` are
 * checked against `outer`. A stepped `outer` also needs `inner` to be stepped
 * by a multiple of its own step.
 */
export function containsInterval(
  outer: Interval,
  inner: Interval,
  options: MembershipOptions = {}
): boolean {
  const endpoints = () =>
    containsBound(outer, inner.min, options) &&
    containsBound(outer, inner.max, options);

  if (outer.step === null) return endpoints();
  if (inner.step === null) return false;
  return (
    endpoints() &&
    isMultiple(inner.step, outer.step, options.tolerance ?? 0)
  );
}

export function contains(
  interval: Interval,
  query: number | Interval,
  options: MembershipOptions = {}
): boolean {
  return typeof query === "number"
    ? containsPoint(interval, query, options)
    : containsInterval(interval, query, options);
}
