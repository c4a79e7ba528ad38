import { pointAt, startCursor } from "./enumerate";
import type { Interval } from "./interval";

export type Count =
  | { type: "unbounded"; reason: "continuous" | "infiniteBound" }
  | { type: "exact"; value: number };

const continuous: Count = { type: "unbounded", reason: "continuous" };
const infiniteBound: Count = { type: "unbounded", reason: "infiniteBound" };
const exact = (value: number): Count => ({ type: "exact", value });

/**
 * Number of points enumeration yields, in closed form. The quotient of the
 * distance by the step gives the count up to rounding; the last point is then
 * confirmed with the same `origin + index * step` arithmetic `enumerate` uses,
 * so the two always agree.
 */
export function size(interval: Interval): Count {
  const { min, max, step } = interval;
  if (step === null) return continuous;
  if (max.type === "negInfinity" || min.type === "infinity") return exact(0);
  if (min.type !== "finite" || max.type !== "finite") return infiniteBound;

  const cursor = startCursor(interval, step);
  const { origin, bound } = cursor;
  // a start that overflowed past the far bound has nothing to count
  if (origin.type !== "finite" || bound.type !== "finite") return exact(0);

  const distance =
    step > 0 ? bound.value - origin.value : origin.value - bound.value;
  let count = distance < 0 ? 0 : Math.floor(distance / Math.abs(step)) + 1;
  while (count > 0 && pointAt(cursor, count - 1) === null) count--;
  while (pointAt(cursor, count) !== null) count++;
  return exact(count);
}

export function countToString(count: Count): string {
  return count.type === "exact" ? String(count.value) : "infinity";
}
