import { NotEnumerableError } from "./errors";
import {
  compare,
  ExtendedReal,
  finite,
  infinity,
  negInfinity,
} from "./extended-real";
import type { Bracket, Interval } from "./interval";
import { assertUnreachable } from "./util";

/**
 * The whole state of a paused traversal: the first candidate point, how many
 * steps have been taken from it, the point reached, the bound being
 * approached, the bracket on that bound and the step.
 */
export type Cursor = {
  readonly origin: ExtendedReal;
  readonly index: number;
  readonly value: ExtendedReal;
  readonly bound: ExtendedReal;
  readonly governing: Bracket;
  readonly step: number;
};

export type Signal<A> =
  | { type: "cont"; acc: A }
  | { type: "halt"; acc: A }
  | { type: "suspend"; acc: A };

export type Outcome<A> =
  | { type: "done"; acc: A }
  | { type: "halted"; acc: A }
  | {
      type: "suspended";
      acc: A;
      cursor: Cursor;
      resume: (signal: Signal<A>) => Outcome<A>;
    };

export type Reducer<A> = (value: number, acc: A) => Signal<A>;

export const cont = <A>(acc: A): Signal<A> => ({ type: "cont", acc });
export const halt = <A>(acc: A): Signal<A> => ({ type: "halt", acc });
export const suspend = <A>(acc: A): Signal<A> => ({ type: "suspend", acc });

// points are origin + index * step, never a running sum, so `size` can find
// the same last point in closed form. An infinite origin stays put.
function valueAt(
  origin: ExtendedReal,
  index: number,
  step: number
): ExtendedReal {
  if (origin.type !== "finite") return origin;
  const value = origin.value + index * step;
  if (Number.isFinite(value)) return finite(value);
  return value > 0 ? infinity : negInfinity;
}

function origin(
  bracket: Bracket,
  bound: ExtendedReal,
  step: number
): ExtendedReal {
  switch (bracket) {
    case "inclusive":
      return bound;
    case "exclusive":
      return valueAt(bound, 1, step);
    default:
      return assertUnreachable(bracket);
  }
}

function inside(governing: Bracket, order: number): boolean {
  switch (governing) {
    case "inclusive":
      return order <= 0;
    case "exclusive":
      return order < 0;
    default:
      return assertUnreachable(governing);
  }
}

export function startCursor(interval: Interval, step: number): Cursor {
  const { left, right, min, max } = interval;
  const first = step > 0 ? origin(left, min, step) : origin(right, max, step);
  return {
    origin: first,
    index: 0,
    value: first,
    bound: step > 0 ? max : min,
    governing: step > 0 ? right : left,
    step,
  };
}

/**
 * The point `index` steps past the cursor's origin if it is still inside the
 * interval, otherwise `null`. Defaults to the cursor's own position.
 */
export function pointAt(cursor: Cursor, index = cursor.index): number | null {
  const { bound, governing, step } = cursor;
  const value = valueAt(cursor.origin, index, step);
  if (value.type !== "finite") return null;
  const order = step > 0 ? compare(value, bound) : compare(bound, value);
  return inside(governing, order) ? value.value : null;
}

export function advance(cursor: Cursor): Cursor {
  const index = cursor.index + 1;
  return {
    ...cursor,
    index,
    value: valueAt(cursor.origin, index, cursor.step),
  };
}

function requireStep(interval: Interval): number {
  if (interval.step === null) throw new NotEnumerableError();
  return interval.step;
}

function run<A>(cursor: Cursor, signal: Signal<A>, fn: Reducer<A>): Outcome<A> {
  let current = cursor;
  let next = signal;
  for (;;) {
    switch (next.type) {
      case "halt":
        return { type: "halted", acc: next.acc };
      case "suspend": {
        const paused = current;
        return {
          type: "suspended",
          acc: next.acc,
          cursor: paused,
          resume: (signal) => run(paused, signal, fn),
        };
      }
      case "cont": {
        const value = pointAt(current);
        if (value === null) return { type: "done", acc: next.acc };
        next = fn(value, next.acc);
        current = advance(current);
      }
    }
  }
}

/**
 * Folds over the points of an interval in step order. `fn` answers every point
 * with a signal: `cont` to keep going, `halt` to stop with the accumulator, or
 * `suspend` to pause. A suspended outcome carries `resume`, which picks the
 * traversal up at the next point and can be called any number of times.
 */
export function reduce<A>(
  interval: Interval,
  signal: Signal<A>,
  fn: Reducer<A>
): Outcome<A> {
  return run(startCursor(interval, requireStep(interval)), signal, fn);
}

/**
 * A lazy, restartable sequence of the interval's points. Infinite when the
 * traversal heads towards an infinite bound.
 */
export function enumerate(interval: Interval): Iterable<number> {
  const step = requireStep(interval);
  return {
    *[Symbol.iterator]() {
      let cursor = startCursor(interval, step);
      let value = pointAt(cursor);
      while (value !== null) {
        yield value;
        cursor = advance(cursor);
        value = pointAt(cursor);
      }
    },
  };
}

export function take(interval: Interval, count: number): number[] {
  const initial = count > 0 ? cont<number[]>([]) : halt<number[]>([]);
  return reduce(interval, initial, (value, acc) => {
    acc.push(value);
    return acc.length < count ? cont(acc) : halt(acc);
  }).acc;
}

export function toArray(interval: Interval): number[] {
  return reduce(interval, cont<number[]>([]), (value, acc) => {
    acc.push(value);
    return cont(acc);
  }).acc;
}

export function sum(interval: Interval): number {
  return reduce(interval, cont(0), (value, acc) => cont(acc + value)).acc;
}
