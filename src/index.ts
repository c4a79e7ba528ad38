export { Interval, makeInterval } from "./interval";
export type { Bracket, Bound } from "./interval";
export {
  compare,
  finite,
  fromNumber,
  infinity,
  isFinite,
  negInfinity,
} from "./extended-real";
export type { ExtendedReal } from "./extended-real";
export { size, countToString } from "./size";
export type { Count } from "./size";
export {
  enumerate,
  reduce,
  take,
  toArray,
  sum,
  cont,
  halt,
  suspend,
} from "./enumerate";
export type { Cursor, Outcome, Reducer, Signal } from "./enumerate";
export { contains, containsInterval, containsPoint } from "./membership";
export type { MembershipOptions } from "./membership";
export { interval, parse, parseInterval } from "./parser";
export { print } from "./print";
export {
  ConstructionError,
  IntervalSyntaxError,
  InvalidBoundError,
  InvalidSpecificationError,
  InvalidStepError,
  NotEnumerableError,
  RangeOrderError,
  ZeroStepError,
} from "./errors";
export type { ConstructionErrorKind } from "./errors";
