import type { TokenPosition } from "./util";

export type ConstructionErrorKind =
  | "syntax"
  | "rangeOrder"
  | "zeroStep"
  | "invalidBound"
  | "invalidStep";

/**
 * Raised while building an interval. Nothing is constructed when one of these
 * is thrown; match on `kind` rather than on the message.
 */
export abstract class ConstructionError extends Error {
  abstract readonly kind: ConstructionErrorKind;
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class IntervalSyntaxError extends ConstructionError {
  readonly kind = "syntax";
  constructor(
    readonly reason: string,
    readonly pos: TokenPosition,
    context: string
  ) {
    super(`${reason}\n${context}`);
  }
}

export class RangeOrderError extends ConstructionError {
  readonly kind = "rangeOrder";
  constructor(readonly min: number, readonly max: number) {
    super(
      `lower bound must not exceed upper bound (got ${min} > ${max}); ` +
        `to enumerate from the upper bound down, use a negative step`
    );
  }
}

export class ZeroStepError extends ConstructionError {
  readonly kind = "zeroStep";
  constructor() {
    super("step cannot be zero");
  }
}

export class InvalidStepError extends ConstructionError {
  readonly kind = "invalidStep";
  constructor(readonly step: number) {
    super(`step must be a finite number (got ${step})`);
  }
}

export class InvalidBoundError extends ConstructionError {
  readonly kind = "invalidBound";
  constructor(readonly side: "min" | "max") {
    super(`${side} cannot be NaN`);
  }
}

export class NotEnumerableError extends Error {
  constructor() {
    super("interval has no step and cannot be enumerated");
    this.name = "NotEnumerableError";
  }
}

export class InvalidSpecificationError extends Error {
  constructor(message = "invalid interval specification") {
    super(message);
    this.name = "InvalidSpecificationError";
  }
}
