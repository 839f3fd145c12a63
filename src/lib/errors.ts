export type SplineErrorCode = "InvalidArgument" | "MalformedInput" | "DegenerateSegment";

export class SplineError extends Error {
  readonly code: SplineErrorCode;

  constructor(code: SplineErrorCode, message: string) {
    super(message);
    this.name = `${code}Error`;
    this.code = code;
  }
}

export class InvalidArgumentError extends SplineError {
  constructor(message: string) {
    super("InvalidArgument", message);
  }
}

export class MalformedInputError extends SplineError {
  readonly token: string;

  constructor(message: string, token: string) {
    super("MalformedInput", message);
    this.token = token;
  }
}

export type DegeneratePair = "flanking" | "adjacent";

/** Two knots coincide so no direction can be derived at `index` (1-based). */
export class DegenerateSegmentError extends SplineError {
  readonly index: number;
  readonly pair: DegeneratePair;

  constructor(index: number, pair: DegeneratePair) {
    super(
      "DegenerateSegment",
      pair === "flanking"
        ? `knots ${index - 1} and ${index + 1} coincide; knot ${index} has no joining direction`
        : `knots ${index} and ${index + 1} coincide`
    );
    this.index = index;
    this.pair = pair;
  }
}

export function isSplineError(value: unknown): value is SplineError {
  return value instanceof SplineError;
}
