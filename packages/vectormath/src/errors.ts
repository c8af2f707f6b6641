/**
 * Vector Math Error Types
 */

/** Reason codes for vector operation failures. */
export type VectorMathErrorCode = "invalid_vector" | "dimension_mismatch";

/**
 * Base class for all failures raised by vector operations.
 */
export class VectorMathError extends Error {
  constructor(
    message: string,
    readonly code: VectorMathErrorCode,
  ) {
    super(message);
    this.name = "VectorMathError";
  }
}

/**
 * Thrown when a value is not a 2- or 3-element indexable sequence, or is a string.
 */
export class InvalidVectorError extends VectorMathError {
  constructor(readonly received: string) {
    super(
      `A given object is not an accepted representation of a vector: ${received}`,
      "invalid_vector",
    );
    this.name = "InvalidVectorError";
  }
}

/**
 * Thrown when vectors of different lengths are added without mismatch fixing.
 */
export class DimensionMismatchError extends VectorMathError {
  constructor(
    readonly expected: number,
    readonly actual: number,
  ) {
    super(`Dimension mismatch: expected ${expected}, got ${actual}`, "dimension_mismatch");
    this.name = "DimensionMismatchError";
  }
}

export function isVectorMathError(error: unknown): error is VectorMathError {
  return error instanceof VectorMathError;
}
