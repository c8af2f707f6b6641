import { InvalidVectorError } from "./errors.js";
import type { Dimension, VectorLike } from "./types.js";

function hasNumericLength(obj: unknown): obj is { readonly length: number } {
  return (
    typeof obj === "object" &&
    obj !== null &&
    !(obj instanceof String) &&
    "length" in obj &&
    typeof obj.length === "number"
  );
}

function describe(obj: unknown): string {
  if (typeof obj === "string") return JSON.stringify(obj);
  if (obj instanceof String) return `String(${JSON.stringify(obj.valueOf())})`;
  if (hasNumericLength(obj)) return `sequence of length ${obj.length}`;
  if (obj === null) return "null";
  return typeof obj;
}

/**
 * Check whether `obj` is an accepted raw representation of a vector: a
 * non-string value with indexed access and exactly 2 or 3 elements.
 *
 * Element types are not inspected; non-numeric components only show up as
 * `NaN` once an operation does arithmetic on them.
 *
 * @param throwOnFailure - Throw `InvalidVectorError` instead of returning `false`.
 */
export function validate(obj: unknown, throwOnFailure = false): obj is VectorLike {
  if (hasNumericLength(obj) && (obj.length === 2 || obj.length === 3)) {
    return true;
  }
  if (throwOnFailure) {
    throw new InvalidVectorError(describe(obj));
  }
  return false;
}

/** 2 or 3 for a valid vector, `undefined` otherwise */
export function dimensionOf(obj: unknown): Dimension | undefined {
  if (!validate(obj)) return undefined;
  return obj.length === 2 ? 2 : 3;
}

/** Throw `InvalidVectorError` unless `obj` is a valid vector */
export function assertVector(obj: unknown): asserts obj is VectorLike {
  validate(obj, true);
}
