/**
 * Result-returning twins of the lenient operations. Instead of an empty vector
 * they hand back the `InvalidVectorError` or `DimensionMismatchError` that
 * caused the failure.
 *
 * @example
 * ```typescript
 * const result = tryAddCartesian([1, 2], [3, 4, 5]);
 * if (isLeft(result)) console.error(result.left.code); // "dimension_mismatch"
 * ```
 */

import { convertToCartesian, convertToPolar } from "./conversions.js";
import { splitArgs, sumCartesian } from "./operations.js";
import { attempt, type VectorResult } from "./result.js";
import type { AddCartesianOptions, Vector2, Vector3 } from "./types.js";

export function tryToCartesian(
  vector: unknown,
  usePhysicsConvention = false,
): VectorResult<Vector2 | Vector3> {
  return attempt(() => convertToCartesian(vector, usePhysicsConvention));
}

export function tryToPolar(
  vector: unknown,
  usePhysicsConvention = false,
): VectorResult<Vector2 | Vector3> {
  return attempt(() => convertToPolar(vector, usePhysicsConvention));
}

export function tryAddCartesian(
  ...args: [...vectors: unknown[], options: AddCartesianOptions]
): VectorResult<Vector2 | Vector3>;
export function tryAddCartesian(...vectors: unknown[]): VectorResult<Vector2 | Vector3>;
export function tryAddCartesian(...args: unknown[]): VectorResult<Vector2 | Vector3> {
  const { vectors, options } = splitArgs(args);
  return attempt(() => sumCartesian(vectors, options));
}
