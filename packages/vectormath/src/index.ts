/**
 * vectormath - Coordinate conversion and addition for raw 2D/3D vectors.
 *
 * Vectors are plain ordered sequences (arrays, tuples, typed arrays) of 2 or 3
 * numbers. Angles are in degrees. The lenient operations never throw and
 * signal failure with an empty vector; the `try*` operations return a tagged
 * result carrying the error instead.
 *
 * @packageDocumentation
 */

export type {
  VectorLike,
  Dimension,
  Vector2,
  Vector3,
  EmptyVector,
  Vector,
  Cartesian2,
  Cartesian3,
  Polar2,
  Spherical3,
  AddCartesianOptions,
} from "./types.js";

export {
  VectorMathError,
  InvalidVectorError,
  DimensionMismatchError,
  isVectorMathError,
} from "./errors.js";
export type { VectorMathErrorCode } from "./errors.js";

export { validate, dimensionOf, assertVector } from "./validate.js";

export { toCartesian, toPolar, promoteTo3d } from "./conversions.js";

export { addCartesian } from "./operations.js";

export { tryToCartesian, tryToPolar, tryAddCartesian } from "./strict.js";

export { Left, Right, isLeft, isRight, getOrThrow } from "./result.js";
export type { VectorResult } from "./result.js";

export { config, defineConfig } from "./config.js";
export type { ConfigResetOptions, VectorMathConfig, VectorMathConfigKey } from "./config.js";
