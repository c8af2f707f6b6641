/**
 * Raw vector shapes.
 *
 * Vectors are plain ordered sequences of 2 or 3 numbers. Whether a sequence
 * holds Cartesian, Polar or Spherical coordinates is decided by the function
 * it is passed to, never by the value itself.
 */

/** Anything indexable with a numeric length: arrays, tuples, typed arrays */
export type VectorLike = ArrayLike<number>;

/** Number of components a valid vector has */
export type Dimension = 2 | 3;

/** `(x, y)`, `(r, angle)` */
export type Vector2 = [number, number];

/** `(x, y, z)`, `(r, azimuth, inclination)` or `(r, inclination, azimuth)` */
export type Vector3 = [number, number, number];

/** Empty result returned by the lenient API when an operation fails */
export type EmptyVector = [];

/** Result of a lenient operation */
export type Vector = Vector2 | Vector3 | EmptyVector;

/** Cartesian 2D vector `(x, y)` */
export type Cartesian2 = Vector2;

/** Cartesian 3D vector `(x, y, z)` */
export type Cartesian3 = Vector3;

/** Polar vector `(radius, angleDegrees)`, angle from the positive x-axis */
export type Polar2 = Vector2;

/**
 * Spherical vector. In the math convention the components are
 * `(radius, azimuthDegrees, polarAngleDegrees)`; the physics convention swaps
 * the last two.
 */
export type Spherical3 = Vector3;

/** Trailing options accepted by `addCartesian` */
export interface AddCartesianOptions {
  /**
   * Tolerate operands of different dimension. The first vector fixes the
   * result's dimension: extra z components are dropped, missing ones count as 0.
   */
  fixDimensionMismatch?: boolean;
}
