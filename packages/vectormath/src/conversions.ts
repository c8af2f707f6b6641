import { orEmpty } from "./result.js";
import type { Vector, Vector2, Vector3 } from "./types.js";
import { assertVector, validate } from "./validate.js";

// ---------------------------------------------------------------------------
// Angle helpers
// ---------------------------------------------------------------------------

function radians(degrees: number): number {
  return degrees * (Math.PI / 180);
}

function degrees(radians: number): number {
  return radians * (180 / Math.PI);
}

/**
 * Angle of `(x, y)` from the positive x-axis, in degrees.
 *
 * Single-argument arctangent: the result lies in [-90, 90], so `(x, y)` and
 * `(-x, -y)` share an angle. On the y-axis the angle is 90 when `y > 0` and
 * -90 otherwise, which includes the origin.
 */
function halfPlaneAngle(x: number, y: number): number {
  if (x === 0) return y > 0 ? 90 : -90;
  return degrees(Math.atan(y / x));
}

// ---------------------------------------------------------------------------
// Throwing conversions
// ---------------------------------------------------------------------------

/**
 * Polar/Spherical → Cartesian. Throws `InvalidVectorError` on invalid input.
 */
export function convertToCartesian(vector: unknown, usePhysicsConvention = false): Vector2 | Vector3 {
  assertVector(vector);
  const r = vector[0];

  if (vector.length === 2) {
    const angle = radians(vector[1]);
    return [r * Math.cos(angle), r * Math.sin(angle)];
  }

  const inclination = radians(usePhysicsConvention ? vector[1] : vector[2]);
  const azimuth = radians(usePhysicsConvention ? vector[2] : vector[1]);
  return [
    r * Math.sin(inclination) * Math.cos(azimuth),
    r * Math.sin(inclination) * Math.sin(azimuth),
    r * Math.cos(inclination),
  ];
}

/**
 * Cartesian → Polar/Spherical. Throws `InvalidVectorError` on invalid input.
 */
export function convertToPolar(vector: unknown, usePhysicsConvention = false): Vector2 | Vector3 {
  assertVector(vector);
  const x = vector[0];
  const y = vector[1];

  if (vector.length === 2) {
    return [Math.sqrt(x ** 2 + y ** 2), halfPlaneAngle(x, y)];
  }

  const z = vector[2];
  const r = Math.sqrt(x ** 2 + y ** 2 + z ** 2);
  const azimuth = halfPlaneAngle(x, y);
  // NaN at the origin
  const inclination = degrees(Math.acos(z / r));

  return usePhysicsConvention ? [r, inclination, azimuth] : [r, azimuth, inclination];
}

// ---------------------------------------------------------------------------
// Lenient conversions
// ---------------------------------------------------------------------------

/**
 * Convert a vector given in Polar (2D) or Spherical (3D) coordinates, angles in
 * degrees, to Cartesian coordinates.
 *
 * In the default math convention a 3D vector is `(r, azimuth, inclination)`;
 * with `usePhysicsConvention` it is `(r, inclination, azimuth)`.
 *
 * Returns an empty vector if `vector` is not a valid vector.
 */
export function toCartesian(vector: unknown, usePhysicsConvention = false): Vector {
  return orEmpty("toCartesian", () => convertToCartesian(vector, usePhysicsConvention));
}

/**
 * Convert a Cartesian vector to Polar (2D) or Spherical (3D) coordinates, angles
 * in degrees. Angles come from a single-argument arctangent and stay within
 * [-90, 90], so vectors with `x < 0` do not round-trip.
 *
 * The math convention returns `(r, azimuth, inclination)`; with
 * `usePhysicsConvention` it is `(r, inclination, azimuth)`.
 *
 * Returns an empty vector if `vector` is not a valid vector.
 */
export function toPolar(vector: unknown, usePhysicsConvention = false): Vector {
  return orEmpty("toPolar", () => convertToPolar(vector, usePhysicsConvention));
}

/**
 * Lift a 2D Cartesian vector into 3D with `z = 0`. A 3D vector comes back with
 * the same components.
 */
export function promoteTo3d(vector: unknown): Vector3 | undefined {
  if (!validate(vector)) return undefined;
  return [vector[0], vector[1], vector.length === 3 ? vector[2] : 0];
}
