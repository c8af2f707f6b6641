import { DimensionMismatchError } from "./errors.js";
import { orEmpty } from "./result.js";
import type { AddCartesianOptions, Vector, Vector2, Vector3, VectorLike } from "./types.js";
import { assertVector } from "./validate.js";

const OPTION_KEYS: ReadonlySet<string> = new Set(["fixDimensionMismatch"]);

/**
 * A plain object whose keys are all known options. Anything else in the last
 * position is an operand and goes through validation.
 */
function isOptions(value: unknown): value is AddCartesianOptions {
  if (typeof value !== "object" || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  if (proto !== Object.prototype && proto !== null) return false;
  return Object.keys(value).every((key) => OPTION_KEYS.has(key));
}

/**
 * Separate the trailing options object, if any, from the vectors.
 */
export function splitArgs(args: readonly unknown[]): {
  vectors: unknown[];
  options: AddCartesianOptions;
} {
  const last = args[args.length - 1];
  if (args.length > 0 && isOptions(last)) {
    return { vectors: args.slice(0, -1), options: last };
  }
  return { vectors: [...args], options: {} };
}

function copy(vector: VectorLike): Vector2 | Vector3 {
  return vector.length === 2 ? [vector[0], vector[1]] : [vector[0], vector[1], vector[2]];
}

/**
 * Add Cartesian vectors. Throws `InvalidVectorError` for an invalid operand and
 * `DimensionMismatchError` when lengths differ and mismatches are not fixed.
 */
export function sumCartesian(
  vectors: readonly unknown[],
  options: AddCartesianOptions = {},
): Vector2 | Vector3 {
  const fixDimensionMismatch = options.fixDimensionMismatch === true;
  const first = vectors[0];
  assertVector(first);

  if (vectors.length === 1) return copy(first);

  const baseDim = first.length;
  let x = 0;
  let y = 0;
  let z = 0;

  for (const v of vectors) {
    assertVector(v);
    if (v.length !== baseDim && !fixDimensionMismatch) {
      throw new DimensionMismatchError(baseDim, v.length);
    }

    x += v[0];
    y += v[1];
    if (baseDim === 3 && v.length === 3) z += v[2];
  }

  return baseDim === 2 ? [x, y] : [x, y, z];
}

/**
 * Add Cartesian vectors component-wise.
 *
 * The first vector fixes the dimension of the result. Pass
 * `{ fixDimensionMismatch: true }` as the last argument to accept operands of
 * the other dimension: a 3D operand on a 2D base loses its z component and a
 * 2D operand on a 3D base contributes a z of 0.
 *
 * Returns an empty vector if any operand is invalid, if no vector is given, or
 * if dimensions differ without mismatch fixing.
 *
 * @example
 * ```typescript
 * addCartesian([1, 2], [3, 4]);                                     // [4, 6]
 * addCartesian([1, 2, 3], [4, 5], { fixDimensionMismatch: true });  // [5, 7, 3]
 * ```
 */
export function addCartesian(
  ...args: [...vectors: unknown[], options: AddCartesianOptions]
): Vector;
export function addCartesian(...vectors: unknown[]): Vector;
export function addCartesian(...args: unknown[]): Vector {
  const { vectors, options } = splitArgs(args);
  return orEmpty("addCartesian", () => sumCartesian(vectors, options));
}
