/**
 * Tagged success/failure results
 *
 * A `VectorResult<A>` is either `Left<VectorMathError>` (the operation failed)
 * or `Right<A>` (it succeeded). The lenient API flattens both failure kinds to
 * an empty vector; results keep the error.
 */

import { config } from "./config.js";
import { isVectorMathError, type VectorMathError } from "./errors.js";
import { logDebug } from "./log.js";
import type { Vector, Vector2, Vector3 } from "./types.js";

// ============================================================================
// Result Type Definition
// ============================================================================

export type VectorResult<A> = Left<VectorMathError> | Right<A>;

/**
 * Left variant - represents failure
 */
export interface Left<E> {
  readonly _tag: "Left";
  readonly left: E;
}

/**
 * Right variant - represents success
 */
export interface Right<A> {
  readonly _tag: "Right";
  readonly right: A;
}

// ============================================================================
// Constructors and Guards
// ============================================================================

export function Left<E>(left: E): Left<E> {
  return { _tag: "Left", left };
}

export function Right<A>(right: A): Right<A> {
  return { _tag: "Right", right };
}

export function isLeft<A>(result: VectorResult<A>): result is Left<VectorMathError> {
  return result._tag === "Left";
}

export function isRight<A>(result: VectorResult<A>): result is Right<A> {
  return result._tag === "Right";
}

/**
 * Unwrap a result, rethrowing the error it carries.
 */
export function getOrThrow<A>(result: VectorResult<A>): A {
  if (isLeft(result)) throw result.left;
  return result.right;
}

// ============================================================================
// Running Operations
// ============================================================================

/**
 * Run a throwing computation and capture a `VectorMathError` as `Left`.
 * Any other error propagates.
 */
export function attempt<A>(run: () => A): VectorResult<A> {
  try {
    return Right(run());
  } catch (error) {
    if (isVectorMathError(error)) return Left(error);
    throw error;
  }
}

/**
 * Run a throwing computation and collapse a `VectorMathError` into an empty
 * vector. In strict mode the error is rethrown instead.
 *
 * Configuration is read only on failure. The first read in a process loads it,
 * which searches the working directory for a config file, synchronously.
 * Successful calls do no I/O.
 */
export function orEmpty(operation: string, run: () => Vector2 | Vector3): Vector {
  const result = attempt(run);
  if (isRight(result)) return result.right;

  if (config.get("strict")) throw result.left;
  logDebug(`${operation} failed, returning an empty vector:`, result.left.message);
  return [];
}
