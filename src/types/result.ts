/**
 * Result Type
 *
 * A type-safe way to handle operations that can fail without throwing exceptions.
 * Detector runs and external analyzer runs report through it so that one
 * failure never unwinds the whole pipeline.
 */

// ============================================================================
// Core Types
// ============================================================================

/**
 * Represents a successful result containing a value.
 */
export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

/**
 * Represents a failed result containing an error.
 */
export interface Err<E> {
  readonly ok: false;
  readonly error: E;
}

/**
 * A Result type that can be either Ok<T> or Err<E>.
 *
 * @example
 * ```ts
 * const result = await tryCatch(() => detector.run(target));
 * if (result.ok) {
 *   findings.push(...result.value);
 * } else {
 *   logger.warn(result.error.message);
 * }
 * ```
 */
export type Result<T, E = Error> = Ok<T> | Err<E>;

// ============================================================================
// Constructors
// ============================================================================

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Normalize anything thrown into an Error.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

// ============================================================================
// Async Utilities
// ============================================================================

/**
 * Wrap an async function that might throw into a Result.
 *
 * @param fn - The async function to wrap
 * @returns A Result containing the value or error
 */
export async function tryCatch<T>(fn: () => Promise<T>): Promise<Result<T, Error>> {
  try {
    const value = await fn();
    return ok(value);
  } catch (error) {
    return err(toError(error));
  }
}

/**
 * Wrap a sync function that might throw into a Result.
 */
export function tryCatchSync<T>(fn: () => T): Result<T, Error> {
  try {
    const value = fn();
    return ok(value);
  } catch (error) {
    return err(toError(error));
  }
}
