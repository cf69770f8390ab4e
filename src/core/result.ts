/**
 * @fileoverview Result type for explicit error handling
 *
 * Used at boundaries where a failure is an expected outcome (rejecting a
 * malformed finding) rather than an exceptional one.
 */

// ============================================================================
// CORE RESULT TYPE
// ============================================================================

export type OkResult<T> = { readonly ok: true; readonly value: T };
export type ErrResult<E> = { readonly ok: false; readonly error: E };
export type Result<T, E = Error> = OkResult<T> | ErrResult<E>;

export const Ok = <T>(value: T): Result<T, never> => ({ ok: true, value });
export const Err = <E>(error: E): Result<never, E> => ({ ok: false, error });

// ============================================================================
// RESULT HELPERS
// ============================================================================

/**
 * Wrap a sync function in a Result, keeping only errors the guard accepts.
 * Anything else is rethrown.
 */
export function safeSync<T, E>(fn: () => T, accept: (error: unknown) => error is E): Result<T, E> {
  try {
    return Ok(fn());
  } catch (e) {
    if (accept(e)) return Err(e);
    throw e;
  }
}
