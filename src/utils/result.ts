/**
 * Result Type Pattern
 * @module utils/result
 *
 * Expected failures returned as values. Narrow on `ok`:
 *
 * @example
 * ```typescript
 * const result = await data.upload.delete(uploadId, webLogId);
 * if (result.ok) {
 *   await removeFromDisk(result.value);
 * }
 * ```
 */

// ============================================================================
// Result Type Definition
// ============================================================================

/**
 * Ok variant - represents a successful result
 */
export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

/**
 * Err variant - represents a failed result
 */
export interface Err<E> {
  readonly ok: false;
  readonly error: E;
}

/**
 * Result type - either Ok<T> or Err<E>
 */
export type Result<T, E = Error> = Ok<T> | Err<E>;

// ============================================================================
// Constructors
// ============================================================================

/**
 * Create a successful result
 */
export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

/**
 * Create a failed result
 */
export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}
