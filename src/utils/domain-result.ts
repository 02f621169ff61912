/**
 * Domain Result Pattern
 * @module utils/domain-result
 *
 * Typed expected failures of data-layer operations.
 */

import { type Result, type Err, err } from './result.js';

// ============================================================================
// Domain Error Types
// ============================================================================

/**
 * Expected failures an operation reports instead of throwing
 */
export type DomainError =
  | { type: 'not_found'; resource: string; id?: string }
  | { type: 'conflict'; resource: string; message: string };

/**
 * Result type with DomainError
 */
export type DomainResult<T> = Result<T, DomainError>;

// ============================================================================
// Domain Error Constructors
// ============================================================================

/**
 * Create a not found domain error
 */
export function notFound(resource: string, id?: string): Err<DomainError> {
  return err({ type: 'not_found', resource, id });
}

/**
 * Create a conflict domain error
 */
export function conflictErr(resource: string, message: string): Err<DomainError> {
  return err({ type: 'conflict', resource, message });
}
