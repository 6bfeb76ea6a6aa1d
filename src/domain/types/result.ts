/**
 * Simplified Result Pattern
 * Basic discriminated union for error handling without complex monadic utilities
 */

import type { ErrorCode } from '../../lib/errors';

/**
 * Result type - simple discriminated union.
 * Failures may carry an error code so callers can classify them without parsing messages.
 */
export type Result<T> = { ok: true; value: T } | { ok: false; error: string; code?: ErrorCode };

/**
 * Create a success result
 */
export const Success = <T>(value: T): Result<T> => ({ ok: true, value });

/**
 * Create a failure result
 */
export const Failure = <T>(error: string, code?: ErrorCode): Result<T> =>
  code ? { ok: false, error, code } : { ok: false, error };
