/**
 * Core Result type
 *
 * Every public entry point returns a Result instead of throwing, so callers
 * (the CLI, embedding programs, tests) branch on `ok` and read structured
 * guidance on failure.
 */

import type { ErrorCode } from '@/lib/errors';

/**
 * Structured guidance attached to a failure.
 */
export interface ErrorGuidance {
  /** Short human-readable summary */
  message?: string;
  /** Likely cause */
  hint?: string;
  /** What the operator can do about it */
  resolution?: string;
  /** Extra machine-readable detail (failed nodes, violated fields, ...) */
  details?: Record<string, unknown>;
}

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: string; code?: ErrorCode; guidance?: ErrorGuidance };

export function Success<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function Failure(error: string, guidance?: ErrorGuidance, code?: ErrorCode): Result<never> {
  return {
    ok: false,
    error,
    ...(code !== undefined && { code }),
    ...(guidance !== undefined && { guidance }),
  };
}

export function isSuccess<T>(result: Result<T>): result is { ok: true; value: T } {
  return result.ok;
}
