/**
 * @fileoverview Result type for explicit error handling
 *
 * Scanners return Results so that one bad line or file is reported and
 * skipped instead of aborting a repository-wide pass.
 */

import { getErrorMessage } from './errors.js';

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

function toError(thrown: unknown): Error {
  return thrown instanceof Error ? thrown : new Error(getErrorMessage(thrown));
}

/**
 * Run an async step (a git call, a note write) and capture its rejection.
 * Non-Error rejections are wrapped so callers always see an Error.
 */
export async function safeAsync<T>(fn: () => Promise<T>): Promise<Result<T, Error>> {
  try {
    return Ok(await fn());
  } catch (e) {
    return Err(toError(e));
  }
}

/** Synchronous counterpart of safeAsync, used around JSON and YAML parsing. */
export function safeSync<T>(fn: () => T): Result<T, Error> {
  try {
    return Ok(fn());
  } catch (e) {
    return Err(toError(e));
  }
}

/**
 * Value of an Ok result. An Err rethrows its error unchanged, so a
 * NoteDecodeError or MalformedTagError keeps its type and context.
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (!result.ok) throw result.error;
  return result.value;
}

// ============================================================================
// ASYNC RESULT UTILITIES
// ============================================================================

export interface RetryOptions {
  /** Attempts after the first one. */
  maxRetries?: number;
  delayMs?: number;
  backoffMultiplier?: number;
  shouldRetry?: (error: Error) => boolean;
  onRetry?: (error: Error, attempt: number) => void;
}

/**
 * Retry an operation a bounded number of times. Never loops forever: the
 * last error is returned once the retries are spent.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<Result<T, Error>> {
  const {
    maxRetries = 3,
    delayMs = 0,
    backoffMultiplier = 2,
    shouldRetry = () => true,
    onRetry,
  } = options;

  let lastError: Error | undefined;
  let currentDelay = delayMs;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    const result = await safeAsync(() => fn(attempt));

    if (result.ok) {
      return result;
    }

    lastError = result.error;

    if (!shouldRetry(result.error)) {
      return Err(result.error);
    }

    if (attempt < maxRetries) {
      onRetry?.(result.error, attempt + 1);
      if (currentDelay > 0) {
        await new Promise(resolve => setTimeout(resolve, currentDelay));
        currentDelay *= backoffMultiplier;
      }
    }
  }

  return Err(lastError ?? new Error('Max retries exceeded'));
}
