/**
 * Extraction error taxonomy
 *
 * Every cascade failure surfaces as one of three subclasses. The caller maps
 * them to outcome classes: NotFoundError is permanent, RateLimitedError is
 * transient for the whole domain, GenericExtractionError is transient for
 * this URL.
 */

import type { ExtractionAttempt } from '../types/index.js';

export type ExtractionErrorCode = 'NOT_FOUND' | 'RATE_LIMITED' | 'EXTRACTION_FAILED';

export abstract class ExtractionError extends Error {
  abstract readonly code: ExtractionErrorCode;

  constructor(
    message: string,
    public readonly attempt: ExtractionAttempt
  ) {
    super(message);
    this.name = 'ExtractionError';
  }

  /** Whether a later retry of the same URL could succeed */
  get retryable(): boolean {
    return this.code !== 'NOT_FOUND';
  }
}

/**
 * The article is gone (404 / 410). Never retried.
 */
export class NotFoundError extends ExtractionError {
  readonly code = 'NOT_FOUND' as const;

  constructor(attempt: ExtractionAttempt) {
    super(`Article not found (HTTP ${attempt.httpStatus ?? 'unknown'}): ${attempt.url}`, attempt);
    this.name = 'NotFoundError';
  }
}

/**
 * The domain is cooling down or every method hit a protection response.
 * Retry after retryAfterMs.
 */
export class RateLimitedError extends ExtractionError {
  readonly code = 'RATE_LIMITED' as const;

  constructor(
    attempt: ExtractionAttempt,
    public readonly retryAfterMs: number,
    public readonly reason: 'cooldown' | 'protection'
  ) {
    super(
      reason === 'cooldown'
        ? `Domain ${attempt.domain} is cooling down for ${Math.ceil(retryAfterMs / 1000)}s`
        : `Blocked by ${attempt.protectionKind ?? 'bot protection'} on ${attempt.domain}`,
      attempt
    );
    this.name = 'RateLimitedError';
  }
}

/**
 * No method produced usable content and no protection was seen
 */
export class GenericExtractionError extends ExtractionError {
  readonly code = 'EXTRACTION_FAILED' as const;

  constructor(
    attempt: ExtractionAttempt,
    public readonly causes: ReadonlyArray<{ method: string; message: string }> = []
  ) {
    const detail = causes.map((c) => `${c.method}: ${c.message}`).join('; ');
    super(`Extraction failed for ${attempt.url}${detail ? ` (${detail})` : ''}`, attempt);
    this.name = 'GenericExtractionError';
  }
}

export function isExtractionError(error: unknown): error is ExtractionError {
  return error instanceof ExtractionError;
}
