import type { RecordField } from './types';

// ================================================
// ERROR TAXONOMY
// ================================================

export type CrawlErrorKind =
  | 'LoadTimeout'
  | 'LoadFailed'
  | 'MissingField'
  | 'InvalidNumber'
  | 'InvalidTimestamp'
  | 'WriteError'
  | 'SessionStartupFailure';

/** Item errors end the current item only; run errors end the crawl */
export type ErrorScope = 'item' | 'run';

export abstract class CrawlError extends Error {
  abstract readonly kind: CrawlErrorKind;
  abstract readonly scope: ErrorScope;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// ================================================
// ITEM-SCOPED ERRORS
// ================================================

export class LoadTimeoutError extends CrawlError {
  readonly kind = 'LoadTimeout';
  readonly scope = 'item';

  constructor(
    readonly url: string,
    readonly timeoutMs: number,
    options?: { cause?: unknown }
  ) {
    super(`Page did not become ready within ${timeoutMs}ms: ${url}`, options);
  }
}

export class PageLoadError extends CrawlError {
  readonly kind = 'LoadFailed';
  readonly scope = 'item';

  constructor(
    readonly url: string,
    reason: string,
    options?: { cause?: unknown }
  ) {
    super(`Failed to load ${url}: ${reason}`, options);
  }
}

export class MissingFieldError extends CrawlError {
  readonly kind = 'MissingField';
  readonly scope = 'item';

  constructor(readonly field: RecordField) {
    super(`Required field '${field}' not found on page`);
  }
}

export class InvalidNumberError extends CrawlError {
  readonly kind = 'InvalidNumber';
  readonly scope = 'item';

  constructor(
    readonly field: RecordField,
    readonly raw: string
  ) {
    super(`Field '${field}' is not a non-negative integer: '${raw}'`);
  }
}

export class InvalidTimestampError extends CrawlError {
  readonly kind = 'InvalidTimestamp';
  readonly scope = 'item';

  constructor(
    readonly field: RecordField,
    readonly raw: string
  ) {
    super(`Field '${field}' is not an ISO 8601 timestamp with offset: '${raw}'`);
  }
}

// ================================================
// RUN-SCOPED ERRORS
// ================================================

export class WriteError extends CrawlError {
  readonly kind = 'WriteError';
  readonly scope = 'run';

  constructor(
    readonly path: string,
    options?: { cause?: unknown }
  ) {
    const reason =
      options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super(`Cannot write to output sink ${path}${reason}`, options);
  }
}

export class SessionStartupError extends CrawlError {
  readonly kind = 'SessionStartupFailure';
  readonly scope = 'run';

  constructor(options?: { cause?: unknown }) {
    const reason =
      options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super(`Browser session could not be started${reason}`, options);
  }
}

export type ExtractionError = MissingFieldError;

export type NormalizationError = InvalidNumberError | InvalidTimestampError;

export type ItemError =
  | LoadTimeoutError
  | PageLoadError
  | ExtractionError
  | NormalizationError;

export function isCrawlError(error: unknown): error is CrawlError {
  return error instanceof CrawlError;
}

export function isItemError(error: unknown): error is ItemError {
  return isCrawlError(error) && error.scope === 'item';
}

export function isRunError(error: unknown): error is CrawlError {
  return isCrawlError(error) && error.scope === 'run';
}

/** Kind reported for failures the crawler does not classify */
export type FailureKind = CrawlErrorKind | 'Unexpected';

export function failureKind(error: unknown): FailureKind {
  return isCrawlError(error) ? error.kind : 'Unexpected';
}
