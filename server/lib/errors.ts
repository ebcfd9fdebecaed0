/**
 * Error taxonomy for the sync pipeline.
 *
 * Every failure that crosses the source or store boundary is converted into
 * one of these classes, and callers dispatch on `kind` rather than on error
 * text.
 */

export type SyncErrorKind = 'connectivity' | 'invalid-range' | 'not-found' | 'storage-integrity';

interface SyncErrorOptions {
  cause?: unknown;
  httpStatus?: number;
  code?: string | number;
}

export class SyncError extends Error {
  readonly kind: SyncErrorKind;
  readonly httpStatus: number | null;
  readonly code: string | number | null;

  constructor(kind: SyncErrorKind, message: string, options: SyncErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'SyncError';
    this.kind = kind;
    this.httpStatus = options.httpStatus ?? null;
    this.code = options.code ?? null;
  }
}

/** Source or store unreachable, timed out, or lost its session. */
export class ConnectivityError extends SyncError {
  constructor(message: string, options: SyncErrorOptions = {}) {
    super('connectivity', message, options);
    this.name = 'ConnectivityError';
  }
}

/** The source rejected a request because of its size or shape. */
export class InvalidRangeError extends SyncError {
  constructor(message: string, options: SyncErrorOptions = {}) {
    super('invalid-range', message, options);
    this.name = 'InvalidRangeError';
  }
}

/** An instrument (or other named resource) does not exist on the source. */
export class NotFoundError extends SyncError {
  constructor(message: string, options: SyncErrorOptions = {}) {
    super('not-found', message, options);
    this.name = 'NotFoundError';
  }
}

/** Instrument resolution found no native symbol. The gateway reports it once. */
export class UnknownInstrumentError extends NotFoundError {
  constructor(message: string, options: SyncErrorOptions = {}) {
    super(message, options);
    this.name = 'UnknownInstrumentError';
  }
}

/** A write failed for a reason other than a duplicate key. */
export class StorageIntegrityError extends SyncError {
  constructor(message: string, options: SyncErrorOptions = {}) {
    super('storage-integrity', message, options);
    this.name = 'StorageIntegrityError';
  }
}

export function isSyncError(err: unknown, kind?: SyncErrorKind): err is SyncError {
  if (!(err instanceof SyncError)) return false;
  return kind === undefined || err.kind === kind;
}

/**
 * Returns true if `err` represents a request-abort signal: an AbortError by
 * name or an HTTP 499 status.
 */
export function isAbortError(err: unknown): boolean {
  if (!err || typeof err !== 'object') return false;
  const e = err as Record<string, unknown>;
  return e.name === 'AbortError' || Number(e.httpStatus) === 499;
}

export function buildAbortError(message?: string): Error {
  const err = new Error(message || 'Operation aborted');
  err.name = 'AbortError';
  return err;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
