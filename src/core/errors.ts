export type Severity = 'fatal' | 'error' | 'warning';

export type ErrorCode =
  | 'TRANSIENT_FETCH'
  | 'QUOTA_EXCEEDED'
  | 'PERMANENT_FETCH'
  | 'CHANNEL_RUN_FAILED'
  | 'VALIDATION'
  | 'SCHEMA'
  | 'LEDGER';

export abstract class EtlError extends Error {
  abstract readonly code: ErrorCode;
  abstract readonly severity: Severity;
  readonly context: Record<string, unknown>;

  constructor(message: string, context: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.context = context;
  }

  toString(): string {
    return `[${this.severity.toUpperCase()}] ${this.code}: ${this.message}`;
  }
}

/** Network failure, timeout or 5xx. Retried with backoff. */
export class TransientFetchError extends EtlError {
  readonly code = 'TRANSIENT_FETCH';
  readonly severity = 'warning';
  readonly status: number | null;

  constructor(message: string, status: number | null, context: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super(message, { ...context, status }, options);
    this.status = status;
  }
}

/** Shared daily API budget is gone: no more fetching for anyone today. */
export class QuotaExceededError extends EtlError {
  readonly code = 'QUOTA_EXCEEDED';
  readonly severity = 'fatal';
  readonly reason: string;

  constructor(reason: string, context: Record<string, unknown> = {}) {
    super(`API quota exceeded (${reason})`, { ...context, reason });
    this.reason = reason;
  }
}

/** 4xx other than quota, or a channel the API does not know. */
export class PermanentFetchError extends EtlError {
  readonly code = 'PERMANENT_FETCH';
  readonly severity = 'error';
  readonly status: number | null;

  constructor(message: string, status: number | null, context: Record<string, unknown> = {}) {
    super(message, { ...context, status });
    this.status = status;
  }
}

export type FetchError = TransientFetchError | QuotaExceededError | PermanentFetchError | SchemaError;

export class ChannelRunFailed extends EtlError {
  readonly code = 'CHANNEL_RUN_FAILED';
  readonly severity = 'error';

  constructor(message: string, context: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super(message, context, options);
  }
}

/** A single row failed validation; it is skipped and counted. */
export class ValidationError extends EtlError {
  readonly code = 'VALIDATION';
  readonly severity = 'warning';
  readonly field: string | null;

  constructor(message: string, field: string | null = null, context: Record<string, unknown> = {}) {
    super(message, { ...context, field });
    this.field = field;
  }
}

/** Contract violation with the API or the storage layer. Aborts the process. */
export class SchemaError extends EtlError {
  readonly code = 'SCHEMA';
  readonly severity = 'fatal';

  constructor(message: string, context: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super(message, context, options);
  }
}

export class LedgerError extends EtlError {
  readonly code = 'LEDGER';
  readonly severity = 'error';

  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, context);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

const SCHEMA_MISMATCH = /no such (table|column)|has no column named/i;

/** Storage errors that mean the database does not look like we expect. */
export function asStorageError(error: unknown, context: Record<string, unknown> = {}): unknown {
  if (error instanceof Error && SCHEMA_MISMATCH.test(error.message)) {
    return new SchemaError(`Storage schema mismatch: ${error.message}`, context, { cause: error });
  }
  return error;
}
