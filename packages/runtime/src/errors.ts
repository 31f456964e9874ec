// Runtime error types

/**
 * Base class for all runtime errors.
 * Provides structured error information for debugging and logging.
 */
export class RuntimeError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = 'RuntimeError';
    this.code = code;
  }
}

/**
 * Validation error for malformed or missing input.
 */
export class ValidationError extends RuntimeError {
  readonly field?: string;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    options?: { field?: string; details?: Record<string, unknown> }
  ) {
    super('VALIDATION_ERROR', message);
    this.name = 'ValidationError';
    this.field = options?.field;
    this.details = options?.details;
  }
}

/**
 * Error when an observation names a spot that has no Location row.
 */
export class UnknownLocationError extends RuntimeError {
  readonly spotName: string;

  constructor(spotName: string) {
    super('UNKNOWN_LOCATION', `Unknown location: ${spotName}`);
    this.name = 'UnknownLocationError';
    this.spotName = spotName;
  }
}

/**
 * Error when an observation names a username that has no User row.
 */
export class UnknownUserError extends RuntimeError {
  readonly username: string;

  constructor(username: string) {
    super('UNKNOWN_USER', `Unknown user: ${username}`);
    this.name = 'UnknownUserError';
    this.username = username;
  }
}

/**
 * Error when buoy readings for a session cannot be fetched or summarized.
 */
export class BuoyDataError extends RuntimeError {
  readonly station: number;
  readonly cause?: Error;

  constructor(station: number, message: string, cause?: Error) {
    super('BUOY_DATA_ERROR', message);
    this.name = 'BuoyDataError';
    this.station = station;
    this.cause = cause;
  }
}

/**
 * Steps of the ingestion unit of work, in execution order.
 */
export type IngestionStep =
  | 'resolve_location'
  | 'resolve_user'
  | 'insert_temperature'
  | 'insert_swell'
  | 'insert_tide'
  | 'insert_wind'
  | 'insert_session'
  | 'commit';

/**
 * Error when the storage layer fails during ingestion.
 * The unit of work has been rolled back by the time this reaches the caller.
 */
export class StorageError extends RuntimeError {
  readonly step: IngestionStep;
  readonly cause?: Error;

  constructor(step: IngestionStep, reason: string, cause?: Error, code = 'STORAGE_ERROR') {
    super(code, `Storage failure during ${step}: ${reason}`);
    this.name = 'StorageError';
    this.step = step;
    this.cause = cause;
  }
}

/**
 * Error when ingestion runs past its deadline.
 */
export class IngestionTimeoutError extends StorageError {
  readonly timeoutMs: number;

  constructor(step: IngestionStep, timeoutMs: number) {
    super(step, `timed out after ${timeoutMs}ms`, undefined, 'INGESTION_TIMEOUT');
    this.name = 'IngestionTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Error when the caller aborts ingestion through its AbortSignal.
 */
export class IngestionAbortedError extends StorageError {
  constructor(step: IngestionStep, reason?: unknown) {
    super(
      step,
      reason instanceof Error ? `aborted: ${reason.message}` : 'aborted',
      reason instanceof Error ? reason : undefined,
      'INGESTION_ABORTED'
    );
    this.name = 'IngestionAbortedError';
  }
}

/**
 * Any error the ingestion operation reports.
 */
export type IngestionError =
  | ValidationError
  | UnknownLocationError
  | UnknownUserError
  | StorageError;

/**
 * Check whether a value belongs to the ingestion error taxonomy.
 */
export function isIngestionError(error: unknown): error is IngestionError {
  return (
    error instanceof ValidationError ||
    error instanceof UnknownLocationError ||
    error instanceof UnknownUserError ||
    error instanceof StorageError
  );
}
