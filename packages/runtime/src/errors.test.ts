// Tests for the ingestion error taxonomy

import { describe, it, expect } from 'vitest';
import {
  RuntimeError,
  ValidationError,
  UnknownLocationError,
  UnknownUserError,
  StorageError,
  IngestionTimeoutError,
  IngestionAbortedError,
  isIngestionError,
} from './errors.js';

describe('ingestion errors', () => {
  it('names the missing spot', () => {
    const error = new UnknownLocationError('Seal Rock');

    expect(error).toBeInstanceOf(RuntimeError);
    expect(error.code).toBe('UNKNOWN_LOCATION');
    expect(error.message).toBe('Unknown location: Seal Rock');
    expect(error.spotName).toBe('Seal Rock');
  });

  it('names the missing user', () => {
    const error = new UnknownUserError('ghost');

    expect(error.code).toBe('UNKNOWN_USER');
    expect(error.message).toBe('Unknown user: ghost');
    expect(error.username).toBe('ghost');
  });

  it('records the failing step and the underlying cause', () => {
    const cause = new Error('deadlock detected');
    const error = new StorageError('insert_wind', cause.message, cause);

    expect(error.code).toBe('STORAGE_ERROR');
    expect(error.step).toBe('insert_wind');
    expect(error.cause).toBe(cause);
    expect(error.message).toBe('Storage failure during insert_wind: deadlock detected');
  });

  it('treats timeouts and aborts as storage failures', () => {
    const timeout = new IngestionTimeoutError('insert_swell', 250);
    const aborted = new IngestionAbortedError('resolve_user');

    expect(timeout).toBeInstanceOf(StorageError);
    expect(timeout.code).toBe('INGESTION_TIMEOUT');
    expect(timeout.message).toBe('Storage failure during insert_swell: timed out after 250ms');
    expect(aborted).toBeInstanceOf(StorageError);
    expect(aborted.code).toBe('INGESTION_ABORTED');
    expect(aborted.message).toBe('Storage failure during resolve_user: aborted');
    expect(aborted.cause).toBeUndefined();
  });

  it('recognizes members of the taxonomy', () => {
    expect(isIngestionError(new ValidationError('rating: Expected number'))).toBe(true);
    expect(isIngestionError(new UnknownUserError('ghost'))).toBe(true);
    expect(isIngestionError(new IngestionTimeoutError('commit', 1))).toBe(true);
    expect(isIngestionError(new RuntimeError('OTHER', 'other'))).toBe(false);
    expect(isIngestionError(new Error('plain'))).toBe(false);
    expect(isIngestionError('Unknown user: ghost')).toBe(false);
  });
});
