import { describe, expect, it } from 'vitest';
import {
  AuthError,
  isRetryableError,
  LocalStorageError,
  NetworkError,
  remoteErrorFrom,
  SerializationError,
  SyncError,
  TimeoutError,
  toSyncError,
} from '@/sync/errors';

describe('remoteErrorFrom', () => {
  it.each([
    [{ message: 'JWT expired', code: 'PGRST301' }, 401, AuthError],
    [{ message: 'permission denied for table daily_logs', code: '42501' }, 403, AuthError],
    [{ message: 'new row violates row-level security policy', code: '42501' }, 409, AuthError],
    [{ message: 'invalid input syntax for type uuid', code: '22P02' }, 400, SerializationError],
    [{ message: 'duplicate key value', code: '23505' }, 409, SerializationError],
    [{ message: 'bad payload', code: null }, 422, SerializationError],
    [{ message: 'upstream unavailable', code: '' }, 502, NetworkError],
    [{ message: 'TypeError: fetch failed', code: '' }, 0, NetworkError],
    [{ message: 'TimeoutError: The operation was aborted due to timeout', code: '23' }, 0, TimeoutError],
    [{ message: 'AbortError: This operation was aborted', code: '' }, 0, TimeoutError],
  ])('classifies %j with status %i', (error, status, expected) => {
    const classified = remoteErrorFrom(error, status, 'daily_logs');

    expect(classified).toBeInstanceOf(expected);
    expect(classified.table).toBe('daily_logs');
  });
});

describe('toSyncError', () => {
  it('keeps sync errors as they are', () => {
    const error = new AuthError('JWT expired');

    expect(toSyncError(error, 'user_profiles')).toBe(error);
  });

  it('maps aborted requests to timeouts', () => {
    const abort = new Error('The operation was aborted due to timeout');
    abort.name = 'TimeoutError';

    expect(toSyncError(abort, 'user_profiles')).toBeInstanceOf(TimeoutError);
  });

  it('treats anything else as a network failure', () => {
    const converted = toSyncError('socket hang up', 'user_cabinets');

    expect(converted).toBeInstanceOf(NetworkError);
    expect(converted.message).toBe('Unknown sync error');
    expect(converted.table).toBe('user_cabinets');
  });
});

describe('isRetryableError', () => {
  it('retries transient failures only', () => {
    expect(isRetryableError(new NetworkError('offline'))).toBe(true);
    expect(isRetryableError(new TimeoutError('slow'))).toBe(true);
    expect(isRetryableError(new AuthError('expired'))).toBe(false);
    expect(isRetryableError(new SerializationError('bad row'))).toBe(false);
    expect(isRetryableError(new LocalStorageError('disk full'))).toBe(false);
  });

  it('exposes the kind on the base class', () => {
    const error: SyncError = new SerializationError('bad row', { recordId: 'item-1' });

    expect(error.kind).toBe('serialization');
    expect(error.recordId).toBe('item-1');
  });
});
