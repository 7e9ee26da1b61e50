/**
 * Sync error taxonomy.
 *
 * Every failure inside a collection's sync cycle is converted into one of these
 * and returned as a value; nothing escapes the collection boundary as a throw.
 */

import type { SyncTableName } from './types';

export type SyncErrorKind = 'network' | 'timeout' | 'auth' | 'serialization' | 'local-storage';

interface SyncErrorOptions {
  table?: SyncTableName | null;
  recordId?: string | null;
  cause?: unknown;
}

export class SyncError extends Error {
  readonly kind: SyncErrorKind;
  readonly table: SyncTableName | null;
  readonly recordId: string | null;

  constructor(kind: SyncErrorKind, message: string, options: SyncErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = 'SyncError';
    this.kind = kind;
    this.table = options.table ?? null;
    this.recordId = options.recordId ?? null;
  }
}

/** Connectivity loss or a transient server failure. Retried on the next natural trigger. */
export class NetworkError extends SyncError {
  constructor(message: string, options?: SyncErrorOptions) {
    super('network', message, options);
    this.name = 'NetworkError';
  }
}

/** A remote call exceeded its time bound. Handled like any network failure. */
export class TimeoutError extends SyncError {
  constructor(message: string, options?: SyncErrorOptions) {
    super('timeout', message, options);
    this.name = 'TimeoutError';
  }
}

/** Session expired or access denied. The user has to authenticate again. */
export class AuthError extends SyncError {
  constructor(message: string, options?: SyncErrorOptions) {
    super('auth', message, options);
    this.name = 'AuthError';
  }
}

/** A single record could not be encoded or decoded. */
export class SerializationError extends SyncError {
  constructor(message: string, options?: SyncErrorOptions) {
    super('serialization', message, options);
    this.name = 'SerializationError';
  }
}

/** The local persistence layer failed. */
export class LocalStorageError extends SyncError {
  constructor(message: string, options?: SyncErrorOptions) {
    super('local-storage', message, options);
    this.name = 'LocalStorageError';
  }
}

/**
 * Sign-out was refused because local changes could not be pushed first.
 */
export class UnsyncedChangesError extends Error {
  constructor(readonly pendingCount: number, readonly lastSyncError: SyncError | null) {
    super(`${pendingCount} local change(s) have not been synced`);
    this.name = 'UnsyncedChangesError';
  }
}

// Shape of the error object returned by PostgREST through supabase-js
export interface PostgrestErrorLike {
  message: string;
  code?: string | null;
  details?: string | null;
  hint?: string | null;
}

const AUTH_ERROR_CODES = new Set(['PGRST301', 'PGRST302', '42501']);

/**
 * Classify a failed Supabase request by HTTP status and PostgREST error code.
 * A status of 0 means the request never got a response.
 */
export function remoteErrorFrom(
  error: PostgrestErrorLike,
  status: number,
  table: SyncTableName | null
): SyncError {
  const code = error.code ?? '';
  const message = error.message;

  if (status === 0) {
    if (message.startsWith('TimeoutError') || message.startsWith('AbortError')) {
      return new TimeoutError(`Request to ${table ?? 'remote'} timed out`, { table, cause: error });
    }
    return new NetworkError(message, { table, cause: error });
  }

  if (status === 401 || status === 403 || AUTH_ERROR_CODES.has(code)) {
    return new AuthError(message, { table, cause: error });
  }

  if (status === 400 || status === 422 || code.startsWith('22') || code.startsWith('23')) {
    return new SerializationError(message, { table, cause: error });
  }

  return new NetworkError(message, { table, cause: error });
}

/**
 * Convert anything thrown during a collection's cycle into a SyncError.
 */
export function toSyncError(error: unknown, table: SyncTableName | null): SyncError {
  if (error instanceof SyncError) {
    return error;
  }

  const message = error instanceof Error ? error.message : 'Unknown sync error';
  if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
    return new TimeoutError(message, { table, cause: error });
  }
  return new NetworkError(message, { table, cause: error });
}

/**
 * Whether the next natural sync trigger may succeed without user action.
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof SyncError) {
    return error.kind === 'network' || error.kind === 'timeout';
  }
  return true;
}
