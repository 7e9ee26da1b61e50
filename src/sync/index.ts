/**
 * Sync Module Public API
 *
 * Offline-first synchronization of the personal record collections.
 *
 * Architecture:
 * - Local SQLite database is the source of truth for all reads
 * - Writes go to local first and stay pending until a sync confirms them
 * - Bidirectional sync with Supabase PostgreSQL, one collection at a time
 * - Whole-record last-write-wins conflict resolution, local wins ties
 *
 * Usage:
 * 1. `const engine = await createSyncEngine()`
 * 2. Read and write through `engine.repositories`
 * 3. Feed lifecycle events to `engine.syncService.handle()`, or call `runSync()`
 */

// Types
export type {
  AuthSession,
  CabinetItem,
  CollectionSyncOutcome,
  CollectionSyncReport,
  ConflictWinner,
  DailyLog,
  DataListener,
  MergeStrategy,
  ProgramEnrollment,
  ProgressRecord,
  SyncableEntity,
  SyncSkipReason,
  SyncStats,
  SyncStatusListener,
  SyncStatusState,
  SyncSummary,
  SyncTableName,
  SyncTrigger,
  SyncTriggerType,
  UserProfile,
} from './types';

export { FORCED_TRIGGERS, SYNC_CONFIG, SYNC_TABLE_ORDER, SYNC_TABLES } from './types';

// Errors
export {
  AuthError,
  isRetryableError,
  LocalStorageError,
  NetworkError,
  SerializationError,
  SyncError,
  TimeoutError,
  UnsyncedChangesError,
  type SyncErrorKind,
} from './errors';

// Timestamps
export { DISTANT_PAST, formatTimestamp, isDistantPast, parseTimestamp, tryParseTimestamp } from './timestamps';

// Services
export { ConflictResolver } from './services/ConflictResolver';
export { SessionManager, type SessionListener } from './services/SessionManager';
export { SignOutPurger } from './services/SignOutPurger';
export { SyncScheduler } from './services/SyncScheduler';
export { SyncService, type SignOutOptions, type SyncableRepository, type SyncServiceOptions } from './services/SyncService';

// Data Sources
export { LocalDataSource } from './datasources/LocalDataSource';
export { createSupabaseRemoteFactory, SupabaseRemoteDataSource } from './datasources/RemoteDataSource';
export type { RemoteDataSource, RemoteDataSourceFactory, RemoteRow, TableConfig } from './datasources/types';

// Repositories
export * from './repositories';

// Composition
export { createSyncEngine, type SyncEngine, type SyncEngineOptions, type SyncRepositories } from './createSyncEngine';

// Auth boundary
export { AuthFailedError, SupabaseAuthProvider, type AuthProvider } from '@/lib/auth';
export { loadConfig, type AppConfig } from '@/lib/config';
