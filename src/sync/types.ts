/**
 * Sync Types
 *
 * Shared type definitions for the offline-first synchronization system.
 */

import type { SyncError } from './errors';

// Re-export entity types from lib/types for convenience
export type {
  AuthSession,
  CabinetItem,
  DailyLog,
  ProgramEnrollment,
  ProgressRecord,
  SyncableEntity,
  UserProfile,
} from '@/lib/types';

// Sync status for UI
export type SyncStatusState = 'idle' | 'syncing' | 'error';

// Merge strategy options
export type MergeStrategy = 'last-write-wins' | 'local-wins' | 'remote-wins';

// Which copy of a record the conflict resolver kept
export type ConflictWinner = 'local' | 'remote';

// Per-collection counters for one sync cycle
export interface SyncStats {
  pulled: number;    // remote rows written locally
  pushed: number;    // local rows written remotely
  unchanged: number; // rows identical on both sides
  skipped: number;   // malformed remote rows left untouched
  failed: number;    // rows the remote rejected
}

export type CollectionSyncOutcome =
  | { ok: true; table: SyncTableName; stats: SyncStats }
  | { ok: false; table: SyncTableName; stats: SyncStats; error: SyncError };

export interface CollectionSyncReport {
  table: SyncTableName;
  status: 'synced' | 'failed';
  stats: SyncStats;
  error: SyncError | null;
}

export type SyncSkipReason = 'cooldown' | 'signed-out' | 'offline-only';

// Result of one runSync() call
export interface SyncSummary {
  ran: boolean;
  skipReason: SyncSkipReason | null;
  success: boolean;
  startedAt: string;
  finishedAt: string;
  pulled: number;
  pushed: number;
  collections: CollectionSyncReport[];
  lastSyncError: SyncError | null;
}

// Explicit lifecycle events that start a sync cycle
export type SyncTrigger =
  | { type: 'app-launched' }
  | { type: 'app-did-become-active' }
  | { type: 'authentication-succeeded' }
  | { type: 'manual-refresh-requested' }
  | { type: 'local-change'; table: SyncTableName }
  | { type: 'periodic' };

export type SyncTriggerType = SyncTrigger['type'];

// Triggers where staleness is unacceptable bypass the cooldown
export const FORCED_TRIGGERS: ReadonlySet<SyncTriggerType> = new Set<SyncTriggerType>([
  'app-launched',
  'authentication-succeeded',
  'manual-refresh-requested',
]);

// Listener types for observable pattern
export type DataListener<T> = (data: T[]) => void;
export type SyncStatusListener = (status: SyncStatusState, error?: SyncError) => void;

// Sync configuration defaults
export const SYNC_CONFIG = {
  COOLDOWN_MS: 30000,          // Minimum gap between non-forced sync cycles
  DEBOUNCE_MS: 2000,           // Wait 2s after last local change before syncing
  PERIODIC_SYNC_MS: 60000,     // Non-forced sync every 60 seconds once started
  REMOTE_TIMEOUT_MS: 15000,    // Bound on every remote call
} as const;

// Table names for type safety
export const SYNC_TABLES = {
  USER_PROFILES: 'user_profiles',
  DAILY_LOGS: 'daily_logs',
  PROGRESS_RECORDS: 'progress_records',
  USER_CABINETS: 'user_cabinets',
  PROGRAM_ENROLLMENTS: 'program_enrollments',
} as const;

export type SyncTableName = typeof SYNC_TABLES[keyof typeof SYNC_TABLES];

// Order in which collections are synchronized and purged
export const SYNC_TABLE_ORDER: readonly SyncTableName[] = [
  SYNC_TABLES.USER_PROFILES,
  SYNC_TABLES.DAILY_LOGS,
  SYNC_TABLES.PROGRESS_RECORDS,
  SYNC_TABLES.USER_CABINETS,
  SYNC_TABLES.PROGRAM_ENROLLMENTS,
];

export function emptyStats(): SyncStats {
  return { pulled: 0, pushed: 0, unchanged: 0, skipped: 0, failed: 0 };
}
