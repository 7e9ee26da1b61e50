/**
 * DataSource Types
 *
 * Interfaces for local and remote data sources.
 * These abstractions allow repositories to work with different storage backends.
 */

import type { z } from 'zod';
import type { AuthSession, SyncableEntity, SyncTableName } from '../types';

/**
 * A row as the remote store returns or accepts it.
 */
export type RemoteRow = Record<string, unknown>;

/**
 * Interface for remote data source operations (Supabase).
 * Every call is scoped to the owner of the given session.
 */
export interface RemoteDataSource {
  /**
   * Get every row owned by the session's user, tombstones included.
   */
  fetchAll(session: AuthSession): Promise<RemoteRow[]>;

  /**
   * Insert or replace a row by id.
   */
  upsert(row: RemoteRow, session: AuthSession): Promise<void>;
}

/**
 * Builds the remote data source of one table.
 */
export type RemoteDataSourceFactory = (table: {
  tableName: SyncTableName;
  columns: readonly string[];
}) => RemoteDataSource;

/**
 * A local row together with its sync bookkeeping.
 */
export interface LocalRecord<T extends SyncableEntity> {
  entity: T;
  /** When this exact state was last confirmed on the remote; `null` means pending. */
  syncedAt: string | null;
}

/**
 * The state a sync cycle read a local row in. Writes made by the cycle only
 * apply while the row is still in this state.
 */
export interface LocalSnapshot {
  updatedAt: string;
  syncedAt: string | null;
}

/**
 * Table configuration for data sources.
 */
export interface TableConfig<T extends SyncableEntity> {
  tableName: SyncTableName;
  /** Every column shared by the local and remote table, base columns included. */
  columns: readonly (keyof T & string)[];
  /** Stored as TEXT locally, jsonb remotely. */
  jsonColumns?: readonly (keyof T & string)[];
  /** Stored as INTEGER 0/1 locally, boolean remotely. */
  booleanColumns?: readonly (keyof T & string)[];
  /** Payload instants that the remote may return in another encoding. */
  timestampColumns?: readonly (keyof T & string)[];
  /**
   * Columns that identify one logical record per owner, e.g. `['date']` for one
   * log per day. An empty list means one record per owner. Without it records
   * are matched by id only.
   */
  naturalKey?: readonly (keyof T & string)[];
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
}

export const BASE_COLUMNS = ['id', 'user_id', 'created_at', 'updated_at', 'deleted_at'] as const;
