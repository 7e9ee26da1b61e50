/**
 * BaseRepository
 *
 * Abstract base class for entity repositories implementing the offline-first pattern:
 * - All reads come from LocalDataSource (source of truth for unsynced changes)
 * - Writes go to LocalDataSource and are marked pending until a sync confirms them
 * - `sync()` reconciles the collection with the remote, one record at a time,
 *   using whole-record last-write-wins
 * - Implements observable pattern for UI integration
 */

import type { LocalDatabase } from '@/lib/database';
import { createLogger } from '@/lib/logger';
import { generateId, systemClock, type Clock, type EntityChanges, type NewEntity } from '@/lib/types';
import { LocalDataSource, snapshotOf, toRecord } from '../datasources/LocalDataSource';
import {
  BASE_COLUMNS,
  type LocalRecord,
  type LocalSnapshot,
  type RemoteDataSource,
  type RemoteDataSourceFactory,
  type RemoteRow,
  type TableConfig,
} from '../datasources/types';
import { SerializationError, toSyncError, type SyncError } from '../errors';
import { ConflictResolver } from '../services/ConflictResolver';
import type { SessionManager } from '../services/SessionManager';
import type { SyncableRepository } from '../services/SyncService';
import { formatTimestamp, latestOf, parseTimestamp, tryParseTimestamp } from '../timestamps';
import {
  emptyStats,
  type AuthSession,
  type CollectionSyncOutcome,
  type DataListener,
  type SyncableEntity,
  type SyncStats,
  type SyncTableName,
} from '../types';

const log = createLogger('sync');

export interface RepositoryDeps {
  db: LocalDatabase;
  sessionManager: SessionManager;
  /** `null` in offline-only mode. */
  remote: RemoteDataSourceFactory | null;
  clock?: Clock;
  resolver?: ConflictResolver;
}

type LocalChangeListener = (table: SyncTableName) => void;

/**
 * A record created on this device and one created elsewhere that stand for the
 * same logical record.
 */
interface DuplicatePair<T extends SyncableEntity> {
  local: LocalRecord<T>;
  remote: T;
}

type ParsedRemote<T> =
  | { ok: true; entity: T }
  | { ok: false; id: string | null; error: SyncError };

export abstract class BaseRepository<T extends SyncableEntity> implements SyncableRepository {
  readonly tableName: SyncTableName;

  protected readonly localDataSource: LocalDataSource<T>;
  protected readonly remoteDataSource: RemoteDataSource | null;
  protected readonly sessionManager: SessionManager;
  protected readonly clock: Clock;
  protected readonly resolver: ConflictResolver;

  protected listeners: Set<DataListener<T>> = new Set();
  private localChangeListeners: Set<LocalChangeListener> = new Set();

  private readonly payloadColumns: readonly (keyof T & string)[];
  private readonly timestampColumns: readonly (keyof T & string)[];

  constructor(deps: RepositoryDeps, protected readonly config: TableConfig<T>) {
    this.tableName = config.tableName;
    this.sessionManager = deps.sessionManager;
    this.clock = deps.clock ?? systemClock;
    this.resolver = deps.resolver ?? new ConflictResolver();
    this.localDataSource = new LocalDataSource<T>(deps.db, config);
    this.remoteDataSource = deps.remote
      ? deps.remote({ tableName: config.tableName, columns: config.columns })
      : null;

    const base: readonly string[] = BASE_COLUMNS;
    this.payloadColumns = config.columns.filter((column) => !base.includes(column));
    this.timestampColumns = config.timestampColumns ?? [];
  }

  // ============ Observable Pattern ============

  /**
   * Subscribe to data changes.
   * Immediately emits current data, then emits on each change.
   */
  subscribe(listener: DataListener<T>): () => void {
    this.listeners.add(listener);

    // Immediately emit current data
    void this.emitCurrentData(listener);

    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Listen for local writes. The sync service uses this to schedule a sync.
   */
  onLocalChange(listener: LocalChangeListener): () => void {
    this.localChangeListeners.add(listener);
    return () => {
      this.localChangeListeners.delete(listener);
    };
  }

  /**
   * Re-emit current data to subscribers, e.g. after the local store was purged.
   */
  async refresh(): Promise<void> {
    await this.notifyListeners();
  }

  /**
   * Notify all listeners of data change.
   */
  protected async notifyListeners(): Promise<void> {
    if (this.listeners.size === 0) return;

    const data = await this.getAll();
    for (const listener of this.listeners) {
      try {
        listener(data);
      } catch (error) {
        log.error('Error in data listener:', error);
      }
    }
  }

  private async emitCurrentData(listener: DataListener<T>): Promise<void> {
    try {
      const data = await this.getAll();
      listener(data);
    } catch (error) {
      log.error('Error emitting current data:', error);
      listener([]);
    }
  }

  // ============ Read Operations (Always from Local) ============

  /**
   * Get all items (excluding soft-deleted).
   */
  async getAll(): Promise<T[]> {
    return this.localDataSource.getAll(false);
  }

  /**
   * Get a single live item by ID.
   */
  async getById(id: string): Promise<T | null> {
    const item = await this.localDataSource.getById(id);
    return item && item.deleted_at === null ? item : null;
  }

  /**
   * Count live items.
   */
  async count(): Promise<number> {
    return this.localDataSource.count();
  }

  /**
   * Live rows matching a condition that belong to the signed-in user, or to
   * nobody yet. Signed out, only unowned rows match.
   */
  protected async queryOwned(condition: string, params: unknown[] = [], orderBy?: string): Promise<T[]> {
    const userId = this.sessionManager.currentIdentity()?.userId ?? null;
    const owner = `$${params.length + 1}`;
    return this.localDataSource.queryWhere(
      `(${condition}) AND (user_id = ${owner} OR user_id IS NULL)`,
      [...params, userId],
      orderBy
    );
  }

  // ============ Write Operations (Local, pending until synced) ============

  /**
   * Create a new item owned by the signed-in user, or unowned when signed out.
   */
  async create(data: NewEntity<T>): Promise<T> {
    const now = formatTimestamp(this.clock());

    const item = this.config.schema.parse({
      ...data,
      id: generateId(),
      user_id: this.sessionManager.currentIdentity()?.userId ?? null,
      created_at: now,
      updated_at: now,
      deleted_at: null,
    });

    await this.localDataSource.insert(item);
    await this.afterLocalWrite();

    return item;
  }

  /**
   * Update an existing item. Returns `null` when it does not exist.
   */
  async update(id: string, changes: EntityChanges<T>): Promise<T | null> {
    const existing = await this.getById(id);
    if (!existing) return null;

    const updated = this.config.schema.parse({
      ...existing,
      ...changes,
      id: existing.id,
      user_id: existing.user_id,
      created_at: existing.created_at,
      updated_at: this.nextUpdatedAt(existing),
      deleted_at: null,
    });

    await this.localDataSource.upsert(updated);
    await this.afterLocalWrite();

    return updated;
  }

  /**
   * Delete an item.
   * Owned items become tombstones so the delete reaches the remote; items that
   * never had an owner were never synced and are removed outright.
   */
  async delete(id: string): Promise<boolean> {
    const existing = await this.getById(id);
    if (!existing) return false;

    if (existing.user_id) {
      const deletedAt = this.nextUpdatedAt(existing);
      const tombstone = this.config.schema.parse({
        ...existing,
        updated_at: deletedAt,
        deleted_at: deletedAt,
      });
      await this.localDataSource.upsert(tombstone);
    } else {
      await this.localDataSource.hardDelete(id);
    }

    await this.afterLocalWrite();
    return true;
  }

  /**
   * `updated_at` for the next write: now, unless the clock is behind the
   * previous value.
   */
  protected nextUpdatedAt(previous: T): string {
    return formatTimestamp(latestOf(this.clock(), parseTimestamp(previous.updated_at)));
  }

  protected async afterLocalWrite(): Promise<void> {
    await this.notifyListeners();
    for (const listener of this.localChangeListeners) {
      try {
        listener(this.tableName);
      } catch (error) {
        log.error('Error in local change listener:', error);
      }
    }
  }

  // ============ Sync Operations (Called by SyncService) ============

  async claimUnowned(userId: string): Promise<number> {
    const claimed = await this.localDataSource.claimUnowned(userId);
    if (claimed > 0) {
      log.info(`Claimed ${claimed} local ${this.tableName} row(s) for ${userId}`);
    }
    return claimed;
  }

  async countPending(): Promise<number> {
    return this.localDataSource.countPending();
  }

  /**
   * Reconcile this collection with the remote for the session's user.
   * Never throws: failures come back as an outcome with the error.
   */
  async sync(session: AuthSession): Promise<CollectionSyncOutcome> {
    const stats = emptyStats();
    const remote = this.remoteDataSource;
    if (!remote) {
      return { ok: true, table: this.tableName, stats };
    }

    let recordError: SyncError | null = null;
    let duplicates: DuplicatePair<T>[] = [];

    try {
      await this.localDataSource.claimUnowned(session.userId);

      // Pull: every remote row of the owner
      const remoteRows = await remote.fetchAll(session);
      const remoteById = new Map<string, T>();
      const malformed = new Set<string>();

      for (const row of remoteRows) {
        const parsed = this.parseRemote(row);
        if (parsed.ok) {
          remoteById.set(parsed.entity.id, parsed.entity);
        } else {
          stats.skipped++;
          recordError = parsed.error;
          if (parsed.id) malformed.add(parsed.id);
          log.warn(`Skipping malformed ${this.tableName} row ${parsed.id ?? '(no id)'}: ${parsed.error.message}`);
        }
      }

      const localRecords = await this.localDataSource.getByOwner(session.userId);
      const localById = new Map(localRecords.map((record) => [record.entity.id, record]));
      duplicates = this.findDuplicates(localById, remoteById, malformed);
      const paired = new Set(duplicates.flatMap((pair) => [pair.local.entity.id, pair.remote.id]));
      const ids = new Set([...localById.keys(), ...remoteById.keys()]);

      // Resolve and write, record by record
      for (const id of ids) {
        if (malformed.has(id) || paired.has(id)) continue;

        const local = localById.get(id);
        const remoteEntity = remoteById.get(id);

        if (local && !remoteEntity) {
          const rejected = await this.pushRecord(remote, local.entity, snapshotOf(local), session, stats);
          recordError = rejected ?? recordError;
        } else if (remoteEntity && !local) {
          await this.pullRecord(remoteEntity, null, stats);
        } else if (local && remoteEntity) {
          if (this.resolver.isSameRecord(local.entity, remoteEntity, this.payloadColumns)) {
            if (local.syncedAt === null) {
              await this.localDataSource.markSynced(id, this.syncTimestamp(), snapshotOf(local));
            }
            stats.unchanged++;
          } else if (this.resolver.pick(local.entity, remoteEntity) === 'local') {
            const rejected = await this.pushRecord(remote, local.entity, snapshotOf(local), session, stats);
            recordError = rejected ?? recordError;
          } else {
            await this.pullRecord(remoteEntity, snapshotOf(local), stats);
          }
        }
      }

      for (const pair of duplicates) {
        const rejected = await this.mergeDuplicate(remote, pair, session, stats);
        recordError = rejected ?? recordError;
      }
    } catch (error) {
      const syncError = toSyncError(error, this.tableName);
      log.error(`Sync ${this.tableName} failed: ${syncError.message}`);
      await this.notifyAfterSync(stats.pulled > 0 || duplicates.length > 0);
      return { ok: false, table: this.tableName, stats, error: syncError };
    }

    await this.notifyAfterSync(stats.pulled > 0 || duplicates.length > 0);

    if (recordError) {
      return { ok: false, table: this.tableName, stats, error: recordError };
    }

    log.debug(
      `Synced ${this.tableName}: pulled ${stats.pulled}, pushed ${stats.pushed}, unchanged ${stats.unchanged}`
    );
    return { ok: true, table: this.tableName, stats };
  }

  /**
   * Write a local record to the remote. A rejected record is counted and its
   * error returned; any other failure ends the cycle. The local row is only
   * marked synced if it was not edited while the upsert was in flight.
   */
  private async pushRecord(
    remote: RemoteDataSource,
    entity: T,
    expected: LocalSnapshot,
    session: AuthSession,
    stats: SyncStats
  ): Promise<SyncError | null> {
    try {
      await remote.upsert(this.toRemoteRow(entity, session), session);
    } catch (error) {
      const syncError = toSyncError(error, this.tableName);
      if (syncError instanceof SerializationError) {
        stats.failed++;
        log.warn(`Remote rejected ${this.tableName} row ${entity.id}: ${syncError.message}`);
        return syncError;
      }
      throw syncError;
    }

    stats.pushed++;
    if (!(await this.localDataSource.markSynced(entity.id, this.syncTimestamp(), expected))) {
      log.debug(`${this.tableName} row ${entity.id} changed during push; left pending`);
    }
    return null;
  }

  /**
   * Store the remote copy locally. `expected` is the local row the decision was
   * made against, `null` when there was none; a row edited since is kept.
   */
  private async pullRecord(entity: T, expected: LocalSnapshot | null, stats: SyncStats): Promise<void> {
    const written = expected
      ? await this.localDataSource.upsert(entity, this.syncTimestamp(), expected)
      : await this.localDataSource.insertIfAbsent(entity, this.syncTimestamp());

    if (written) {
      stats.pulled++;
    } else {
      log.debug(`${this.tableName} row ${entity.id} changed during sync; kept the local copy`);
    }
  }

  // ============ Duplicate Records ============

  /**
   * Pair live local-only rows with live remote-only rows that share the
   * natural key. Each remote row is paired at most once.
   */
  private findDuplicates(
    localById: Map<string, LocalRecord<T>>,
    remoteById: Map<string, T>,
    malformed: Set<string>
  ): DuplicatePair<T>[] {
    const keyColumns = this.config.naturalKey;
    if (!keyColumns) return [];

    const remoteByKey = new Map<string, T>();
    for (const [id, entity] of remoteById) {
      if (localById.has(id) || entity.deleted_at !== null) continue;
      const key = this.naturalKeyOf(entity, keyColumns);
      if (!remoteByKey.has(key)) remoteByKey.set(key, entity);
    }

    const pairs: DuplicatePair<T>[] = [];
    for (const [id, record] of localById) {
      if (remoteById.has(id) || malformed.has(id) || record.entity.deleted_at !== null) continue;

      const key = this.naturalKeyOf(record.entity, keyColumns);
      const remoteEntity = remoteByKey.get(key);
      if (!remoteEntity) continue;

      remoteByKey.delete(key);
      pairs.push({ local: record, remote: remoteEntity });
    }
    return pairs;
  }

  private naturalKeyOf(entity: T, keyColumns: readonly (keyof T & string)[]): string {
    return JSON.stringify(keyColumns.map((column) => entity[column]));
  }

  /**
   * Fold a local duplicate into the remote record. The remote id is kept and
   * the newer payload wins; the local row never reached the remote, so it is
   * removed rather than turned into a tombstone.
   */
  private async mergeDuplicate(
    remote: RemoteDataSource,
    pair: DuplicatePair<T>,
    session: AuthSession,
    stats: SyncStats
  ): Promise<SyncError | null> {
    const { local, remote: remoteEntity } = pair;
    const localWins = this.resolver.pick(local.entity, remoteEntity) === 'local';
    const merged: T = localWins
      ? { ...local.entity, id: remoteEntity.id, created_at: remoteEntity.created_at }
      : remoteEntity;
    const syncedAt = localWins ? null : this.syncTimestamp();

    const replaced = await this.localDataSource.replace(local.entity.id, snapshotOf(local), merged, syncedAt);
    if (!replaced) {
      log.debug(`${this.tableName} row ${local.entity.id} changed during sync; merge deferred`);
      return null;
    }
    log.info(`Merged duplicate ${this.tableName} row ${local.entity.id} into ${remoteEntity.id}`);

    if (!localWins) {
      stats.pulled++;
      return null;
    }
    return this.pushRecord(remote, merged, { updatedAt: merged.updated_at, syncedAt: null }, session, stats);
  }

  private async notifyAfterSync(localChanged: boolean): Promise<void> {
    if (!localChanged) return;
    try {
      await this.notifyListeners();
    } catch (error) {
      log.error(`Failed to notify ${this.tableName} listeners after sync:`, error);
    }
  }

  private syncTimestamp(): string {
    return formatTimestamp(this.clock());
  }

  // ============ Row Conversion ============

  /**
   * Validate a remote row, normalizing its timestamps to the local encoding.
   */
  protected parseRemote(row: RemoteRow): ParsedRemote<T> {
    const id = typeof row.id === 'string' ? row.id : null;
    const normalized: RemoteRow = { ...row };

    if (typeof row.updated_at === 'string') {
      normalized.updated_at = formatTimestamp(parseTimestamp(row.updated_at));
    }
    for (const column of ['created_at', 'deleted_at', ...this.timestampColumns]) {
      const value = row[column];
      if (typeof value === 'string') {
        const parsed = tryParseTimestamp(value);
        normalized[column] = parsed ? formatTimestamp(parsed) : value;
      }
    }

    const result = this.config.schema.safeParse(normalized);
    if (!result.success) {
      return {
        ok: false,
        id,
        error: new SerializationError(result.error.issues[0]?.message ?? 'Invalid row', {
          table: this.tableName,
          recordId: id,
          cause: result.error,
        }),
      };
    }
    return { ok: true, entity: result.data };
  }

  protected toRemoteRow(entity: T, session: AuthSession): RemoteRow {
    const record = toRecord(entity);
    const row: RemoteRow = {};
    for (const column of this.config.columns) {
      row[column] = record[column];
    }
    row.user_id = entity.user_id ?? session.userId;
    return row;
  }
}
