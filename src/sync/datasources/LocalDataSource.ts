/**
 * LocalDataSource
 *
 * Generic SQLite data source implementation.
 * Each entity repository creates an instance with the appropriate table configuration.
 */

import type { LocalDatabase, SqlRow } from '@/lib/database';
import { LocalStorageError } from '../errors';
import type { SyncableEntity } from '../types';
import type { LocalRecord, LocalSnapshot, TableConfig } from './types';

/**
 * Plain key/value view of an entity.
 */
export function toRecord(entity: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(entity));
}

export function snapshotOf<T extends SyncableEntity>(record: LocalRecord<T>): LocalSnapshot {
  return { updatedAt: record.entity.updated_at, syncedAt: record.syncedAt };
}

export class LocalDataSource<T extends SyncableEntity> {
  private readonly jsonColumns: ReadonlySet<string>;
  private readonly booleanColumns: ReadonlySet<string>;

  constructor(
    private readonly db: LocalDatabase,
    private readonly config: TableConfig<T>
  ) {
    this.jsonColumns = new Set(config.jsonColumns ?? []);
    this.booleanColumns = new Set(config.booleanColumns ?? []);
  }

  private get tableName(): string {
    return this.config.tableName;
  }

  async getById(id: string): Promise<T | null> {
    const rows = await this.run(() =>
      this.db.select(`SELECT * FROM ${this.tableName} WHERE id = $1`, [id])
    );
    return rows.length > 0 ? this.decode(rows[0]) : null;
  }

  async getAll(includeDeleted: boolean = false): Promise<T[]> {
    const whereClause = includeDeleted ? '' : 'WHERE deleted_at IS NULL';
    const rows = await this.run(() =>
      this.db.select(`SELECT * FROM ${this.tableName} ${whereClause} ORDER BY created_at DESC`)
    );
    return rows.map((row) => this.decode(row));
  }

  /**
   * Rows matching a SQL condition, soft-deleted rows excluded.
   */
  async queryWhere(condition: string, params: unknown[] = [], orderBy: string = 'created_at DESC'): Promise<T[]> {
    const rows = await this.run(() =>
      this.db.select(
        `SELECT * FROM ${this.tableName} WHERE (${condition}) AND deleted_at IS NULL ORDER BY ${orderBy}`,
        params
      )
    );
    return rows.map((row) => this.decode(row));
  }

  /**
   * Every row of one owner, tombstones included, with its sync state.
   */
  async getByOwner(userId: string): Promise<LocalRecord<T>[]> {
    const rows = await this.run(() =>
      this.db.select(`SELECT * FROM ${this.tableName} WHERE user_id = $1`, [userId])
    );
    return rows.map((row) => ({
      entity: this.decode(row),
      syncedAt: typeof row.synced_at === 'string' ? row.synced_at : null,
    }));
  }

  /**
   * Insert a new row. It starts out pending.
   */
  async insert(item: T): Promise<void> {
    const columns = [...this.config.columns, 'synced_at'];
    const values = [...this.encode(item), null];
    const placeholders = columns.map((_, i) => `$${i + 1}`).join(', ');

    await this.run(() =>
      this.db.execute(
        `INSERT INTO ${this.tableName} (${columns.join(', ')}) VALUES (${placeholders})`,
        values
      )
    );
  }

  /**
   * Insert or replace a row by id. `syncedAt` is `null` for local writes and the
   * sync time for rows that match the remote.
   *
   * With `expected`, an existing row is only replaced while it is still in that
   * state. Returns whether the row was written.
   */
  async upsert(item: T, syncedAt: string | null = null, expected?: LocalSnapshot): Promise<boolean> {
    const columns = [...this.config.columns, 'synced_at'];
    const values: unknown[] = [...this.encode(item), syncedAt];
    const placeholders = columns.map((_, i) => `$${i + 1}`).join(', ');
    const assignments = columns
      .filter((column) => column !== 'id')
      .map((column) => `${column} = excluded.${column}`)
      .join(', ');

    let guard = '';
    if (expected) {
      const n = values.length;
      guard = ` WHERE ${this.tableName}.updated_at = $${n + 1} AND ${this.tableName}.synced_at IS $${n + 2}`;
      values.push(expected.updatedAt, expected.syncedAt);
    }

    const result = await this.run(() =>
      this.db.execute(
        `INSERT INTO ${this.tableName} (${columns.join(', ')}) VALUES (${placeholders})
         ON CONFLICT(id) DO UPDATE SET ${assignments}${guard}`,
        values
      )
    );
    return result.rowsAffected > 0;
  }

  /**
   * Insert a row unless one with the same id exists. Returns whether it was written.
   */
  async insertIfAbsent(item: T, syncedAt: string | null): Promise<boolean> {
    const columns = [...this.config.columns, 'synced_at'];
    const placeholders = columns.map((_, i) => `$${i + 1}`).join(', ');

    const result = await this.run(() =>
      this.db.execute(
        `INSERT INTO ${this.tableName} (${columns.join(', ')}) VALUES (${placeholders})
         ON CONFLICT(id) DO NOTHING`,
        [...this.encode(item), syncedAt]
      )
    );
    return result.rowsAffected > 0;
  }

  /**
   * Swap the row `previousId` for `item` in one transaction, provided the
   * previous row is still in the `expected` state. Returns whether it happened.
   */
  async replace(previousId: string, expected: LocalSnapshot, item: T, syncedAt: string | null): Promise<boolean> {
    const columns = [...this.config.columns, 'synced_at'];
    const values = [...this.encode(item), syncedAt];
    const placeholders = columns.map((_, i) => `$${i + 1}`).join(', ');
    const previous = `$${values.length + 1}`;

    const rowsAffected = await this.run(() =>
      this.db.transaction([
        {
          query: `DELETE FROM ${this.tableName} WHERE id = $1 AND updated_at = $2 AND synced_at IS $3`,
          params: [previousId, expected.updatedAt, expected.syncedAt],
        },
        {
          query: `INSERT INTO ${this.tableName} (${columns.join(', ')})
                  SELECT ${placeholders}
                  WHERE NOT EXISTS (SELECT 1 FROM ${this.tableName} WHERE id = ${previous})`,
          params: [...values, previousId],
        },
      ])
    );
    return rowsAffected > 0;
  }

  async hardDelete(id: string): Promise<void> {
    await this.run(() => this.db.execute(`DELETE FROM ${this.tableName} WHERE id = $1`, [id]));
  }

  /**
   * Record that the row's current state is on the remote, unless it changed
   * since `expected` was read. Returns whether it was marked.
   */
  async markSynced(id: string, syncedAt: string, expected: LocalSnapshot): Promise<boolean> {
    const result = await this.run(() =>
      this.db.execute(
        `UPDATE ${this.tableName} SET synced_at = $1
         WHERE id = $2 AND updated_at = $3 AND synced_at IS $4`,
        [syncedAt, id, expected.updatedAt, expected.syncedAt]
      )
    );
    return result.rowsAffected > 0;
  }

  /**
   * Assign rows created while signed out to the given owner.
   * Returns the number of rows claimed.
   */
  async claimUnowned(userId: string): Promise<number> {
    const result = await this.run(() =>
      this.db.execute(
        `UPDATE ${this.tableName} SET user_id = $1, synced_at = NULL WHERE user_id IS NULL`,
        [userId]
      )
    );
    return result.rowsAffected;
  }

  /**
   * Count live rows, optionally matching a condition.
   */
  async count(condition?: string, params: unknown[] = []): Promise<number> {
    const whereClause = condition ? `(${condition}) AND deleted_at IS NULL` : 'deleted_at IS NULL';
    return this.countWhere(whereClause, params);
  }

  /**
   * Count rows (tombstones included) whose current state is not on the remote.
   */
  async countPending(): Promise<number> {
    return this.countWhere('synced_at IS NULL');
  }

  private async countWhere(whereClause: string, params: unknown[] = []): Promise<number> {
    const rows = await this.run(() =>
      this.db.select(`SELECT COUNT(*) as count FROM ${this.tableName} WHERE ${whereClause}`, params)
    );
    const value = rows[0]?.count;
    return typeof value === 'number' ? value : 0;
  }

  // ============ Row Conversion ============

  private encode(item: T): unknown[] {
    const record = toRecord(item);
    return this.config.columns.map((column) => {
      const value = record[column];
      if (this.jsonColumns.has(column)) {
        return JSON.stringify(value ?? null);
      }
      return value;
    });
  }

  private decode(row: SqlRow): T {
    const record: Record<string, unknown> = {};

    for (const column of this.config.columns) {
      const value = row[column];
      if (this.jsonColumns.has(column) && typeof value === 'string') {
        record[column] = this.parseJson(value, column, row.id);
      } else if (this.booleanColumns.has(column) && typeof value === 'number') {
        record[column] = value !== 0;
      } else {
        record[column] = value;
      }
    }

    const result = this.config.schema.safeParse(record);
    if (!result.success) {
      throw new LocalStorageError(
        `Corrupt row in ${this.tableName}: ${result.error.issues[0]?.message ?? 'invalid row'}`,
        { table: this.config.tableName, recordId: typeof row.id === 'string' ? row.id : null, cause: result.error }
      );
    }
    return result.data;
  }

  private parseJson(value: string, column: string, id: unknown): unknown {
    try {
      return JSON.parse(value);
    } catch (error) {
      throw new LocalStorageError(`Invalid JSON in ${this.tableName}.${column}`, {
        table: this.config.tableName,
        recordId: typeof id === 'string' ? id : null,
        cause: error,
      });
    }
  }

  /**
   * Run a database call, reporting SQLite failures as LocalStorageError.
   */
  private async run<R>(operation: () => Promise<R>): Promise<R> {
    try {
      return await operation();
    } catch (error) {
      if (error instanceof LocalStorageError) throw error;
      const message = error instanceof Error ? error.message : String(error);
      throw new LocalStorageError(`${this.tableName}: ${message}`, { table: this.config.tableName, cause: error });
    }
  }
}
