/**
 * Local SQLite database backed by sql.js (SQLite compiled to WASM).
 *
 * Every local read and write in the app goes through one LocalDatabase. sql.js
 * runs statements synchronously, so a single statement, and every batch passed
 * to `transaction()`, is applied without interleaving with other writers.
 *
 * When a file path is given, the database image is loaded from it on open and
 * written back (debounced) after each write.
 */

import { readFile, writeFile } from 'node:fs/promises';
import initSqlJs, { type Database as SqlJsDatabase, type SqlJsStatic } from 'sql.js';
import { createLogger } from './logger';

const log = createLogger('database');

const SAVE_DEBOUNCE_MS = 100;

export type SqlValue = string | number | null | Uint8Array;

export type SqlRow = Record<string, SqlValue>;

export interface SqlStatement {
  query: string;
  params?: unknown[];
}

export interface LocalDatabaseOptions {
  /** File holding the database image; `null` keeps everything in memory. */
  filePath?: string | null;
}

let sqlJsPromise: Promise<SqlJsStatic> | null = null;

function loadSqlJs(): Promise<SqlJsStatic> {
  if (!sqlJsPromise) {
    sqlJsPromise = initSqlJs();
  }
  return sqlJsPromise;
}

/**
 * Convert PostgreSQL-style parameters ($1, $2) to SQLite-style (?)
 * and reorder the params array accordingly.
 */
export function convertParams(query: string, params: unknown[]): { query: string; params: SqlValue[] } {
  const paramRefs: number[] = [];
  const regex = /\$(\d+)/g;
  let match: RegExpExecArray | null;

  while ((match = regex.exec(query)) !== null) {
    paramRefs.push(parseInt(match[1], 10));
  }

  if (paramRefs.length === 0) {
    return { query, params: params.map(toSqlValue) };
  }

  return {
    query: query.replace(/\$\d+/g, '?'),
    params: paramRefs.map((paramNum) => toSqlValue(params[paramNum - 1])),
  };
}

function toSqlValue(value: unknown): SqlValue {
  if (value === undefined || value === null) return null;
  if (typeof value === 'string' || typeof value === 'number') return value;
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (value instanceof Uint8Array) return value;
  throw new TypeError(`Unsupported SQL parameter type: ${typeof value}`);
}

/**
 * Transform sql.js results to an array of row objects.
 * sql.js returns: [{ columns: ['id', 'name'], values: [[1, 'foo'], [2, 'bar']] }]
 */
function transformResults(results: { columns: string[]; values: SqlValue[][] }[]): SqlRow[] {
  if (results.length === 0) return [];

  const { columns, values } = results[0];
  return values.map((row) => {
    const obj: SqlRow = {};
    columns.forEach((col, i) => {
      obj[col] = row[i];
    });
    return obj;
  });
}

export class LocalDatabase {
  private saveTimeout: ReturnType<typeof setTimeout> | null = null;
  private closed = false;

  private constructor(
    private readonly db: SqlJsDatabase,
    private readonly filePath: string | null
  ) {}

  /**
   * Open a database, loading the existing image from disk when there is one.
   */
  static async open(options: LocalDatabaseOptions = {}): Promise<LocalDatabase> {
    const SQL = await loadSqlJs();
    const filePath = options.filePath ?? null;
    const existing = filePath ? await readImage(filePath) : null;

    const db = existing ? new SQL.Database(existing) : new SQL.Database();
    db.run('PRAGMA foreign_keys = ON');

    return new LocalDatabase(db, filePath);
  }

  /**
   * Execute a write statement (INSERT, UPDATE, DELETE, CREATE TABLE, ...).
   */
  async execute(query: string, params: unknown[] = []): Promise<{ rowsAffected: number }> {
    this.assertOpen();
    const converted = convertParams(query, params);

    try {
      this.db.run(converted.query, converted.params);
      const rowsAffected = this.db.getRowsModified();
      this.scheduleSave();
      return { rowsAffected };
    } catch (error) {
      log.error('SQL execute error:', error, { query });
      throw error;
    }
  }

  /**
   * Run a query and return its rows.
   */
  async select(query: string, params: unknown[] = []): Promise<SqlRow[]> {
    this.assertOpen();
    const converted = convertParams(query, params);

    try {
      return transformResults(this.db.exec(converted.query, converted.params));
    } catch (error) {
      log.error('SQL select error:', error, { query });
      throw error;
    }
  }

  /**
   * Apply a batch of statements atomically. Either all of them take effect or,
   * if any fails, none do and the error is rethrown.
   */
  async transaction(statements: SqlStatement[]): Promise<number> {
    this.assertOpen();
    let rowsAffected = 0;

    this.db.run('BEGIN TRANSACTION');
    try {
      for (const statement of statements) {
        const converted = convertParams(statement.query, statement.params ?? []);
        this.db.run(converted.query, converted.params);
        rowsAffected += this.db.getRowsModified();
      }
      this.db.run('COMMIT');
    } catch (error) {
      this.db.run('ROLLBACK');
      log.error('Transaction rolled back:', error);
      throw error;
    }

    this.scheduleSave();
    return rowsAffected;
  }

  /**
   * Write the database image to disk now (no-op for in-memory databases).
   */
  async flush(): Promise<void> {
    if (this.saveTimeout) {
      clearTimeout(this.saveTimeout);
      this.saveTimeout = null;
    }
    if (!this.filePath || this.closed) return;

    await writeFile(this.filePath, this.db.export());
  }

  async close(): Promise<void> {
    if (this.closed) return;
    await this.flush();
    this.db.close();
    this.closed = true;
  }

  private scheduleSave(): void {
    if (!this.filePath) return;

    if (this.saveTimeout) {
      clearTimeout(this.saveTimeout);
    }
    this.saveTimeout = setTimeout(() => {
      this.saveTimeout = null;
      this.flush().catch((error: unknown) => {
        log.error('Failed to save database image:', error);
      });
    }, SAVE_DEBOUNCE_MS);
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new Error('Database is closed');
    }
  }
}

async function readImage(filePath: string): Promise<Uint8Array | null> {
  try {
    return new Uint8Array(await readFile(filePath));
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}
