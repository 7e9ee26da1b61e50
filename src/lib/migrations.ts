/**
 * Migration Runner for the Local SQLite Database
 *
 * Reads SQL migration files from supabase/migrations/ and adapts them for
 * SQLite execution. It handles:
 * - Filtering out Supabase-only sections (@supabase-only-start/end)
 * - Including local-only sections (@local-only-start/end)
 * - Tracking applied migrations in the _migrations table
 */

import { readdir, readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import type { LocalDatabase } from './database';
import { createLogger } from './logger';

const log = createLogger('migrations');

export const MIGRATIONS_DIR = fileURLToPath(new URL('../../supabase/migrations/', import.meta.url));

export interface Migration {
  name: string;
  sql: string;
}

/**
 * Load every `.sql` file of a directory, ordered by file name.
 */
export async function loadMigrations(directory: string = MIGRATIONS_DIR): Promise<Migration[]> {
  const files = (await readdir(directory)).filter((file) => file.endsWith('.sql')).sort();

  return Promise.all(
    files.map(async (file) => ({
      name: file.replace(/\.sql$/, ''),
      sql: await readFile(`${directory}/${file}`, 'utf8'),
    }))
  );
}

/**
 * Drop the sections that only apply to the Supabase (Postgres) side.
 * Local-only markers are removed, their content is kept.
 */
export function toLocalSql(sql: string): string {
  const kept: string[] = [];
  let inSupabaseOnly = false;

  for (const line of sql.split('\n')) {
    const marker = line.trim();
    if (marker === '-- @supabase-only-start') {
      inSupabaseOnly = true;
      continue;
    }
    if (marker === '-- @supabase-only-end') {
      inSupabaseOnly = false;
      continue;
    }
    if (marker === '-- @local-only-start' || marker === '-- @local-only-end') {
      continue;
    }
    if (!inSupabaseOnly) {
      kept.push(line);
    }
  }

  return kept.join('\n');
}

/**
 * Split SQL into individual statements, handling semicolons inside strings.
 * Also strips leading comment lines from each statement.
 */
export function splitStatements(sql: string): string[] {
  const statements: string[] = [];
  let current = '';
  let inString = false;
  let stringChar = '';

  for (let i = 0; i < sql.length; i++) {
    const char = sql[i];
    const prevChar = i > 0 ? sql[i - 1] : '';

    if ((char === "'" || char === '"') && prevChar !== '\\') {
      if (!inString) {
        inString = true;
        stringChar = char;
      } else if (char === stringChar) {
        inString = false;
      }
    }

    if (char === ';' && !inString) {
      const stmt = current.trim();
      if (stmt) {
        statements.push(stmt);
      }
      current = '';
    } else {
      current += char;
    }
  }

  const final = current.trim();
  if (final) {
    statements.push(final);
  }

  return statements
    .map((stmt) => {
      const lines = stmt.split('\n');
      let startIndex = 0;
      while (startIndex < lines.length) {
        const trimmed = lines[startIndex].trim();
        if (trimmed === '' || trimmed.startsWith('--')) {
          startIndex++;
        } else {
          break;
        }
      }
      return lines.slice(startIndex).join('\n').trim();
    })
    .filter((stmt) => stmt.length > 0);
}

async function getAppliedMigrations(db: LocalDatabase): Promise<Set<string>> {
  const rows = await db.select('SELECT name FROM _migrations');
  const names = new Set<string>();
  for (const row of rows) {
    if (typeof row.name === 'string') names.add(row.name);
  }
  return names;
}

/**
 * Apply every pending migration. Each migration runs in its own transaction,
 * and the first failure stops the run.
 */
export async function runMigrations(
  db: LocalDatabase,
  migrations?: Migration[]
): Promise<{ applied: string[]; errors: string[] }> {
  const result = { applied: [] as string[], errors: [] as string[] };
  const pending = migrations ?? (await loadMigrations());

  await db.execute(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT NOT NULL UNIQUE,
      applied_at TEXT NOT NULL
    )
  `);

  const appliedMigrations = await getAppliedMigrations(db);

  for (const migration of pending) {
    if (appliedMigrations.has(migration.name)) {
      log.debug(`Skipping already applied: ${migration.name}`);
      continue;
    }

    log.info(`Applying: ${migration.name}`);

    try {
      const statements = splitStatements(toLocalSql(migration.sql)).map((query) => ({ query }));
      await db.transaction([
        ...statements,
        {
          query: 'INSERT INTO _migrations (name, applied_at) VALUES ($1, $2)',
          params: [migration.name, new Date().toISOString()],
        },
      ]);
      result.applied.push(migration.name);
    } catch (error) {
      const errorMsg = `Failed to apply ${migration.name}: ${error instanceof Error ? error.message : String(error)}`;
      log.error(errorMsg);
      result.errors.push(errorMsg);
      break;
    }
  }

  return result;
}
