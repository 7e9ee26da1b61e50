import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { LocalDatabase } from '@/lib/database';
import { loadMigrations, runMigrations, splitStatements, toLocalSql } from '@/lib/migrations';

describe('toLocalSql', () => {
  it('drops supabase-only sections and keeps local-only ones', () => {
    const sql = [
      'CREATE TABLE shared (id TEXT);',
      '-- @supabase-only-start',
      'ALTER TABLE shared ENABLE ROW LEVEL SECURITY;',
      '-- @supabase-only-end',
      '-- @local-only-start',
      'CREATE TABLE device (id INTEGER);',
      '-- @local-only-end',
    ].join('\n');

    expect(toLocalSql(sql)).toBe(['CREATE TABLE shared (id TEXT);', 'CREATE TABLE device (id INTEGER);'].join('\n'));
  });
});

describe('splitStatements', () => {
  it('splits on semicolons outside string literals', () => {
    const sql = "INSERT INTO t VALUES ('a;b');\nINSERT INTO t VALUES ('c');";

    expect(splitStatements(sql)).toEqual(["INSERT INTO t VALUES ('a;b')", "INSERT INTO t VALUES ('c')"]);
  });

  it('strips leading comment lines and empty statements', () => {
    const sql = '-- first table\nCREATE TABLE a (id TEXT);\n;\n-- trailing comment only\n';

    expect(splitStatements(sql)).toEqual(['CREATE TABLE a (id TEXT)']);
  });
});

describe('runMigrations', () => {
  let db: LocalDatabase;

  beforeEach(async () => {
    db = await LocalDatabase.open();
  });

  afterEach(async () => {
    await db.close();
  });

  it('creates the local schema from the bundled migrations', async () => {
    const result = await runMigrations(db);

    expect(result).toEqual({ applied: ['00001_initial_schema'], errors: [] });

    const tables = await db.select(
      "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name"
    );
    expect(tables.map((row) => row.name)).toEqual([
      '_migrations',
      'auth_state',
      'daily_logs',
      'program_enrollments',
      'progress_records',
      'user_cabinets',
      'user_profiles',
    ]);
  });

  it('applies each migration once', async () => {
    await runMigrations(db);

    expect(await runMigrations(db)).toEqual({ applied: [], errors: [] });
  });

  it('stops at the first failing migration', async () => {
    const result = await runMigrations(db, [
      { name: '001_ok', sql: 'CREATE TABLE a (id TEXT);' },
      { name: '002_broken', sql: 'CREATE TABLE b (id TEXT;' },
      { name: '003_never', sql: 'CREATE TABLE c (id TEXT);' },
    ]);

    expect(result.applied).toEqual(['001_ok']);
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]).toMatch(/^Failed to apply 002_broken: /);
  });

  it('loads migration files in name order', async () => {
    const migrations = await loadMigrations();

    expect(migrations.map((migration) => migration.name)).toEqual(['00001_initial_schema']);
  });
});
