/**
 * BaseRepository tests
 *
 * Local write semantics shared by every collection, exercised through the
 * cabinet repository on an offline-only engine.
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { CabinetItem } from '@/lib/types';
import type { SyncEngine } from '@/sync/createSyncEngine';
import { LocalStorageError } from '@/sync/errors';
import { createTestEngine, SESSION, START, TestClock } from '../fixtures/engine';

describe('BaseRepository', () => {
  let engine: SyncEngine;
  let clock: TestClock;

  beforeEach(async () => {
    clock = new TestClock();
    engine = await createTestEngine({ store: null, clock });
  });

  afterEach(async () => {
    await engine.close();
  });

  async function rawRow(id: string) {
    const rows = await engine.db.select('SELECT * FROM user_cabinets WHERE id = $1', [id]);
    return rows[0];
  }

  describe('create', () => {
    it('leaves records unowned and pending while signed out', async () => {
      const item = await engine.repositories.cabinetItems.addIngredient('ginger');

      expect(item).toEqual({
        id: item.id,
        user_id: null,
        ingredient_id: 'ginger',
        is_staple: false,
        added_at: START,
        last_used_at: null,
        created_at: START,
        updated_at: START,
        deleted_at: null,
      });
      expect(await engine.repositories.cabinetItems.countPending()).toBe(1);
    });

    it('assigns the signed-in user', async () => {
      await engine.sessionManager.signIn(SESSION);

      const item = await engine.repositories.cabinetItems.addIngredient('ginger');

      expect(item.user_id).toBe('user-1');
    });
  });

  describe('update', () => {
    it('moves updated_at to now', async () => {
      const item = await engine.repositories.cabinetItems.addIngredient('ginger');
      clock.advance(60_000);

      const updated = await engine.repositories.cabinetItems.update(item.id, { is_staple: true });

      expect(updated?.updated_at).toBe('2026-01-31T08:01:00.000Z');
      expect(updated?.created_at).toBe(START);
      expect(updated?.is_staple).toBe(true);
    });

    it('never moves updated_at backwards', async () => {
      clock.set('2026-01-31T09:00:00.000Z');
      const item = await engine.repositories.cabinetItems.addIngredient('ginger');
      clock.set('2026-01-31T07:00:00.000Z');

      const updated = await engine.repositories.cabinetItems.update(item.id, { is_staple: true });

      expect(updated?.updated_at).toBe('2026-01-31T09:00:00.000Z');
    });

    it('returns null for an unknown id', async () => {
      expect(await engine.repositories.cabinetItems.update('missing', { is_staple: true })).toBeNull();
    });

    it('marks a synced record pending again', async () => {
      const item = await engine.repositories.cabinetItems.addIngredient('ginger');
      await engine.db.execute('UPDATE user_cabinets SET synced_at = $1', [START]);

      await engine.repositories.cabinetItems.update(item.id, { is_staple: true });

      expect((await rawRow(item.id))?.synced_at).toBeNull();
    });
  });

  describe('delete', () => {
    it('removes a record that never had an owner', async () => {
      const item = await engine.repositories.cabinetItems.addIngredient('ginger');

      expect(await engine.repositories.cabinetItems.delete(item.id)).toBe(true);

      expect(await rawRow(item.id)).toBeUndefined();
      expect(await engine.repositories.cabinetItems.countPending()).toBe(0);
    });

    it('keeps a tombstone for an owned record', async () => {
      await engine.sessionManager.signIn(SESSION);
      const item = await engine.repositories.cabinetItems.addIngredient('ginger');
      clock.advance(1_000);

      await engine.repositories.cabinetItems.delete(item.id);

      expect(await engine.repositories.cabinetItems.getById(item.id)).toBeNull();
      expect(await engine.repositories.cabinetItems.getAll()).toEqual([]);
      expect(await engine.repositories.cabinetItems.count()).toBe(0);

      const row = await rawRow(item.id);
      expect(row?.deleted_at).toBe('2026-01-31T08:00:01.000Z');
      expect(row?.updated_at).toBe('2026-01-31T08:00:01.000Z');
      expect(row?.synced_at).toBeNull();
    });

    it('returns false for an unknown id', async () => {
      expect(await engine.repositories.cabinetItems.delete('missing')).toBe(false);
    });
  });

  describe('observers', () => {
    it('emits current data on subscribe and after each write', async () => {
      const listener = vi.fn<[CabinetItem[]], void>();
      engine.repositories.cabinetItems.subscribe(listener);
      await vi.waitFor(() => expect(listener).toHaveBeenCalledTimes(1));
      expect(listener).toHaveBeenLastCalledWith([]);

      const item = await engine.repositories.cabinetItems.addIngredient('ginger');

      expect(listener).toHaveBeenCalledTimes(2);
      expect(listener).toHaveBeenLastCalledWith([item]);
    });

    it('stops emitting after unsubscribe', async () => {
      const listener = vi.fn<[CabinetItem[]], void>();
      const unsubscribe = engine.repositories.cabinetItems.subscribe(listener);
      await vi.waitFor(() => expect(listener).toHaveBeenCalledTimes(1));
      unsubscribe();

      await engine.repositories.cabinetItems.addIngredient('ginger');

      expect(listener).toHaveBeenCalledTimes(1);
    });

    it('reports local writes with the table name', async () => {
      const tables: string[] = [];
      engine.repositories.cabinetItems.onLocalChange((table) => tables.push(table));

      await engine.repositories.cabinetItems.addIngredient('ginger');
      await engine.repositories.cabinetItems.markUsed('ginger');

      expect(tables).toEqual(['user_cabinets', 'user_cabinets']);
    });
  });

  it('reports a corrupt local row as a storage failure', async () => {
    await engine.repositories.cabinetItems.addIngredient('ginger');
    await engine.db.execute("UPDATE user_cabinets SET is_staple = 'sometimes'");

    await expect(engine.repositories.cabinetItems.getAll()).rejects.toBeInstanceOf(LocalStorageError);
  });
});
