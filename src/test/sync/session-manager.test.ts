import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { LocalDatabase } from '@/lib/database';
import { runMigrations } from '@/lib/migrations';
import type { AuthSession } from '@/lib/types';
import { SessionManager } from '@/sync/services/SessionManager';
import { SESSION, TestClock } from '../fixtures/engine';

describe('SessionManager', () => {
  let db: LocalDatabase;
  let clock: TestClock;
  let sessions: SessionManager;

  beforeEach(async () => {
    db = await LocalDatabase.open();
    await runMigrations(db);
    clock = new TestClock('2026-01-31T08:00:00.000Z');
    sessions = new SessionManager(db, clock.now);
  });

  afterEach(async () => {
    await db.close();
  });

  it('starts signed out', async () => {
    expect(await sessions.restore()).toBeNull();
    expect(sessions.currentIdentity()).toBeNull();
  });

  it('persists the session across restarts', async () => {
    await sessions.signIn(SESSION);

    const restarted = new SessionManager(db, clock.now);
    expect(await restarted.restore()).toEqual(SESSION);
    expect(restarted.currentIdentity()).toEqual(SESSION);
  });

  it('forgets the session on sign-out', async () => {
    await sessions.signIn(SESSION);
    await sessions.signOut();

    expect(sessions.currentIdentity()).toBeNull();
    expect(await new SessionManager(db, clock.now).restore()).toBeNull();
  });

  it('replaces the tokens of the same user', async () => {
    await sessions.signIn(SESSION);
    const refreshed: AuthSession = { ...SESSION, accessToken: 'test-access-token-2' };

    await sessions.replace(refreshed);

    expect(sessions.currentIdentity()?.accessToken).toBe('test-access-token-2');
    expect((await new SessionManager(db, clock.now).restore())?.accessToken).toBe('test-access-token-2');
  });

  it('refuses a refreshed session for another user', async () => {
    await sessions.signIn(SESSION);

    await expect(sessions.replace({ ...SESSION, userId: 'user-2' })).rejects.toThrow(
      'Refreshed session belongs to a different user'
    );
    expect(sessions.currentIdentity()?.userId).toBe('user-1');
  });

  it.each([
    ['2026-01-31T08:04:59.000Z', true],
    ['2026-01-31T08:05:00.000Z', false],
    ['2026-01-31T09:00:00.000Z', false],
    ['2026-01-31T07:00:00.000Z', true],
    ['whenever', true],
  ])('treats a session expiring at %s as expired: %s', (expiresAt, expired) => {
    expect(sessions.isExpired({ ...SESSION, expiresAt })).toBe(expired);
  });

  it('never expires a session without an expiry', () => {
    expect(sessions.isExpired({ ...SESSION, expiresAt: null })).toBe(false);
  });

  it('stores the last sync time next to the session', async () => {
    await sessions.signIn(SESSION);
    await sessions.updateLastSyncAt('2026-01-31T08:00:00.000Z');

    expect(await sessions.getLastSyncAt()).toBe('2026-01-31T08:00:00.000Z');
  });

  it('notifies listeners of every change', async () => {
    const seen: (string | null)[] = [];
    sessions.onChange((session) => seen.push(session?.userId ?? null));

    await sessions.signIn(SESSION);
    await sessions.signOut();

    expect(seen).toEqual(['user-1', null]);
  });
});
