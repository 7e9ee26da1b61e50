/**
 * SessionManager
 *
 * Holds the signed-in identity (or none) and persists it in the local
 * `auth_state` row so it survives a restart. Remote work is only attempted
 * while an identity is established.
 */

import type { LocalDatabase } from '@/lib/database';
import { createLogger } from '@/lib/logger';
import { systemClock, type AuthSession, type Clock } from '@/lib/types';
import { tryParseTimestamp } from '../timestamps';

const log = createLogger('session');

// Consider a session expired when less than 5 minutes remain
const EXPIRY_MARGIN_MS = 5 * 60 * 1000;

export type SessionListener = (session: AuthSession | null) => void;

function textOrNull(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

export class SessionManager {
  private current: AuthSession | null = null;
  private listeners: Set<SessionListener> = new Set();

  constructor(
    private readonly db: LocalDatabase,
    private readonly clock: Clock = systemClock
  ) {}

  currentIdentity(): AuthSession | null {
    return this.current;
  }

  /**
   * Load the persisted session, if any. Called once on cold start.
   */
  async restore(): Promise<AuthSession | null> {
    const rows = await this.db.select('SELECT * FROM auth_state WHERE id = 1');
    const row = rows[0];
    const userId = textOrNull(row?.user_id);
    const accessToken = textOrNull(row?.access_token);

    this.current = userId && accessToken
      ? {
          userId,
          email: textOrNull(row?.email),
          accessToken,
          refreshToken: textOrNull(row?.refresh_token),
          expiresAt: textOrNull(row?.expires_at),
        }
      : null;

    if (this.current) {
      log.info(`Restored session for ${this.current.userId}`);
    }
    this.notify();
    return this.current;
  }

  async signIn(session: AuthSession): Promise<void> {
    await this.save(session);
    this.current = session;
    this.notify();
  }

  /**
   * Swap in a refreshed session for the same user.
   */
  async replace(session: AuthSession): Promise<void> {
    if (this.current && this.current.userId !== session.userId) {
      throw new Error('Refreshed session belongs to a different user');
    }
    await this.save(session);
    this.current = session;
    this.notify();
  }

  async signOut(): Promise<void> {
    await this.db.execute('DELETE FROM auth_state WHERE id = 1');
    this.current = null;
    this.notify();
  }

  /**
   * Whether the access token has expired or is about to.
   */
  isExpired(session: AuthSession | null = this.current): boolean {
    if (!session?.expiresAt) return false;

    const expiry = tryParseTimestamp(session.expiresAt);
    if (!expiry) return true;
    return expiry.getTime() - this.clock().getTime() < EXPIRY_MARGIN_MS;
  }

  // ============ Last Sync Time ============

  async getLastSyncAt(): Promise<string | null> {
    const rows = await this.db.select('SELECT last_sync_at FROM auth_state WHERE id = 1');
    return textOrNull(rows[0]?.last_sync_at);
  }

  async updateLastSyncAt(timestamp: string): Promise<void> {
    await this.db.execute('UPDATE auth_state SET last_sync_at = $1 WHERE id = 1', [timestamp]);
  }

  onChange(listener: SessionListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  private async save(session: AuthSession): Promise<void> {
    await this.db.execute(
      `INSERT INTO auth_state (id, user_id, email, access_token, refresh_token, expires_at)
       VALUES (1, $1, $2, $3, $4, $5)
       ON CONFLICT(id) DO UPDATE SET
         user_id = $1,
         email = $2,
         access_token = $3,
         refresh_token = $4,
         expires_at = $5`,
      [session.userId, session.email, session.accessToken, session.refreshToken, session.expiresAt]
    );
  }

  private notify(): void {
    for (const listener of this.listeners) {
      try {
        listener(this.current);
      } catch (error) {
        log.error('Error in session listener:', error);
      }
    }
  }
}
