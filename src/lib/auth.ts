import type { Session, User } from '@supabase/supabase-js';
import type { SupabaseConfig } from './config';
import { createLogger } from './logger';
import { SupabaseClientPool } from './supabase';
import type { AuthSession } from './types';

const log = createLogger('auth');

/**
 * What the sync engine needs from the authentication provider.
 */
export interface AuthProvider {
  /** Exchange a refresh token for a new session, or `null` when it is no longer valid. */
  refreshSession(refreshToken: string): Promise<AuthSession | null>;
  /** Revoke the session remotely. */
  logOut(session: AuthSession): Promise<void>;
}

export class AuthFailedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AuthFailedError';
  }
}

/**
 * Map a Supabase session to the session shape stored locally.
 */
export function toAuthSession(session: Session, user: User | null = session.user): AuthSession {
  return {
    userId: user?.id ?? session.user.id,
    email: user?.email ?? null,
    accessToken: session.access_token,
    refreshToken: session.refresh_token || null,
    expiresAt: session.expires_at !== undefined ? new Date(session.expires_at * 1000).toISOString() : null,
  };
}

export class SupabaseAuthProvider implements AuthProvider {
  private readonly clients: SupabaseClientPool;

  constructor(config: SupabaseConfig | SupabaseClientPool) {
    this.clients = config instanceof SupabaseClientPool ? config : new SupabaseClientPool(config);
  }

  /**
   * Log in with email and password.
   */
  async logIn(email: string, password: string): Promise<AuthSession> {
    const { data, error } = await this.clients.anonymous().auth.signInWithPassword({
      email,
      password,
    });

    if (error) {
      throw new AuthFailedError(error.message);
    }

    return toAuthSession(data.session, data.user);
  }

  /**
   * Sign up with email and password.
   */
  async signUp(email: string, password: string): Promise<AuthSession> {
    const { data, error } = await this.clients.anonymous().auth.signUp({
      email,
      password,
    });

    if (error) {
      throw new AuthFailedError(error.message);
    }

    if (!data.session) {
      throw new AuthFailedError('Signup failed - please check your email for verification');
    }

    return toAuthSession(data.session, data.user);
  }

  async refreshSession(refreshToken: string): Promise<AuthSession | null> {
    const { data, error } = await this.clients.anonymous().auth.refreshSession({
      refresh_token: refreshToken,
    });

    if (error || !data.session) {
      log.warn('Failed to refresh session:', error?.message ?? 'no session returned');
      return null;
    }

    return toAuthSession(data.session, data.user);
  }

  async logOut(session: AuthSession): Promise<void> {
    const { error } = await this.clients.forSession(session).auth.admin.signOut(session.accessToken);
    this.clients.clear();

    if (error) {
      throw new AuthFailedError(error.message);
    }
  }
}
