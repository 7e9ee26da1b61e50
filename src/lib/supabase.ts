import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import type { SupabaseConfig } from './config';
import type { AuthSession } from './types';

/**
 * Create a Supabase client. With an access token, every request is made as
 * that user, so row level security scopes it to their rows.
 */
export function createSupabaseClient(config: SupabaseConfig, accessToken?: string): SupabaseClient {
  return createClient(config.url, config.anonKey, {
    auth: {
      // Sessions live in the local auth_state table, not in the client
      persistSession: false,
      autoRefreshToken: false,
      detectSessionInUrl: false,
    },
    global: {
      headers: accessToken ? { Authorization: `Bearer ${accessToken}` } : {},
      ...(config.fetch ? { fetch: config.fetch } : {}),
    },
  });
}

/**
 * One client per signed-in user, recreated when the access token changes.
 */
export class SupabaseClientPool {
  private readonly clients = new Map<string, { accessToken: string; client: SupabaseClient }>();
  private anonymousClient: SupabaseClient | null = null;

  constructor(readonly config: SupabaseConfig) {}

  forSession(session: AuthSession): SupabaseClient {
    const cached = this.clients.get(session.userId);
    if (cached && cached.accessToken === session.accessToken) {
      return cached.client;
    }

    const client = createSupabaseClient(this.config, session.accessToken);
    this.clients.set(session.userId, { accessToken: session.accessToken, client });
    return client;
  }

  /**
   * Client without a user token, for the auth endpoints.
   */
  anonymous(): SupabaseClient {
    if (!this.anonymousClient) {
      this.anonymousClient = createSupabaseClient(this.config);
    }
    return this.anonymousClient;
  }

  clear(): void {
    this.clients.clear();
  }
}
