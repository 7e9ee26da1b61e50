/**
 * RemoteDataSource
 *
 * Supabase data source implementation.
 * Each entity repository gets an instance with its table configuration.
 */

import type { SupabaseClientPool } from '@/lib/supabase';
import { remoteErrorFrom } from '../errors';
import { SYNC_CONFIG, type AuthSession, type SyncTableName } from '../types';
import type { RemoteDataSource, RemoteDataSourceFactory, RemoteRow } from './types';

export class SupabaseRemoteDataSource implements RemoteDataSource {
  constructor(
    private readonly tableName: SyncTableName,
    private readonly columns: readonly string[],
    private readonly clients: SupabaseClientPool,
    private readonly timeoutMs: number = SYNC_CONFIG.REMOTE_TIMEOUT_MS
  ) {}

  async fetchAll(session: AuthSession): Promise<RemoteRow[]> {
    const supabase = this.clients.forSession(session);

    const { data, error, status } = await supabase
      .from(this.tableName)
      .select('*')
      .eq('user_id', session.userId)
      .order('updated_at', { ascending: true })
      .abortSignal(AbortSignal.timeout(this.timeoutMs));

    if (error) {
      throw remoteErrorFrom(error, status, this.tableName);
    }

    const rows: RemoteRow[] = data ?? [];
    return rows;
  }

  async upsert(row: RemoteRow, session: AuthSession): Promise<void> {
    const supabase = this.clients.forSession(session);

    // Build the data object with only the columns we want
    const data: RemoteRow = {};
    for (const col of this.columns) {
      if (col in row) {
        data[col] = row[col];
      }
    }
    data.user_id = session.userId;

    const { error, status } = await supabase
      .from(this.tableName)
      .upsert(data, { onConflict: 'id' })
      .abortSignal(AbortSignal.timeout(this.timeoutMs));

    if (error) {
      throw remoteErrorFrom(error, status, this.tableName);
    }
  }
}

/**
 * Factory wiring every table to the same client pool.
 */
export function createSupabaseRemoteFactory(
  clients: SupabaseClientPool,
  timeoutMs: number = SYNC_CONFIG.REMOTE_TIMEOUT_MS
): RemoteDataSourceFactory {
  return ({ tableName, columns }) => new SupabaseRemoteDataSource(tableName, columns, clients, timeoutMs);
}
