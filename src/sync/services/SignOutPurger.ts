/**
 * SignOutPurger
 *
 * Removes every locally held user record when the user signs out, so the next
 * person on the device starts empty. Remote rows are not touched.
 */

import type { LocalDatabase, SqlStatement } from '@/lib/database';
import { createLogger } from '@/lib/logger';
import { LocalStorageError } from '../errors';
import { SYNC_TABLE_ORDER, type SyncTableName } from '../types';

const log = createLogger('sync');

export class SignOutPurger {
  constructor(
    private readonly db: LocalDatabase,
    private readonly tables: readonly SyncTableName[] = SYNC_TABLE_ORDER
  ) {}

  /**
   * Delete all rows of every collection and the last sync time in one
   * transaction: either everything is cleared or nothing is.
   */
  async purgeLocalData(): Promise<void> {
    const statements: SqlStatement[] = [
      ...this.tables.map((table) => ({ query: `DELETE FROM ${table}` })),
      { query: 'UPDATE auth_state SET last_sync_at = NULL WHERE id = 1' },
    ];

    try {
      await this.db.transaction(statements);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new LocalStorageError(`Failed to purge local data: ${message}`, { cause: error });
    }

    await this.db.flush();
    log.info(`Purged local data from ${this.tables.length} collections`);
  }
}
