/**
 * ConflictResolver
 *
 * Whole-record last-write-wins between the local and remote copy of one record.
 * The newer `updated_at` wins outright; on an exact tie the local copy wins.
 */

import { isDeepStrictEqual } from 'node:util';
import { parseTimestamp } from '../timestamps';
import type { ConflictWinner, MergeStrategy, SyncableEntity } from '../types';

export class ConflictResolver {
  constructor(readonly strategy: MergeStrategy = 'last-write-wins') {}

  /**
   * Which copy survives.
   */
  pick<T extends SyncableEntity>(local: T, remote: T): ConflictWinner {
    switch (this.strategy) {
      case 'local-wins':
        return 'local';
      case 'remote-wins':
        return 'remote';
      case 'last-write-wins':
        return parseTimestamp(remote.updated_at).getTime() > parseTimestamp(local.updated_at).getTime()
          ? 'remote'
          : 'local';
    }
  }

  resolve<T extends SyncableEntity>(local: T, remote: T): T {
    return this.pick(local, remote) === 'local' ? local : remote;
  }

  /**
   * Whether both copies already hold the same state, in which case neither side
   * needs a write.
   */
  isSameRecord<T extends SyncableEntity>(local: T, remote: T, payloadColumns: readonly (keyof T)[]): boolean {
    if (!sameInstant(local.updated_at, remote.updated_at)) return false;
    if (local.deleted_at === null || remote.deleted_at === null) {
      if (local.deleted_at !== remote.deleted_at) return false;
    } else if (!sameInstant(local.deleted_at, remote.deleted_at)) {
      return false;
    }

    return payloadColumns.every((column) => isDeepStrictEqual(local[column], remote[column]));
  }
}

function sameInstant(a: string, b: string): boolean {
  return parseTimestamp(a).getTime() === parseTimestamp(b).getTime();
}
