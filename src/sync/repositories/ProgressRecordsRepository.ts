/**
 * ProgressRecordsRepository
 *
 * Completion streaks and counters. There is one progress record per user.
 */

import { format, parseISO, subDays } from 'date-fns';
import { toDateKey, toMonthKey, type ProgressRecord } from '@/lib/types';
import type { TableConfig } from '../datasources/types';
import { progressRecordSchema } from '../schemas';
import { SYNC_TABLES } from '../types';
import { BaseRepository, type RepositoryDeps } from './BaseRepository';

export const PROGRESS_RECORDS_TABLE: TableConfig<ProgressRecord> = {
  tableName: SYNC_TABLES.PROGRESS_RECORDS,
  columns: [
    'id',
    'user_id',
    'current_streak',
    'longest_streak',
    'total_completions',
    'last_completion_date',
    'monthly_completions',
    'created_at',
    'updated_at',
    'deleted_at',
  ],
  jsonColumns: ['monthly_completions'],
  naturalKey: [],
  schema: progressRecordSchema,
};

function previousDay(dateKey: string): string {
  return format(subDays(parseISO(dateKey), 1), 'yyyy-MM-dd');
}

export class ProgressRecordsRepository extends BaseRepository<ProgressRecord> {
  constructor(deps: RepositoryDeps) {
    super(deps, PROGRESS_RECORDS_TABLE);
  }

  async getCurrent(): Promise<ProgressRecord | null> {
    const records = await this.queryOwned('1 = 1', [], 'updated_at DESC');
    return records[0] ?? null;
  }

  /**
   * Count a completed day. A second completion on the same day changes nothing;
   * a completion the day after the last one extends the streak, any later one
   * starts a new streak.
   */
  async recordCompletion(on: Date = this.clock()): Promise<ProgressRecord> {
    const record = await this.getOrCreate();
    const today = toDateKey(on);

    if (record.last_completion_date === today) {
      return record;
    }

    const currentStreak =
      record.last_completion_date === previousDay(today) ? record.current_streak + 1 : 1;
    const monthKey = toMonthKey(on);

    const updated = await this.update(record.id, {
      current_streak: currentStreak,
      longest_streak: Math.max(record.longest_streak, currentStreak),
      total_completions: record.total_completions + 1,
      last_completion_date: today,
      monthly_completions: {
        ...record.monthly_completions,
        [monthKey]: (record.monthly_completions[monthKey] ?? 0) + 1,
      },
    });
    return updated ?? record;
  }

  /**
   * Reset the current streak when the last completion is older than yesterday.
   * Call this on app launch.
   */
  async checkStreakContinuity(today: Date = this.clock()): Promise<ProgressRecord | null> {
    const record = await this.getCurrent();
    const lastDate = record?.last_completion_date ?? null;
    if (!record || lastDate === null || record.current_streak === 0) {
      return record;
    }

    if (lastDate >= previousDay(toDateKey(today))) {
      return record;
    }

    return (await this.update(record.id, { current_streak: 0 })) ?? record;
  }

  private async getOrCreate(): Promise<ProgressRecord> {
    return (
      (await this.getCurrent()) ??
      this.create({
        current_streak: 0,
        longest_streak: 0,
        total_completions: 0,
        last_completion_date: null,
        monthly_completions: {},
      })
    );
  }
}
