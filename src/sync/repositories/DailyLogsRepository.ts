/**
 * DailyLogsRepository
 *
 * One log per calendar day: check-in answers and the routines and movements
 * completed that day.
 */

import type { DailyLog, EnergyLevel, NewEntity, RoutineFeedbackValue } from '@/lib/types';
import type { TableConfig } from '../datasources/types';
import { dailyLogSchema } from '../schemas';
import { formatTimestamp } from '../timestamps';
import { SYNC_TABLES } from '../types';
import { BaseRepository, type RepositoryDeps } from './BaseRepository';

export const DAILY_LOGS_TABLE: TableConfig<DailyLog> = {
  tableName: SYNC_TABLES.DAILY_LOGS,
  columns: [
    'id',
    'user_id',
    'date',
    'symptoms',
    'energy_level',
    'quick_symptoms',
    'completed_routine_ids',
    'completed_movement_ids',
    'routine_level',
    'routine_feedback',
    'quick_fix_completion_times',
    'notes',
    'created_at',
    'updated_at',
    'deleted_at',
  ],
  jsonColumns: [
    'symptoms',
    'quick_symptoms',
    'completed_routine_ids',
    'completed_movement_ids',
    'routine_feedback',
    'quick_fix_completion_times',
  ],
  naturalKey: ['date'],
  schema: dailyLogSchema,
};

export interface CheckIn {
  symptoms?: string[];
  energyLevel?: EnergyLevel | null;
  notes?: string | null;
}

export class DailyLogsRepository extends BaseRepository<DailyLog> {
  constructor(deps: RepositoryDeps) {
    super(deps, DAILY_LOGS_TABLE);
  }

  async getByDate(date: string): Promise<DailyLog | null> {
    const logs = await this.queryOwned('date = $1', [date], 'updated_at DESC');
    return logs[0] ?? null;
  }

  /**
   * Logs between two dates, inclusive, oldest first.
   */
  async getRange(from: string, to: string): Promise<DailyLog[]> {
    return this.queryOwned('date >= $1 AND date <= $2', [from, to], 'date ASC');
  }

  async recordCheckIn(date: string, checkIn: CheckIn): Promise<DailyLog> {
    const log = await this.getOrCreate(date);
    return this.save(log, {
      ...(checkIn.symptoms !== undefined ? { symptoms: checkIn.symptoms } : {}),
      ...(checkIn.energyLevel !== undefined ? { energy_level: checkIn.energyLevel } : {}),
      ...(checkIn.notes !== undefined ? { notes: checkIn.notes } : {}),
    });
  }

  /**
   * Mark a routine done for the day, with optional feedback on how it felt.
   */
  async markRoutineComplete(date: string, routineId: string, feedback?: RoutineFeedbackValue): Promise<DailyLog> {
    const log = await this.getOrCreate(date);
    const completed = log.completed_routine_ids.includes(routineId)
      ? log.completed_routine_ids
      : [...log.completed_routine_ids, routineId];

    return this.save(log, {
      completed_routine_ids: completed,
      routine_feedback: feedback
        ? [
            ...log.routine_feedback,
            { routine_or_movement_id: routineId, feedback, timestamp: formatTimestamp(this.clock()) },
          ]
        : log.routine_feedback,
    });
  }

  async markMovementComplete(date: string, movementId: string): Promise<DailyLog> {
    const log = await this.getOrCreate(date);
    if (log.completed_movement_ids.includes(movementId)) {
      return log;
    }

    return this.save(log, {
      completed_movement_ids: [...log.completed_movement_ids, movementId],
    });
  }

  private async getOrCreate(date: string): Promise<DailyLog> {
    return (await this.getByDate(date)) ?? this.create(emptyLog(date));
  }

  private async save(log: DailyLog, changes: Partial<NewEntity<DailyLog>>): Promise<DailyLog> {
    return (await this.update(log.id, changes)) ?? log;
  }
}

function emptyLog(date: string): NewEntity<DailyLog> {
  return {
    date,
    symptoms: [],
    energy_level: null,
    quick_symptoms: [],
    completed_routine_ids: [],
    completed_movement_ids: [],
    routine_level: null,
    routine_feedback: [],
    quick_fix_completion_times: {},
    notes: null,
  };
}
