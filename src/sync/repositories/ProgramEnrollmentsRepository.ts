/**
 * ProgramEnrollmentsRepository
 *
 * Multi-day program enrollments: one per program, and only one active at a time.
 */

import { toDateKey, type ProgramDayCompletion, type ProgramEnrollment } from '@/lib/types';
import type { TableConfig } from '../datasources/types';
import { programEnrollmentSchema } from '../schemas';
import { formatTimestamp } from '../timestamps';
import { SYNC_TABLES } from '../types';
import { BaseRepository, type RepositoryDeps } from './BaseRepository';

export const PROGRAM_ENROLLMENTS_TABLE: TableConfig<ProgramEnrollment> = {
  tableName: SYNC_TABLES.PROGRAM_ENROLLMENTS,
  columns: [
    'id',
    'user_id',
    'program_id',
    'start_date',
    'current_day',
    'day_completions',
    'is_active',
    'completed_at',
    'created_at',
    'updated_at',
    'deleted_at',
  ],
  jsonColumns: ['day_completions'],
  booleanColumns: ['is_active'],
  timestampColumns: ['completed_at'],
  naturalKey: ['program_id'],
  schema: programEnrollmentSchema,
};

export class ProgramEnrollmentsRepository extends BaseRepository<ProgramEnrollment> {
  constructor(deps: RepositoryDeps) {
    super(deps, PROGRAM_ENROLLMENTS_TABLE);
  }

  async getActive(): Promise<ProgramEnrollment | null> {
    const enrollments = await this.queryOwned('is_active = $1', [true], 'updated_at DESC');
    return enrollments[0] ?? null;
  }

  async getByProgram(programId: string): Promise<ProgramEnrollment | null> {
    const enrollments = await this.queryOwned('program_id = $1', [programId], 'updated_at DESC');
    return enrollments[0] ?? null;
  }

  /**
   * Start a program, ending whichever one was active before. Enrolling in a
   * program again restarts its existing enrollment from day one.
   */
  async enroll(programId: string, startDate: string = toDateKey(this.clock())): Promise<ProgramEnrollment> {
    const active = await this.getActive();
    if (active && active.program_id !== programId) {
      await this.update(active.id, { is_active: false });
    }

    const fresh = {
      program_id: programId,
      start_date: startDate,
      current_day: 1,
      day_completions: [],
      is_active: true,
      completed_at: null,
    };

    const existing = await this.getByProgram(programId);
    if (existing) {
      const restarted = await this.update(existing.id, fresh);
      if (restarted) return restarted;
    }

    return this.create(fresh);
  }

  async markItemCompleted(enrollmentId: string, day: number, itemId: string): Promise<ProgramEnrollment | null> {
    const enrollment = await this.getById(enrollmentId);
    if (!enrollment) return null;

    const existing = enrollment.day_completions.find((completion) => completion.day === day);
    if (existing?.completed_item_ids.includes(itemId)) {
      return enrollment;
    }

    const dayCompletions: ProgramDayCompletion[] = existing
      ? enrollment.day_completions.map((completion) =>
          completion.day === day
            ? { ...completion, completed_item_ids: [...completion.completed_item_ids, itemId] }
            : completion
        )
      : [...enrollment.day_completions, { day, completed_item_ids: [itemId] }];

    return this.update(enrollmentId, { day_completions: dayCompletions });
  }

  /**
   * Mark a whole day done. Completing the last day finishes the program.
   */
  async markDayCompleted(
    enrollmentId: string,
    day: number,
    programDurationDays: number
  ): Promise<ProgramEnrollment | null> {
    const enrollment = await this.getById(enrollmentId);
    if (!enrollment) return null;

    const hasEntry = enrollment.day_completions.some((completion) => completion.day === day);
    const finished = day >= programDurationDays;

    return this.update(enrollmentId, {
      day_completions: hasEntry
        ? enrollment.day_completions
        : [...enrollment.day_completions, { day, completed_item_ids: [] }],
      current_day: Math.max(enrollment.current_day, Math.min(day + 1, programDurationDays)),
      ...(finished ? { is_active: false, completed_at: formatTimestamp(this.clock()) } : {}),
    });
  }
}
