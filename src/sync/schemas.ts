/**
 * Row schemas for the synchronized collections.
 *
 * Every row read from SQLite or from Supabase goes through one of these before
 * it is treated as an entity, so a malformed row is caught at the boundary.
 */

import { z } from 'zod';
import type {
  CabinetItem,
  DailyLog,
  ProgramEnrollment,
  ProgressRecord,
  UserProfile,
} from '@/lib/types';

const nullableText = z.string().nullish().transform((value) => value ?? null);
const textList = z.array(z.string());
const textMap = z.record(z.string());
const count = z.number().int().nonnegative();

const syncableShape = {
  id: z.string().min(1),
  user_id: nullableText,
  created_at: z.string().min(1),
  updated_at: z.string().min(1),
  deleted_at: nullableText,
};

export const userProfileSchema: z.ZodType<UserProfile, z.ZodTypeDef, unknown> = z.object({
  ...syncableShape,
  constitution_type: nullableText,
  constitution_modifier: nullableText,
  goals: textList,
  quiz_responses: textMap,
  notification_preferences: z.object({
    enabled: z.boolean(),
    morning_time: nullableText,
    evening_time: nullableText,
  }),
});

export const dailyLogSchema: z.ZodType<DailyLog, z.ZodTypeDef, unknown> = z.object({
  ...syncableShape,
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  symptoms: textList,
  energy_level: z.enum(['low', 'normal', 'wired']).nullish().transform((value) => value ?? null),
  quick_symptoms: textList,
  completed_routine_ids: textList,
  completed_movement_ids: textList,
  routine_level: nullableText,
  routine_feedback: z.array(
    z.object({
      routine_or_movement_id: z.string(),
      feedback: z.enum(['better', 'same', 'not_sure']),
      timestamp: z.string(),
    })
  ),
  quick_fix_completion_times: textMap,
  notes: nullableText,
});

export const progressRecordSchema: z.ZodType<ProgressRecord, z.ZodTypeDef, unknown> = z.object({
  ...syncableShape,
  current_streak: count,
  longest_streak: count,
  total_completions: count,
  last_completion_date: nullableText,
  monthly_completions: z.record(count),
});

export const cabinetItemSchema: z.ZodType<CabinetItem, z.ZodTypeDef, unknown> = z.object({
  ...syncableShape,
  ingredient_id: z.string().min(1),
  is_staple: z.boolean(),
  added_at: z.string().min(1),
  last_used_at: nullableText,
});

export const programEnrollmentSchema: z.ZodType<ProgramEnrollment, z.ZodTypeDef, unknown> = z.object({
  ...syncableShape,
  program_id: z.string().min(1),
  start_date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  current_day: z.number().int().positive(),
  day_completions: z.array(
    z.object({
      day: z.number().int().positive(),
      completed_item_ids: textList,
    })
  ),
  is_active: z.boolean(),
  completed_at: nullableText,
});
