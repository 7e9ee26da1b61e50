// Entity types shared by the local SQLite store and the remote Supabase tables.
// JSON columns hold the structured values below; SQLite keeps them as TEXT.

/**
 * Columns every synchronized record carries.
 */
export interface SyncableEntity {
  id: string;
  user_id: string | null;
  created_at: string;
  updated_at: string;
  deleted_at: string | null;
}

export interface NotificationPreferences {
  enabled: boolean;
  morning_time: string | null;
  evening_time: string | null;
}

export interface UserProfile extends SyncableEntity {
  constitution_type: string | null;
  constitution_modifier: string | null;
  goals: string[];
  quiz_responses: Record<string, string>; // questionId -> optionId
  notification_preferences: NotificationPreferences;
}

export type EnergyLevel = 'low' | 'normal' | 'wired';

export type RoutineFeedbackValue = 'better' | 'same' | 'not_sure';

export interface RoutineFeedback {
  routine_or_movement_id: string;
  feedback: RoutineFeedbackValue;
  timestamp: string;
}

export interface DailyLog extends SyncableEntity {
  date: string; // "2026-01-31"
  symptoms: string[];
  energy_level: EnergyLevel | null;
  quick_symptoms: string[];
  completed_routine_ids: string[];
  completed_movement_ids: string[];
  routine_level: string | null;
  routine_feedback: RoutineFeedback[];
  quick_fix_completion_times: Record<string, string>;
  notes: string | null;
}

export interface ProgressRecord extends SyncableEntity {
  current_streak: number;
  longest_streak: number;
  total_completions: number;
  last_completion_date: string | null;
  monthly_completions: Record<string, number>; // "2026-01" -> count
}

export interface CabinetItem extends SyncableEntity {
  ingredient_id: string;
  is_staple: boolean;
  added_at: string;
  last_used_at: string | null;
}

export interface ProgramDayCompletion {
  day: number;
  completed_item_ids: string[];
}

export interface ProgramEnrollment extends SyncableEntity {
  program_id: string;
  start_date: string;
  current_day: number;
  day_completions: ProgramDayCompletion[];
  is_active: boolean;
  completed_at: string | null;
}

/**
 * Fields a caller supplies when creating a record; the repository fills in the rest.
 */
export type NewEntity<T extends SyncableEntity> = Omit<T, keyof SyncableEntity>;

/**
 * Fields a caller may change on an existing record.
 */
export type EntityChanges<T extends SyncableEntity> = Partial<NewEntity<T>>;

// Utility functions

export function generateId(): string {
  return crypto.randomUUID();
}

/**
 * Calendar date ("yyyy-MM-dd") of an instant in UTC.
 */
export function toDateKey(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Calendar month ("yyyy-MM") of an instant in UTC.
 */
export function toMonthKey(date: Date): string {
  return date.toISOString().slice(0, 7);
}

/**
 * Source of "now" for every write; tests substitute a controllable clock.
 */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

// Auth types

export interface AuthSession {
  userId: string;
  email: string | null;
  accessToken: string;
  refreshToken: string | null;
  expiresAt: string | null;
}
