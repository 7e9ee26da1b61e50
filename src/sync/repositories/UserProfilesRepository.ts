/**
 * UserProfilesRepository
 *
 * The user's profile: quiz-derived constitution, goals and notification settings.
 */

import type { NewEntity, NotificationPreferences, UserProfile } from '@/lib/types';
import type { TableConfig } from '../datasources/types';
import { userProfileSchema } from '../schemas';
import { SYNC_TABLES } from '../types';
import { BaseRepository, type RepositoryDeps } from './BaseRepository';

export const USER_PROFILES_TABLE: TableConfig<UserProfile> = {
  tableName: SYNC_TABLES.USER_PROFILES,
  columns: [
    'id',
    'user_id',
    'constitution_type',
    'constitution_modifier',
    'goals',
    'quiz_responses',
    'notification_preferences',
    'created_at',
    'updated_at',
    'deleted_at',
  ],
  jsonColumns: ['goals', 'quiz_responses', 'notification_preferences'],
  naturalKey: [],
  schema: userProfileSchema,
};

export const DEFAULT_NOTIFICATION_PREFERENCES: NotificationPreferences = {
  enabled: false,
  morning_time: null,
  evening_time: null,
};

export interface QuizResult {
  constitutionType: string;
  constitutionModifier?: string | null;
  responses: Record<string, string>;
  goals?: string[];
}

export class UserProfilesRepository extends BaseRepository<UserProfile> {
  constructor(deps: RepositoryDeps) {
    super(deps, USER_PROFILES_TABLE);
  }

  /**
   * The signed-in user's profile, if one exists.
   */
  async getCurrent(): Promise<UserProfile | null> {
    const profiles = await this.queryOwned('1 = 1', [], 'updated_at DESC');
    return profiles[0] ?? null;
  }

  /**
   * Store the outcome of the constitution quiz, creating the profile on first use.
   */
  async saveQuizResult(result: QuizResult): Promise<UserProfile> {
    const current = await this.getCurrent();
    const changes = {
      constitution_type: result.constitutionType,
      constitution_modifier: result.constitutionModifier ?? null,
      quiz_responses: result.responses,
      ...(result.goals ? { goals: result.goals } : {}),
    };

    if (current) {
      const updated = await this.update(current.id, changes);
      if (updated) return updated;
    }

    return this.create({ ...emptyProfile(), ...changes });
  }

  async setNotificationPreferences(preferences: Partial<NotificationPreferences>): Promise<UserProfile> {
    const current = await this.getCurrent();

    if (current) {
      const updated = await this.update(current.id, {
        notification_preferences: { ...current.notification_preferences, ...preferences },
      });
      if (updated) return updated;
    }

    return this.create({
      ...emptyProfile(),
      notification_preferences: { ...DEFAULT_NOTIFICATION_PREFERENCES, ...preferences },
    });
  }
}

function emptyProfile(): NewEntity<UserProfile> {
  return {
    constitution_type: null,
    constitution_modifier: null,
    goals: [],
    quiz_responses: {},
    notification_preferences: { ...DEFAULT_NOTIFICATION_PREFERENCES },
  };
}
