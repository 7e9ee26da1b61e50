/**
 * Collection repository tests
 *
 * Domain operations of each collection, on an offline-only engine.
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { SyncEngine } from '@/sync/createSyncEngine';
import { createTestEngine, SESSION, START, TestClock } from '../fixtures/engine';

let engine: SyncEngine;
let clock: TestClock;

beforeEach(async () => {
  clock = new TestClock();
  engine = await createTestEngine({ store: null, clock });
});

afterEach(async () => {
  await engine.close();
});

describe('UserProfilesRepository', () => {
  it('creates the profile from the first quiz result and updates it afterwards', async () => {
    const profiles = engine.repositories.userProfiles;

    const first = await profiles.saveQuizResult({
      constitutionType: 'vata',
      responses: { q1: 'a' },
      goals: ['sleep'],
    });
    const second = await profiles.saveQuizResult({
      constitutionType: 'pitta',
      constitutionModifier: 'vata',
      responses: { q1: 'b' },
    });

    expect(second.id).toBe(first.id);
    expect(second.constitution_type).toBe('pitta');
    expect(second.constitution_modifier).toBe('vata');
    expect(second.quiz_responses).toEqual({ q1: 'b' });
    expect(second.goals).toEqual(['sleep']);
    expect(await profiles.count()).toBe(1);
  });

  it('merges notification preferences', async () => {
    const profiles = engine.repositories.userProfiles;

    await profiles.setNotificationPreferences({ enabled: true });
    const updated = await profiles.setNotificationPreferences({ morning_time: '07:30' });

    expect(updated.notification_preferences).toEqual({
      enabled: true,
      morning_time: '07:30',
      evening_time: null,
    });
    expect(await profiles.getCurrent()).toEqual(updated);
  });
});

describe('DailyLogsRepository', () => {
  it('keeps one log per day', async () => {
    const logs = engine.repositories.dailyLogs;

    await logs.recordCheckIn('2026-01-31', { symptoms: ['bloating'], energyLevel: 'low' });
    const log = await logs.recordCheckIn('2026-01-31', { notes: 'slept badly' });

    expect(log.symptoms).toEqual(['bloating']);
    expect(log.energy_level).toBe('low');
    expect(log.notes).toBe('slept badly');
    expect(await logs.count()).toBe(1);
  });

  it('records routines once and keeps every piece of feedback', async () => {
    const logs = engine.repositories.dailyLogs;

    await logs.markRoutineComplete('2026-01-31', 'warm-water', 'better');
    clock.advance(60_000);
    const log = await logs.markRoutineComplete('2026-01-31', 'warm-water', 'same');

    expect(log.completed_routine_ids).toEqual(['warm-water']);
    expect(log.routine_feedback).toEqual([
      { routine_or_movement_id: 'warm-water', feedback: 'better', timestamp: START },
      { routine_or_movement_id: 'warm-water', feedback: 'same', timestamp: '2026-01-31T08:01:00.000Z' },
    ]);
  });

  it('ignores a movement that is already complete', async () => {
    const logs = engine.repositories.dailyLogs;

    const first = await logs.markMovementComplete('2026-01-31', 'cat-cow');
    clock.advance(60_000);
    const second = await logs.markMovementComplete('2026-01-31', 'cat-cow');

    expect(second.completed_movement_ids).toEqual(['cat-cow']);
    expect(second.updated_at).toBe(first.updated_at);
  });

  it('returns a date range oldest first', async () => {
    const logs = engine.repositories.dailyLogs;
    await logs.recordCheckIn('2026-01-30', { notes: 'b' });
    await logs.recordCheckIn('2026-01-28', { notes: 'a' });
    await logs.recordCheckIn('2026-02-02', { notes: 'outside' });

    const range = await logs.getRange('2026-01-28', '2026-01-31');

    expect(range.map((log) => log.date)).toEqual(['2026-01-28', '2026-01-30']);
    expect((await logs.getByDate('2026-02-02'))?.notes).toBe('outside');
    expect(await logs.getByDate('2026-02-01')).toBeNull();
  });
});

describe('ProgressRecordsRepository', () => {
  it('starts a streak on the first completion', async () => {
    const progress = await engine.repositories.progressRecords.recordCompletion();

    expect(progress).toMatchObject({
      current_streak: 1,
      longest_streak: 1,
      total_completions: 1,
      last_completion_date: '2026-01-31',
      monthly_completions: { '2026-01': 1 },
    });
  });

  it('counts a day only once', async () => {
    const records = engine.repositories.progressRecords;
    await records.recordCompletion();
    clock.advance(3_600_000);

    const progress = await records.recordCompletion();

    expect(progress.total_completions).toBe(1);
    expect(progress.current_streak).toBe(1);
  });

  it('extends the streak on consecutive days across a month boundary', async () => {
    const records = engine.repositories.progressRecords;
    await records.recordCompletion(new Date('2026-01-31T08:00:00.000Z'));

    const progress = await records.recordCompletion(new Date('2026-02-01T21:00:00.000Z'));

    expect(progress).toMatchObject({
      current_streak: 2,
      longest_streak: 2,
      total_completions: 2,
      last_completion_date: '2026-02-01',
      monthly_completions: { '2026-01': 1, '2026-02': 1 },
    });
  });

  it('restarts the streak after a missed day and keeps the longest', async () => {
    const records = engine.repositories.progressRecords;
    await records.recordCompletion(new Date('2026-01-30T08:00:00.000Z'));
    await records.recordCompletion(new Date('2026-01-31T08:00:00.000Z'));

    const progress = await records.recordCompletion(new Date('2026-02-02T08:00:00.000Z'));

    expect(progress.current_streak).toBe(1);
    expect(progress.longest_streak).toBe(2);
    expect(progress.total_completions).toBe(3);
  });

  it('resets the current streak when yesterday was missed', async () => {
    const records = engine.repositories.progressRecords;
    await records.recordCompletion(new Date('2026-01-30T08:00:00.000Z'));
    await records.recordCompletion(new Date('2026-01-31T08:00:00.000Z'));

    const kept = await records.checkStreakContinuity(new Date('2026-02-01T08:00:00.000Z'));
    const reset = await records.checkStreakContinuity(new Date('2026-02-02T08:00:00.000Z'));

    expect(kept?.current_streak).toBe(2);
    expect(reset?.current_streak).toBe(0);
    expect(reset?.longest_streak).toBe(2);
  });

  it('has nothing to check before the first completion', async () => {
    expect(await engine.repositories.progressRecords.checkStreakContinuity()).toBeNull();
  });
});

describe('CabinetItemsRepository', () => {
  it('keeps one item per ingredient', async () => {
    const cabinet = engine.repositories.cabinetItems;

    const first = await cabinet.addIngredient('ginger');
    const again = await cabinet.addIngredient('ginger');
    const staple = await cabinet.addIngredient('ginger', true);

    expect(again).toEqual(first);
    expect(staple.id).toBe(first.id);
    expect(staple.is_staple).toBe(true);
    expect(await cabinet.count()).toBe(1);
  });

  it('lists staples in the order they were added', async () => {
    const cabinet = engine.repositories.cabinetItems;
    await cabinet.addIngredient('turmeric', true);
    clock.advance(1_000);
    await cabinet.addIngredient('fennel');
    clock.advance(1_000);
    await cabinet.addIngredient('ginger', true);

    const staples = await cabinet.getStaples();

    expect(staples.map((item) => item.ingredient_id)).toEqual(['turmeric', 'ginger']);
  });

  it('records when an ingredient was last used', async () => {
    const cabinet = engine.repositories.cabinetItems;
    await cabinet.addIngredient('ginger');
    clock.advance(60_000);

    const used = await cabinet.markUsed('ginger');

    expect(used?.last_used_at).toBe('2026-01-31T08:01:00.000Z');
    expect(await cabinet.markUsed('cardamom')).toBeNull();
  });

  it('removes an ingredient', async () => {
    const cabinet = engine.repositories.cabinetItems;
    await cabinet.addIngredient('ginger');

    expect(await cabinet.removeIngredient('ginger')).toBe(true);
    expect(await cabinet.getByIngredient('ginger')).toBeNull();
    expect(await cabinet.removeIngredient('ginger')).toBe(false);
  });
});

describe('ProgramEnrollmentsRepository', () => {
  it('keeps a single active enrollment', async () => {
    const enrollments = engine.repositories.programEnrollments;

    const first = await enrollments.enroll('reset-7');
    clock.advance(1_000);
    const second = await enrollments.enroll('sleep-14', '2026-02-01');

    expect(second).toMatchObject({ program_id: 'sleep-14', start_date: '2026-02-01', current_day: 1, is_active: true });
    expect((await enrollments.getById(first.id))?.is_active).toBe(false);
    expect((await enrollments.getActive())?.id).toBe(second.id);
  });

  it('collects completed items per day without duplicates', async () => {
    const enrollments = engine.repositories.programEnrollments;
    const enrollment = await enrollments.enroll('reset-7');

    await enrollments.markItemCompleted(enrollment.id, 1, 'breathing');
    await enrollments.markItemCompleted(enrollment.id, 1, 'tea');
    await enrollments.markItemCompleted(enrollment.id, 1, 'tea');
    const updated = await enrollments.markItemCompleted(enrollment.id, 2, 'walk');

    expect(updated?.day_completions).toEqual([
      { day: 1, completed_item_ids: ['breathing', 'tea'] },
      { day: 2, completed_item_ids: ['walk'] },
    ]);
  });

  it('advances the current day and finishes on the last one', async () => {
    const enrollments = engine.repositories.programEnrollments;
    const enrollment = await enrollments.enroll('short-2');

    const dayOne = await enrollments.markDayCompleted(enrollment.id, 1, 2);
    clock.advance(60_000);
    const dayTwo = await enrollments.markDayCompleted(enrollment.id, 2, 2);

    expect(dayOne).toMatchObject({ current_day: 2, is_active: true, completed_at: null });
    expect(dayTwo).toMatchObject({
      current_day: 2,
      is_active: false,
      completed_at: '2026-01-31T08:01:00.000Z',
      day_completions: [
        { day: 1, completed_item_ids: [] },
        { day: 2, completed_item_ids: [] },
      ],
    });
    expect(await enrollments.getActive()).toBeNull();
  });

  it('restarts an existing enrollment when enrolling in the same program again', async () => {
    const enrollments = engine.repositories.programEnrollments;
    const first = await enrollments.enroll('reset-7');
    await enrollments.markDayCompleted(first.id, 1, 7);
    const second = await enrollments.enroll('sleep-14');

    const again = await enrollments.enroll('reset-7', '2026-02-03');

    expect(again).toMatchObject({
      id: first.id,
      start_date: '2026-02-03',
      current_day: 1,
      day_completions: [],
      is_active: true,
      completed_at: null,
    });
    expect((await enrollments.getById(second.id))?.is_active).toBe(false);
    expect((await enrollments.getActive())?.id).toBe(first.id);
    expect(await enrollments.count()).toBe(2);
  });

  it('ignores unknown enrollments', async () => {
    expect(await engine.repositories.programEnrollments.markDayCompleted('missing', 1, 7)).toBeNull();
  });
});

describe('record ownership', () => {
  it('only finds records of the signed-in user', async () => {
    const { userProfiles, progressRecords, dailyLogs } = engine.repositories;
    await engine.sessionManager.signIn(SESSION);
    await userProfiles.saveQuizResult({ constitutionType: 'vata', responses: {} });
    await progressRecords.recordCompletion();
    await dailyLogs.recordCheckIn('2026-01-31', { notes: 'mine' });

    await engine.sessionManager.signIn({ ...SESSION, userId: 'user-2', email: 'other@example.com' });

    expect(await userProfiles.getCurrent()).toBeNull();
    expect(await progressRecords.getCurrent()).toBeNull();
    expect(await dailyLogs.getByDate('2026-01-31')).toBeNull();
  });

  it('finds records created before signing in', async () => {
    const profile = await engine.repositories.userProfiles.saveQuizResult({ constitutionType: 'kapha', responses: {} });

    await engine.sessionManager.signIn(SESSION);

    expect(await engine.repositories.userProfiles.getCurrent()).toEqual(profile);
  });
});
