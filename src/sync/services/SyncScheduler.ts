/**
 * SyncScheduler
 *
 * Cooldown gate in front of the sync cycle. A passing check marks the run time
 * right away so that overlapping callers cannot both get through.
 */

import { SYNC_CONFIG } from '../types';

export class SyncScheduler {
  private lastRunAt: Date | null = null;

  constructor(readonly cooldownMs: number = SYNC_CONFIG.COOLDOWN_MS) {}

  get lastRunTime(): Date | null {
    return this.lastRunAt;
  }

  shouldRun(force: boolean, now: Date): boolean {
    const cooledDown =
      this.lastRunAt === null || now.getTime() - this.lastRunAt.getTime() >= this.cooldownMs;

    if (!force && !cooledDown) {
      return false;
    }

    this.lastRunAt = now;
    return true;
  }

  /** Forget the last run, e.g. after sign-out. */
  reset(): void {
    this.lastRunAt = null;
  }
}
