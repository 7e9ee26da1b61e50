/**
 * SyncService
 *
 * Central orchestrator for all sync operations:
 * - Cooldown and session gates in front of every cycle
 * - Sequencing of the collection repositories, with per-collection failure isolation
 * - Explicit lifecycle triggers, periodic sync and debounced sync after local writes
 * - Sign-in / sign-out transitions, including the local purge on sign-out
 */

import type { AuthProvider } from '@/lib/auth';
import type { SyncTimingConfig } from '@/lib/config';
import { createLogger } from '@/lib/logger';
import { systemClock, type Clock } from '@/lib/types';
import { AuthError, toSyncError, UnsyncedChangesError, type SyncError } from '../errors';
import { formatTimestamp, tryParseTimestamp } from '../timestamps';
import {
  emptyStats,
  FORCED_TRIGGERS,
  SYNC_CONFIG,
  SYNC_TABLE_ORDER,
  type AuthSession,
  type CollectionSyncOutcome,
  type CollectionSyncReport,
  type SyncSkipReason,
  type SyncStatusListener,
  type SyncStatusState,
  type SyncSummary,
  type SyncTableName,
  type SyncTrigger,
} from '../types';
import type { SessionManager } from './SessionManager';
import type { SignOutPurger } from './SignOutPurger';
import { SyncScheduler } from './SyncScheduler';

const log = createLogger('sync');

// Interface that repositories must implement to participate in sync
export interface SyncableRepository {
  readonly tableName: SyncTableName;

  // Reconcile the collection with the remote; never throws
  sync(session: AuthSession): Promise<CollectionSyncOutcome>;

  // Give rows created while signed out to the user
  claimUnowned(userId: string): Promise<number>;

  // Rows whose current state is not on the remote yet
  countPending(): Promise<number>;

  // Called after every local write
  onLocalChange(listener: (table: SyncTableName) => void): () => void;

  // Re-emit data to subscribers
  refresh(): Promise<void>;
}

export interface SyncServiceOptions {
  sessionManager: SessionManager;
  repositories: readonly SyncableRepository[];
  purger: SignOutPurger;
  /** `false` in offline-only mode: every cycle is skipped. */
  remoteEnabled: boolean;
  authProvider?: AuthProvider | null;
  scheduler?: SyncScheduler;
  clock?: Clock;
  timing?: Partial<Pick<SyncTimingConfig, 'debounceMs' | 'periodicMs'>>;
}

export interface SignOutOptions {
  /** Sign out even when local changes could not be pushed first. */
  discardUnsynced?: boolean;
}

export class SyncService {
  private isSyncingInner: boolean = false;
  private lastSyncErrorInner: SyncError | null = null;
  private lastSyncTimeInner: Date | null = null;

  private inFlight: Promise<SyncSummary> | null = null;

  private localChangeTimer: ReturnType<typeof setTimeout> | null = null;
  private periodicSyncInterval: ReturnType<typeof setInterval> | null = null;
  private localChangeSubscriptions: (() => void)[] = [];

  private statusListeners: Set<SyncStatusListener> = new Set();
  private repositories: Map<SyncTableName, SyncableRepository> = new Map();

  private readonly sessionManager: SessionManager;
  private readonly purger: SignOutPurger;
  private readonly authProvider: AuthProvider | null;
  private readonly scheduler: SyncScheduler;
  private readonly clock: Clock;
  private readonly remoteEnabled: boolean;
  private readonly debounceMs: number;
  private readonly periodicMs: number;

  constructor(options: SyncServiceOptions) {
    this.sessionManager = options.sessionManager;
    this.purger = options.purger;
    this.authProvider = options.authProvider ?? null;
    this.scheduler = options.scheduler ?? new SyncScheduler();
    this.clock = options.clock ?? systemClock;
    this.remoteEnabled = options.remoteEnabled;
    this.debounceMs = options.timing?.debounceMs ?? SYNC_CONFIG.DEBOUNCE_MS;
    this.periodicMs = options.timing?.periodicMs ?? SYNC_CONFIG.PERIODIC_SYNC_MS;

    for (const repository of options.repositories) {
      this.repositories.set(repository.tableName, repository);
    }
  }

  /**
   * Load the persisted last sync time. Call this once when the app starts.
   */
  async initialize(): Promise<void> {
    const lastSyncAt = await this.sessionManager.getLastSyncAt();
    this.lastSyncTimeInner = lastSyncAt ? tryParseTimestamp(lastSyncAt) : null;
  }

  // ============ Status Getters ============

  get isSyncing(): boolean {
    return this.isSyncingInner;
  }

  get lastSyncError(): SyncError | null {
    return this.lastSyncErrorInner;
  }

  get lastSyncTime(): Date | null {
    return this.lastSyncTimeInner;
  }

  // ============ Sync Triggers ============

  /**
   * Run one sync cycle across all collections.
   *
   * A non-forced call made while a cycle is running joins that cycle. A forced
   * call waits for it and then runs its own, so it always observes fresh state.
   */
  async runSync(force: boolean = false): Promise<SyncSummary> {
    while (this.inFlight) {
      if (!force) return this.inFlight;
      await this.inFlight;
    }

    const cycle = this.runCycle(force);
    this.inFlight = cycle;
    try {
      return await cycle;
    } finally {
      if (this.inFlight === cycle) {
        this.inFlight = null;
      }
    }
  }

  /**
   * Feed a lifecycle event into the engine.
   */
  async handle(trigger: SyncTrigger): Promise<SyncSummary> {
    const force = FORCED_TRIGGERS.has(trigger.type);
    log.debug(`Trigger ${trigger.type}${force ? ' (forced)' : ''}`);
    return this.runSync(force);
  }

  /**
   * Start periodic sync and debounced sync after local writes.
   */
  start(): void {
    if (this.periodicSyncInterval) return;

    this.periodicSyncInterval = setInterval(() => {
      this.handle({ type: 'periodic' }).catch((error: unknown) => {
        log.error('Periodic sync failed:', error);
      });
    }, this.periodicMs);

    this.localChangeSubscriptions = [...this.repositories.values()].map((repository) =>
      repository.onLocalChange((table) => this.scheduleLocalChangeSync(table))
    );
  }

  /**
   * Stop all timers. Call this when the app shuts down.
   */
  stop(): void {
    if (this.localChangeTimer) {
      clearTimeout(this.localChangeTimer);
      this.localChangeTimer = null;
    }

    if (this.periodicSyncInterval) {
      clearInterval(this.periodicSyncInterval);
      this.periodicSyncInterval = null;
    }

    for (const unsubscribe of this.localChangeSubscriptions) {
      unsubscribe();
    }
    this.localChangeSubscriptions = [];
  }

  // ============ Session Transitions ============

  /**
   * Establish a session, give it the rows created while signed out, and sync
   * right away.
   */
  async signIn(session: AuthSession): Promise<SyncSummary> {
    await this.sessionManager.signIn(session);

    for (const repository of this.repositories.values()) {
      await repository.claimUnowned(session.userId);
    }

    return this.handle({ type: 'authentication-succeeded' });
  }

  /**
   * Push what can be pushed, then clear all local user data and the session.
   *
   * @throws UnsyncedChangesError when local changes are still pending and
   * `discardUnsynced` is not set; nothing is purged in that case.
   */
  async signOut(options: SignOutOptions = {}): Promise<void> {
    const session = this.sessionManager.currentIdentity();

    let lastError: SyncError | null = null;
    if (session) {
      const summary = await this.runSync(true);
      lastError = summary.lastSyncError;
    }

    const pending = await this.getPendingCount();
    if (pending > 0 && !options.discardUnsynced) {
      throw new UnsyncedChangesError(pending, lastError);
    }

    this.stop();
    await this.purger.purgeLocalData();
    await this.sessionManager.signOut();
    this.scheduler.reset();
    this.lastSyncTimeInner = null;
    this.lastSyncErrorInner = null;

    for (const repository of this.repositories.values()) {
      await repository.refresh();
    }

    if (session && this.authProvider) {
      try {
        await this.authProvider.logOut(session);
      } catch (error) {
        // Local data and session are already gone
        log.warn('Remote logout failed:', error);
      }
    }

    this.notifyStatusListeners('idle');
  }

  // ============ Status Subscriptions ============

  /**
   * Subscribe to sync status changes.
   */
  onStatusChange(listener: SyncStatusListener): () => void {
    this.statusListeners.add(listener);
    return () => this.statusListeners.delete(listener);
  }

  // ============ Utility Methods ============

  /**
   * Number of local rows (tombstones included) not yet on the remote.
   */
  async getPendingCount(): Promise<number> {
    let pending = 0;
    for (const repository of this.repositories.values()) {
      pending += await repository.countPending();
    }
    return pending;
  }

  // ============ Private Methods ============

  private async runCycle(force: boolean): Promise<SyncSummary> {
    const startedAt = this.clock();

    if (!this.scheduler.shouldRun(force, startedAt)) {
      return this.skipped('cooldown', startedAt);
    }

    const current = this.sessionManager.currentIdentity();
    if (!current) {
      return this.skipped('signed-out', startedAt);
    }
    if (!this.remoteEnabled) {
      return this.skipped('offline-only', startedAt);
    }

    this.isSyncingInner = true;
    this.lastSyncErrorInner = null;
    this.notifyStatusListeners('syncing');

    const collections: CollectionSyncReport[] = [];

    try {
      const session = await this.ensureFreshSession(current);

      if (session) {
        // Sequential, in a fixed order; a failed collection never stops the rest
        for (const tableName of SYNC_TABLE_ORDER) {
          const repository = this.repositories.get(tableName);
          if (!repository) continue;

          const outcome = await this.syncCollection(repository, session);
          collections.push({
            table: outcome.table,
            status: outcome.ok ? 'synced' : 'failed',
            stats: outcome.stats,
            error: outcome.ok ? null : outcome.error,
          });

          if (!outcome.ok) {
            this.lastSyncErrorInner = outcome.error;
          }
        }
      }

      const summary = this.summarize(startedAt, collections);

      if (summary.success || summary.pulled > 0 || summary.pushed > 0) {
        await this.recordSyncTime(summary.finishedAt);
      }

      return { ...summary, lastSyncError: this.lastSyncErrorInner };
    } finally {
      this.isSyncingInner = false;
      if (this.lastSyncErrorInner) {
        this.notifyStatusListeners('error', this.lastSyncErrorInner);
      } else {
        this.notifyStatusListeners('idle');
      }
    }
  }

  private async syncCollection(
    repository: SyncableRepository,
    session: AuthSession
  ): Promise<CollectionSyncOutcome> {
    try {
      return await repository.sync(session);
    } catch (error) {
      return {
        ok: false,
        table: repository.tableName,
        stats: emptyStats(),
        error: toSyncError(error, repository.tableName),
      };
    }
  }

  /**
   * Return a usable session, refreshing it when it is about to expire.
   * Sets lastSyncError and returns `null` when that is not possible.
   */
  private async ensureFreshSession(session: AuthSession): Promise<AuthSession | null> {
    if (!this.sessionManager.isExpired(session)) {
      return session;
    }

    if (!this.authProvider || !session.refreshToken) {
      this.lastSyncErrorInner = new AuthError('Session expired, please sign in again');
      return null;
    }

    try {
      const refreshed = await this.authProvider.refreshSession(session.refreshToken);
      if (!refreshed) {
        this.lastSyncErrorInner = new AuthError('Session expired, please sign in again');
        return null;
      }
      await this.sessionManager.replace(refreshed);
      return refreshed;
    } catch (error) {
      this.lastSyncErrorInner = toSyncError(error, null);
      log.error('Session refresh failed:', error);
      return null;
    }
  }

  private async recordSyncTime(finishedAt: string): Promise<void> {
    try {
      await this.sessionManager.updateLastSyncAt(finishedAt);
      this.lastSyncTimeInner = tryParseTimestamp(finishedAt);
    } catch (error) {
      this.lastSyncErrorInner = toSyncError(error, null);
      log.error('Failed to record last sync time:', error);
    }
  }

  private summarize(startedAt: Date, collections: CollectionSyncReport[]): SyncSummary {
    return {
      ran: true,
      skipReason: null,
      success: this.lastSyncErrorInner === null && collections.every((report) => report.status === 'synced'),
      startedAt: formatTimestamp(startedAt),
      finishedAt: formatTimestamp(this.clock()),
      pulled: collections.reduce((total, report) => total + report.stats.pulled, 0),
      pushed: collections.reduce((total, report) => total + report.stats.pushed, 0),
      collections,
      lastSyncError: this.lastSyncErrorInner,
    };
  }

  private skipped(reason: SyncSkipReason, at: Date): SyncSummary {
    log.debug(`Sync skipped: ${reason}`);
    const timestamp = formatTimestamp(at);
    return {
      ran: false,
      skipReason: reason,
      success: true,
      startedAt: timestamp,
      finishedAt: timestamp,
      pulled: 0,
      pushed: 0,
      collections: [],
      lastSyncError: this.lastSyncErrorInner,
    };
  }

  private scheduleLocalChangeSync(table: SyncTableName): void {
    if (this.localChangeTimer) {
      clearTimeout(this.localChangeTimer);
    }

    this.localChangeTimer = setTimeout(() => {
      this.localChangeTimer = null;
      this.handle({ type: 'local-change', table }).catch((error: unknown) => {
        log.error('Sync after local change failed:', error);
      });
    }, this.debounceMs);
  }

  private notifyStatusListeners(status: SyncStatusState, error?: SyncError): void {
    for (const listener of this.statusListeners) {
      try {
        listener(status, error);
      } catch (e) {
        log.error('Error in sync status listener:', e);
      }
    }
  }
}
