import type { AuthProvider } from '@/lib/auth';
import type { AppConfig, SyncTimingConfig } from '@/lib/config';
import type { AuthSession, Clock } from '@/lib/types';
import { createSyncEngine, type SyncEngine } from '@/sync/createSyncEngine';
import type { InMemoryRemoteStore } from './in-memory-remote';

export const START = '2026-01-31T08:00:00.000Z';

export const SESSION: AuthSession = {
  userId: 'user-1',
  email: 'user@example.com',
  accessToken: 'test-access-token',
  refreshToken: 'test-refresh-token',
  expiresAt: '2026-02-01T08:00:00.000Z',
};

/**
 * Manually driven clock.
 */
export class TestClock {
  private current: Date;

  constructor(iso: string = START) {
    this.current = new Date(iso);
  }

  readonly now: Clock = () => new Date(this.current.getTime());

  set(iso: string): void {
    this.current = new Date(iso);
  }

  advance(ms: number): void {
    this.current = new Date(this.current.getTime() + ms);
  }
}

export function testConfig(timing: Partial<SyncTimingConfig> = {}): AppConfig {
  return {
    supabase: null,
    localDbPath: null,
    sync: {
      cooldownMs: 30_000,
      debounceMs: 2_000,
      periodicMs: 60_000,
      remoteTimeoutMs: 15_000,
      ...timing,
    },
    logLevel: 'silent',
  };
}

export interface TestEngineOptions {
  /** `null` runs the engine offline-only. */
  store: InMemoryRemoteStore | null;
  clock?: TestClock;
  authProvider?: AuthProvider | null;
  timing?: Partial<SyncTimingConfig>;
}

export function createTestEngine(options: TestEngineOptions): Promise<SyncEngine> {
  return createSyncEngine({
    config: testConfig(options.timing),
    remote: options.store ? options.store.factory : null,
    authProvider: options.authProvider ?? null,
    clock: (options.clock ?? new TestClock()).now,
  });
}
