/**
 * Composition root: opens the local database, applies migrations and wires the
 * repositories, session, purger and sync service together.
 */

import { SupabaseAuthProvider, type AuthProvider } from '@/lib/auth';
import { loadConfig, type AppConfig } from '@/lib/config';
import { LocalDatabase } from '@/lib/database';
import { createLogger, setLogLevel } from '@/lib/logger';
import { runMigrations, type Migration } from '@/lib/migrations';
import { SupabaseClientPool } from '@/lib/supabase';
import { systemClock, type Clock } from '@/lib/types';
import { createSupabaseRemoteFactory } from './datasources/RemoteDataSource';
import type { RemoteDataSourceFactory } from './datasources/types';
import {
  CabinetItemsRepository,
  DailyLogsRepository,
  ProgramEnrollmentsRepository,
  ProgressRecordsRepository,
  UserProfilesRepository,
  type RepositoryDeps,
} from './repositories';
import { ConflictResolver } from './services/ConflictResolver';
import { SessionManager } from './services/SessionManager';
import { SignOutPurger } from './services/SignOutPurger';
import { SyncScheduler } from './services/SyncScheduler';
import { SyncService } from './services/SyncService';

const log = createLogger('sync');

export interface SyncRepositories {
  userProfiles: UserProfilesRepository;
  dailyLogs: DailyLogsRepository;
  progressRecords: ProgressRecordsRepository;
  cabinetItems: CabinetItemsRepository;
  programEnrollments: ProgramEnrollmentsRepository;
}

export interface SyncEngineOptions {
  /** Defaults to `loadConfig()` over the process environment. */
  config?: AppConfig;
  /** Overrides the remote store; `null` forces offline-only mode. */
  remote?: RemoteDataSourceFactory | null;
  /** Overrides the auth provider; `null` disables token refresh and remote logout. */
  authProvider?: AuthProvider | null;
  clock?: Clock;
  /** Defaults to the files in supabase/migrations. */
  migrations?: Migration[];
}

export interface SyncEngine {
  config: AppConfig;
  db: LocalDatabase;
  sessionManager: SessionManager;
  repositories: SyncRepositories;
  purger: SignOutPurger;
  syncService: SyncService;
  authProvider: AuthProvider | null;
  /** Stop timers and write the database to disk. */
  close(): Promise<void>;
}

export async function createSyncEngine(options: SyncEngineOptions = {}): Promise<SyncEngine> {
  const config = options.config ?? loadConfig();
  const clock = options.clock ?? systemClock;
  setLogLevel(config.logLevel);

  const db = await LocalDatabase.open({ filePath: config.localDbPath });
  const migrationResult = await runMigrations(db, options.migrations);
  if (migrationResult.errors.length > 0) {
    await db.close();
    throw new Error(`Local database migration failed: ${migrationResult.errors.join('; ')}`);
  }

  const clients = config.supabase ? new SupabaseClientPool(config.supabase) : null;
  const remote =
    options.remote !== undefined
      ? options.remote
      : clients
        ? createSupabaseRemoteFactory(clients, config.sync.remoteTimeoutMs)
        : null;
  const authProvider =
    options.authProvider !== undefined ? options.authProvider : clients ? new SupabaseAuthProvider(clients) : null;

  const sessionManager = new SessionManager(db, clock);
  const deps: RepositoryDeps = {
    db,
    sessionManager,
    remote,
    clock,
    resolver: new ConflictResolver('last-write-wins'),
  };

  const repositories: SyncRepositories = {
    userProfiles: new UserProfilesRepository(deps),
    dailyLogs: new DailyLogsRepository(deps),
    progressRecords: new ProgressRecordsRepository(deps),
    cabinetItems: new CabinetItemsRepository(deps),
    programEnrollments: new ProgramEnrollmentsRepository(deps),
  };

  const purger = new SignOutPurger(db);
  const syncService = new SyncService({
    sessionManager,
    repositories: Object.values(repositories),
    purger,
    remoteEnabled: remote !== null,
    authProvider,
    scheduler: new SyncScheduler(config.sync.cooldownMs),
    clock,
    timing: { debounceMs: config.sync.debounceMs, periodicMs: config.sync.periodicMs },
  });

  await sessionManager.restore();
  await syncService.initialize();

  log.info(remote ? 'Sync engine ready' : 'Sync engine ready (offline-only)');

  return {
    config,
    db,
    sessionManager,
    repositories,
    purger,
    syncService,
    authProvider,
    async close() {
      syncService.stop();
      await db.close();
    },
  };
}
