import { z } from 'zod';
import type { LogLevel } from './logger';

// Placeholder values from the example env file; treated as "not configured".
const PLACEHOLDER_URL = 'https://your-project.supabase.co';
const PLACEHOLDER_ANON_KEY = 'your-anon-key';

const envSchema = z.object({
  SUPABASE_URL: z.string().url().optional(),
  SUPABASE_ANON_KEY: z.string().min(1).optional(),
  LOCAL_DB_PATH: z.string().min(1).optional(),
  SYNC_COOLDOWN_MS: z.coerce.number().int().nonnegative().default(30_000),
  SYNC_DEBOUNCE_MS: z.coerce.number().int().nonnegative().default(2_000),
  SYNC_PERIODIC_MS: z.coerce.number().int().positive().default(60_000),
  SYNC_REMOTE_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

export interface SupabaseConfig {
  url: string;
  anonKey: string;
  /** Overrides the global fetch used by the Supabase client. */
  fetch?: typeof fetch;
}

export interface SyncTimingConfig {
  cooldownMs: number;
  debounceMs: number;
  periodicMs: number;
  remoteTimeoutMs: number;
}

export interface AppConfig {
  /** `null` means offline-only mode: nothing is ever sent to a remote store. */
  supabase: SupabaseConfig | null;
  /** `null` keeps the local database in memory only. */
  localDbPath: string | null;
  sync: SyncTimingConfig;
  logLevel: LogLevel;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Build the application configuration from environment variables.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }

  const values = parsed.data;

  return {
    supabase: validateSupabaseConfig(values.SUPABASE_URL, values.SUPABASE_ANON_KEY),
    localDbPath: values.LOCAL_DB_PATH ?? null,
    sync: {
      cooldownMs: values.SYNC_COOLDOWN_MS,
      debounceMs: values.SYNC_DEBOUNCE_MS,
      periodicMs: values.SYNC_PERIODIC_MS,
      remoteTimeoutMs: values.SYNC_REMOTE_TIMEOUT_MS,
    },
    logLevel: values.LOG_LEVEL,
  };
}

function validateSupabaseConfig(url: string | undefined, anonKey: string | undefined): SupabaseConfig | null {
  if (!url || url === PLACEHOLDER_URL) {
    return null;
  }
  if (!anonKey || anonKey === PLACEHOLDER_ANON_KEY) {
    return null;
  }
  return { url, anonKey };
}

export function isSupabaseConfigured(config: AppConfig): boolean {
  return config.supabase !== null;
}
