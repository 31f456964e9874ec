// Server configuration
//
// Read once from the environment at startup. Without DATABASE_URL the
// server runs on in-memory storage seeded with the starter spots.

import { z } from 'zod';
import { LOG_LEVELS, NDBC_REALTIME_URL, DEFAULT_SESSION_TIME_ZONE, type LogLevel } from '@surflog/runtime';

const EnvSchema = z.object({
  DATABASE_URL: z.string().min(1).optional(),
  PORT: z.coerce.number().int().min(1).max(65535).default(5001),
  DB_MAX_CONNECTIONS: z.coerce.number().int().positive().default(10),
  DB_STATEMENT_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  INGEST_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  DEFAULT_USERNAME: z.string().min(1).optional(),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  BUOY_DATA_URL: z.string().url().default(NDBC_REALTIME_URL),
  BUOY_TIMEZONE: z.string().min(1).default(DEFAULT_SESSION_TIME_ZONE),
  BUOY_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
});

export type StorageKind = 'postgres' | 'memory';

export type ServerConfig = {
  /** Postgres connection string; absent selects in-memory storage */
  databaseUrl?: string;
  port: number;
  dbMaxConnections: number;
  dbStatementTimeoutMs?: number;
  /** Deadline for one session ingestion, name resolution included */
  ingestTimeoutMs: number;
  /** Username recorded when a submission names none */
  defaultUsername?: string;
  storage: StorageKind;
  logLevel: LogLevel;
  /** Base URL of the realtime buoy files, used when a submission omits readings */
  buoyDataUrl: string;
  /** Zone the session date and times are logged in */
  buoyTimeZone: string;
  buoyTimeoutMs: number;
};

/**
 * Parse server configuration from environment variables.
 * Empty variables count as unset.
 *
 * @throws Error naming every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );
  const parsed = EnvSchema.safeParse(present);

  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${problems}`);
  }

  const vars = parsed.data;
  return {
    databaseUrl: vars.DATABASE_URL,
    port: vars.PORT,
    dbMaxConnections: vars.DB_MAX_CONNECTIONS,
    dbStatementTimeoutMs: vars.DB_STATEMENT_TIMEOUT_MS,
    ingestTimeoutMs: vars.INGEST_TIMEOUT_MS,
    defaultUsername: vars.DEFAULT_USERNAME,
    storage: vars.DATABASE_URL ? 'postgres' : 'memory',
    logLevel: vars.LOG_LEVEL,
    buoyDataUrl: vars.BUOY_DATA_URL,
    buoyTimeZone: vars.BUOY_TIMEZONE,
    buoyTimeoutMs: vars.BUOY_TIMEOUT_MS,
  };
}
