import { drizzle } from 'drizzle-orm/postgres-js';
import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core';
import postgres from 'postgres';
import * as schema from './schema/index.js';

export type DatabaseConfig = {
  connectionString: string;
  maxConnections?: number;

  /**
   * Server-side statement_timeout for every connection in the pool.
   * A statement that runs longer fails, which rolls back its transaction.
   */
  statementTimeoutMs?: number;
};

/**
 * Create a database connection and Drizzle instance.
 *
 * Usage:
 * ```ts
 * const { db, client } = createDatabase({
 *   connectionString: process.env.DATABASE_URL
 * });
 * ```
 */
export function createDatabase(config: DatabaseConfig) {
  const client = postgres(config.connectionString, {
    max: config.maxConnections ?? 10,
    connection:
      config.statementTimeoutMs !== undefined
        ? { statement_timeout: config.statementTimeoutMs }
        : undefined,
  });

  const db = drizzle(client, { schema });

  return { db, client };
}

export type Database = ReturnType<typeof createDatabase>['db'];

/**
 * Anything repositories can run queries against: a database on any
 * drizzle Postgres driver, or an open transaction on one (PgTransaction
 * extends PgDatabase).
 */
export type DbExecutor = PgDatabase<PgQueryResultHKT, typeof schema>;
