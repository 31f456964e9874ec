// Repository context singleton
//
// Supports two modes:
// - In-memory (no DATABASE_URL): no setup required, seeded with starter data
// - Postgres: set DATABASE_URL

import {
  postgres,
  memory,
  type TransactionalRepositoryContext,
} from '@surflog/repositories';
import type { IngestLogger } from '@surflog/runtime';
import type { ServerConfig } from '../config.js';
import { seedStarterData } from './seed.js';

type Connection = ReturnType<typeof postgres.createDatabase>;

// Singletons
let connection: Connection | null = null;
let memoryRepos: memory.InMemoryRepositoryContext | null = null;

/**
 * Get the repository context for the configured storage.
 *
 * In-memory storage is seeded with the starter spots and a user named after
 * the configured default username, or the development user.
 */
export async function getRepositoryContext(
  config: ServerConfig,
  logger?: IngestLogger
): Promise<TransactionalRepositoryContext> {
  if (!config.databaseUrl) {
    if (!memoryRepos) {
      const repos = memory.createInMemoryRepositoryContext();
      await seedStarterData(repos, { username: config.defaultUsername });
      memoryRepos = repos;
      logger?.info('Using in-memory storage with starter data');
    }
    return memoryRepos;
  }

  if (!connection) {
    connection = postgres.createDatabase({
      connectionString: config.databaseUrl,
      maxConnections: config.dbMaxConnections,
      statementTimeoutMs: config.dbStatementTimeoutMs,
    });
    logger?.info('Connected to Postgres', { maxConnections: config.dbMaxConnections });
  }

  return postgres.createTransactionalPgRepositoryContext(connection.db);
}

/**
 * Close the database connection and drop in-memory data.
 */
export async function closeDb(): Promise<void> {
  if (connection) {
    await connection.client.end();
    connection = null;
  }
  memoryRepos = null;
}
