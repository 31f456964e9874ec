import type { DbExecutor } from '../db.js';
import type {
  RepositoryContext,
  TransactionalRepositoryContext,
  TransactionFn,
} from '../../interfaces/index.js';
import { PgLocationRepository } from './location-repository.js';
import { PgUserRepository } from './user-repository.js';
import {
  PgTemperatureRepository,
  PgSwellRepository,
  PgTideRepository,
  PgWindRepository,
} from './condition-repositories.js';
import { PgSessionRepository } from './session-repository.js';

/**
 * Create a RepositoryContext backed by Postgres.
 *
 * Usage:
 * ```ts
 * const { db } = createDatabase({ connectionString: process.env.DATABASE_URL });
 * const repos = createPgRepositoryContext(db);
 *
 * const spot = await repos.locations.findByName('Agate Beach');
 * ```
 */
export function createPgRepositoryContext(db: DbExecutor): RepositoryContext {
  return {
    locations: new PgLocationRepository(db),
    users: new PgUserRepository(db),
    temperatures: new PgTemperatureRepository(db),
    swells: new PgSwellRepository(db),
    tides: new PgTideRepository(db),
    winds: new PgWindRepository(db),
    sessions: new PgSessionRepository(db),
  };
}

/**
 * Create a TransactionalRepositoryContext backed by Postgres.
 *
 * This extends the basic RepositoryContext with transaction support,
 * allowing multiple operations to be executed atomically.
 *
 * Usage:
 * ```ts
 * const repos = createTransactionalPgRepositoryContext(db);
 *
 * const session = await repos.transaction(async (tx) => {
 *   const temperature = await tx.temperatures.insert({ airTemp: 12.5, waterTemp: 9.8 });
 *   // ...swell, tide, wind
 *   return tx.sessions.insert({ temperatureId: temperature.id, ... });
 * });
 * ```
 */
export function createTransactionalPgRepositoryContext(
  db: DbExecutor
): TransactionalRepositoryContext {
  return new TransactionalPgRepositoryContext(db);
}

/**
 * TransactionalRepositoryContext implementation for Postgres.
 *
 * Provides all repository interfaces plus a transaction() method
 * for executing atomic operations.
 */
class TransactionalPgRepositoryContext implements TransactionalRepositoryContext {
  readonly locations: PgLocationRepository;
  readonly users: PgUserRepository;
  readonly temperatures: PgTemperatureRepository;
  readonly swells: PgSwellRepository;
  readonly tides: PgTideRepository;
  readonly winds: PgWindRepository;
  readonly sessions: PgSessionRepository;

  constructor(private db: DbExecutor) {
    this.locations = new PgLocationRepository(db);
    this.users = new PgUserRepository(db);
    this.temperatures = new PgTemperatureRepository(db);
    this.swells = new PgSwellRepository(db);
    this.tides = new PgTideRepository(db);
    this.winds = new PgWindRepository(db);
    this.sessions = new PgSessionRepository(db);
  }

  /**
   * Execute a function within a database transaction.
   *
   * All repository operations within the function will be atomic:
   * - If the function returns successfully, all changes are committed
   * - If the function throws, all changes are rolled back
   *
   * Postgres runs the transaction at READ COMMITTED, so other connections
   * never see its rows before commit.
   *
   * @throws Rolls back the transaction and rethrows if the function throws
   */
  async transaction<T>(fn: TransactionFn<T>): Promise<T> {
    // The callback receives a transaction-scoped executor; build a fresh
    // repository context on it so every query joins the transaction
    return this.db.transaction(async (tx) => fn(createPgRepositoryContext(tx)));
  }
}
