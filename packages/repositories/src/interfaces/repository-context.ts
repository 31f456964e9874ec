import type { LocationRepository } from './location-repository.js';
import type { UserRepository } from './user-repository.js';
import type {
  TemperatureRepository,
  SwellRepository,
  TideRepository,
  WindRepository,
} from './condition-repository.js';
import type { SessionRepository } from './session-repository.js';

/**
 * RepositoryContext bundles all repository interfaces together.
 *
 * This is the primary dependency injection point for the runtime.
 * Pass a RepositoryContext to any code that needs data access,
 * and you can swap implementations (Postgres, in-memory)
 * without changing the consuming code.
 */
export interface RepositoryContext {
  readonly locations: LocationRepository;
  readonly users: UserRepository;
  readonly temperatures: TemperatureRepository;
  readonly swells: SwellRepository;
  readonly tides: TideRepository;
  readonly winds: WindRepository;
  readonly sessions: SessionRepository;
}

/**
 * Transaction wrapper type for atomic operations across repositories.
 * The repositories passed in are scoped to the transaction; use them, not
 * the outer context, for every read and write inside it.
 */
export type TransactionFn<T> = (repos: RepositoryContext) => Promise<T>;

/**
 * Extended context with transaction support.
 */
export interface TransactionalRepositoryContext extends RepositoryContext {
  /**
   * Execute a function within a transaction.
   *
   * - If the function resolves, every write it made is committed together
   * - If the function rejects, every write is rolled back and the
   *   original error is rethrown
   *
   * Writes made inside the transaction are not visible to readers outside
   * it until commit.
   */
  transaction<T>(fn: TransactionFn<T>): Promise<T>;
}
