// In-memory repository implementations for development and testing
//
// This module provides a complete in-memory implementation of all repositories,
// useful for:
// - Local development without a database
// - Fast unit testing of the ingestion path
//
// Transactions run against a staged copy of every table. The copy is
// published in one synchronous step when the transaction resolves and
// dropped when it rejects, so readers never see uncommitted rows.
// Transactions are serialized; writes made outside a transaction are
// queued behind them as single-statement transactions.
//
// Data does not persist between restarts.

import type {
  Id,
  Location,
  User,
  Temperature,
  Swell,
  Tide,
  Wind,
  Session,
} from '@surflog/protocol';
import type {
  RepositoryContext,
  TransactionalRepositoryContext,
  TransactionFn,
  LocationRepository,
  UserRepository,
  TemperatureRepository,
  SwellRepository,
  TideRepository,
  WindRepository,
  SessionRepository,
} from '../interfaces/index.js';

/**
 * One map per table, keyed by generated id.
 */
export interface InMemoryTables {
  locations: Map<Id, Location>;
  users: Map<Id, User>;
  temperatures: Map<Id, Temperature>;
  swells: Map<Id, Swell>;
  tides: Map<Id, Tide>;
  winds: Map<Id, Wind>;
  sessions: Map<Id, Session>;
}

export type InMemoryTableName = keyof InMemoryTables;

/**
 * In-memory data store that can be accessed for debugging/inspection.
 */
export interface InMemoryDataStore extends InMemoryTables {
  /** Last id handed out per table; ids start at 1 and are never reused */
  sequences: Record<InMemoryTableName, number>;
}

/**
 * Extended repository context with access to underlying data and clear function.
 */
export interface InMemoryRepositoryContext extends TransactionalRepositoryContext {
  /** Direct access to committed data (for debugging/testing) */
  _data: InMemoryDataStore;
  /** Clear all data and reset id sequences */
  clear(): void;
}

function emptySequences(): Record<InMemoryTableName, number> {
  return {
    locations: 0,
    users: 0,
    temperatures: 0,
    swells: 0,
    tides: 0,
    winds: 0,
    sessions: 0,
  };
}

function createStore(): InMemoryDataStore {
  return {
    locations: new Map(),
    users: new Map(),
    temperatures: new Map(),
    swells: new Map(),
    tides: new Map(),
    winds: new Map(),
    sessions: new Map(),
    sequences: emptySequences(),
  };
}

// Rows are immutable, so a shallow copy of each map is a full snapshot
function cloneStore(store: InMemoryDataStore): InMemoryDataStore {
  return {
    locations: new Map(store.locations),
    users: new Map(store.users),
    temperatures: new Map(store.temperatures),
    swells: new Map(store.swells),
    tides: new Map(store.tides),
    winds: new Map(store.winds),
    sessions: new Map(store.sessions),
    sequences: { ...store.sequences },
  };
}

function replaceRows<V>(target: Map<Id, V>, source: Map<Id, V>): void {
  target.clear();
  for (const [id, row] of source) {
    target.set(id, row);
  }
}

// Must stay synchronous: this is the commit point
function publish(staged: InMemoryDataStore, committed: InMemoryDataStore): void {
  replaceRows(committed.locations, staged.locations);
  replaceRows(committed.users, staged.users);
  replaceRows(committed.temperatures, staged.temperatures);
  replaceRows(committed.swells, staged.swells);
  replaceRows(committed.tides, staged.tides);
  replaceRows(committed.winds, staged.winds);
  replaceRows(committed.sessions, staged.sessions);
  committed.sequences = { ...staged.sequences };
}

function nextId(store: InMemoryDataStore, table: InMemoryTableName): Id {
  store.sequences[table] += 1;
  return store.sequences[table];
}

function assertReference(table: Map<Id, unknown>, id: Id, column: string): void {
  if (!table.has(id)) {
    throw new Error(
      `insert on table "session_info" violates foreign key constraint: ${column}=${id} does not exist`
    );
  }
}

/**
 * Remove every session matching the predicate along with its reading rows.
 */
function deleteSessionsWhere(store: InMemoryDataStore, predicate: (session: Session) => boolean): number {
  let removed = 0;
  for (const session of Array.from(store.sessions.values())) {
    if (!predicate(session)) continue;
    store.sessions.delete(session.id);
    store.temperatures.delete(session.temperatureId);
    store.swells.delete(session.swellId);
    store.tides.delete(session.tideId);
    store.winds.delete(session.windId);
    removed++;
  }
  return removed;
}

/**
 * Build repositories that read and write the given store directly.
 */
function bindRepositories(store: InMemoryDataStore): RepositoryContext {
  const locationRepo: LocationRepository = {
    async create(input) {
      for (const existing of store.locations.values()) {
        if (existing.name === input.name) {
          throw new Error(`duplicate location name: ${input.name}`);
        }
      }
      const location: Location = {
        id: nextId(store, 'locations'),
        name: input.name,
        buoyNumber: input.buoyNumber,
        latitude: input.latitude ?? null,
        longitude: input.longitude ?? null,
      };
      store.locations.set(location.id, location);
      return location;
    },
    async get(id) {
      return store.locations.get(id) ?? null;
    },
    async findByName(name) {
      for (const location of store.locations.values()) {
        if (location.name === name) return location;
      }
      return null;
    },
    async delete(id) {
      if (!store.locations.has(id)) return false;
      deleteSessionsWhere(store, (s) => s.locationId === id);
      store.locations.delete(id);
      return true;
    },
  };

  const userRepo: UserRepository = {
    async create(input) {
      for (const existing of store.users.values()) {
        if (existing.username === input.username) {
          throw new Error(`duplicate username: ${input.username}`);
        }
      }
      const user: User = {
        id: nextId(store, 'users'),
        username: input.username,
        passkey: input.passkey,
        email: input.email ?? null,
      };
      store.users.set(user.id, user);
      return user;
    },
    async get(id) {
      return store.users.get(id) ?? null;
    },
    async findByUsername(username) {
      for (const user of store.users.values()) {
        if (user.username === username) return user;
      }
      return null;
    },
    async delete(id) {
      if (!store.users.has(id)) return false;
      deleteSessionsWhere(store, (s) => s.userId === id);
      store.users.delete(id);
      return true;
    },
  };

  const temperatureRepo: TemperatureRepository = {
    async insert(input) {
      const row: Temperature = { id: nextId(store, 'temperatures'), ...input };
      store.temperatures.set(row.id, row);
      return row;
    },
    async get(id) {
      return store.temperatures.get(id) ?? null;
    },
  };

  const swellRepo: SwellRepository = {
    async insert(input) {
      const row: Swell = { id: nextId(store, 'swells'), ...input };
      store.swells.set(row.id, row);
      return row;
    },
    async get(id) {
      return store.swells.get(id) ?? null;
    },
  };

  const tideRepo: TideRepository = {
    async insert(input) {
      const row: Tide = { id: nextId(store, 'tides'), ...input };
      store.tides.set(row.id, row);
      return row;
    },
    async get(id) {
      return store.tides.get(id) ?? null;
    },
  };

  const windRepo: WindRepository = {
    async insert(input) {
      const row: Wind = { id: nextId(store, 'winds'), ...input };
      store.winds.set(row.id, row);
      return row;
    },
    async get(id) {
      return store.winds.get(id) ?? null;
    },
  };

  const sessionRepo: SessionRepository = {
    async insert(input) {
      assertReference(store.locations, input.locationId, 'loc_id');
      assertReference(store.temperatures, input.temperatureId, 'temp_id');
      assertReference(store.swells, input.swellId, 'swell_id');
      assertReference(store.tides, input.tideId, 'tide_id');
      assertReference(store.winds, input.windId, 'wind_id');
      assertReference(store.users, input.userId, 'user_id');

      const session: Session = { id: nextId(store, 'sessions'), ...input };
      store.sessions.set(session.id, session);
      return session;
    },
    async get(id) {
      return store.sessions.get(id) ?? null;
    },
  };

  return {
    locations: locationRepo,
    users: userRepo,
    temperatures: temperatureRepo,
    swells: swellRepo,
    tides: tideRepo,
    winds: windRepo,
    sessions: sessionRepo,
  };
}

/**
 * Create a complete in-memory repository context.
 *
 * All data is stored in memory and will not persist between restarts.
 * Useful for development and testing.
 *
 * @example
 * ```typescript
 * const repos = createInMemoryRepositoryContext();
 *
 * await repos.locations.create({ name: 'Otter Rock', buoyNumber: 46050 });
 *
 * // Access underlying data for debugging
 * console.log(repos._data.locations.size);
 *
 * // Clear all data
 * repos.clear();
 * ```
 */
export function createInMemoryRepositoryContext(): InMemoryRepositoryContext {
  const data = createStore();
  const committed = bindRepositories(data);

  // Tail of the transaction queue. Each transaction starts when the
  // previous one has settled, whatever its outcome.
  let queue: Promise<unknown> = Promise.resolve();

  function transaction<T>(fn: TransactionFn<T>): Promise<T> {
    const run = queue.then(async () => {
      const staged = cloneStore(data);
      const result = await fn(bindRepositories(staged));
      publish(staged, data);
      return result;
    });
    // The queue only tracks ordering; the caller still receives the rejection through `run`
    queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  // Reads go straight to committed data; writes are queued as transactions
  const context: RepositoryContext = {
    locations: {
      ...committed.locations,
      create: (input) => transaction((tx) => tx.locations.create(input)),
      delete: (id) => transaction((tx) => tx.locations.delete(id)),
    },
    users: {
      ...committed.users,
      create: (input) => transaction((tx) => tx.users.create(input)),
      delete: (id) => transaction((tx) => tx.users.delete(id)),
    },
    temperatures: {
      ...committed.temperatures,
      insert: (input) => transaction((tx) => tx.temperatures.insert(input)),
    },
    swells: {
      ...committed.swells,
      insert: (input) => transaction((tx) => tx.swells.insert(input)),
    },
    tides: {
      ...committed.tides,
      insert: (input) => transaction((tx) => tx.tides.insert(input)),
    },
    winds: {
      ...committed.winds,
      insert: (input) => transaction((tx) => tx.winds.insert(input)),
    },
    sessions: {
      ...committed.sessions,
      insert: (input) => transaction((tx) => tx.sessions.insert(input)),
    },
  };

  return {
    ...context,
    transaction,
    _data: data,
    clear() {
      data.locations.clear();
      data.users.clear();
      data.temperatures.clear();
      data.swells.clear();
      data.tides.clear();
      data.winds.clear();
      data.sessions.clear();
      data.sequences = emptySequences();
    },
  };
}
