// Repository interfaces
// These define the contracts for data access, independent of the storage backend.

export type { LocationRepository, CreateLocationInput } from './location-repository.js';

export type { UserRepository, CreateUserInput } from './user-repository.js';

export type {
  ConditionRepository,
  TemperatureRepository,
  SwellRepository,
  TideRepository,
  WindRepository,
  InsertTemperatureInput,
  InsertSwellInput,
  InsertTideInput,
  InsertWindInput,
} from './condition-repository.js';

export type { SessionRepository, InsertSessionInput } from './session-repository.js';

export type {
  RepositoryContext,
  TransactionFn,
  TransactionalRepositoryContext,
} from './repository-context.js';
