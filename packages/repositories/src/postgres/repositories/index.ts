export { createPgRepositoryContext, createTransactionalPgRepositoryContext } from './context.js';
export { PgLocationRepository } from './location-repository.js';
export { PgUserRepository } from './user-repository.js';
export {
  PgTemperatureRepository,
  PgSwellRepository,
  PgTideRepository,
  PgWindRepository,
} from './condition-repositories.js';
export { PgSessionRepository } from './session-repository.js';
export { deleteSessionsCascade } from './cascade.js';
