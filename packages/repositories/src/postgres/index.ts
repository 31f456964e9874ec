// Postgres implementation (drizzle-orm over postgres.js)

export { createDatabase, type Database, type DatabaseConfig, type DbExecutor } from './db.js';
export * from './schema/index.js';
export * from './repositories/index.js';
