// @surflog/server
// tRPC submission endpoint, configuration and storage selection

export { loadConfig, type ServerConfig, type StorageKind } from './lib/config.js';
export { getRepositoryContext, closeDb } from './lib/db/index.js';
export {
  seedStarterData,
  STARTER_LOCATIONS,
  DEV_USERNAME,
  type SeedOptions,
  type SeedResult,
} from './lib/db/seed.js';
export { createContextFactory, type Context, type ContextDependencies } from './lib/trpc/context.js';
export { toTRPCError } from './lib/trpc/errors.js';
export { appRouter, type AppRouter } from './lib/trpc/routers/index.js';
export { SubmitSessionInputSchema } from './lib/trpc/routers/sessions.js';
