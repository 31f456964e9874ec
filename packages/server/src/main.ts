// HTTP entry point
//
// Serves the tRPC router on PORT (default 5001). Procedures are addressed by
// path, e.g. POST /sessions.submit.

import { createHTTPServer } from '@trpc/server/adapters/standalone';
import { createBuoyClient, createConsoleLogger } from '@surflog/runtime';
import { loadConfig } from './lib/config.js';
import { getRepositoryContext, closeDb } from './lib/db/index.js';
import { createContextFactory } from './lib/trpc/context.js';
import { appRouter } from './lib/trpc/routers/index.js';

const config = loadConfig();
const logger = createConsoleLogger({ level: config.logLevel });
const repos = await getRepositoryContext(config, logger);
const buoys = createBuoyClient({
  baseUrl: config.buoyDataUrl,
  timeZone: config.buoyTimeZone,
  timeoutMs: config.buoyTimeoutMs,
  logger,
});

const { server, listen } = createHTTPServer({
  router: appRouter,
  createContext: createContextFactory({ repos, config, logger, buoys }),
  onError({ error, path }) {
    if (error.code === 'INTERNAL_SERVER_ERROR') {
      logger.error(`tRPC error on ${path ?? '<no path>'}`, { message: error.message });
    }
  },
});

listen(config.port);
logger.info('Surf log server listening', { port: config.port, storage: config.storage });

async function shutdown(signal: string): Promise<void> {
  logger.info('Shutting down', { signal });
  await new Promise<void>((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
  await closeDb();
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((err: unknown) => {
      logger.error('Shutdown failed', { message: err instanceof Error ? err.message : String(err) });
      process.exitCode = 1;
    });
  });
}
