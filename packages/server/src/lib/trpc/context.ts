// tRPC request context

import type { CreateHTTPContextOptions } from '@trpc/server/adapters/standalone';
import type { TransactionalRepositoryContext } from '@surflog/repositories';
import type { BuoyClient, IngestLogger } from '@surflog/runtime';
import type { ServerConfig } from '../config.js';

/**
 * Context available to all tRPC procedures.
 */
export type Context = {
  /** Repository context for data access */
  repos: TransactionalRepositoryContext;

  config: ServerConfig;

  logger: IngestLogger;

  /** Source of readings a submission leaves out */
  buoys: BuoyClient;

  /** Aborted when the client disconnects before the response is sent */
  signal?: AbortSignal;
};

export type ContextDependencies = Omit<Context, 'signal'>;

/**
 * Build the createContext function for the HTTP adapter.
 *
 * Called once per request. Without request options (direct callers, tests)
 * the context carries no abort signal.
 */
export function createContextFactory(deps: ContextDependencies) {
  return (opts?: CreateHTTPContextOptions): Context => {
    if (!opts) {
      return { ...deps };
    }

    const controller = new AbortController();
    const { res } = opts;
    res.once('close', () => {
      if (!res.writableEnded) {
        controller.abort(new Error('client disconnected'));
      }
    });

    return { ...deps, signal: controller.signal };
  };
}
