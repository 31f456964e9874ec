// Root router - combines all domain routers

import { router, publicProcedure } from '../index.js';
import { sessionsRouter } from './sessions.js';

/**
 * The root router.
 *
 * Usage from client:
 * ```ts
 * const { sessionId } = await trpc.sessions.submit.mutate({
 *   spotName: 'Agate Beach',
 *   date: '2024-01-01',
 *   ...
 * });
 * ```
 */
export const appRouter = router({
  sessions: sessionsRouter,

  /**
   * Report liveness and which storage backend is in use.
   */
  health: publicProcedure.query(({ ctx }) => ({
    status: 'ok' as const,
    storage: ctx.config.storage,
  })),
});

/**
 * Export the router type for client-side type inference.
 */
export type AppRouter = typeof appRouter;
