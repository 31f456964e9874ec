// tRPC initialization
//
// Sets up tRPC with the superjson transformer. Error shapes carry the
// runtime error code so clients can tell an unknown spot from an unknown user.

import { initTRPC, TRPCError } from '@trpc/server';
import superjson from 'superjson';
import { ZodError } from 'zod';
import { RuntimeError } from '@surflog/runtime';
import type { Context } from './context.js';

const t = initTRPC.context<Context>().create({
  transformer: superjson,
  errorFormatter({ shape, error }) {
    return {
      ...shape,
      data: {
        ...shape.data,
        // Runtime error code (UNKNOWN_LOCATION, STORAGE_ERROR, ...) when there is one
        errorCode: error.cause instanceof RuntimeError ? error.cause.code : null,
        zodError: error.cause instanceof ZodError ? error.cause.flatten() : null,
      },
    };
  },
});

export const router = t.router;

/**
 * Base procedure. The submission API has no authentication.
 */
export const publicProcedure = t.procedure;

export { TRPCError };
