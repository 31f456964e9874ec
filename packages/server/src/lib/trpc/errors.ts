// Mapping from runtime errors to tRPC errors

import {
  ValidationError,
  UnknownLocationError,
  UnknownUserError,
  BuoyDataError,
  StorageError,
} from '@surflog/runtime';
import { TRPCError } from './index.js';

/**
 * Convert an error thrown by the runtime into the matching TRPCError.
 * The original error is kept as the cause.
 */
export function toTRPCError(error: unknown): TRPCError {
  if (error instanceof TRPCError) {
    return error;
  }
  if (error instanceof ValidationError) {
    return new TRPCError({ code: 'BAD_REQUEST', message: error.message, cause: error });
  }
  if (error instanceof UnknownLocationError || error instanceof UnknownUserError) {
    return new TRPCError({ code: 'NOT_FOUND', message: error.message, cause: error });
  }
  if (error instanceof StorageError || error instanceof BuoyDataError) {
    return new TRPCError({ code: 'INTERNAL_SERVER_ERROR', message: error.message, cause: error });
  }
  return new TRPCError({
    code: 'INTERNAL_SERVER_ERROR',
    message: error instanceof Error ? error.message : 'Unknown error',
    cause: error,
  });
}
