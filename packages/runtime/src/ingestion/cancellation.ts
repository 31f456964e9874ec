// Cancellation guard for a single ingestion call
//
// Combines the caller's AbortSignal with an optional deadline. Every step of
// the unit of work checks the guard before it starts and races its storage
// call against it, so a cancelled call fails inside the transaction and is
// rolled back like any other storage failure.

import {
  IngestionAbortedError,
  IngestionTimeoutError,
  type IngestionStep,
  type StorageError,
} from '../errors.js';

export type CancellationGuard = {
  /**
   * Throw if the call has been aborted or has run past its deadline.
   */
  throwIfCancelled(step: IngestionStep): void;

  /**
   * Settle with `pending`, or reject as soon as the call is cancelled.
   */
  race<T>(step: IngestionStep, pending: Promise<T>): Promise<T>;

  /**
   * Like `race`, but cancellation only rejects while `waiting()` is true.
   * Once it turns false, `pending` is awaited to the end.
   */
  raceWhile<T>(step: IngestionStep, pending: Promise<T>, waiting: () => boolean): Promise<T>;

  /**
   * Release the timer and signal listener.
   */
  dispose(): void;
};

export type CancellationOptions = {
  signal?: AbortSignal;
  timeoutMs?: number;
};

export function createCancellationGuard(options: CancellationOptions): CancellationGuard {
  const { signal, timeoutMs } = options;
  const controller = new AbortController();
  let timedOut = false;

  const forwardAbort = () => controller.abort();
  if (signal?.aborted) {
    controller.abort();
  } else {
    signal?.addEventListener('abort', forwardAbort, { once: true });
  }

  const timeoutId =
    timeoutMs !== undefined
      ? setTimeout(() => {
          timedOut = true;
          controller.abort();
        }, timeoutMs)
      : undefined;

  const cancellationError = (step: IngestionStep): StorageError =>
    timedOut && timeoutMs !== undefined
      ? new IngestionTimeoutError(step, timeoutMs)
      : new IngestionAbortedError(step, signal?.reason);

  function raceWhile<T>(
    step: IngestionStep,
    pending: Promise<T>,
    waiting: () => boolean
  ): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const onCancel = () => {
        if (waiting()) reject(cancellationError(step));
      };

      pending
        .then(resolve, reject)
        .finally(() => controller.signal.removeEventListener('abort', onCancel));

      // The work itself may have cancelled the call before it returned
      if (controller.signal.aborted) {
        onCancel();
      } else {
        controller.signal.addEventListener('abort', onCancel, { once: true });
      }
    });
  }

  return {
    throwIfCancelled(step) {
      if (controller.signal.aborted) {
        throw cancellationError(step);
      }
    },

    race<T>(step: IngestionStep, pending: Promise<T>): Promise<T> {
      return raceWhile(step, pending, () => true);
    },

    raceWhile,

    dispose() {
      if (timeoutId !== undefined) clearTimeout(timeoutId);
      signal?.removeEventListener('abort', forwardAbort);
    },
  };
}
