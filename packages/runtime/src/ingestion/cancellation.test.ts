// Tests for the ingestion cancellation guard

import { describe, it, expect, vi, afterEach } from 'vitest';
import { createCancellationGuard } from './cancellation.js';
import { IngestionAbortedError, IngestionTimeoutError } from '../errors.js';

const never = () => new Promise<never>(() => {});

describe('createCancellationGuard', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('does nothing without a signal or deadline', async () => {
    const guard = createCancellationGuard({});

    expect(() => guard.throwIfCancelled('resolve_location')).not.toThrow();
    await expect(guard.race('resolve_location', Promise.resolve(7))).resolves.toBe(7);
    guard.dispose();
  });

  it('passes through the rejection of the raced work', async () => {
    const guard = createCancellationGuard({ timeoutMs: 1000 });
    const failure = new Error('connection reset');

    await expect(guard.race('insert_tide', Promise.reject(failure))).rejects.toBe(failure);
    guard.dispose();
  });

  it('reports a signal that was aborted before the call started', () => {
    const controller = new AbortController();
    controller.abort(new Error('client went away'));
    const guard = createCancellationGuard({ signal: controller.signal });

    let thrown: unknown;
    try {
      guard.throwIfCancelled('resolve_user');
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(IngestionAbortedError);
    expect(thrown).toMatchObject({
      code: 'INGESTION_ABORTED',
      step: 'resolve_user',
      message: 'Storage failure during resolve_user: aborted: client went away',
    });
    guard.dispose();
  });

  it('rejects pending work when the signal aborts', async () => {
    const controller = new AbortController();
    const guard = createCancellationGuard({ signal: controller.signal });

    const raced = guard.race('insert_swell', never());
    controller.abort(new Error('shutdown'));

    await expect(raced).rejects.toMatchObject({
      code: 'INGESTION_ABORTED',
      step: 'insert_swell',
      message: 'Storage failure during insert_swell: aborted: shutdown',
    });
    guard.dispose();
  });

  it('rejects work that aborts the call before returning', async () => {
    const controller = new AbortController();
    const guard = createCancellationGuard({ signal: controller.signal });

    const raced = guard.race(
      'insert_wind',
      (() => {
        controller.abort(new Error('shutdown'));
        return never();
      })()
    );

    await expect(raced).rejects.toBeInstanceOf(IngestionAbortedError);
    guard.dispose();
  });

  it('rejects pending work once the deadline passes', async () => {
    vi.useFakeTimers();
    const guard = createCancellationGuard({ timeoutMs: 50 });

    const raced = guard.race('insert_session', never());
    vi.advanceTimersByTime(50);

    await expect(raced).rejects.toBeInstanceOf(IngestionTimeoutError);
    await expect(raced).rejects.toMatchObject({
      code: 'INGESTION_TIMEOUT',
      step: 'insert_session',
      timeoutMs: 50,
      message: 'Storage failure during insert_session: timed out after 50ms',
    });
    expect(() => guard.throwIfCancelled('commit')).toThrow(
      'Storage failure during commit: timed out after 50ms'
    );
    guard.dispose();
  });

  it('rejects a wait that is still waiting when the deadline passes', async () => {
    vi.useFakeTimers();
    const guard = createCancellationGuard({ timeoutMs: 50 });

    const raced = guard.raceWhile('resolve_location', never(), () => true);
    vi.advanceTimersByTime(50);

    await expect(raced).rejects.toMatchObject({
      code: 'INGESTION_TIMEOUT',
      step: 'resolve_location',
    });
    guard.dispose();
  });

  it('lets work that has started run to the end after cancellation', async () => {
    const controller = new AbortController();
    const guard = createCancellationGuard({ signal: controller.signal });
    let started = false;
    let finish: (value: string) => void = () => {};
    const work = new Promise<string>((resolve) => {
      finish = resolve;
    });

    const raced = guard.raceWhile('resolve_location', work, () => !started);
    started = true;
    controller.abort(new Error('shutdown'));
    finish('committed');

    await expect(raced).resolves.toBe('committed');
    guard.dispose();
  });

  it('stops the deadline timer on dispose', () => {
    vi.useFakeTimers();
    const guard = createCancellationGuard({ timeoutMs: 50 });

    guard.dispose();
    vi.advanceTimersByTime(100);

    expect(() => guard.throwIfCancelled('commit')).not.toThrow();
  });
});
