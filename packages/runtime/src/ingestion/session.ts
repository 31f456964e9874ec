// Session ingestion - the write path for one surf session
//
// One observation becomes five rows (temperature, swell, tide, wind and the
// linking session) inside a single transaction. Location and user are
// resolved by name first and are never created here.

import {
  normalizeTime,
  validateSessionObservation,
  type Id,
  type SessionObservation,
} from '@surflog/protocol';
import type { TransactionalRepositoryContext } from '@surflog/repositories';
import {
  RuntimeError,
  ValidationError,
  UnknownLocationError,
  UnknownUserError,
  StorageError,
  isIngestionError,
  type IngestionError,
  type IngestionStep,
} from '../errors.js';
import { consoleLogger, withLogContext, type IngestLogger } from '../logger.js';
import { createCancellationGuard, type CancellationGuard } from './cancellation.js';

/**
 * Options for session ingestion.
 */
export type IngestSessionOptions = {
  /**
   * Aborting the signal rolls back the unit of work and rejects with
   * IngestionAbortedError.
   */
  signal?: AbortSignal;

  /**
   * Deadline for the whole call, including name resolution.
   * Expiry rolls back and rejects with IngestionTimeoutError.
   */
  timeoutMs?: number;

  logger?: IngestLogger;
};

/**
 * Ids of every row the ingestion touched.
 */
export type IngestSessionResult = {
  sessionId: Id;
  locationId: Id;
  userId: Id;
  temperatureId: Id;
  swellId: Id;
  tideId: Id;
  windId: Id;
};

function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * Validate the observation, turning the first schema problem into a
 * ValidationError and keeping the full list in its details.
 */
function parseObservation(input: unknown): SessionObservation {
  const result = validateSessionObservation(input);
  if (result.success) {
    return result.observation;
  }

  const [first] = result.errors;
  throw new ValidationError(`${first.path}: ${first.message}`, {
    field: first.path,
    details: { errors: result.errors },
  });
}

/**
 * Runs one step of the unit of work: checks cancellation, races the
 * storage call against it and wraps raw storage errors in StorageError.
 */
function createStepRunner(guard: CancellationGuard) {
  let current: IngestionStep = 'resolve_location';

  async function step<T>(name: IngestionStep, work: () => Promise<T>): Promise<T> {
    current = name;
    guard.throwIfCancelled(name);
    try {
      return await guard.race(name, work());
    } catch (error) {
      if (error instanceof RuntimeError) throw error;
      const cause = toError(error);
      throw new StorageError(name, cause.message, cause);
    }
  }

  return {
    step,
    current: () => current,
    enterCommit: () => {
      current = 'commit';
    },
  };
}

/**
 * Ingest one surf session observation.
 *
 * Resolves the spot and the user by exact name, inserts fresh temperature,
 * swell, tide and wind rows, then inserts the session row that links them,
 * all in one transaction. Either all five rows are committed or none are.
 *
 * No retries are attempted; the caller owns retry policy.
 *
 * @returns Ids of the new session and of every row it references
 * @throws ValidationError if the observation is malformed
 * @throws UnknownLocationError if no location has the given spot name
 * @throws UnknownUserError if no user has the given username
 * @throws StorageError if persistence fails (IngestionTimeoutError and
 *   IngestionAbortedError are StorageErrors)
 *
 * @example
 * ```typescript
 * const { sessionId } = await ingestSession(repos, {
 *   spotName: 'Agate Beach',
 *   username: 'roshindelman',
 *   date: '2024-01-01',
 *   timeIn: '13:00',
 *   timeOut: '13:45',
 *   rating: 2,
 *   airTemp: 12.5,
 *   waterTemp: 9.8,
 *   meanWaveDir: 270,
 *   meanWaveDirCardinal: 'W',
 *   meanWaveHeight: 1.2,
 *   domPeriod: 9.5,
 *   meanWindDir: 358,
 *   meanWindDirCardinal: 'NW',
 *   meanWindSpeed: 22.8,
 *   gustSpeed: 29.5,
 * });
 * ```
 */
export async function ingestSession(
  repos: TransactionalRepositoryContext,
  input: SessionObservation,
  options: IngestSessionOptions = {}
): Promise<IngestSessionResult> {
  const observation = parseObservation(input);
  const guard = createCancellationGuard(options);
  const runner = createStepRunner(guard);
  const { step } = runner;
  const logger = withLogContext(options.logger ?? consoleLogger, () => ({
    spotName: observation.spotName,
    step: runner.current(),
  }));
  const startedAt = Date.now();

  // Set once the transaction has a connection (or the in-memory slot) and
  // the unit of work begins. Until then the wait itself is cancellable.
  let started = false;

  try {
    const unit = repos.transaction(async (tx) => {
      started = true;

      const location = await step('resolve_location', () =>
        tx.locations.findByName(observation.spotName)
      );
      if (!location) {
        throw new UnknownLocationError(observation.spotName);
      }

      const user = await step('resolve_user', () => tx.users.findByUsername(observation.username));
      if (!user) {
        throw new UnknownUserError(observation.username);
      }

      logger.debug('Resolved session references', {
        locationId: location.id,
        username: observation.username,
        userId: user.id,
      });

      const temperature = await step('insert_temperature', () =>
        tx.temperatures.insert({
          airTemp: observation.airTemp,
          waterTemp: observation.waterTemp,
        })
      );

      const swell = await step('insert_swell', () =>
        tx.swells.insert({
          meanWaveDir: observation.meanWaveDir,
          meanWaveDirCardinal: observation.meanWaveDirCardinal,
          meanWaveHeight: observation.meanWaveHeight,
          domPeriod: observation.domPeriod,
        })
      );

      const tide = await step('insert_tide', () =>
        tx.tides.insert({
          incoming: observation.tideIncoming ?? null,
          maxHeight: observation.tideMaxHeight ?? null,
          minHeight: observation.tideMinHeight ?? null,
          medianHeight: observation.tideMedianHeight ?? null,
        })
      );

      const wind = await step('insert_wind', () =>
        tx.winds.insert({
          meanWindDir: observation.meanWindDir,
          meanWindDirCardinal: observation.meanWindDirCardinal,
          meanWindSpeed: observation.meanWindSpeed,
          gustSpeed: observation.gustSpeed,
        })
      );

      const session = await step('insert_session', () =>
        tx.sessions.insert({
          locationId: location.id,
          temperatureId: temperature.id,
          swellId: swell.id,
          tideId: tide.id,
          windId: wind.id,
          userId: user.id,
          date: observation.date,
          timeIn: normalizeTime(observation.timeIn),
          timeOut: normalizeTime(observation.timeOut),
          notes: observation.notes ?? null,
          rating: observation.rating,
        })
      );

      // Last chance to cancel before the transaction commits
      guard.throwIfCancelled('commit');
      runner.enterCommit();

      return {
        sessionId: session.id,
        locationId: location.id,
        userId: user.id,
        temperatureId: temperature.id,
        swellId: swell.id,
        tideId: tide.id,
        windId: wind.id,
      };
    });

    // A unit that starts after cancellation fails its first step and rolls back.
    // Once started, only the steps race the guard, so a committed call is never
    // reported as cancelled.
    const result = await guard.raceWhile('resolve_location', unit, () => !started);

    logger.info('Session ingested', {
      sessionId: result.sessionId,
      durationMs: Date.now() - startedAt,
    });

    return result;
  } catch (error) {
    const failure: IngestionError = isIngestionError(error)
      ? error
      : new StorageError(runner.current(), toError(error).message, toError(error));

    logger.warn('Session ingestion rolled back', {
      code: failure.code,
      step: failure instanceof StorageError ? failure.step : runner.current(),
      message: failure.message,
    });

    throw failure;
  } finally {
    guard.dispose();
  }
}
