// Sessions router - surf session submission

import {
  SessionObservationSchema,
  degreesToCardinal,
  type SessionObservation,
} from '@surflog/protocol';
import { ingestSession, UnknownLocationError, type BuoyReadings } from '@surflog/runtime';
import { z } from 'zod';
import { router, publicProcedure, TRPCError } from '../index.js';
import type { Context } from '../context.js';
import { toTRPCError } from '../errors.js';

const shape = SessionObservationSchema.shape;

/**
 * Submission form input. The username falls back to the configured default
 * and the cardinal strings are derived from the bearings when omitted.
 * Omitted readings are averaged from the spot's buoy over the session.
 */
export const SubmitSessionInputSchema = SessionObservationSchema.extend({
  username: shape.username.optional(),
  meanWaveDirCardinal: shape.meanWaveDirCardinal.optional(),
  meanWindDirCardinal: shape.meanWindDirCardinal.optional(),
  airTemp: shape.airTemp.optional(),
  waterTemp: shape.waterTemp.optional(),
  meanWaveDir: shape.meanWaveDir.optional(),
  meanWaveHeight: shape.meanWaveHeight.optional(),
  domPeriod: shape.domPeriod.optional(),
  meanWindDir: shape.meanWindDir.optional(),
  meanWindSpeed: shape.meanWindSpeed.optional(),
  gustSpeed: shape.gustSpeed.optional(),
});

export type SubmitSessionInput = z.infer<typeof SubmitSessionInputSchema>;

/**
 * Fill the readings a submission left out from the spot's buoy. The buoy is
 * only asked once, and not at all when every reading is given.
 */
async function completeReadings(ctx: Context, input: SubmitSessionInput) {
  let fromBuoy: Promise<BuoyReadings> | undefined;

  const buoyReadings = () => {
    fromBuoy ??= (async () => {
      const location = await ctx.repos.locations.findByName(input.spotName);
      if (!location) {
        throw new UnknownLocationError(input.spotName);
      }
      ctx.logger.info('Filling readings from buoy', {
        spotName: input.spotName,
        station: location.buoyNumber,
      });
      return ctx.buoys.sessionReadings(location.buoyNumber, input, { signal: ctx.signal });
    })();
    return fromBuoy;
  };

  const fill = async <T>(given: T | undefined, pick: (readings: BuoyReadings) => T): Promise<T> =>
    given !== undefined ? given : pick(await buoyReadings());

  const meanWaveDir = await fill(input.meanWaveDir, (r) => r.meanWaveDir);
  const meanWindDir = await fill(input.meanWindDir, (r) => r.meanWindDir);

  return {
    airTemp: await fill(input.airTemp, (r) => r.airTemp),
    waterTemp: await fill(input.waterTemp, (r) => r.waterTemp),
    meanWaveDir,
    meanWaveDirCardinal: input.meanWaveDirCardinal ?? degreesToCardinal(meanWaveDir),
    meanWaveHeight: await fill(input.meanWaveHeight, (r) => r.meanWaveHeight),
    domPeriod: await fill(input.domPeriod, (r) => r.domPeriod),
    meanWindDir,
    meanWindDirCardinal: input.meanWindDirCardinal ?? degreesToCardinal(meanWindDir),
    meanWindSpeed: await fill(input.meanWindSpeed, (r) => r.meanWindSpeed),
    gustSpeed: await fill(input.gustSpeed, (r) => r.gustSpeed),
  };
}

export const sessionsRouter = router({
  /**
   * Record one surf session with its readings.
   * Either the session and all of its readings are stored, or nothing is.
   */
  submit: publicProcedure.input(SubmitSessionInputSchema).mutation(async ({ ctx, input }) => {
    const username = input.username ?? ctx.config.defaultUsername;
    if (!username) {
      throw new TRPCError({
        code: 'BAD_REQUEST',
        message: 'username is required when no default username is configured',
      });
    }

    try {
      const observation: SessionObservation = {
        ...input,
        ...(await completeReadings(ctx, input)),
        username,
      };

      const result = await ingestSession(ctx.repos, observation, {
        timeoutMs: ctx.config.ingestTimeoutMs,
        signal: ctx.signal,
        logger: ctx.logger,
      });
      return { sessionId: result.sessionId };
    } catch (error) {
      throw toTRPCError(error);
    }
  }),
});
