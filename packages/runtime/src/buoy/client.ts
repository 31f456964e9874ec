// HTTP client for NDBC realtime buoy files

import { BuoyDataError } from '../errors.js';
import { silentLogger, type IngestLogger } from '../logger.js';
import {
  parseStandardMet,
  summarizeStandardMet,
  StandardMetParseError,
  type StandardMetRow,
} from './standard-met.js';
import { sessionWindow, summaryToReadings, type BuoyReadings, type SessionTimes } from './readings.js';

export const NDBC_REALTIME_URL = 'https://www.ndbc.noaa.gov/data/realtime2';

/** Zone the session times are logged in */
export const DEFAULT_SESSION_TIME_ZONE = 'America/Los_Angeles';

export type BuoyClientOptions = {
  baseUrl?: string;
  timeZone?: string;
  /** Per-request deadline. Defaults to 10 seconds. */
  timeoutMs?: number;
  fetch?: typeof fetch;
  logger?: IngestLogger;
};

export type BuoyRequestOptions = {
  signal?: AbortSignal;
};

export type BuoyClient = {
  /**
   * Download and parse the station's standard meteorological file
   * (about the last 45 days of rows).
   */
  fetchStandardMet(station: number, options?: BuoyRequestOptions): Promise<StandardMetRow[]>;

  /**
   * Average the station's rows over the session window and convert them to
   * session readings.
   */
  sessionReadings(
    station: number,
    session: SessionTimes,
    options?: BuoyRequestOptions
  ): Promise<BuoyReadings>;
};

function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

export function createBuoyClient(options: BuoyClientOptions = {}): BuoyClient {
  const {
    baseUrl = NDBC_REALTIME_URL,
    timeZone = DEFAULT_SESSION_TIME_ZONE,
    timeoutMs = 10_000,
    fetch: fetchImpl = fetch,
    logger = silentLogger,
  } = options;

  async function fetchStandardMet(
    station: number,
    { signal }: BuoyRequestOptions = {}
  ): Promise<StandardMetRow[]> {
    const url = `${baseUrl.replace(/\/+$/, '')}/${station}.txt`;
    const deadline = AbortSignal.timeout(timeoutMs);
    const signals = signal ? [deadline, signal] : [deadline];

    let text: string;
    try {
      const response = await fetchImpl(url, { signal: AbortSignal.any(signals) });
      if (!response.ok) {
        throw new BuoyDataError(station, `Buoy ${station} returned HTTP ${response.status}`);
      }
      text = await response.text();
    } catch (error) {
      if (error instanceof BuoyDataError) throw error;
      const cause = toError(error);
      throw new BuoyDataError(station, `Buoy ${station} request failed: ${cause.message}`, cause);
    }

    try {
      return parseStandardMet(text);
    } catch (error) {
      if (error instanceof StandardMetParseError) {
        throw new BuoyDataError(
          station,
          `Buoy ${station} sent an unreadable file: ${error.message}`,
          error
        );
      }
      throw error;
    }
  }

  return {
    fetchStandardMet,

    async sessionReadings(station, session, requestOptions) {
      const window = sessionWindow(session, timeZone);
      const rows = await fetchStandardMet(station, requestOptions);
      const summary = summarizeStandardMet(rows, window);

      logger.debug('Summarized buoy readings', {
        station,
        samples: summary.samples,
        start: window.start.toISO(),
        end: window.end.toISO(),
      });

      return summaryToReadings(station, summary);
    },
  };
}
