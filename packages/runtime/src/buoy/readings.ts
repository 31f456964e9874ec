// Session readings from a buoy summary

import { DateTime } from 'luxon';
import {
  celsiusToFahrenheit,
  degreesToCardinal,
  metersPerSecondToMph,
  metersToFeet,
  normalizeTime,
  type SessionObservation,
} from '@surflog/protocol';
import { BuoyDataError, ValidationError } from '../errors.js';
import type { StandardMetSummary, SummaryColumn, TimeWindow } from './standard-met.js';

/**
 * The reading fields of an observation that a buoy can supply.
 */
export type BuoyReadings = Pick<
  SessionObservation,
  | 'airTemp'
  | 'waterTemp'
  | 'meanWaveDir'
  | 'meanWaveDirCardinal'
  | 'meanWaveHeight'
  | 'domPeriod'
  | 'meanWindDir'
  | 'meanWindDirCardinal'
  | 'meanWindSpeed'
  | 'gustSpeed'
>;

export type SessionTimes = Pick<SessionObservation, 'date' | 'timeIn' | 'timeOut'>;

/**
 * The UTC span of a session logged in local time at `timeZone`.
 *
 * @throws ValidationError if the times do not form a window in that zone
 */
export function sessionWindow(session: SessionTimes, timeZone: string): TimeWindow {
  const at = (time: string) =>
    DateTime.fromISO(`${session.date}T${normalizeTime(time)}`, { zone: timeZone }).toUTC();
  const start = at(session.timeIn);
  const end = at(session.timeOut);

  if (!start.isValid || !end.isValid) {
    throw new ValidationError(
      `session times are not valid in ${timeZone}: ${start.invalidExplanation ?? end.invalidExplanation}`
    );
  }
  if (end.toMillis() < start.toMillis()) {
    throw new ValidationError(
      `timeOut ${session.timeOut} precedes timeIn ${session.timeIn}; buoy readings need a forward window`,
      { field: 'timeOut' }
    );
  }

  return { start, end };
}

/**
 * Convert buoy means to session readings: speeds to mph, wave height to
 * feet, temperatures to Fahrenheit. Bearings are truncated to whole degrees
 * and given a cardinal.
 *
 * @throws BuoyDataError if the window held no rows or a required column had no values
 */
export function summaryToReadings(station: number, summary: StandardMetSummary): BuoyReadings {
  if (summary.samples === 0) {
    throw new BuoyDataError(station, `Buoy ${station} has no readings for the session window`);
  }

  const required = (column: SummaryColumn): number => {
    const value = summary.means[column];
    if (value === null) {
      throw new BuoyDataError(station, `Buoy ${station} reported no ${column} during the session`);
    }
    return value;
  };

  const meanWaveDir = Math.trunc(required('MWD'));
  const meanWindDir = Math.trunc(required('WDIR'));
  const { ATMP, WTMP } = summary.means;

  return {
    airTemp: ATMP === null ? null : celsiusToFahrenheit(ATMP),
    waterTemp: WTMP === null ? null : celsiusToFahrenheit(WTMP),
    meanWaveDir,
    meanWaveDirCardinal: degreesToCardinal(meanWaveDir),
    meanWaveHeight: metersToFeet(required('WVHT')),
    domPeriod: required('DPD'),
    meanWindDir,
    meanWindDirCardinal: degreesToCardinal(meanWindDir),
    meanWindSpeed: metersPerSecondToMph(required('WSPD')),
    gustSpeed: metersPerSecondToMph(required('GST')),
  };
}
