// Condition types - environmental readings captured at session time
//
// Each ingested session owns a fresh row of each kind. Rows are never
// shared between sessions, even when the readings are identical.

import type { Id } from './common.js';

/**
 * Compass direction string stored alongside a bearing, at most 5 characters
 */
export type CardinalString = string;

export type Temperature = {
  id: Id;
  airTemp: number | null;
  waterTemp: number | null;
};

export type Swell = {
  id: Id;

  /**
   * Mean wave direction in whole degrees
   */
  meanWaveDir: number;
  meanWaveDirCardinal: CardinalString;
  meanWaveHeight: number;

  /**
   * Dominant wave period in seconds
   */
  domPeriod: number;
};

export type Tide = {
  id: Id;

  /**
   * true = incoming, false = outgoing, null = unknown
   */
  incoming: boolean | null;
  maxHeight: number | null;
  minHeight: number | null;
  medianHeight: number | null;
};

export type Wind = {
  id: Id;

  /**
   * Mean wind direction in whole degrees
   */
  meanWindDir: number;
  meanWindDirCardinal: CardinalString;
  meanWindSpeed: number;
  gustSpeed: number;
};

/**
 * Names of the per-session reading kinds, in insertion order
 */
export type ConditionKind = 'temperature' | 'swell' | 'tide' | 'wind';
