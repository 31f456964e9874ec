// Location types - surf spots, seeded reference data

import type { Id } from './common.js';

/**
 * A named surf spot and the NDBC buoy that reports conditions near it.
 * Locations are created by seeding or administration, never by ingestion.
 */
export type Location = {
  id: Id;

  /**
   * Unique lookup key, matched exactly during ingestion
   */
  name: string;

  /**
   * NDBC buoy station number, e.g. 46050
   */
  buoyNumber: number;

  latitude: number | null;
  longitude: number | null;
};
