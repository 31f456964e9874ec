// Session types - the linking row of an ingested observation

import type { DateString, Id, TimeString } from './common.js';

/**
 * A logged surf session.
 * References one location, one user and the four condition rows created with it.
 */
export type Session = {
  id: Id;
  locationId: Id;
  temperatureId: Id;
  swellId: Id;
  tideId: Id;
  windId: Id;
  userId: Id;
  date: DateString;
  timeIn: TimeString;
  timeOut: TimeString;
  notes: string | null;
  rating: number;
};
