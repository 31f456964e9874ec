import { pgTable, serial, integer, date, time, varchar, index } from 'drizzle-orm/pg-core';
import { locations } from './locations.js';
import { logUsers } from './users.js';
import { temps, swells, tides, winds } from './conditions.js';

const cascade = { onDelete: 'cascade', onUpdate: 'cascade' } as const;

/**
 * SessionInfo table - intersection of a location, a user and the four
 * reading rows captured with the session.
 *
 * Design notes:
 * - Every foreign key cascades, so removing any parent removes the session
 * - Reading rows are not removed by that cascade; deleting a location or
 *   user clears them explicitly (see postgres/repositories/cascade.ts)
 */
export const sessionInfo = pgTable(
  'session_info',
  {
    id: serial('session_id').primaryKey(),
    locId: integer('loc_id')
      .notNull()
      .references(() => locations.id, cascade),
    tempId: integer('temp_id')
      .notNull()
      .references(() => temps.id, cascade),
    swellId: integer('swell_id')
      .notNull()
      .references(() => swells.id, cascade),
    tideId: integer('tide_id')
      .notNull()
      .references(() => tides.id, cascade),
    windId: integer('wind_id')
      .notNull()
      .references(() => winds.id, cascade),
    userId: integer('user_id')
      .notNull()
      .references(() => logUsers.id, cascade),
    sessionDate: date('session_date', { mode: 'string' }).notNull(),
    sessionTimeIn: time('session_time_in').notNull(),
    sessionTimeOut: time('session_time_out').notNull(),
    sessionNotes: varchar('session_notes', { length: 500 }),
    rating: integer('rating').notNull(),
  },
  (table) => [
    index('session_info_loc_idx').on(table.locId),
    index('session_info_user_idx').on(table.userId),
  ]
);
