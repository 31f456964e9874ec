import { pgTable, serial, text, integer, doublePrecision, uniqueIndex } from 'drizzle-orm/pg-core';

/**
 * Location table - surf spots, seeded reference data.
 * spot_name is the lookup key used by ingestion.
 */
export const locations = pgTable(
  'location',
  {
    id: serial('location_id').primaryKey(),
    spotName: text('spot_name').notNull(),
    buoyNum: integer('buoy_num').notNull(),
    lat: doublePrecision('lat'),
    long: doublePrecision('long'),
  },
  (table) => [uniqueIndex('location_spot_name_idx').on(table.spotName)]
);
