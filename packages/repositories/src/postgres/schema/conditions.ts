import { pgTable, serial, integer, varchar, doublePrecision, boolean } from 'drizzle-orm/pg-core';

// Per-session reading tables. One row of each is inserted per ingested
// session; rows are never looked up by value or shared.

export const temps = pgTable('temps', {
  id: serial('temp_id').primaryKey(),
  airTemp: doublePrecision('air_temp'),
  waterTemp: doublePrecision('water_temp'),
});

export const swells = pgTable('swell', {
  id: serial('swell_id').primaryKey(),
  meanWaveDir: integer('mean_wave_dir').notNull(),
  meanWaveDirCardinal: varchar('mean_wave_dir_cardinal', { length: 5 }).notNull(),
  domPeriod: doublePrecision('dom_period').notNull(),
  meanWaveHeight: doublePrecision('mean_wave_height').notNull(),
});

export const tides = pgTable('tide', {
  id: serial('tide_id').primaryKey(),
  incoming: boolean('incoming'), // true = incoming, false = outgoing
  maximumHeight: doublePrecision('maximum_height'),
  minimumHeight: doublePrecision('minimum_height'),
  medianHeight: doublePrecision('median_height'),
});

export const winds = pgTable('wind', {
  id: serial('wind_id').primaryKey(),
  meanWindDir: integer('mean_wind_dir').notNull(),
  meanWindDirCardinal: varchar('mean_wind_dir_cardinal', { length: 5 }).notNull(),
  meanWindSpeed: doublePrecision('mean_wind_speed').notNull(),
  gustSpeed: doublePrecision('gust_speed').notNull(),
});
