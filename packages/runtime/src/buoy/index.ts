// Buoy readings - fills a session's conditions from NDBC station data

export {
  parseStandardMet,
  summarizeStandardMet,
  StandardMetParseError,
  SUMMARY_COLUMNS,
  type StandardMetRow,
  type StandardMetSummary,
  type SummaryColumn,
  type TimeWindow,
} from './standard-met.js';

export {
  sessionWindow,
  summaryToReadings,
  type BuoyReadings,
  type SessionTimes,
} from './readings.js';

export {
  createBuoyClient,
  NDBC_REALTIME_URL,
  DEFAULT_SESSION_TIME_ZONE,
  type BuoyClient,
  type BuoyClientOptions,
  type BuoyRequestOptions,
} from './client.js';
