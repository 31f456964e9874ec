// @surflog/runtime
// Transactional ingestion of surf session observations

// Ingestion
export {
  ingestSession,
  createCancellationGuard,
  type IngestSessionOptions,
  type IngestSessionResult,
  type CancellationGuard,
  type CancellationOptions,
} from './ingestion/index.js';

// Buoy readings
export {
  createBuoyClient,
  parseStandardMet,
  summarizeStandardMet,
  sessionWindow,
  summaryToReadings,
  StandardMetParseError,
  SUMMARY_COLUMNS,
  NDBC_REALTIME_URL,
  DEFAULT_SESSION_TIME_ZONE,
  type BuoyClient,
  type BuoyClientOptions,
  type BuoyRequestOptions,
  type BuoyReadings,
  type SessionTimes,
  type StandardMetRow,
  type StandardMetSummary,
  type SummaryColumn,
  type TimeWindow,
} from './buoy/index.js';

// Error types
export {
  RuntimeError,
  ValidationError,
  UnknownLocationError,
  UnknownUserError,
  BuoyDataError,
  StorageError,
  IngestionTimeoutError,
  IngestionAbortedError,
  isIngestionError,
  type IngestionError,
  type IngestionStep,
} from './errors.js';

// Loggers
export {
  consoleLogger,
  createConsoleLogger,
  withLogContext,
  silentLogger,
  createCapturingLogger,
  LOG_LEVELS,
  type IngestLogger,
  type ConsoleLoggerOptions,
  type LogLevel,
  type LogData,
  type LogEntry,
} from './logger.js';
