// Structured logging for the runtime

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogData = Record<string, unknown>;

/**
 * Structured logger interface for ingestion.
 * Implementations can route to console, file, or external services.
 */
export type IngestLogger = {
  debug(message: string, data?: LogData): void;
  info(message: string, data?: LogData): void;
  warn(message: string, data?: LogData): void;
  error(message: string, data?: LogData): void;
};

const severity: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const satisfies readonly LogLevel[];

export type ConsoleLoggerOptions = {
  /** Entries below this level are dropped. Defaults to info. */
  level?: LogLevel;
};

/**
 * Console logger that prefixes each entry with its level.
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): IngestLogger {
  const threshold = severity[options.level ?? 'info'];

  const log =
    (level: LogLevel, write: (...args: unknown[]) => void) =>
    (message: string, data?: LogData) => {
      if (severity[level] < threshold) return;
      write(`[${level.toUpperCase()}] ${message}`, data ?? '');
    };

  return {
    debug: log('debug', console.debug),
    info: log('info', console.info),
    warn: log('warn', console.warn),
    error: log('error', console.error),
  };
}

export const consoleLogger: IngestLogger = createConsoleLogger();

/**
 * Wrap a logger so every entry carries `context`. Fields given with the entry
 * win over the context. A function is read again for each entry, so the
 * context can follow state that changes during a call, such as the current
 * ingestion step.
 */
export function withLogContext(logger: IngestLogger, context: LogData | (() => LogData)): IngestLogger {
  const current = typeof context === 'function' ? context : () => context;
  const merge = (data?: LogData): LogData => ({ ...current(), ...data });

  return {
    debug: (message, data) => logger.debug(message, merge(data)),
    info: (message, data) => logger.info(message, merge(data)),
    warn: (message, data) => logger.warn(message, merge(data)),
    error: (message, data) => logger.error(message, merge(data)),
  };
}

/**
 * Silent logger for testing
 */
export const silentLogger: IngestLogger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

export type LogEntry = {
  level: LogLevel;
  message: string;
  data?: LogData;
  timestamp: string;
};

/**
 * Create a capturing logger that stores log entries for inspection
 */
export function createCapturingLogger(): IngestLogger & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];

  const log = (level: LogLevel) => (message: string, data?: LogData) => {
    entries.push({ level, message, data, timestamp: new Date().toISOString() });
  };

  return {
    entries,
    debug: log('debug'),
    info: log('info'),
    warn: log('warn'),
    error: log('error'),
  };
}
