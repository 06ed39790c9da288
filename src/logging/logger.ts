import {getLogMetadata} from './metadata';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFields = Record<string, unknown>;

/** Receives a formatted line. Defaults to the matching `console` method. */
export type LogSink = (level: LogLevel, line: string) => void;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

export type LoggerConfig = {
  name: string;
  level?: LogLevel;
  sink?: LogSink;
};

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(SEVERITY, value);
}

/**
 * Reads a level name (e.g. from `LOG_LEVEL`), falling back when it is unset or unknown.
 */
export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : fallback;
}

const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case 'error':
      return console.error(line);
    case 'warn':
      return console.warn(line);
    default:
      return console.log(line);
  }
};

/**
 * Creates a logger writing one JSON object per line.
 *
 * Each line holds `level`, `time`, `name` and `msg`, then the metadata of the current
 * request scope (see `withLogMetadata`), then the fields passed at the call site.
 *
 * @example
 * ```typescript
 * const logger = createLogger({name: 'users-api'});
 * logger.info('user loaded', {userId: '42'});
 * // {"level":"info","time":"...","name":"users-api","msg":"user loaded","trace_id":"...","span_id":"...","trace_options":1,"userId":"42"}
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
  const {name, sink = consoleSink} = config;
  const threshold = SEVERITY[config.level || parseLogLevel(process.env.LOG_LEVEL)];

  const write = (level: LogLevel) =>
    function (message: string, fields: LogFields = {}) {
      if (SEVERITY[level] < threshold) {
        return;
      }

      const line = {
        level,
        time: new Date().toISOString(),
        name,
        msg: message,
        ...getLogMetadata(),
        ...fields,
      };
      sink(level, JSON.stringify(line));
    };

  return {
    debug: write('debug'),
    info: write('info'),
    warn: write('warn'),
    error: write('error'),
  };
}
