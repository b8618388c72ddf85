/**
 * Structured Logger
 *
 * Writes one JSON object per line through the console, the same way the
 * request logger emits its entries. Every entry carries a level, an event
 * name, a timestamp and whatever fields the caller (or a parent logger) bound.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogFields = Record<string, unknown>;

/**
 * Log entry structure
 */
export interface LogEntry extends LogFields {
  timestamp: string;
  level: Exclude<LogLevel, 'silent'>;
  event: string;
}

export interface Logger {
  readonly level: LogLevel;
  debug(event: string, fields?: LogFields): void;
  info(event: string, fields?: LogFields): void;
  warn(event: string, fields?: LogFields): void;
  error(event: string, fields?: LogFields): void;
  /** Create a logger that adds `bindings` to every entry */
  child(bindings: LogFields): Logger;
}

/**
 * Destination for formatted entries. Defaults to the console.
 */
export type LogSink = (entry: LogEntry) => void;

export interface LoggerOptions {
  level?: LogLevel;
  bindings?: LogFields;
  sink?: LogSink;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

const consoleSink: LogSink = (entry) => {
  const line = JSON.stringify(entry, errorReplacer);
  if (entry.level === 'error') {
    console.error(line);
  } else if (entry.level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
};

// Error instances stringify to {} otherwise
function errorReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

class JsonLogger implements Logger {
  constructor(
    readonly level: LogLevel,
    private readonly bindings: LogFields,
    private readonly sink: LogSink
  ) {}

  debug(event: string, fields?: LogFields): void {
    this.write('debug', event, fields);
  }

  info(event: string, fields?: LogFields): void {
    this.write('info', event, fields);
  }

  warn(event: string, fields?: LogFields): void {
    this.write('warn', event, fields);
  }

  error(event: string, fields?: LogFields): void {
    this.write('error', event, fields);
  }

  child(bindings: LogFields): Logger {
    return new JsonLogger(this.level, { ...this.bindings, ...bindings }, this.sink);
  }

  private write(level: Exclude<LogLevel, 'silent'>, event: string, fields?: LogFields): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) {
      return;
    }

    this.sink({
      ...this.bindings,
      ...fields,
      timestamp: new Date().toISOString(),
      level,
      event,
    });
  }
}

/**
 * Create a structured logger
 *
 * @example
 * ```ts
 * const logger = createLogger({ level: 'info', bindings: { service: 'question-cache' } });
 * logger.child({ component: 'cache' }).info('cache.hit', { cacheKey });
 * ```
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return new JsonLogger(options.level ?? 'info', options.bindings ?? {}, options.sink ?? consoleSink);
}

/**
 * Logger that drops everything, for tests and tools
 */
export function createSilentLogger(): Logger {
  return createLogger({ level: 'silent' });
}
