/**
 * Structured Logging
 *
 * JSON-structured logging with levels and context.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface SerializedError {
  name: string;
  message: string;
  code?: string;
  stack?: string;
  cause?: SerializedError;
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  context?: Record<string, unknown>;
  error?: SerializedError;
}

export interface LoggerOptions {
  level?: LogLevel;
  format?: 'json' | 'pretty';
  context?: Record<string, unknown>;
  output?: (entry: LogEntry) => void;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LOG_LEVELS, value);
}

/**
 * Structured logger
 */
export class Logger {
  private level: LogLevel;
  private format: 'json' | 'pretty';
  private context: Record<string, unknown>;
  private output: (entry: LogEntry) => void;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.format = options.format ?? 'json';
    this.context = options.context ?? {};
    this.output = options.output ?? this.defaultOutput.bind(this);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    this.log('error', message, context, error);
  }

  /**
   * Create a child logger with additional context
   */
  child(context: Record<string, unknown>): Logger {
    return new Logger({
      level: this.level,
      format: this.format,
      context: { ...this.context, ...context },
      output: this.output,
    });
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: unknown
  ): void {
    if (!this.isLevelEnabled(level)) return;

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      context: { ...this.context, ...context },
    };

    if (error !== undefined) {
      entry.error = serializeError(error);
    }

    this.output(entry);
  }

  private defaultOutput(entry: LogEntry): void {
    if (this.format === 'json') {
      process.stdout.write(JSON.stringify(entry) + '\n');
    } else {
      this.prettyPrint(entry);
    }
  }

  /**
   * Pretty print for development
   */
  private prettyPrint(entry: LogEntry): void {
    const colors: Record<LogLevel, string> = {
      debug: '\x1b[36m',
      info: '\x1b[32m',
      warn: '\x1b[33m',
      error: '\x1b[31m',
    };
    const reset = '\x1b[0m';
    const dim = '\x1b[2m';

    const timestamp = dim + entry.timestamp + reset;
    const level = colors[entry.level] + entry.level.toUpperCase().padEnd(5) + reset;

    let line = `${timestamp} ${level} ${entry.message}`;

    if (entry.context && Object.keys(entry.context).length > 0) {
      line += ` ${dim}${JSON.stringify(entry.context)}${reset}`;
    }

    const stream = entry.level === 'error' ? process.stderr : process.stdout;
    stream.write(line + '\n');

    for (let error = entry.error; error; error = error.cause) {
      stream.write(dim + (error.stack ?? `${error.name}: ${error.message}`) + reset + '\n');
    }
  }
}

/**
 * Flatten an error and its cause chain into plain JSON
 */
export function serializeError(error: unknown): SerializedError {
  if (!(error instanceof Error)) {
    return { name: 'Error', message: String(error) };
  }

  const serialized: SerializedError = {
    name: error.name,
    message: error.message,
    stack: error.stack,
  };

  if ('code' in error && typeof error.code === 'string') {
    serialized.code = error.code;
  }

  if (error.cause !== undefined) {
    serialized.cause = serializeError(error.cause);
  }

  return serialized;
}

export interface RequestLogContext {
  method?: string;
  path?: string;
  template?: string;
}

/**
 * Create a logger scoped to one inbound request
 */
export function createRequestLogger(baseLogger: Logger, context: RequestLogContext): Logger {
  return baseLogger.child({
    method: context.method,
    path: context.path,
    template: context.template,
  });
}

let defaultLogger: Logger | null = null;

/**
 * Get the default logger
 */
export function getLogger(): Logger {
  if (!defaultLogger) {
    const env = process.env.NODE_ENV ?? 'development';
    const level = process.env.LOG_LEVEL;
    defaultLogger = new Logger({
      level: isLogLevel(level) ? level : env === 'production' ? 'info' : 'debug',
      format: env === 'production' ? 'json' : 'pretty',
    });
  }
  return defaultLogger;
}

export function setLogger(logger: Logger): void {
  defaultLogger = logger;
}
