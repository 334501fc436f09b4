/**
 * @fileoverview Structured logger for mem-db
 * @module @memdb/logger/logger
 */

import type { ILogger, LogEntry, LogLevel, LoggerConfig } from './types.js';

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  warn: 20,
  error: 30,
};

/**
 * Check whether a string names a log level.
 */
export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(SEVERITY, value);
}

function configFromEnv(env: NodeJS.ProcessEnv): LoggerConfig {
  const level = env['LOG_LEVEL'];
  return {
    level: isLogLevel(level) ? level : 'warn',
    service: env['SERVICE_NAME'] ?? 'mem-db',
    format: env['NODE_ENV'] === 'production' ? 'json' : 'pretty',
    timestamps: true,
  };
}

let settings: LoggerConfig = configFromEnv(process.env);

/**
 * Merge settings into the process-wide logger configuration.
 */
export function configureLogger(config: Partial<LoggerConfig>): void {
  settings = { ...settings, ...config };
}

export function getLoggerConfig(): LoggerConfig {
  return { ...settings };
}

const RESET = '\x1b[0m';
const BOLD = '\x1b[1m';
const GRAY = '\x1b[90m';

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: GRAY,
  warn: '\x1b[33m',
  error: '\x1b[31m',
};

function render(entry: LogEntry): string {
  if (settings.format === 'json') {
    return JSON.stringify(entry);
  }

  const stamp = settings.timestamps
    ? `${GRAY}${new Date(entry.timestamp).toLocaleTimeString()}${RESET} `
    : '';
  const level = `${LEVEL_COLORS[entry.level]}${BOLD}${entry.level.toUpperCase().padEnd(5)}${RESET}`;
  const lines = [`${stamp}${level} ${entry.message}`];

  if (entry.context) {
    lines.push(`  ${GRAY}${JSON.stringify(entry.context)}${RESET}`);
  }
  if (entry.error) {
    lines.push(`  ${LEVEL_COLORS.error}${entry.error.name}: ${entry.error.message}${RESET}`);
  }
  return lines.join('\n');
}

function emit(entry: LogEntry): void {
  if (settings.output) {
    settings.output(entry);
    return;
  }

  const line = render(entry);
  if (entry.level === 'error') {
    console.error(line);
  } else if (entry.level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
}

function describeError(value: unknown): LogEntry['error'] {
  if (value instanceof Error) {
    const code: unknown = Reflect.get(value, 'code');
    return {
      name: value.name,
      message: value.message,
      stack: value.stack,
      code: typeof code === 'string' ? code : undefined,
    };
  }
  if (typeof value === 'string') {
    return { name: 'Error', message: value };
  }
  return undefined;
}

/**
 * Logger carrying a fixed context that is merged into every entry.
 * An `error` field in the data is lifted into `entry.error`.
 *
 * @example
 * ```typescript
 * const log = createLogger({ component: 'connector' });
 * log.child({ db: 2 }).debug('Connect phase connected');
 * ```
 */
export class Logger implements ILogger {
  private readonly context: Record<string, unknown>;

  constructor(context: Record<string, unknown> = {}) {
    this.context = { ...context };
  }

  child(context: Record<string, unknown>): Logger {
    return new Logger({ ...this.context, ...context });
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.write('debug', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.write('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.write('error', message, data);
  }

  private write(level: LogLevel, message: string, data: Record<string, unknown> = {}): void {
    if (SEVERITY[level] < SEVERITY[settings.level]) {
      return;
    }

    const { error, ...context } = { ...this.context, ...data };
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      service: settings.service,
    };

    if (Object.keys(context).length > 0) {
      entry.context = context;
    }
    const described = describeError(error);
    if (described) {
      entry.error = described;
    }

    emit(entry);
  }
}

export function createLogger(context?: Record<string, unknown>): Logger {
  return new Logger(context);
}
