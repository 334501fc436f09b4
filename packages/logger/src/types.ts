/**
 * @fileoverview Types for the mem-db logger
 * @module @memdb/logger/types
 */

/**
 * Severity of an entry. `debug` traces connect phases, `warn` flags ignored
 * configuration and `error` records failed connect calls.
 */
export type LogLevel = 'debug' | 'warn' | 'error';

/**
 * One structured log record.
 */
export interface LogEntry {
  /** ISO 8601 timestamp */
  timestamp: string;
  level: LogLevel;
  message: string;
  service: string;
  /** Logger context merged with the call's data */
  context?: Record<string, unknown>;
  /** The `error` field of the call's data, flattened */
  error?: {
    name: string;
    message: string;
    stack?: string;
    code?: string;
  };
}

/**
 * Receives every entry that passes the level filter.
 */
export type LogOutput = (entry: LogEntry) => void;

export interface LoggerConfig {
  /** Entries below this level are dropped */
  level: LogLevel;
  service: string;
  format: 'json' | 'pretty';
  /** Prefix pretty lines with the local time */
  timestamps: boolean;
  /** Replaces console output when set */
  output?: LogOutput;
}

/**
 * What a connector needs from a logger.
 */
export interface ILogger {
  debug(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): ILogger;
}
