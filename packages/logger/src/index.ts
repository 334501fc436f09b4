/**
 * @fileoverview Structured logging for mem-db packages
 * @module @memdb/logger
 *
 * @example
 * ```typescript
 * import { createLogger, configureLogger } from '@memdb/logger';
 *
 * configureLogger({ level: 'debug', format: 'pretty' });
 *
 * const log = createLogger({ component: 'connector' });
 * log.debug('Resolving sentinel master', { serviceName: 'mymaster' });
 * ```
 */

export { Logger, createLogger, configureLogger, getLoggerConfig, isLogLevel } from './logger.js';

export type { LogLevel, LogEntry, LoggerConfig, LogOutput, ILogger } from './types.js';
