/**
 * Logging utilities for the Mnemy client
 * @module utils/logging
 */

export { ALogger, type LogContext, type LogLevel, type LoggerOptions } from './ALogger.js';
export { Logger, logger, localDateStamp, logFileName } from './logger.js';
