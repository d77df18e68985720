/**
 * Abstract Logger Service
 *
 * Base class for structured logging services. Initializes first so that
 * other services can log during their initialization.
 *
 * @see Logger for the concrete implementation
 */
import { AService } from '../../services/abstracts/AService.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Context metadata attached to log entries.
 */
export interface LogContext {
  /** Component name (e.g., 'ApiClient', 'SyncService', 'ProcessWatcher') */
  component?: string;
  /** Game the entry relates to */
  gameName?: string;
  /** Additional context fields */
  [key: string]: unknown;
}

export interface LoggerOptions {
  /** Minimum level that is written anywhere */
  level?: LogLevel;
  /** Write formatted lines to the console */
  console?: boolean;
  /** Directory for daily log files; `null` disables file output */
  logDir?: string | null;
  /** Print stack traces for logged errors */
  verbose?: boolean;
  /** Time source, replaceable in tests */
  clock?: () => Date;
}

/**
 * Abstract logger service.
 *
 * Provides leveled logging with structured context. Initialize order is -100
 * to ensure logging is available before other services initialize.
 */
export abstract class ALogger extends AService {
  override readonly order: number = -100;

  abstract configure(options: LoggerOptions): void;

  abstract debug(message: string, context?: LogContext): void;

  abstract info(message: string, context?: LogContext): void;

  abstract warn(message: string, context?: LogContext): void;

  abstract error(message: string, error?: unknown, context?: LogContext): void;
}
