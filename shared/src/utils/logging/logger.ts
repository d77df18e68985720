import { appendFileSync, existsSync, mkdirSync } from 'fs';
import { join } from 'path';

import { ALogger } from './ALogger.js';
import { LOG_LEVEL, VERBOSE_MODE } from '../../config/env.js';
import type { LogContext, LogLevel, LoggerOptions } from './ALogger.js';

export type { LogContext, LogLevel, LoggerOptions } from './ALogger.js';

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Local calendar date (YYYY-MM-DD) used to name daily log files.
 */
export function localDateStamp(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

export function logFileName(date: Date): string {
  return `mnemy_${localDateStamp(date)}.log`;
}

export class Logger extends ALogger {
  private level: LogLevel = LOG_LEVEL;
  private consoleEnabled = true;
  private logDir: string | null = null;
  private verbose = VERBOSE_MODE;
  private clock: () => Date = () => new Date();

  configure(options: LoggerOptions): void {
    if (options.level !== undefined) this.level = options.level;
    if (options.console !== undefined) this.consoleEnabled = options.console;
    if (options.logDir !== undefined) this.logDir = options.logDir;
    if (options.verbose !== undefined) this.verbose = options.verbose;
    if (options.clock !== undefined) this.clock = options.clock;
  }

  /**
   * Current log file, or null when file output is disabled.
   */
  currentLogFile(): string | null {
    return this.logDir ? join(this.logDir, logFileName(this.clock())) : null;
  }

  formatMessage(level: LogLevel, message: string, context?: LogContext, timestamp: Date = this.clock()): string {
    const levelStr = level.toUpperCase().padEnd(5);

    let contextStr = '';
    if (context) {
      const parts: string[] = [];
      if (context.component) parts.push(`component=${context.component}`);
      if (context.gameName) parts.push(`game=${context.gameName}`);

      for (const key of Object.keys(context)) {
        if (key === 'component' || key === 'gameName') continue;
        const value = context[key];
        if (value === undefined) continue;
        parts.push(`${key}=${typeof value === 'object' ? JSON.stringify(value) : String(value)}`);
      }

      if (parts.length > 0) {
        contextStr = ` [${parts.join(', ')}]`;
      }
    }

    return `${timestamp.toISOString()} ${levelStr}${contextStr} ${message}`;
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_WEIGHT[level] >= LEVEL_WEIGHT[this.level];
  }

  private write(level: LogLevel, lines: string[]): void {
    if (this.consoleEnabled) {
      for (const line of lines) {
        if (level === 'error') console.error(line);
        else if (level === 'warn') console.warn(line);
        else console.log(line);
      }
    }

    const file = this.currentLogFile();
    if (file && this.logDir) {
      try {
        if (!existsSync(this.logDir)) {
          mkdirSync(this.logDir, { recursive: true });
        }
        appendFileSync(file, lines.map((line) => `${line}\n`).join(''), 'utf-8');
      } catch (error) {
        // The file sink is lost; keep the console and stop retrying the write
        this.logDir = null;
        console.error(`Failed to write log file ${file}: ${error instanceof Error ? error.message : String(error)}`);
      }
    }
  }

  debug(message: string, context?: LogContext): void {
    if (!this.enabled('debug')) return;
    this.write('debug', [this.formatMessage('debug', message, context)]);
  }

  info(message: string, context?: LogContext): void {
    if (!this.enabled('info')) return;
    this.write('info', [this.formatMessage('info', message, context)]);
  }

  warn(message: string, context?: LogContext): void {
    if (!this.enabled('warn')) return;
    this.write('warn', [this.formatMessage('warn', message, context)]);
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    if (!this.enabled('error')) return;
    const lines = [this.formatMessage('error', message, context)];
    if (error instanceof Error) {
      lines.push(`  Error: ${error.message}`);
      if (error.stack && this.verbose) {
        lines.push(`  Stack: ${error.stack}`);
      }
    } else if (error !== undefined) {
      lines.push(`  Details: ${JSON.stringify(error)}`);
    }
    this.write('error', lines);
  }
}

export const logger = new Logger();
