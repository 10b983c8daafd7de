/**
 * Structured logging using pino, written to stdout and to the log file the
 * scheduler collects after every run.
 */

import pino, { type Logger as PinoLogger } from 'pino';
import * as fs from 'node:fs';
import * as path from 'node:path';
import type { LogLevel } from '../types/config.js';

export type Logger = PinoLogger;

export interface LoggerOptions {
  level?: LogLevel;
  /** Log file path; omit to log to stdout only */
  file?: string;
  /** Extra destination, used by tests to capture output */
  stream?: NodeJS.WritableStream;
}

/**
 * Get log level from environment or default
 */
function getLogLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  const validLevels: LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];
  return validLevels.find((level) => level === envLevel) ?? 'info';
}

/**
 * Default log file for a job: `<job>.log` in the working directory
 */
export function defaultLogFile(job: string): string {
  return path.resolve(process.cwd(), `${job}.log`);
}

/**
 * Create a logger for a component.
 *
 * @example
 * ```typescript
 * const logger = createLogger('mirror-cards', { file: 'mirror-cards.log' });
 * logger.info({ created: 2 }, 'Run finished');
 * ```
 */
export function createLogger(component: string, options: LoggerOptions = {}): Logger {
  const level = options.level ?? getLogLevel();
  if (level === 'silent') {
    return pino({ name: component, level });
  }

  const baseOptions: pino.LoggerOptions = {
    name: component,
    level,
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  const streams: pino.StreamEntry[] = [{ level, stream: options.stream ?? process.stdout }];

  if (options.file) {
    const dir = path.dirname(path.resolve(options.file));
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    // Synchronous so the file is complete when the process exits
    streams.push({ level, stream: pino.destination({ dest: options.file, sync: true, append: true }) });
  }

  return pino(baseOptions, pino.multistream(streams));
}

/**
 * Logger that drops everything, for library callers that do not care
 */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
