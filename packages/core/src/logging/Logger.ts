/**
 * Logger - Lightweight logging for graphlint
 *
 * Features:
 * - 5 log levels: silent, errors, warnings, info, debug
 * - Context support for structured logging
 * - Console and file output (or both via MultiLogger)
 * - Safe handling of circular references
 *
 * Usage:
 *   const logger = createLogger('info');
 *   logger.info('Scan started', { assets: 150 });
 *
 *   const logger = createLogger('info', { logFile: '.graphlint/scan.log' });
 */

import { createWriteStream, mkdirSync, statSync, writeFileSync, type WriteStream } from 'fs';
import { dirname, resolve } from 'path';
import type { LogLevel, Logger } from '@graphlint/types';

export type { LogLevel, Logger };

/**
 * Log level priorities (higher = more verbose)
 */
const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  silent: 0,
  errors: 1,
  warnings: 2,
  info: 3,
  debug: 4,
};

type LogMethod = 'error' | 'warn' | 'info' | 'debug' | 'trace';

/**
 * Minimum level required for each method
 */
const METHOD_LEVELS: Record<LogMethod, number> = {
  error: LOG_LEVEL_PRIORITY.errors,
  warn: LOG_LEVEL_PRIORITY.warnings,
  info: LOG_LEVEL_PRIORITY.info,
  debug: LOG_LEVEL_PRIORITY.debug,
  trace: LOG_LEVEL_PRIORITY.debug,
};

const METHOD_TAGS: Record<LogMethod, string> = {
  error: 'ERROR',
  warn: 'WARN',
  info: 'INFO',
  debug: 'DEBUG',
  trace: 'TRACE',
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LOG_LEVEL_PRIORITY, value);
}

/**
 * JSON.stringify that replaces circular references
 */
export function safeStringify(obj: unknown): string {
  const seen = new WeakSet<object>();
  return JSON.stringify(obj, (_key, value: unknown) => {
    if (typeof value === 'object' && value !== null) {
      if (seen.has(value)) {
        return '[Circular]';
      }
      seen.add(value);
    }
    return value;
  });
}

export function formatMessage(message: string, context?: Record<string, unknown>): string {
  if (!context || Object.keys(context).length === 0) {
    return message;
  }
  try {
    return `${message} ${safeStringify(context)}`;
  } catch {
    return `${message} [context serialization failed]`;
  }
}

/**
 * Level filtering shared by the concrete loggers.
 * Methods below the threshold are no-ops.
 */
abstract class LeveledLogger implements Logger {
  private readonly priority: number;

  constructor(logLevel: LogLevel) {
    this.priority = LOG_LEVEL_PRIORITY[logLevel];
  }

  protected abstract write(method: LogMethod, message: string, context?: Record<string, unknown>): void;

  private emit(method: LogMethod, message: string, context?: Record<string, unknown>): void {
    if (this.priority < METHOD_LEVELS[method]) return;
    this.write(method, message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.emit('error', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.emit('warn', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.emit('info', message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.emit('debug', message, context);
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.emit('trace', message, context);
  }
}

/**
 * Console-based Logger
 */
export class ConsoleLogger extends LeveledLogger {
  constructor(logLevel: LogLevel = 'info') {
    super(logLevel);
  }

  protected write(method: LogMethod, message: string, context?: Record<string, unknown>): void {
    const line = formatMessage(`[${METHOD_TAGS[method]}] ${message}`, context);
    switch (method) {
      case 'error':
        console.error(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      case 'info':
        console.info(line);
        break;
      default:
        console.debug(line);
        break;
    }
  }
}

/**
 * File-based Logger
 *
 * Writes ISO-timestamped lines through a write stream. The file is
 * truncated on construction; parent directories are created.
 * Throws if the path points to a directory.
 */
export class FileLogger extends LeveledLogger {
  private readonly stream: WriteStream;
  private streamFailed = false;

  constructor(logLevel: LogLevel, filePath: string) {
    super(logLevel);
    const resolvedPath = resolve(filePath);

    mkdirSync(dirname(resolvedPath), { recursive: true });

    const existing = statSync(resolvedPath, { throwIfNoEntry: false });
    if (existing?.isDirectory()) {
      throw new Error(`Cannot write log file: '${resolvedPath}' is a directory`);
    }

    writeFileSync(resolvedPath, '');
    this.stream = createWriteStream(resolvedPath, { flags: 'a' });
    this.stream.on('error', (err: Error) => {
      // Logging failures must not abort a scan; report once and stop writing
      if (!this.streamFailed) {
        this.streamFailed = true;
        console.error(`[ERROR] Log file write failed: ${err.message}`);
      }
    });
  }

  protected write(method: LogMethod, message: string, context?: Record<string, unknown>): void {
    if (this.streamFailed) return;
    const timestamp = new Date().toISOString();
    this.stream.write(formatMessage(`${timestamp} [${METHOD_TAGS[method]}] ${message}`, context) + '\n');
  }

  /** Flush and close the stream */
  close(): Promise<void> {
    return new Promise((resolvePromise) => {
      this.stream.end(() => resolvePromise());
    });
  }
}

/**
 * Delegates to several loggers, each filtering by its own level
 */
export class MultiLogger implements Logger {
  private readonly loggers: Logger[];

  constructor(loggers: Logger[]) {
    this.loggers = loggers;
  }

  error(message: string, context?: Record<string, unknown>): void {
    for (const logger of this.loggers) logger.error(message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    for (const logger of this.loggers) logger.warn(message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    for (const logger of this.loggers) logger.info(message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    for (const logger of this.loggers) logger.debug(message, context);
  }

  trace(message: string, context?: Record<string, unknown>): void {
    for (const logger of this.loggers) logger.trace(message, context);
  }

  async close(): Promise<void> {
    for (const logger of this.loggers) {
      if (logger instanceof FileLogger) {
        await logger.close();
      }
    }
  }
}

/**
 * Console logger at `level`; with `logFile`, also a file logger that
 * always records at debug level.
 */
export function createLogger(level: LogLevel, options?: { logFile?: string }): Logger {
  const consoleLogger = new ConsoleLogger(level);

  if (options?.logFile) {
    const fileLogger = new FileLogger('debug', options.logFile);
    return new MultiLogger([consoleLogger, fileLogger]);
  }

  return consoleLogger;
}
