/**
 * @module @docsync/core/logging
 * Structured console logger with levels, prefixes and an optional log file
 */

import fs from 'fs-extra';

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  child?(prefix: string): Logger;
}

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export interface ConsoleLoggerOptions {
  level?: LogLevel;
  prefix?: string;
  timestamps?: boolean;
  colors?: boolean;
  /** Plain-text copy of every emitted line is appended here */
  logFile?: string;
  /** Line writer, console.log unless given */
  write?: (line: string) => void;
}

const MAX_STRING_LENGTH = 1000;
const MAX_ARRAY_LENGTH = 50;

/**
 * Console-based logger implementation
 */
export class ConsoleLogger implements Logger {
  private level: LogLevel;
  private readonly prefix: string;
  private readonly timestamps: boolean;
  private readonly colors: boolean;
  private readonly logFile: string | undefined;
  private readonly write: (line: string) => void;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.level = options.level ?? LogLevel.INFO;
    this.prefix = options.prefix ?? '';
    this.timestamps = options.timestamps ?? true;
    this.colors = options.colors ?? true;
    this.logFile = options.logFile;
    this.write = options.write ?? ((line) => console.log(line));

    if (this.logFile) {
      fs.ensureFileSync(this.logFile);
    }
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    if (this.level <= LogLevel.DEBUG) {
      this.log('DEBUG', message, meta, '\x1b[36m'); // Cyan
    }
  }

  info(message: string, meta?: Record<string, unknown>): void {
    if (this.level <= LogLevel.INFO) {
      this.log('INFO', message, meta, '\x1b[32m'); // Green
    }
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    if (this.level <= LogLevel.WARN) {
      this.log('WARN', message, meta, '\x1b[33m'); // Yellow
    }
  }

  error(message: string, meta?: Record<string, unknown>): void {
    if (this.level <= LogLevel.ERROR) {
      this.log('ERROR', message, meta, '\x1b[31m'); // Red
    }
  }

  private log(
    level: string,
    message: string,
    meta: Record<string, unknown> | undefined,
    color: string,
  ): void {
    const head: string[] = [];
    const tail: string[] = [];

    if (this.timestamps) {
      head.push(`[${new Date().toISOString()}]`);
    }

    if (this.prefix) {
      tail.push(`[${this.prefix}]`);
    }

    tail.push(message);

    if (meta && Object.keys(meta).length > 0) {
      // Compact JSON only; large text fields are cut down first
      tail.push(JSON.stringify(sanitizeMeta(meta)));
    }

    const plain = [...head, level, ...tail].join(' ');
    this.write(this.colors ? [...head, `${color}${level}\x1b[0m`, ...tail].join(' ') : plain);

    if (this.logFile) {
      fs.appendFileSync(this.logFile, `${plain}\n`);
    }
  }

  /**
   * Create child logger with additional prefix
   */
  child(prefix: string): ConsoleLogger {
    return new ConsoleLogger({
      level: this.level,
      prefix: this.prefix ? `${this.prefix}:${prefix}` : prefix,
      timestamps: this.timestamps,
      colors: this.colors,
      logFile: this.logFile,
      write: this.write,
    });
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object';
}

/**
 * Truncate long strings and arrays so a log line stays bounded
 */
export function sanitizeMeta(meta: Record<string, unknown>): Record<string, unknown> {
  const sanitized: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(meta)) {
    if (typeof value === 'string') {
      sanitized[key] = value.length > MAX_STRING_LENGTH
        ? `${value.slice(0, MAX_STRING_LENGTH)}... [${value.length} chars]`
        : value;
      continue;
    }

    if (Array.isArray(value)) {
      const limited: unknown[] = value.slice(0, MAX_ARRAY_LENGTH);
      if (value.length > MAX_ARRAY_LENGTH) {
        limited.push(`... [${value.length - MAX_ARRAY_LENGTH} more items]`);
      }
      sanitized[key] = limited;
      continue;
    }

    if (value instanceof Error) {
      sanitized[key] = value.message;
      continue;
    }

    if (isRecord(value)) {
      sanitized[key] = sanitizeMeta(value);
      continue;
    }

    sanitized[key] = value;
  }

  return sanitized;
}

/**
 * No-op logger for testing or silent mode
 */
export class SilentLogger implements Logger {
  debug(_message: string, _meta?: Record<string, unknown>): void {
    // No-op
  }

  info(_message: string, _meta?: Record<string, unknown>): void {
    // No-op
  }

  warn(_message: string, _meta?: Record<string, unknown>): void {
    // No-op
  }

  error(_message: string, _meta?: Record<string, unknown>): void {
    // No-op
  }

  child(_prefix: string): SilentLogger {
    return this;
  }
}

/**
 * Child logger when the implementation supports prefixes, the same logger otherwise
 */
export function childLogger(logger: Logger, prefix: string): Logger {
  return logger.child ? logger.child(prefix) : logger;
}

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  switch (value?.toUpperCase()) {
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'INFO':
      return LogLevel.INFO;
    case 'WARN':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    case 'SILENT':
      return LogLevel.SILENT;
    default:
      return undefined;
  }
}

/**
 * Create a logger based on environment
 */
export function createLogger(options?: ConsoleLoggerOptions): Logger {
  // In test environment, use silent logger
  if (process.env.NODE_ENV === 'test') {
    return new SilentLogger();
  }

  return new ConsoleLogger({
    ...options,
    level: options?.level ?? parseLogLevel(process.env.LOG_LEVEL),
  });
}
