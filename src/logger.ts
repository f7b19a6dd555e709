/**
 * Leveled console logger and the error types shared by the organizer
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  message: string;
  context?: string;
  data?: Record<string, unknown>;
  error?: Error;
}

export interface LoggerOptions {
  minLevel?: LogLevel;
  context?: string;
  color?: boolean;
  maxLogs?: number;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some(level => level === value);
}

export class Logger {
  private logs: LogEntry[];
  private maxLogs: number;
  private minLevel: LogLevel;
  private color: boolean;
  private context?: string;

  constructor(options: LoggerOptions = {}, logs: LogEntry[] = []) {
    this.minLevel = options.minLevel ?? 'info';
    this.context = options.context;
    this.color = options.color ?? false;
    this.maxLogs = options.maxLogs ?? 1000;
    this.logs = logs;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.minLevel);
  }

  formatMessage(entry: LogEntry): string {
    const timestamp = entry.timestamp.toISOString();
    const level = entry.level.toUpperCase().padEnd(5);
    const context = entry.context ? ` [${entry.context}]` : '';

    let message = `${timestamp} ${level}${context} ${entry.message}`;

    if (entry.data && Object.keys(entry.data).length > 0) {
      message += '\n  ' + JSON.stringify(entry.data, null, 2).split('\n').join('\n  ');
    }

    if (entry.error) {
      message += `\n  Error: ${entry.error.message}`;
      if (this.minLevel === 'debug' && entry.error.stack) {
        message += `\n  Stack: ${entry.error.stack}`;
      }
    }

    return message;
  }

  private getConsoleColor(level: LogLevel): string {
    const colors: Record<LogLevel, string> = {
      debug: '\x1b[36m',    // Cyan
      info: '\x1b[32m',     // Green
      warn: '\x1b[33m',     // Yellow
      error: '\x1b[31m'     // Red
    };
    return colors[level];
  }

  private log(entry: LogEntry): void {
    if (!this.shouldLog(entry.level)) return;

    // splice keeps the buffer shared with child loggers
    this.logs.push(entry);
    if (this.logs.length > this.maxLogs) {
      this.logs.splice(0, this.logs.length - this.maxLogs);
    }

    const formatted = this.color
      ? `${this.getConsoleColor(entry.level)}${this.formatMessage(entry)}\x1b[0m`
      : this.formatMessage(entry);

    switch (entry.level) {
      case 'error':
        console.error(formatted);
        break;
      case 'warn':
        console.warn(formatted);
        break;
      default:
        console.log(formatted);
    }
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log({ timestamp: new Date(), level: 'debug', message, data, context: this.context });
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log({ timestamp: new Date(), level: 'info', message, data, context: this.context });
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log({ timestamp: new Date(), level: 'warn', message, data, context: this.context });
  }

  error(message: string, error?: Error): void {
    this.log({ timestamp: new Date(), level: 'error', message, error, context: this.context });
  }

  /**
   * Logger for a component. Shares level, color and the entry buffer.
   */
  child(context: string): Logger {
    return new Logger(
      { minLevel: this.minLevel, color: this.color, maxLogs: this.maxLogs, context },
      this.logs
    );
  }

  getLogs(level?: LogLevel): LogEntry[] {
    return level ? this.logs.filter(log => log.level === level) : [...this.logs];
  }

  clear(): void {
    this.logs.splice(0, this.logs.length);
  }

  setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  getMinLevel(): LogLevel {
    return this.minLevel;
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return new Logger(options);
}

/**
 * Base class for errors the organizer raises on purpose
 */
export class AppError extends Error {
  constructor(
    message: string,
    public code: string = 'UNKNOWN_ERROR',
    public exitCode: number = 1,
    public context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): { name: string; message: string; code: string; exitCode: number; context?: Record<string, unknown> } {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      exitCode: this.exitCode,
      context: this.context,
    };
  }
}

/**
 * Target path is missing or is not a directory. Fatal for the whole run.
 */
export class InvalidTargetError extends AppError {
  constructor(public targetPath: string, reason: string) {
    super(`Target path '${targetPath}' is not a valid directory: ${reason}`, 'INVALID_TARGET', 1, {
      targetPath,
    });
    this.name = 'InvalidTargetError';
  }
}

export class UsageError extends AppError {
  constructor(message: string) {
    super(message, 'USAGE_ERROR', 1);
    this.name = 'UsageError';
  }
}

export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Normalize anything thrown into an AppError and log it
 */
export function handleError(error: unknown, logger: Logger): AppError {
  if (error instanceof AppError) {
    logger.error(error.message);
    return error;
  }

  if (error instanceof Error) {
    logger.error(error.message, error);
    return new AppError(error.message, 'INTERNAL_ERROR', 1);
  }

  logger.error(String(error));
  return new AppError(String(error), 'UNKNOWN_ERROR', 1);
}
