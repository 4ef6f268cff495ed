/**
 * Centralized logging system with multiple output levels
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  message: string;
  context?: string;
  data?: Record<string, unknown>;
  error?: Error;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

export class Logger {
  private minLevel: LogLevel = 'info';

  constructor(minLevel: LogLevel = 'info') {
    this.minLevel = minLevel;
  }

  private shouldLog(level: LogLevel): boolean {
    const minIndex = LOG_LEVELS.indexOf(this.minLevel);
    const levelIndex = LOG_LEVELS.indexOf(level);
    return levelIndex >= minIndex;
  }

  private formatMessage(entry: LogEntry): string {
    const timestamp = entry.timestamp.toISOString();
    const level = entry.level.toUpperCase().padEnd(5);
    const context = entry.context ? `[${entry.context}]` : '';

    let message = `${timestamp} ${level} ${context} ${entry.message}`;

    if (entry.data && Object.keys(entry.data).length > 0) {
      message += '\n  ' + JSON.stringify(entry.data, null, 2).split('\n').join('\n  ');
    }

    if (entry.error) {
      message += `\n  Error: ${entry.error.message}\n  Stack: ${entry.error.stack}`;
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

    const formatted = this.formatMessage(entry);
    const color = this.getConsoleColor(entry.level);
    const reset = '\x1b[0m';

    switch (entry.level) {
      case 'error':
        console.error(`${color}${formatted}${reset}`);
        break;
      case 'warn':
        console.warn(`${color}${formatted}${reset}`);
        break;
      default:
        console.log(`${color}${formatted}${reset}`);
    }
  }

  debug(message: string, data?: Record<string, unknown>, context?: string): void {
    this.log({ timestamp: new Date(), level: 'debug', message, data, context });
  }

  info(message: string, data?: Record<string, unknown>, context?: string): void {
    this.log({ timestamp: new Date(), level: 'info', message, data, context });
  }

  warn(message: string, data?: Record<string, unknown>, context?: string): void {
    this.log({ timestamp: new Date(), level: 'warn', message, data, context });
  }

  error(message: string, error?: Error, context?: string): void {
    this.log({
      timestamp: new Date(),
      level: 'error',
      message,
      error,
      context
    });
  }

  success(message: string): void {
    console.log(`\x1b[32m✅ ${message}\x1b[0m`);
  }

  setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }
}

// Singleton instance
export const logger = new Logger(isLogLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : 'info');

/**
 * Custom error class for application errors
 */
export class AppError extends Error {
  constructor(
    message: string,
    public code: string = 'UNKNOWN_ERROR',
    public context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Normalizes anything thrown into an AppError and logs it once
 */
export function handleError(error: unknown, context?: string): AppError {
  if (error instanceof AppError) {
    logger.error(error.message, error, context);
    return error;
  }

  if (error instanceof Error) {
    const appError = new AppError(error.message, 'INTERNAL_ERROR');
    logger.error(error.message, error, context);
    return appError;
  }

  const appError = new AppError(String(error), 'UNKNOWN_ERROR');
  logger.error(String(error), undefined, context);
  return appError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
