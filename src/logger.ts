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

export interface LoggerOptions {
  context?: string;
  minLevel?: LogLevel;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  const match = LOG_LEVELS.find(level => level === value?.toLowerCase());
  return match ?? fallback;
}

export interface LoggingSettings {
  /** Level for loggers created without their own `minLevel`; unset falls back to LOG_LEVEL */
  level?: LogLevel;
  /** Send debug and info lines to stderr so stdout carries only command output */
  stderr: boolean;
}

let shared: LoggingSettings = { level: undefined, stderr: false };

/**
 * Apply settings to every logger in the process. Returns the previous settings.
 */
export function configureLogging(settings: Partial<LoggingSettings>): LoggingSettings {
  const previous = shared;
  shared = { ...shared, ...settings };
  return previous;
}

export class Logger {
  private minLevel?: LogLevel;
  private context?: string;

  constructor(options: LoggerOptions = {}) {
    this.context = options.context;
    this.minLevel = options.minLevel;
  }

  private shouldLog(level: LogLevel): boolean {
    // Resolved per call so LOG_LEVEL loaded by dotenv after import still applies
    const minLevel = this.minLevel ?? shared.level ?? parseLogLevel(process.env.LOG_LEVEL);
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(minLevel);
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
        if (shared.stderr) {
          console.error(`${color}${formatted}${reset}`);
        } else {
          console.log(`${color}${formatted}${reset}`);
        }
    }
  }

  debug(message: string, data?: Record<string, unknown>, context?: string): void {
    this.log({ timestamp: new Date(), level: 'debug', message, data, context: context ?? this.context });
  }

  info(message: string, data?: Record<string, unknown>, context?: string): void {
    this.log({ timestamp: new Date(), level: 'info', message, data, context: context ?? this.context });
  }

  warn(message: string, data?: Record<string, unknown>, context?: string): void {
    this.log({ timestamp: new Date(), level: 'warn', message, data, context: context ?? this.context });
  }

  error(message: string, error?: Error, context?: string): void {
    this.log({
      timestamp: new Date(),
      level: 'error',
      message,
      error,
      context: context ?? this.context
    });
  }
}

// Singleton instance
export const logger = new Logger();

export type ErrorCode =
  | 'ENVIRONMENT_SETUP_FAILED'
  | 'INVALID_ROOT'
  | 'MOVE_NOT_FOUND'
  | 'DESTINATION_MISSING'
  | 'ORIGINAL_OCCUPIED'
  | 'MOVE_FAILED'
  | 'LEDGER_WRITE_FAILED'
  | 'UNSUPPORTED_CONFIG_FORMAT'
  | 'INTERNAL_ERROR'
  | 'UNKNOWN_ERROR';

/**
 * Custom error class for application errors
 */
export class AppError extends Error {
  constructor(
    message: string,
    public code: ErrorCode = 'UNKNOWN_ERROR',
    public context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Normalise any thrown value into an AppError and log it
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
