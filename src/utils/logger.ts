/**
 * Logger Interface and Console Implementation
 *
 * All levels are written to stderr; stdout carries command output only.
 * Callers can supply their own ILogger to route records elsewhere.
 */

export enum LogLevel {
  DEBUG = "debug",
  INFO = "info",
  WARN = "warn",
  ERROR = "error",
  SILENT = "silent",
}

const LEVEL_ORDER: readonly LogLevel[] = [
  LogLevel.DEBUG,
  LogLevel.INFO,
  LogLevel.WARN,
  LogLevel.ERROR,
  LogLevel.SILENT,
];

export interface ILogger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(
    message: string,
    error?: unknown,
    context?: Record<string, unknown>
  ): void;
}

/**
 * Parse a level name such as "info" or "WARN"; unknown names yield undefined
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (!value) {
    return undefined;
  }
  const normalized = value.trim().toLowerCase();
  return LEVEL_ORDER.find((level) => level === normalized);
}

export class ConsoleLogger implements ILogger {
  private logLevel: LogLevel;

  constructor(logLevel: LogLevel = LogLevel.WARN) {
    this.logLevel = logLevel;
  }

  public setLogLevel(level: LogLevel): void {
    this.logLevel = level;
  }

  public getLogLevel(): LogLevel {
    return this.logLevel;
  }

  /* eslint-disable no-console -- Console logger implementation requires console output */
  public debug(message: string, context?: Record<string, unknown>): void {
    if (this.shouldLog(LogLevel.DEBUG)) {
      console.warn(this.formatMessage("DEBUG", message, context));
    }
  }

  public info(message: string, context?: Record<string, unknown>): void {
    if (this.shouldLog(LogLevel.INFO)) {
      console.warn(this.formatMessage("INFO", message, context));
    }
  }

  public warn(message: string, context?: Record<string, unknown>): void {
    if (this.shouldLog(LogLevel.WARN)) {
      console.warn(this.formatMessage("WARN", message, context));
    }
  }

  public error(
    message: string,
    error?: unknown,
    context?: Record<string, unknown>
  ): void {
    if (this.shouldLog(LogLevel.ERROR)) {
      console.error(this.formatMessage("ERROR", message, context, error));
    }
  }
  /* eslint-enable no-console */

  private shouldLog(level: LogLevel): boolean {
    if (this.logLevel === LogLevel.SILENT) {
      return false;
    }
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.logLevel);
  }

  private formatMessage(
    level: string,
    message: string,
    context?: Record<string, unknown>,
    error?: unknown
  ): string {
    const timestamp = new Date().toISOString();
    let formatted = `[${timestamp}] [${level}] ${message}`;

    if (context) {
      try {
        formatted += ` ${JSON.stringify(context)}`;
      } catch {
        formatted += ` [Context serialization failed]`;
      }
    }

    if (error) {
      if (error instanceof Error) {
        formatted += `\nError: ${error.name}: ${error.message}`;
      } else {
        formatted += `\nError: ${String(error)}`;
      }
    }

    return formatted;
  }
}

/**
 * Default logger instance
 */
export const defaultLogger: ILogger = new ConsoleLogger(LogLevel.WARN);
