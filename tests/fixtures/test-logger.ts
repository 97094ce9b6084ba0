import type { ILogger } from "../../src/utils/logger";

export interface LogRecord {
  level: "debug" | "info" | "warn" | "error";
  message: string;
  error?: unknown;
  context?: Record<string, unknown>;
}

/**
 * Logger that keeps every record in memory
 */
export class RecordingLogger implements ILogger {
  public readonly records: LogRecord[] = [];

  public debug(message: string, context?: Record<string, unknown>): void {
    this.records.push({ level: "debug", message, context });
  }

  public info(message: string, context?: Record<string, unknown>): void {
    this.records.push({ level: "info", message, context });
  }

  public warn(message: string, context?: Record<string, unknown>): void {
    this.records.push({ level: "warn", message, context });
  }

  public error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    this.records.push({ level: "error", message, error, context });
  }

  public serialized(): string {
    return JSON.stringify(
      this.records.map((record) => ({
        ...record,
        error: record.error instanceof Error ? record.error.message : record.error,
      }))
    );
  }
}
