/**
 * Error Handling Utilities for idseal
 */

import type { ErrorContext, ServiceResult } from "../types/errors";
import { ServiceError } from "../types/errors";
import type { ILogger } from "./logger";
import { defaultLogger } from "./logger";

const VALID_SEVERITIES = ["low", "medium", "high", "critical"] as const;

function isSeverity(value: unknown): value is ErrorContext["severity"] {
  return VALID_SEVERITIES.some((severity) => severity === value);
}

export class ErrorUtils {
  private static logger: ILogger = defaultLogger;

  /**
   * Set custom logger instance
   */
  public static setLogger(logger: ILogger): void {
    ErrorUtils.logger = logger;
  }

  /**
   * Create error context for consistent error handling
   */
  public static createContext(
    service: string,
    operation: string,
    additionalContext?: Record<string, unknown>
  ): ErrorContext {
    if (!service) {
      throw new ServiceError("Service name is required", {
        code: "INVALID_ERROR_CONTEXT",
        details: { service, operation },
      });
    }

    if (!operation) {
      throw new ServiceError("Operation name is required", {
        code: "INVALID_ERROR_CONTEXT",
        details: { service, operation },
      });
    }

    const severity = additionalContext?.severity ?? "medium";
    if (!isSeverity(severity)) {
      throw new ServiceError(
        `Invalid severity level: ${String(severity)}. Must be one of: ${VALID_SEVERITIES.join(", ")}`,
        {
          code: "INVALID_ERROR_CONTEXT",
          details: { service, operation, severity },
        }
      );
    }

    return {
      message: `${service}: ${operation}`,
      type: "service_error",
      source: service,
      operation,
      timestamp: Date.now(),
      ...additionalContext,
      severity,
    };
  }

  /**
   * Extract error message from unknown error type
   */
  public static getErrorMessage(error: unknown): string {
    if (error instanceof Error) {
      return error.message;
    }
    if (error && typeof error === "object" && "message" in error) {
      return String(error.message);
    }
    return String(error);
  }

  public static createSuccessResult<T>(data: T): ServiceResult<T> {
    return {
      success: true,
      data,
    };
  }

  public static createErrorResult<T>(error: unknown): ServiceResult<T> {
    return {
      success: false,
      error: ErrorUtils.getErrorMessage(error),
      errorCode: error instanceof ServiceError ? error.code : undefined,
    };
  }

  /**
   * Run an async operation, logging and capturing any failure in the result
   */
  public static async withErrorHandling<T>(
    operation: () => Promise<T>,
    context: ErrorContext
  ): Promise<ServiceResult<T>> {
    try {
      const result = await operation();
      return ErrorUtils.createSuccessResult(result);
    } catch (error) {
      ErrorUtils.handleError(error, context);
      return ErrorUtils.createErrorResult<T>(error);
    }
  }

  /**
   * Log an error with its context
   */
  public static handleError(
    error: unknown,
    context: ErrorContext,
    logger: ILogger = ErrorUtils.logger
  ): void {
    logger.error(
      `Error in ${context.source}.${context.operation}`,
      error,
      context
    );
  }
}
