/**
 * Error Handling Tests
 */

import { describe, it, expect } from "@jest/globals";
import { ErrorUtils } from "../../src/utils/error-handling";
import {
  AuthenticationError,
  EncodingError,
  FormatError,
  InvalidInputError,
  KeyDerivationError,
  ServiceError,
  UnsupportedVersionError,
  WriteError,
} from "../../src/types/errors";
import { RecordingLogger } from "../fixtures/test-logger";

describe("ErrorUtils", () => {
  describe("createContext", () => {
    it("should create error context", () => {
      const context = ErrorUtils.createContext("TestService", "testOperation");
      expect(context.message).toBe("TestService: testOperation");
      expect(context.source).toBe("TestService");
      expect(context.operation).toBe("testOperation");
      expect(context.type).toBe("service_error");
      expect(context.severity).toBe("medium");
      expect(typeof context.timestamp).toBe("number");
    });

    it("should create context with additional data", () => {
      const context = ErrorUtils.createContext("TestService", "testOperation", {
        severity: "high",
        path: "/tmp/a.txt",
      });
      expect(context.severity).toBe("high");
      expect(context.path).toBe("/tmp/a.txt");
    });

    it("should throw error for invalid service name", () => {
      expect(() => ErrorUtils.createContext("", "testOperation")).toThrow(ServiceError);
    });

    it("should throw error for invalid operation name", () => {
      expect(() => ErrorUtils.createContext("TestService", "")).toThrow(ServiceError);
    });

    it("should throw error for invalid severity", () => {
      expect(() =>
        ErrorUtils.createContext("TestService", "testOperation", { severity: "invalid" })
      ).toThrow("Invalid severity level: invalid. Must be one of: low, medium, high, critical");
    });
  });

  describe("getErrorMessage", () => {
    it("should extract message from Error", () => {
      expect(ErrorUtils.getErrorMessage(new Error("test error"))).toBe("test error");
    });

    it("should extract message from object with message property", () => {
      expect(ErrorUtils.getErrorMessage({ message: "test message" })).toBe("test message");
    });

    it("should convert non-Error to string", () => {
      expect(ErrorUtils.getErrorMessage("string error")).toBe("string error");
      expect(ErrorUtils.getErrorMessage(123)).toBe("123");
    });
  });

  describe("createErrorResult", () => {
    it("should carry the code of a ServiceError", () => {
      const result = ErrorUtils.createErrorResult(new FormatError("bad"));
      expect(result).toEqual({ success: false, error: "bad", errorCode: "FORMAT_ERROR" });
    });

    it("should leave the code empty for plain errors", () => {
      const result = ErrorUtils.createErrorResult("test error");
      expect(result).toEqual({ success: false, error: "test error", errorCode: undefined });
    });
  });

  describe("withErrorHandling", () => {
    it("should return success result for successful operation", async () => {
      const result = await ErrorUtils.withErrorHandling(
        async () => "test data",
        ErrorUtils.createContext("TestService", "testOperation")
      );
      expect(result).toEqual({ success: true, data: "test data" });
    });

    it("should log and capture a failed operation", async () => {
      const logger = new RecordingLogger();
      ErrorUtils.setLogger(logger);
      try {
        const result = await ErrorUtils.withErrorHandling(async () => {
          throw new WriteError("disk full");
        }, ErrorUtils.createContext("TestService", "testOperation"));

        expect(result.success).toBe(false);
        expect(result.error).toBe("disk full");
        expect(result.errorCode).toBe("WRITE_ERROR");
        expect(logger.records.map((record) => record.message)).toEqual([
          "Error in TestService.testOperation",
        ]);
      } finally {
        ErrorUtils.setLogger(new RecordingLogger());
      }
    });
  });

  describe("handleError", () => {
    it("should log to an explicit logger", () => {
      const logger = new RecordingLogger();
      const error = new Error("boom");
      ErrorUtils.handleError(error, ErrorUtils.createContext("Svc", "op"), logger);

      expect(logger.records).toHaveLength(1);
      expect(logger.records[0]?.level).toBe("error");
      expect(logger.records[0]?.error).toBe(error);
      expect(logger.records[0]?.context?.operation).toBe("op");
    });
  });
});

describe("Error classes", () => {
  it("should assign codes and names", () => {
    const cases: Array<[ServiceError, string, string]> = [
      [new InvalidInputError("x"), "InvalidInputError", "INVALID_INPUT"],
      [new FormatError("x"), "FormatError", "FORMAT_ERROR"],
      [new UnsupportedVersionError(3), "UnsupportedVersionError", "UNSUPPORTED_VERSION"],
      [new AuthenticationError(), "AuthenticationError", "AUTHENTICATION_FAILED"],
      [new KeyDerivationError("x"), "KeyDerivationError", "KEY_DERIVATION_FAILED"],
      [new EncodingError("x"), "EncodingError", "ENCODING_ERROR"],
      [new WriteError("x"), "WriteError", "WRITE_ERROR"],
    ];

    for (const [error, name, code] of cases) {
      expect(error).toBeInstanceOf(ServiceError);
      expect(error).toBeInstanceOf(Error);
      expect(error.name).toBe(name);
      expect(error.code).toBe(code);
    }
  });

  it("should describe the unsupported version", () => {
    const error = new UnsupportedVersionError(3);
    expect(error.message).toBe("Unsupported container version: 3");
    expect(error.version).toBe(3);
  });

  it("should give every AuthenticationError the same message and no details", () => {
    const a = new AuthenticationError();
    const b = new AuthenticationError();
    expect(a.message).toBe(b.message);
    expect(a.message).toBe("Decryption failed (wrong credentials or damaged file)");
    expect(a.details).toBeUndefined();
  });
});
