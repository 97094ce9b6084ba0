/**
 * Error Types and Classes for idseal
 */

export interface ErrorContext {
  message: string;
  type: string;
  source: string;
  operation: string;
  timestamp: number;
  severity: "low" | "medium" | "high" | "critical";
  metadata?: Record<string, unknown>;
  service?: string;
  [key: string]: unknown;
}

export interface ServiceResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  errorCode?: string;
  context?: ErrorContext;
  metadata?: Record<string, unknown>;
}

interface ErrorOptions {
  code?: string;
  details?: Record<string, unknown>;
}

/**
 * Base Service Error Class
 */
export class ServiceError extends Error {
  public readonly code?: string;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, options?: ErrorOptions) {
    super(message);
    this.name = "ServiceError";
    this.code = options?.code;
    this.details = options?.details;
    Object.setPrototypeOf(this, ServiceError.prototype);
  }
}

/**
 * Bad arguments: missing or unreadable file, empty identity token
 */
export class InvalidInputError extends ServiceError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, { code: "INVALID_INPUT", details });
    this.name = "InvalidInputError";
    Object.setPrototypeOf(this, InvalidInputError.prototype);
  }
}

/**
 * The bytes do not parse as a container
 */
export class FormatError extends ServiceError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, { code: "FORMAT_ERROR", details });
    this.name = "FormatError";
    Object.setPrototypeOf(this, FormatError.prototype);
  }
}

/**
 * Structurally valid container with a version this build does not decrypt
 */
export class UnsupportedVersionError extends ServiceError {
  public readonly version: number;

  constructor(version: number) {
    super(`Unsupported container version: ${version}`, {
      code: "UNSUPPORTED_VERSION",
      details: { version },
    });
    this.name = "UnsupportedVersionError";
    this.version = version;
    Object.setPrototypeOf(this, UnsupportedVersionError.prototype);
  }
}

/**
 * AEAD verification failed.
 *
 * Takes no arguments: wrong key, corrupted bytes and truncated ciphertext
 * all produce the same message and carry no details.
 */
export class AuthenticationError extends ServiceError {
  constructor() {
    super("Decryption failed (wrong credentials or damaged file)", {
      code: "AUTHENTICATION_FAILED",
    });
    this.name = "AuthenticationError";
    Object.setPrototypeOf(this, AuthenticationError.prototype);
  }
}

export class KeyDerivationError extends ServiceError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, { code: "KEY_DERIVATION_FAILED", details });
    this.name = "KeyDerivationError";
    Object.setPrototypeOf(this, KeyDerivationError.prototype);
  }
}

export class EncodingError extends ServiceError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, { code: "ENCODING_ERROR", details });
    this.name = "EncodingError";
    Object.setPrototypeOf(this, EncodingError.prototype);
  }
}

export class WriteError extends ServiceError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, { code: "WRITE_ERROR", details });
    this.name = "WriteError";
    Object.setPrototypeOf(this, WriteError.prototype);
  }
}
