/**
 * idseal - identity-bound file encryption
 *
 * Seals single files with XChaCha20-Poly1305 under a key derived by Argon2id
 * from a shared secret and an identity token.
 *
 * @packageDocumentation
 */

// ===== Core Service =====
export { FileSealService } from "./core/file-seal-service";

// ===== Core Utilities =====
export { deriveKey, withDerivedKey } from "./core/key-deriver";
export {
  encodeContainer,
  decodeContainer,
  ciphertextOf,
  containerOutputName,
  writeU16BE,
  readU16BE,
} from "./core/container-codec";

// ===== Configuration =====
export {
  createSealConfig,
  loadSealConfigFromEnv,
  resolveKdfParameters,
  isKdfProfileName,
} from "./config";

// ===== Types =====
export type {
  ContainerAnalysis,
  ContainerDecodeResult,
  ContainerFields,
  ContainerHeader,
  ContainerNotRecognized,
  KdfParameters,
  KdfProfileName,
  OpenedContainer,
  SealConfig,
  SealConfigOverrides,
  SealedData,
  SecretInput,
} from "./types/container";

export type { ErrorContext, ServiceResult } from "./types/errors";

export {
  ServiceError,
  InvalidInputError,
  FormatError,
  UnsupportedVersionError,
  AuthenticationError,
  KeyDerivationError,
  EncodingError,
  WriteError,
} from "./types/errors";

// ===== Utilities =====
export {
  defaultLogger,
  ConsoleLogger,
  LogLevel,
  parseLogLevel,
  type ILogger,
} from "./utils/logger";

export { ErrorUtils } from "./utils/error-handling";
export { ServiceBase } from "./utils/service-base";

// ===== CLI =====
export { createProgram, runCli } from "./cli";

// ===== Constants =====
export {
  CONTAINER_CONSTANTS,
  KDF_CONSTANTS,
  KDF_PROFILES,
  ANALYSIS_MESSAGES,
} from "./constants";

export { VERSION } from "./version";
