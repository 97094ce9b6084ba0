/**
 * Container and Service Types for idseal
 */

import type { LogLevel } from "../utils/logger";
import type { KDF_PROFILES } from "../constants";

// ===== Container =====

export interface ContainerFields {
  version: number;
  fileName: string;
  salt: Uint8Array;
  nonce: Uint8Array;
  ciphertext: Uint8Array;
}

export interface ContainerHeader {
  recognized: true;
  version: number;
  fileName: string;
  salt: Uint8Array;
  nonce: Uint8Array;
  /** Offset of the first ciphertext byte */
  headerLength: number;
  /** Whole container, present only when decoded with includeCiphertext */
  raw?: Uint8Array;
}

export interface ContainerNotRecognized {
  recognized: false;
}

export type ContainerDecodeResult = ContainerHeader | ContainerNotRecognized;

export interface ContainerAnalysis {
  recognized: boolean;
  decryptable: boolean;
  info: string;
  version?: number;
  headerLength?: number;
}

export interface SealedData {
  container: Uint8Array;
  outputName: string;
}

export interface OpenedContainer {
  version: number;
  fileName: string;
  plaintext: Uint8Array;
}

// ===== Key Derivation =====

export type KdfProfileName = keyof typeof KDF_PROFILES;

export interface KdfParameters {
  opsLimit: number;
  memLimit: number;
}

/** Caller-owned secret input; strings are UTF-8 encoded */
export type SecretInput = string | Uint8Array;

// ===== Configuration =====

export interface SealConfig {
  kdf: Readonly<KdfParameters>;
  outputSuffix: string;
  logLevel: LogLevel;
}

export interface SealConfigOverrides {
  kdf?: KdfProfileName | KdfParameters;
  outputSuffix?: string;
  logLevel?: LogLevel;
}
