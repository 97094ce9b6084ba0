/**
 * idseal Constants
 * Single source of truth for container layout and key-derivation parameters
 */

/**
 * Container Format Constants
 */
export const CONTAINER_CONSTANTS = {
  VERSION: 2,
  VERSION_BYTES_SIZE: 1,
  FILE_NAME_LENGTH_BYTES_SIZE: 2, // u16 big-endian
  MAX_FILE_NAME_BYTES: 0xffff,
  SALT_SIZE: 16, // crypto_pwhash_SALTBYTES
  NONCE_SIZE: 24, // XChaCha20-Poly1305 public nonce
  TAG_SIZE: 16, // Poly1305 tag appended to the ciphertext
  MIN_CONTAINER_SIZE: 1 + 2 + 16 + 24,
  OUTPUT_SUFFIX: ".enc",
} as const;

/**
 * Key Derivation Constants
 */
export const KDF_CONSTANTS = {
  KEY_SIZE: 32,
  PASSWORD_SEPARATOR: "|",
  MIN_OPS_LIMIT: 1,
  MIN_MEM_LIMIT: 8192, // crypto_pwhash_argon2id_MEMLIMIT_MIN
} as const;

/**
 * Argon2id cost profiles, mirroring libsodium's named limits
 */
export const KDF_PROFILES = {
  interactive: { opsLimit: 2, memLimit: 64 * 1024 * 1024 },
  moderate: { opsLimit: 3, memLimit: 256 * 1024 * 1024 },
  sensitive: { opsLimit: 4, memLimit: 1024 * 1024 * 1024 },
} as const;

export const DEFAULT_KDF_PROFILE = "moderate";

/**
 * Analysis messages
 */
export const ANALYSIS_MESSAGES = {
  NOT_RECOGNIZED: "no signature detected",
  TRUNCATED: "truncated container (no ciphertext)",
} as const;
