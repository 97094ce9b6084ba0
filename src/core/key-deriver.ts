/**
 * Key Deriver
 *
 * key = Argon2id(sharedSecret || "|" || identityToken, salt) -> 32 bytes
 *
 * The key is used directly as the XChaCha20-Poly1305 key. Cost limits come
 * from the deployment's SealConfig and must match between encrypt and decrypt.
 */

import sodium from "libsodium-wrappers-sumo";

import { CONTAINER_CONSTANTS, KDF_CONSTANTS } from "../constants";
import type { KdfParameters, SecretInput } from "../types/container";
import { KeyDerivationError } from "../types/errors";
import { concatBytes, toBytes, zeroize } from "../utils/crypto";
import { ErrorUtils } from "../utils/error-handling";

const SEPARATOR = new TextEncoder().encode(KDF_CONSTANTS.PASSWORD_SEPARATOR);

/**
 * Derive a 32-byte key. The caller owns the result and must zero it.
 */
export async function deriveKey(
  sharedSecret: SecretInput,
  identityToken: SecretInput,
  salt: Uint8Array,
  kdf: Readonly<KdfParameters>
): Promise<Uint8Array> {
  if (salt.length !== CONTAINER_CONSTANTS.SALT_SIZE) {
    throw new KeyDerivationError(
      `Invalid salt length: expected ${CONTAINER_CONSTANTS.SALT_SIZE}, got ${salt.length}`,
      { expectedLength: CONTAINER_CONSTANTS.SALT_SIZE, actualLength: salt.length }
    );
  }

  await sodium.ready;

  const password = concatBytes(toBytes(sharedSecret), SEPARATOR, toBytes(identityToken));
  try {
    return sodium.crypto_pwhash(
      KDF_CONSTANTS.KEY_SIZE,
      password,
      salt,
      kdf.opsLimit,
      kdf.memLimit,
      sodium.crypto_pwhash_ALG_ARGON2ID13
    );
  } catch (error) {
    throw new KeyDerivationError("Key derivation failed", {
      opsLimit: kdf.opsLimit,
      memLimit: kdf.memLimit,
      reason: ErrorUtils.getErrorMessage(error),
    });
  } finally {
    zeroize(password);
  }
}

/**
 * Derive a key, hand it to `use`, and zero it on every exit path
 */
export async function withDerivedKey<T>(
  sharedSecret: SecretInput,
  identityToken: SecretInput,
  salt: Uint8Array,
  kdf: Readonly<KdfParameters>,
  use: (key: Uint8Array) => T | Promise<T>
): Promise<T> {
  const key = await deriveKey(sharedSecret, identityToken, salt, kdf);
  try {
    return await use(key);
  } finally {
    zeroize(key);
  }
}
