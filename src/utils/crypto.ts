/**
 * Crypto Utilities for idseal
 */

import sodium from "libsodium-wrappers-sumo";

import { sha256 } from "@noble/hashes/sha2";
import { bytesToHex } from "@noble/hashes/utils";

import type { SecretInput } from "../types/container";

const encoder = new TextEncoder();

/**
 * Generate cryptographically random bytes using libsodium
 */
export async function generateRandomBytes(length: number): Promise<Uint8Array> {
  await sodium.ready;
  return sodium.randombytes_buf(length);
}

/**
 * SHA-256 digest as lowercase hex
 */
export function sha256Hex(data: Uint8Array): string {
  return bytesToHex(sha256(data));
}

export function toBytes(input: SecretInput): Uint8Array {
  return typeof input === "string" ? encoder.encode(input) : input;
}

export function concatBytes(...parts: Uint8Array[]): Uint8Array {
  const total = parts.reduce((sum, part) => sum + part.length, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}

/**
 * Overwrite a buffer with zeros
 */
export function zeroize(buffer: Uint8Array): void {
  sodium.memzero(buffer);
}
