/**
 * Container Wire Format
 *
 * Layout: VERSION(1) + NAME_LEN(2, big-endian) + NAME(n, UTF-8)
 *       + SALT(16) + NONCE(24) + CIPHERTEXT(rest, tag included)
 *
 * Decoding is header-only and permissive about the version byte: any version
 * is "recognized" here, and the operations decide what they support.
 *
 * This module exports pure functions (not class methods).
 */

import { CONTAINER_CONSTANTS } from "../constants";
import type {
  ContainerDecodeResult,
  ContainerFields,
  ContainerHeader,
} from "../types/container";
import { EncodingError, FormatError, ServiceError } from "../types/errors";
import { concatBytes, sha256Hex } from "../utils/crypto";

const U8_MAX = 0xff;
const U16_MASK = 0xff;
const U16_SHIFT_BITS = 8;
const U16_BYTES = 2;

const NOT_RECOGNIZED = { recognized: false } as const;

const encoder = new TextEncoder();
const decoder = new TextDecoder("utf-8");

/**
 * Write big-endian u16
 */
export function writeU16BE(value: number): Uint8Array {
  const bytes = new Uint8Array(U16_BYTES);
  bytes[0] = (value >> U16_SHIFT_BITS) & U16_MASK;
  bytes[1] = value & U16_MASK;
  return bytes;
}

/**
 * Read big-endian u16
 */
export function readU16BE(buffer: Uint8Array, offset: number): number {
  const high = buffer[offset];
  const low = buffer[offset + 1];
  if (offset < 0 || high === undefined || low === undefined) {
    throw new ServiceError("Buffer too short for u16 read", {
      code: "BUFFER_TOO_SHORT",
      details: { offset, bufferLength: buffer.length },
    });
  }
  return (high << U16_SHIFT_BITS) | low;
}

export function encodeContainer(fields: ContainerFields): Uint8Array {
  const { version, fileName, salt, nonce, ciphertext } = fields;

  if (!Number.isInteger(version) || version < 0 || version > U8_MAX) {
    throw new EncodingError(`Invalid container version: ${version}`, { version });
  }

  const nameBytes = encoder.encode(fileName);
  if (nameBytes.length > CONTAINER_CONSTANTS.MAX_FILE_NAME_BYTES) {
    throw new EncodingError(
      `File name too long: ${nameBytes.length} bytes (maximum ${CONTAINER_CONSTANTS.MAX_FILE_NAME_BYTES})`,
      {
        length: nameBytes.length,
        maximum: CONTAINER_CONSTANTS.MAX_FILE_NAME_BYTES,
      }
    );
  }

  if (salt.length !== CONTAINER_CONSTANTS.SALT_SIZE) {
    throw new EncodingError(
      `Invalid salt length: expected ${CONTAINER_CONSTANTS.SALT_SIZE}, got ${salt.length}`,
      { expectedLength: CONTAINER_CONSTANTS.SALT_SIZE, actualLength: salt.length }
    );
  }

  if (nonce.length !== CONTAINER_CONSTANTS.NONCE_SIZE) {
    throw new EncodingError(
      `Invalid nonce length: expected ${CONTAINER_CONSTANTS.NONCE_SIZE}, got ${nonce.length}`,
      { expectedLength: CONTAINER_CONSTANTS.NONCE_SIZE, actualLength: nonce.length }
    );
  }

  return concatBytes(
    Uint8Array.of(version),
    writeU16BE(nameBytes.length),
    nameBytes,
    salt,
    nonce,
    ciphertext
  );
}

/**
 * Parse the header of a container.
 *
 * Returns `{ recognized: false }` whenever too few bytes remain for the next
 * field. With includeCiphertext the full buffer is kept as `raw`.
 */
export function decodeContainer(
  raw: Uint8Array,
  includeCiphertext = true
): ContainerDecodeResult {
  const fixedTail = CONTAINER_CONSTANTS.SALT_SIZE + CONTAINER_CONSTANTS.NONCE_SIZE;

  if (raw.length < CONTAINER_CONSTANTS.MIN_CONTAINER_SIZE) {
    return NOT_RECOGNIZED;
  }

  let offset = 0;
  const version = raw[offset];
  if (version === undefined) {
    return NOT_RECOGNIZED;
  }
  offset += CONTAINER_CONSTANTS.VERSION_BYTES_SIZE;

  const nameLength = readU16BE(raw, offset);
  offset += CONTAINER_CONSTANTS.FILE_NAME_LENGTH_BYTES_SIZE;

  if (raw.length < offset + nameLength + fixedTail) {
    return NOT_RECOGNIZED;
  }

  const fileName = decoder.decode(raw.subarray(offset, offset + nameLength));
  offset += nameLength;

  const salt = raw.slice(offset, offset + CONTAINER_CONSTANTS.SALT_SIZE);
  offset += CONTAINER_CONSTANTS.SALT_SIZE;

  const nonce = raw.slice(offset, offset + CONTAINER_CONSTANTS.NONCE_SIZE);
  offset += CONTAINER_CONSTANTS.NONCE_SIZE;

  const header: ContainerHeader = {
    recognized: true,
    version,
    fileName,
    salt,
    nonce,
    headerLength: offset,
  };
  if (includeCiphertext) {
    header.raw = raw;
  }
  return header;
}

/**
 * Everything after the header. Requires a header decoded with includeCiphertext.
 */
export function ciphertextOf(header: ContainerHeader): Uint8Array {
  if (!header.raw) {
    throw new FormatError("Container was decoded without its ciphertext", {
      headerLength: header.headerLength,
    });
  }
  return header.raw.subarray(header.headerLength);
}

/**
 * On-disk name of a container: SHA-256 of the whole container plus suffix
 */
export function containerOutputName(
  container: Uint8Array,
  suffix: string = CONTAINER_CONSTANTS.OUTPUT_SUFFIX
): string {
  return `${sha256Hex(container)}${suffix}`;
}
