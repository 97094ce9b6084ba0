/**
 * File Seal Service - identity-bound file encryption
 *
 * Service Flow:
 * 1. Encrypt: read file, fresh salt + nonce, Argon2id key, XChaCha20-Poly1305,
 *    container written under the SHA-256 of its own bytes
 * 2. Decrypt: parse container, check version, re-derive key from the stored
 *    salt, authenticate, restore the original file name beside the container
 * 3. Analyze: header-only structural check, no key material involved
 */

// libsodium-wrappers-sumo uses default export, not namespace export
import sodium from "libsodium-wrappers-sumo";

import { basename, dirname, join } from "node:path";

import { ANALYSIS_MESSAGES, CONTAINER_CONSTANTS } from "../constants";
import { createSealConfig } from "../config";
import type {
  ContainerAnalysis,
  ContainerHeader,
  OpenedContainer,
  SealConfig,
  SealedData,
  SecretInput,
} from "../types/container";
import {
  AuthenticationError,
  FormatError,
  InvalidInputError,
  ServiceError,
  UnsupportedVersionError,
} from "../types/errors";
import { generateRandomBytes } from "../utils/crypto";
import { ErrorUtils } from "../utils/error-handling";
import { assertReadableFile, readWholeFile, writeFileAtomic } from "../utils/file-io";
import { defaultLogger, type ILogger } from "../utils/logger";
import { ServiceBase } from "../utils/service-base";

import {
  ciphertextOf,
  containerOutputName,
  decodeContainer,
  encodeContainer,
} from "./container-codec";
import { withDerivedKey } from "./key-deriver";

const SERVICE_NAME = "FileSealService";

export class FileSealService extends ServiceBase {
  private readonly config: Readonly<SealConfig>;
  private readonly logger: ILogger;

  public constructor(
    config: Readonly<SealConfig> = createSealConfig(),
    logger: ILogger = defaultLogger
  ) {
    super();
    this.config = config;
    this.logger = logger;
  }

  protected async onInitialize(): Promise<void> {
    await sodium.ready;

    if (
      sodium.crypto_pwhash_SALTBYTES !== CONTAINER_CONSTANTS.SALT_SIZE ||
      sodium.crypto_aead_xchacha20poly1305_ietf_NPUBBYTES !==
        CONTAINER_CONSTANTS.NONCE_SIZE
    ) {
      throw new ServiceError("libsodium field sizes do not match the container layout", {
        code: "LIBSODIUM_MISMATCH",
        details: {
          saltBytes: sodium.crypto_pwhash_SALTBYTES,
          nonceBytes: sodium.crypto_aead_xchacha20poly1305_ietf_NPUBBYTES,
        },
      });
    }

    this.logger.debug("File seal service initialized", {
      opsLimit: this.config.kdf.opsLimit,
      memLimit: this.config.kdf.memLimit,
    });
  }

  public async cleanup(): Promise<void> {
    this.initialized = false;
  }

  public getConfig(): Readonly<SealConfig> {
    return this.config;
  }

  // ===== Encrypt =====

  /**
   * Encrypt a file into a container next to it.
   *
   * @returns Absolute path of the written container
   */
  public async encryptFile(
    filePath: string,
    sharedSecret: SecretInput,
    identityToken: SecretInput
  ): Promise<string> {
    await this.ensureInitialized();
    const context = ErrorUtils.createContext(SERVICE_NAME, "encryptFile");

    try {
      await assertReadableFile(filePath);
      assertIdentityToken(identityToken);

      const data = await readWholeFile(filePath);
      const { container, outputName } = await this.sealData(
        data,
        basename(filePath),
        sharedSecret,
        identityToken
      );

      const outputPath = await writeFileAtomic(
        join(dirname(filePath), outputName),
        container
      );

      this.logger.info("File encrypted", {
        outputPath,
        plaintextSize: data.length,
        containerSize: container.length,
      });
      return outputPath;
    } catch (error) {
      ErrorUtils.handleError(error, context, this.logger);
      throw error;
    }
  }

  /**
   * Build a container in memory
   */
  public async sealData(
    data: Uint8Array,
    fileName: string,
    sharedSecret: SecretInput,
    identityToken: SecretInput
  ): Promise<SealedData> {
    await this.ensureInitialized();
    assertIdentityToken(identityToken);

    const salt = await generateRandomBytes(CONTAINER_CONSTANTS.SALT_SIZE);
    const nonce = await generateRandomBytes(CONTAINER_CONSTANTS.NONCE_SIZE);

    const ciphertext = await withDerivedKey(
      sharedSecret,
      identityToken,
      salt,
      this.config.kdf,
      (key) =>
        sodium.crypto_aead_xchacha20poly1305_ietf_encrypt(data, null, null, nonce, key)
    );

    const container = encodeContainer({
      version: CONTAINER_CONSTANTS.VERSION,
      fileName,
      salt,
      nonce,
      ciphertext,
    });

    return {
      container,
      outputName: containerOutputName(container, this.config.outputSuffix),
    };
  }

  // ===== Decrypt =====

  /**
   * Decrypt a container and restore the original file in the same directory.
   *
   * @returns Absolute path of the restored file
   */
  public async decryptFile(
    containerPath: string,
    sharedSecret: SecretInput,
    identityToken: SecretInput
  ): Promise<string> {
    await this.ensureInitialized();
    const context = ErrorUtils.createContext(SERVICE_NAME, "decryptFile");

    try {
      assertIdentityToken(identityToken);

      const raw = await readWholeFile(containerPath);
      const opened = await this.openContainer(raw, sharedSecret, identityToken);

      const outputPath = await writeFileAtomic(
        join(dirname(containerPath), safeOutputName(opened.fileName)),
        opened.plaintext
      );

      this.logger.info("File decrypted", {
        outputPath,
        plaintextSize: opened.plaintext.length,
      });
      return outputPath;
    } catch (error) {
      ErrorUtils.handleError(error, context, this.logger);
      throw error;
    }
  }

  /**
   * Authenticate and decrypt a container held in memory
   */
  public async openContainer(
    raw: Uint8Array,
    sharedSecret: SecretInput,
    identityToken: SecretInput
  ): Promise<OpenedContainer> {
    await this.ensureInitialized();
    assertIdentityToken(identityToken);

    const header = decodeContainer(raw, true);
    if (!header.recognized) {
      throw new FormatError("Not a valid container", { size: raw.length });
    }
    assertSupportedVersion(header);

    const ciphertext = ciphertextOf(header);
    const plaintext = await withDerivedKey(
      sharedSecret,
      identityToken,
      header.salt,
      this.config.kdf,
      (key) => openCiphertext(ciphertext, header.nonce, key)
    );

    return {
      version: header.version,
      fileName: header.fileName,
      plaintext,
    };
  }

  // ===== Analyze =====

  /**
   * Report whether a file is structurally a container. Never decrypts.
   */
  public async analyzeFile(path: string): Promise<ContainerAnalysis> {
    const raw = await readWholeFile(path);
    const analysis = this.analyzeData(raw);
    this.logger.debug("File analyzed", { path, ...analysis });
    return analysis;
  }

  public analyzeData(raw: Uint8Array): ContainerAnalysis {
    const header = decodeContainer(raw, false);
    if (!header.recognized) {
      return {
        recognized: false,
        decryptable: false,
        info: ANALYSIS_MESSAGES.NOT_RECOGNIZED,
      };
    }

    const decryptable = raw.length > header.headerLength;
    return {
      recognized: true,
      decryptable,
      info: decryptable
        ? `valid container v${header.version}`
        : ANALYSIS_MESSAGES.TRUNCATED,
      version: header.version,
      headerLength: header.headerLength,
    };
  }
}

function assertIdentityToken(identityToken: SecretInput): void {
  if (identityToken.length === 0) {
    throw new InvalidInputError("Identity token must not be empty");
  }
}

function assertSupportedVersion(header: ContainerHeader): void {
  if (header.version !== CONTAINER_CONSTANTS.VERSION) {
    throw new UnsupportedVersionError(header.version);
  }
}

/**
 * Any AEAD failure becomes the same AuthenticationError, with no cause attached
 */
function openCiphertext(
  ciphertext: Uint8Array,
  nonce: Uint8Array,
  key: Uint8Array
): Uint8Array {
  let plaintext: Uint8Array | null = null;
  try {
    plaintext = sodium.crypto_aead_xchacha20poly1305_ietf_decrypt(
      null,
      ciphertext,
      null,
      nonce,
      key
    );
  } catch {
    plaintext = null;
  }
  if (plaintext === null) {
    throw new AuthenticationError();
  }
  return plaintext;
}

/**
 * Stored names are written beside the container; directory parts are dropped
 */
function safeOutputName(fileName: string): string {
  const name = basename(fileName.replace(/\\/g, "/"));
  if (name === "" || name === "." || name === "..") {
    throw new FormatError("Container does not store a usable file name", {
      fileName,
    });
  }
  return name;
}
