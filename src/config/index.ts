/**
 * idseal Configuration
 * Built once at process start from defaults, explicit overrides and the
 * environment. The returned object is frozen.
 *
 * Environment:
 *   IDSEAL_KDF_PROFILE  interactive | moderate | sensitive
 *   IDSEAL_LOG_LEVEL    debug | info | warn | error | silent
 */

import {
  CONTAINER_CONSTANTS,
  DEFAULT_KDF_PROFILE,
  KDF_CONSTANTS,
  KDF_PROFILES,
} from "../constants";
import type {
  KdfParameters,
  KdfProfileName,
  SealConfig,
  SealConfigOverrides,
} from "../types/container";
import { ServiceError } from "../types/errors";
import { LogLevel, parseLogLevel } from "../utils/logger";

export function isKdfProfileName(value: string): value is KdfProfileName {
  return Object.prototype.hasOwnProperty.call(KDF_PROFILES, value);
}

/**
 * Resolve a profile name or explicit parameters to validated Argon2id limits
 */
export function resolveKdfParameters(
  kdf: KdfProfileName | KdfParameters
): Readonly<KdfParameters> {
  if (typeof kdf === "string") {
    if (!isKdfProfileName(kdf)) {
      throw new ServiceError(`Unknown KDF profile: ${String(kdf)}`, {
        code: "INVALID_CONFIG",
        details: { kdf, profiles: Object.keys(KDF_PROFILES) },
      });
    }
    return Object.freeze({ ...KDF_PROFILES[kdf] });
  }

  const { opsLimit, memLimit } = kdf;
  if (!Number.isInteger(opsLimit) || opsLimit < KDF_CONSTANTS.MIN_OPS_LIMIT) {
    throw new ServiceError(`Invalid KDF opsLimit: ${opsLimit}`, {
      code: "INVALID_CONFIG",
      details: { opsLimit, minimum: KDF_CONSTANTS.MIN_OPS_LIMIT },
    });
  }
  if (!Number.isInteger(memLimit) || memLimit < KDF_CONSTANTS.MIN_MEM_LIMIT) {
    throw new ServiceError(`Invalid KDF memLimit: ${memLimit}`, {
      code: "INVALID_CONFIG",
      details: { memLimit, minimum: KDF_CONSTANTS.MIN_MEM_LIMIT },
    });
  }
  return Object.freeze({ opsLimit, memLimit });
}

export function createSealConfig(
  overrides: SealConfigOverrides = {}
): Readonly<SealConfig> {
  const outputSuffix = overrides.outputSuffix ?? CONTAINER_CONSTANTS.OUTPUT_SUFFIX;
  if (/[\\/]/.test(outputSuffix)) {
    throw new ServiceError("Output suffix must not contain path separators", {
      code: "INVALID_CONFIG",
      details: { outputSuffix },
    });
  }

  return Object.freeze({
    kdf: resolveKdfParameters(overrides.kdf ?? DEFAULT_KDF_PROFILE),
    outputSuffix,
    logLevel: overrides.logLevel ?? LogLevel.WARN,
  });
}

/**
 * Read overrides from environment variables. Explicit overrides win.
 */
export function loadSealConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  overrides: SealConfigOverrides = {}
): Readonly<SealConfig> {
  const fromEnv: SealConfigOverrides = {};

  const profile = env.IDSEAL_KDF_PROFILE?.trim();
  if (profile) {
    if (!isKdfProfileName(profile)) {
      throw new ServiceError(`Unknown KDF profile in IDSEAL_KDF_PROFILE: ${profile}`, {
        code: "INVALID_CONFIG",
        details: { profile, profiles: Object.keys(KDF_PROFILES) },
      });
    }
    fromEnv.kdf = profile;
  }

  const rawLevel = env.IDSEAL_LOG_LEVEL;
  if (rawLevel) {
    const level = parseLogLevel(rawLevel);
    if (!level) {
      throw new ServiceError(`Unknown log level in IDSEAL_LOG_LEVEL: ${rawLevel}`, {
        code: "INVALID_CONFIG",
        details: { level: rawLevel },
      });
    }
    fromEnv.logLevel = level;
  }

  return createSealConfig({ ...fromEnv, ...stripUndefined(overrides) });
}

function stripUndefined(overrides: SealConfigOverrides): SealConfigOverrides {
  const out: SealConfigOverrides = {};
  if (overrides.kdf !== undefined) out.kdf = overrides.kdf;
  if (overrides.outputSuffix !== undefined) out.outputSuffix = overrides.outputSuffix;
  if (overrides.logLevel !== undefined) out.logLevel = overrides.logLevel;
  return out;
}
