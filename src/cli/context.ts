/**
 * Shared state handed to every subcommand: output sinks, exit status and a
 * way to build the service from the parsed global options.
 */

import type { Command } from "commander";

import { isKdfProfileName, loadSealConfigFromEnv } from "../config";
import { FileSealService } from "../core/file-seal-service";
import type { SealConfigOverrides } from "../types/container";
import { ServiceError } from "../types/errors";
import { ErrorUtils } from "../utils/error-handling";
import { ConsoleLogger, type ILogger, LogLevel } from "../utils/logger";

import { failMark } from "./theme";

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
}

export type GlobalOptions = {
  kdf?: string;
  verbose?: boolean;
};

export interface CliContext {
  io: CliIO;
  serviceFor(command: Command): FileSealService;
  fail(error: unknown): void;
}

export interface CliContextOptions {
  io?: CliIO;
  env?: NodeJS.ProcessEnv;
  logger?: ILogger;
  /** Applied beneath the command-line flags */
  configOverrides?: SealConfigOverrides;
  setExitCode?: (code: number) => void;
  /** Throw CommanderError instead of exiting on usage errors */
  exitOverride?: boolean;
}

/* eslint-disable no-console -- CLI output */
export const processIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};
/* eslint-enable no-console */

export function createCliContext(options: CliContextOptions = {}): CliContext {
  const io = options.io ?? processIO;
  const env = options.env ?? process.env;
  const setExitCode =
    options.setExitCode ??
    ((code: number) => {
      process.exitCode = code;
    });

  return {
    io,
    serviceFor(command) {
      const globals = command.optsWithGlobals<GlobalOptions>();
      const overrides: SealConfigOverrides = { ...options.configOverrides };

      if (globals.kdf !== undefined) {
        if (!isKdfProfileName(globals.kdf)) {
          throw new ServiceError(`Unknown KDF profile: ${globals.kdf}`, {
            code: "INVALID_CONFIG",
            details: { kdf: globals.kdf },
          });
        }
        overrides.kdf = globals.kdf;
      }
      if (globals.verbose) {
        overrides.logLevel = LogLevel.DEBUG;
      }

      const config = loadSealConfigFromEnv(env, overrides);
      const logger = options.logger ?? new ConsoleLogger(config.logLevel);
      return new FileSealService(config, logger);
    },
    fail(error) {
      io.err(failMark(ErrorUtils.getErrorMessage(error)));
      setExitCode(1);
    },
  };
}
