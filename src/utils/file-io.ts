/**
 * Whole-file I/O helpers.
 * Writes go through a temporary sibling and a rename, so readers of the
 * final path never observe a partially written file.
 */

import { constants } from "node:fs";
import { access, open, readFile, realpath, rename, stat, unlink } from "node:fs/promises";
import { basename, dirname, join } from "node:path";

import { generateRandomBytes } from "./crypto";
import { ErrorUtils } from "./error-handling";
import { InvalidInputError, WriteError } from "../types/errors";

/**
 * Fail with InvalidInputError unless path is a readable regular file
 */
export async function assertReadableFile(path: string): Promise<void> {
  try {
    const info = await stat(path);
    if (!info.isFile()) {
      throw new InvalidInputError(`File '${path}' does not exist or is not readable`, {
        path,
      });
    }
    await access(path, constants.R_OK);
  } catch (error) {
    if (error instanceof InvalidInputError) {
      throw error;
    }
    throw new InvalidInputError(`File '${path}' does not exist or is not readable`, {
      path,
      reason: ErrorUtils.getErrorMessage(error),
    });
  }
}

export async function readWholeFile(path: string): Promise<Uint8Array> {
  try {
    return new Uint8Array(await readFile(path));
  } catch (error) {
    throw new InvalidInputError(`File '${path}' does not exist or is not readable`, {
      path,
      reason: ErrorUtils.getErrorMessage(error),
    });
  }
}

/**
 * Write data to path and return the resolved absolute path
 */
export async function writeFileAtomic(path: string, data: Uint8Array): Promise<string> {
  const suffix = Buffer.from(await generateRandomBytes(6)).toString("hex");
  const tempPath = join(dirname(path), `.${basename(path)}.${suffix}.tmp`);

  try {
    const handle = await open(tempPath, "wx", 0o600);
    try {
      await handle.writeFile(data);
      await handle.sync();
    } finally {
      await handle.close();
    }
    await rename(tempPath, path);
    return await realpath(path);
  } catch (error) {
    // the temp file may never have been created
    await unlink(tempPath).catch(() => undefined);
    throw new WriteError(`Could not write file '${path}'`, {
      path,
      reason: ErrorUtils.getErrorMessage(error),
    });
  }
}
