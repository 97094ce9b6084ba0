/**
 * CLI Tests
 * Drives the commander program in process with captured output
 */

import { describe, it, expect, beforeEach, afterEach } from "@jest/globals";
import { readFile, realpath, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";

import { createProgram } from "../../src/cli";
import type { CliIO } from "../../src/cli/context";
import { failMark, successMark } from "../../src/cli/theme";
import {
  FAST_KDF,
  OTHER_TOKEN,
  TEST_CONTENT_MEDIUM,
  TEST_SECRET,
  TEST_TOKEN,
  createTempDir,
  removeTempDir,
} from "../fixtures/test-data";
import { RecordingLogger } from "../fixtures/test-logger";

describe("CLI", () => {
  let dir: string;
  let out: string[];
  let err: string[];
  let exitCodes: number[];

  const io: CliIO = {
    out: (line) => out.push(line),
    err: (line) => err.push(line),
  };

  function run(...args: string[]): Promise<unknown> {
    const program = createProgram({
      io,
      env: {},
      logger: new RecordingLogger(),
      configOverrides: { kdf: FAST_KDF },
      setExitCode: (code) => exitCodes.push(code),
      exitOverride: true,
    });
    return program.parseAsync(["node", "idseal", ...args]);
  }

  beforeEach(async () => {
    dir = await realpath(await createTempDir());
    out = [];
    err = [];
    exitCodes = [];
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it("should encrypt, analyze and decrypt a file", async () => {
    const input = join(dir, "notes.txt");
    await writeFile(input, TEST_CONTENT_MEDIUM);

    await run("encrypt", input, TEST_SECRET, TEST_TOKEN);
    const match = /^Encrypted: (.+\.enc)$/.exec(out[0] ?? "");
    expect(match).not.toBeNull();
    const containerPath = match?.[1] ?? "";
    await rm(input);

    await run("analyze", containerPath);
    expect(out[1]).toBe(successMark("valid container v2"));

    await run("decrypt", containerPath, TEST_SECRET, TEST_TOKEN);
    expect(out[2]).toBe(`Decrypted: ${input}`);
    expect(new Uint8Array(await readFile(input))).toEqual(TEST_CONTENT_MEDIUM);

    expect(err).toEqual([]);
    expect(exitCodes).toEqual([]);
  });

  it("should report an unrecognized file without failing", async () => {
    const path = join(dir, "noise.bin");
    await writeFile(path, new Uint8Array(10));

    await run("analyze", path);

    expect(out).toEqual([failMark("no signature detected")]);
    expect(exitCodes).toEqual([]);
  });

  it("should print the failure and set exit status 1", async () => {
    const input = join(dir, "notes.txt");
    await writeFile(input, TEST_CONTENT_MEDIUM);
    await run("encrypt", input, TEST_SECRET, TEST_TOKEN);
    const containerPath = (out[0] ?? "").replace("Encrypted: ", "");

    await run("decrypt", containerPath, TEST_SECRET, OTHER_TOKEN);

    expect(err).toEqual([failMark("Decryption failed (wrong credentials or damaged file)")]);
    expect(exitCodes).toEqual([1]);
  });

  it("should reject an unknown KDF profile", async () => {
    const path = join(dir, "noise.bin");
    await writeFile(path, new Uint8Array(10));

    await run("--kdf", "extreme", "analyze", path);

    expect(err).toEqual([failMark("Unknown KDF profile: extreme")]);
    expect(exitCodes).toEqual([1]);
  });

  it("should reject missing arguments", async () => {
    await expect(run("encrypt", join(dir, "a.txt"))).rejects.toMatchObject({
      code: "commander.missingArgument",
    });
  });

  it("should reject extra arguments", async () => {
    await expect(run("analyze", "a", "b")).rejects.toMatchObject({
      code: "commander.excessArguments",
    });
  });

  it("should reject unknown commands", async () => {
    await expect(run("shred", "a")).rejects.toMatchObject({
      code: "commander.unknownCommand",
    });
  });
});
