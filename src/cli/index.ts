import { Command } from "commander";

import { VERSION } from "../version";

import { analyzeCommand } from "./commands/analyze.command";
import { decryptCommand } from "./commands/decrypt.command";
import { encryptCommand } from "./commands/encrypt.command";
import { type CliContextOptions, createCliContext } from "./context";
import { dim } from "./theme";

export function createProgram(options: CliContextOptions = {}): Command {
  const ctx = createCliContext(options);
  const program = new Command();

  program
    .name("idseal")
    .description("Encrypt, decrypt and inspect identity-bound file containers")
    .version(VERSION)
    .option("--kdf <profile>", "Argon2id cost profile: interactive, moderate or sensitive")
    .option("-v, --verbose", "Log debug output to stderr")
    .addHelpText(
      "after",
      `
${dim("Examples:")}
  $ idseal encrypt ./report.pdf "$PEPPER" "$IDENTITY"
  $ idseal decrypt ./<sha256>.enc "$PEPPER" "$IDENTITY"
  $ idseal analyze ./<sha256>.enc
`
    );

  program.addCommand(encryptCommand(ctx));
  program.addCommand(decryptCommand(ctx));
  program.addCommand(analyzeCommand(ctx));

  // addCommand does not copy settings onto subcommands
  for (const command of [program, ...program.commands]) {
    command.configureOutput({
      writeOut: (text) => ctx.io.out(text.trimEnd()),
      writeErr: (text) => ctx.io.err(text.trimEnd()),
    });
    if (options.exitOverride) {
      command.exitOverride();
    }
  }

  return program;
}

export async function runCli(argv: string[] = process.argv): Promise<void> {
  await createProgram().parseAsync(argv);
}
