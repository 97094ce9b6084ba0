import { Command } from "commander";

import type { CliContext } from "../context";

export function encryptCommand(ctx: CliContext): Command {
  return new Command("encrypt")
    .description("Encrypt a file for one authenticated identity")
    .argument("<filePath>", "File to encrypt")
    .argument("<sharedSecret>", "Deployment-wide shared secret")
    .argument("<identityToken>", "Identity token of the authenticated user")
    .allowExcessArguments(false)
    .action(
      async (
        filePath: string,
        sharedSecret: string,
        identityToken: string,
        _options: Record<string, unknown>,
        command: Command
      ) => {
        try {
          const service = ctx.serviceFor(command);
          const outputPath = await service.encryptFile(filePath, sharedSecret, identityToken);
          ctx.io.out(`Encrypted: ${outputPath}`);
        } catch (error) {
          ctx.fail(error);
        }
      }
    );
}
