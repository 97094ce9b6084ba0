import { Command } from "commander";

import type { CliContext } from "../context";

export function decryptCommand(ctx: CliContext): Command {
  return new Command("decrypt")
    .description("Decrypt a container and restore the original file beside it")
    .argument("<containerPath>", "Container to decrypt")
    .argument("<sharedSecret>", "Deployment-wide shared secret")
    .argument("<identityToken>", "Identity token used at encryption time")
    .allowExcessArguments(false)
    .action(
      async (
        containerPath: string,
        sharedSecret: string,
        identityToken: string,
        _options: Record<string, unknown>,
        command: Command
      ) => {
        try {
          const service = ctx.serviceFor(command);
          const outputPath = await service.decryptFile(
            containerPath,
            sharedSecret,
            identityToken
          );
          ctx.io.out(`Decrypted: ${outputPath}`);
        } catch (error) {
          ctx.fail(error);
        }
      }
    );
}
