import { Command } from "commander";

import type { CliContext } from "../context";
import { failMark, successMark } from "../theme";

export function analyzeCommand(ctx: CliContext): Command {
  return new Command("analyze")
    .description("Check whether a file is a container (no credentials needed)")
    .argument("<containerPath>", "File to inspect")
    .allowExcessArguments(false)
    .action(
      async (containerPath: string, _options: Record<string, unknown>, command: Command) => {
        try {
          const service = ctx.serviceFor(command);
          const analysis = await service.analyzeFile(containerPath);
          ctx.io.out(
            analysis.recognized ? successMark(analysis.info) : failMark(analysis.info)
          );
        } catch (error) {
          ctx.fail(error);
        }
      }
    );
}
