/**
 * src/cli/commands/run.ts
 * foreman run <goal> [--max-steps n]
 */

import { Command, InvalidArgumentError } from "commander";
import { setupCli } from "../utils/setup";

export function parseMaxSteps(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("must be a positive integer");
  }
  return parsed;
}

export function runCommand(): Command {
  const cmd = new Command("run");
  cmd
    .description("Run the agent on a goal and print its final response")
    .argument("<goal...>", "natural-language goal")
    .option("--max-steps <n>", "step budget for this run", parseMaxSteps)
    .action(async (goalWords: string[], opts: { maxSteps?: number }) => {
      const { foreman, logger } = await setupCli();
      try {
        const response = await foreman.agent.run(goalWords.join(" "), opts.maxSteps);
        console.log(response);
      } catch (e) {
        logger.error(e instanceof Error ? e : String(e));
        process.exitCode = 1;
      } finally {
        await logger.flush();
      }
    });

  return cmd;
}
