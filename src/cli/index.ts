#!/usr/bin/env node
/**
 * src/cli/index.ts
 * CLI entry (commander)
 */

import "dotenv/config";
import { Command } from "commander";
import { runCommand } from "./commands/run";
import { toolsListCommand } from "./commands/toolsList";

export function createCli(): Command {
  const program = new Command();

  program
    .name("foreman")
    .description("Run the Foreman task agent and inspect its tools")
    .version("0.1.0");

  program.addCommand(runCommand());
  program.addCommand(toolsListCommand());

  return program;
}

if (require.main === module) {
  createCli()
    .parseAsync(process.argv)
    .catch((err) => {
      console.error("Fatal error:", err instanceof Error ? err.message : err);
      process.exit(1);
    });
}
