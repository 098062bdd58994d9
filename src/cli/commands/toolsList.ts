/**
 * src/cli/commands/toolsList.ts
 * foreman tools:list
 */

import { Command } from "commander";
import { ToolRegistry } from "../../core/tool-engine";
import { printTable } from "../utils/printTable";
import { setupCli } from "../utils/setup";

export function toolRows(registry: ToolRegistry): string[][] {
  return registry.list().map((name) => [name, registry.get(name)?.description ?? ""]);
}

export function toolsListCommand(): Command {
  const cmd = new Command("tools:list");
  cmd.description("List registered tools (built-ins and discovered extensions)").action(async () => {
    const { foreman, logger } = await setupCli();
    printTable(["NAME", "DESCRIPTION"], toolRows(foreman.registry));
    for (const failure of foreman.extensions.failed) {
      console.error(`Failed to load ${failure.file}: ${failure.error}`);
    }
    await logger.flush();
  });
  return cmd;
}
