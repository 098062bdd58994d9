import type { ToolRegistry } from "../../../src/core/tool-engine";

export function register_tools(registry: ToolRegistry): void {
  registry.register("shout", "Uppercase the input", (input) => input.toUpperCase());
}
