/**
 * Tool Registry:
 * - register named tools (last write wins)
 * - list / describe them for prompts
 * - dispatch with a uniform { success, result } shape; never throws
 *
 * `ToolRegistry.create` registers the built-ins, then discovers extensions.
 */

import { EventBus } from "../eventBus";
import { ValidationError } from "../errors";
import { Tool, ToolInvoke, ToolResult } from "../types";
import { registerBuiltinTools } from "../tools/builtinTools";
import { ExtensionLoadReport, loadExtensions } from "./discovery";

export interface ToolRegistryOptions {
  customToolsPath?: string;
}

export class ToolRegistry {
  private tools: Map<string, Tool> = new Map();

  constructor(private eventBus: EventBus) {}

  /**
   * Built-ins first, then extensions from `customToolsPath`
   */
  static async create(
    eventBus: EventBus,
    options: ToolRegistryOptions = {}
  ): Promise<{ registry: ToolRegistry; extensions: ExtensionLoadReport }> {
    const registry = new ToolRegistry(eventBus);
    registerBuiltinTools(registry);

    const extensions: ExtensionLoadReport = options.customToolsPath
      ? await loadExtensions(registry, options.customToolsPath, eventBus)
      : { loaded: [], skipped: [], failed: [] };

    return { registry, extensions };
  }

  register(name: string, description: string, invoke: ToolInvoke): void {
    if (!name || !name.trim()) {
      throw new ValidationError("Tool name must be a non-empty string", { name });
    }
    if (typeof invoke !== "function") {
      throw new ValidationError(`Tool ${name}: invoke must be a function`, { name });
    }

    const replaced = this.tools.has(name);
    this.tools.set(name, { name, description, invoke });
    this.eventBus.emit("ToolRegisteredEvent", { name, replaced });
  }

  get(name: string): Tool | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  /**
   * Tool names in registration order
   */
  list(): string[] {
    return Array.from(this.tools.keys());
  }

  /**
   * One "name: description" line per tool, for prompts
   */
  descriptions(): string {
    return Array.from(this.tools.values())
      .map((t) => `${t.name}: ${t.description}`)
      .join("\n");
  }

  async dispatch(tool: Tool, input: string): Promise<ToolResult> {
    this.eventBus.emit("ToolInvocationEvent", { name: tool.name, input });
    const started = Date.now();

    try {
      const output = await tool.invoke(input);
      const result = String(output);
      this.eventBus.emit("ToolResultEvent", {
        name: tool.name,
        result,
        durationMs: Date.now() - started,
      });
      return { success: true, result };
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      this.eventBus.emit("ToolErrorEvent", {
        name: tool.name,
        error: message,
        durationMs: Date.now() - started,
      });
      return { success: false, result: `Tool ${tool.name} failed: ${message}` };
    }
  }
}

export type { ExtensionLoadReport, ToolExtension } from "./discovery";
export { loadExtensions } from "./discovery";
