/**
 * Extension discovery: load tool modules from a directory.
 * A module contributes tools by exporting `register_tools(registry)`,
 * either directly or on its default export.
 */

import { existsSync } from "node:fs";
import { readdir } from "node:fs/promises";
import { extname, join, resolve } from "node:path";
import type { ToolRegistry } from "./index";
import type { EventBus } from "../eventBus";
import { ExtensionLoadError, toError } from "../errors";

export interface ToolExtension {
  register_tools(registry: ToolRegistry): void | Promise<void>;
}

export interface ExtensionLoadReport {
  /** Files whose register_tools ran to completion */
  loaded: string[];
  /** Files without an entry point */
  skipped: string[];
  failed: Array<{ file: string; error: string }>;
}

const EXTENSION_SUFFIXES = new Set([".js", ".cjs", ".ts"]);

type RegisterTools = (registry: ToolRegistry) => unknown;

export function isExtensionFile(name: string): boolean {
  if (name.endsWith(".d.ts")) return false;
  if (/^index\.[cm]?[jt]s$/.test(name)) return false;
  return EXTENSION_SUFFIXES.has(extname(name));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return (typeof value === "object" || typeof value === "function") && value !== null;
}

/**
 * Find `register_tools` on the module or on its default export
 */
export function resolveEntryPoint(mod: unknown): RegisterTools | undefined {
  const candidates = isRecord(mod) ? [mod, mod.default] : [];
  for (const candidate of candidates) {
    if (!isRecord(candidate)) continue;
    const entry = candidate.register_tools;
    if (typeof entry === "function") {
      return (registry: ToolRegistry): unknown => entry(registry);
    }
  }
  return undefined;
}

/**
 * Load every extension module in `dir` (sorted by file name) into `registry`.
 * Never throws: failures are reported through events and the returned report.
 */
export async function loadExtensions(
  registry: ToolRegistry,
  dir: string,
  eventBus: EventBus
): Promise<ExtensionLoadReport> {
  const report: ExtensionLoadReport = { loaded: [], skipped: [], failed: [] };
  const root = resolve(dir);

  if (!existsSync(root)) {
    eventBus.emit("ExtensionSkippedEvent", { dir: root, reason: "directory not found" });
    return report;
  }

  let files: string[];
  try {
    const entries = await readdir(root, { withFileTypes: true });
    files = entries
      .filter((entry) => entry.isFile() && isExtensionFile(entry.name))
      .map((entry) => entry.name)
      .sort();
  } catch (e) {
    const error = new ExtensionLoadError(toError(e).message, root, toError(e));
    eventBus.emit("ExtensionErrorEvent", { file: root, error: error.message });
    report.failed.push({ file: root, error: error.message });
    return report;
  }

  for (const file of files) {
    const fullPath = join(root, file);

    try {
      const mod: unknown = await import(fullPath);
      const registerTools = resolveEntryPoint(mod);

      if (!registerTools) {
        eventBus.emit("ExtensionSkippedEvent", { file, reason: "no register_tools function found" });
        report.skipped.push(file);
        continue;
      }

      const before = new Set(registry.list());
      await registerTools(registry);
      const tools = registry.list().filter((name) => !before.has(name));

      eventBus.emit("ExtensionLoadedEvent", { file, tools });
      report.loaded.push(file);
    } catch (e) {
      const error = new ExtensionLoadError(toError(e).message, file, toError(e));
      eventBus.emit("ExtensionErrorEvent", { file, error: error.message });
      report.failed.push({ file, error: error.message });
    }
  }

  return report;
}
