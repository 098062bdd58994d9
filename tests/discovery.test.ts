import fs from "fs";
import os from "os";
import path from "path";
import { EventBus } from "../src/core/eventBus";
import { ToolRegistry, loadExtensions } from "../src/core/tool-engine";
import { isExtensionFile, resolveEntryPoint } from "../src/core/tool-engine/discovery";

const FIXTURES = path.join(__dirname, "fixtures", "custom_tools");

describe("extension discovery", () => {
  let bus: EventBus;

  beforeEach(() => {
    bus = new EventBus();
  });

  test("should recognise extension modules by file name", () => {
    expect(isExtensionFile("weather.ts")).toBe(true);
    expect(isExtensionFile("weather.js")).toBe(true);
    expect(isExtensionFile("weather.cjs")).toBe(true);
    expect(isExtensionFile("weather.d.ts")).toBe(false);
    expect(isExtensionFile("index.ts")).toBe(false);
    expect(isExtensionFile("notes.txt")).toBe(false);
  });

  test("should find register_tools directly or on the default export", () => {
    const direct = { register_tools: () => undefined };
    const wrapped = { default: { register_tools: () => undefined } };

    expect(resolveEntryPoint(direct)).toBeInstanceOf(Function);
    expect(resolveEntryPoint(wrapped)).toBeInstanceOf(Function);
    expect(resolveEntryPoint({ description: "nothing" })).toBeUndefined();
    expect(resolveEntryPoint(null)).toBeUndefined();
  });

  test("should load good extensions and report the rest", async () => {
    const errorSpy = jest.spyOn(console, "error").mockImplementation(() => undefined);
    const registry = new ToolRegistry(bus);

    const report = await loadExtensions(registry, FIXTURES, bus);

    expect(report.loaded).toEqual(["a_good_tool.ts", "b_default_export.ts"]);
    expect(report.skipped).toEqual(["c_missing_entry.ts"]);
    expect(report.failed).toEqual([
      {
        file: "d_broken_import.ts",
        error: "Extension load error (d_broken_import.ts): cannot load this extension",
      },
      {
        file: "e_broken_register.ts",
        error: "Extension load error (e_broken_register.ts): registration exploded",
      },
    ]);
    expect(registry.list()).toEqual(["shout", "reverse"]);
    expect(bus.getHistory({ type: "ExtensionLoadedEvent" }).map((e) => e.payload)).toEqual([
      { file: "a_good_tool.ts", tools: ["shout"] },
      { file: "b_default_export.ts", tools: ["reverse"] },
    ]);
    errorSpy.mockRestore();
  });

  test("should register extensions after the built-ins", async () => {
    const { registry, extensions } = await ToolRegistry.create(bus, { customToolsPath: FIXTURES });

    expect(registry.list()).toEqual(["calculator", "shout", "reverse"]);
    expect(extensions.failed).toHaveLength(2);

    const shout = registry.get("shout");
    if (!shout) throw new Error("shout not registered");
    await expect(registry.dispatch(shout, "hi")).resolves.toEqual({ success: true, result: "HI" });
  });

  test("should load the bundled time extension", async () => {
    const registry = new ToolRegistry(bus);

    const report = await loadExtensions(registry, path.join(__dirname, "..", "data", "custom_tools"), bus);

    expect(report.loaded).toEqual(["time_tool.js"]);
    const time = registry.get("time");
    if (!time) throw new Error("time not registered");
    const result = await registry.dispatch(time, "");
    expect(result.success).toBe(true);
    expect(new Date(result.result).toISOString()).toBe(result.result);
  });

  test("should ignore declaration and index files in the directory", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "foreman-extensions-"));
    try {
      fs.writeFileSync(path.join(dir, "types.d.ts"), "export declare const unused: string;\n");
      fs.writeFileSync(
        path.join(dir, "index.js"),
        'module.exports = { register_tools(r) { r.register("index_tool", "never loaded", () => "no"); } };\n'
      );
      fs.writeFileSync(
        path.join(dir, "echo_tool.js"),
        'module.exports = { register_tools(r) { r.register("echo", "Echo the input", (s) => s); } };\n'
      );
      const registry = new ToolRegistry(bus);

      const report = await loadExtensions(registry, dir, bus);

      expect(report).toEqual({ loaded: ["echo_tool.js"], skipped: [], failed: [] });
      expect(registry.list()).toEqual(["echo"]);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  test("should skip a missing directory", async () => {
    const registry = new ToolRegistry(bus);
    const missing = path.join(FIXTURES, "does-not-exist");

    const report = await loadExtensions(registry, missing, bus);

    expect(report).toEqual({ loaded: [], skipped: [], failed: [] });
    expect(bus.getHistory({ type: "ExtensionSkippedEvent" })[0].payload).toEqual({
      dir: missing,
      reason: "directory not found",
    });
  });
});
