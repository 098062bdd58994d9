import fs from "fs";
import os from "os";
import path from "path";
import { CONFIG_FILE_NAME, loadConfigFile, loadSettings } from "../src/core/config/settings";

describe("loadSettings", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "foreman-settings-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  test("should use defaults when nothing is configured", () => {
    const settings = loadSettings({}, dir);

    expect(settings).toMatchObject({
      apiBase: "https://api.openai.com/v1",
      model: "gpt-4o-mini",
      minRequestInterval: 1,
      lastRequestTime: 0,
      maxRetries: 3,
      backoffBaseMs: 1000,
      timeoutMs: 30000,
      temperature: 0.7,
      maxSteps: 5,
      memorySearchLimit: 5,
      memoryCollection: "foreman_memory",
      customToolsPath: path.join(dir, "data", "custom_tools"),
      logLevel: "info",
      logFileEnabled: false,
      port: 4000,
    });
    expect(settings.apiKey).toBeUndefined();
    expect(settings.chromaUrl).toBeUndefined();
  });

  test("should read values from the environment", () => {
    const settings = loadSettings(
      {
        LLM_API_KEY: "test-secret",
        LLM_MAX_STEPS: "8",
        LLM_API_TEMPERATURE: "0.2",
        LLM_API_MIN_REQUEST_INTERVAL: "2.5",
        LOG_FILE_ENABLED: "true",
        CHROMA_URL: "http://localhost:8000",
      },
      dir
    );

    expect(settings).toMatchObject({
      apiKey: "test-secret",
      maxSteps: 8,
      temperature: 0.2,
      minRequestInterval: 2.5,
      logFileEnabled: true,
      chromaUrl: "http://localhost:8000",
    });
  });

  test("should fall back to defaults for invalid values", () => {
    const settings = loadSettings(
      { LLM_MAX_STEPS: "abc", LLM_API_TEMPERATURE: "5", LOG_LEVEL: "loud", LLM_API_KEY: "   " },
      dir
    );

    expect(settings.maxSteps).toBe(5);
    expect(settings.temperature).toBe(0.7);
    expect(settings.logLevel).toBe("info");
    expect(settings.apiKey).toBeUndefined();
  });

  test("should let the environment override the config file", () => {
    fs.writeFileSync(path.join(dir, CONFIG_FILE_NAME), JSON.stringify({ maxSteps: 9, model: "file-model" }));

    const settings = loadSettings({ LLM_API_MODEL: "env-model" }, dir);

    expect(settings.maxSteps).toBe(9);
    expect(settings.model).toBe("env-model");
  });

  test("should ignore empty environment values", () => {
    fs.writeFileSync(path.join(dir, CONFIG_FILE_NAME), JSON.stringify({ model: "file-model" }));

    expect(loadSettings({ LLM_API_MODEL: "" }, dir).model).toBe("file-model");
  });

  test("should ignore a malformed config file", () => {
    fs.writeFileSync(path.join(dir, CONFIG_FILE_NAME), "{ not json");

    expect(loadConfigFile(dir)).toEqual({});
    expect(loadSettings({}, dir).maxSteps).toBe(5);
  });
});
