/**
 * Runtime settings.
 * Precedence (lowest first): defaults, foreman.config.json in cwd, environment.
 * Invalid values fall back to their defaults.
 */

import fs from "fs";
import path from "path";
import { z } from "zod";

export const CONFIG_FILE_NAME = "foreman.config.json";

const bool = (fallback: boolean) =>
  z
    .union([z.boolean(), z.enum(["true", "false", "1", "0"]).transform((v) => v === "true" || v === "1")])
    .catch(fallback);

const optionalString = z.string().trim().min(1).optional().catch(undefined);

function createSettingsSchema(cwd: string) {
  return z.object({
    apiKey: optionalString,
    apiBase: z.string().url().catch("https://api.openai.com/v1"),
    model: z.string().min(1).catch("gpt-4o-mini"),
    /** Seconds between outbound completion attempts */
    minRequestInterval: z.coerce.number().min(0).catch(1.0),
    /** Epoch seconds of the last request made before start-up */
    lastRequestTime: z.coerce.number().min(0).catch(0),
    maxRetries: z.coerce.number().int().min(0).catch(3),
    backoffBaseMs: z.coerce.number().min(0).catch(1000),
    timeoutMs: z.coerce.number().int().positive().catch(30000),
    temperature: z.coerce.number().min(0).max(2).catch(0.7),
    maxSteps: z.coerce.number().int().positive().catch(5),
    memorySearchLimit: z.coerce.number().int().min(0).catch(5),
    memoryCollection: z.string().min(1).catch("foreman_memory"),
    memoryTimeoutMs: z.coerce.number().int().positive().catch(10000),
    chromaUrl: optionalString,
    embeddingModel: z.string().min(1).catch("text-embedding-3-small"),
    customToolsPath: z.string().min(1).catch(path.join(cwd, "data", "custom_tools")),
    logLevel: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).catch("info"),
    logFormat: z.enum(["json", "pretty"]).catch("pretty"),
    logFileEnabled: bool(false),
    logFilePath: z.string().min(1).catch("./logs/foreman.log"),
    port: z.coerce.number().int().min(0).max(65535).catch(4000),
  });
}

export type Settings = z.infer<ReturnType<typeof createSettingsSchema>>;
type SettingKey = keyof Settings;

export const ENV_KEYS: Record<string, SettingKey> = {
  LLM_API_KEY: "apiKey",
  LLM_API_BASE: "apiBase",
  LLM_API_MODEL: "model",
  LLM_API_MIN_REQUEST_INTERVAL: "minRequestInterval",
  LLM_API_LAST_REQUEST_TIME: "lastRequestTime",
  LLM_API_MAX_RETRIES: "maxRetries",
  LLM_API_BACKOFF_BASE_MS: "backoffBaseMs",
  LLM_API_TIMEOUT_MS: "timeoutMs",
  LLM_API_TEMPERATURE: "temperature",
  LLM_MAX_STEPS: "maxSteps",
  MEMORY_SEARCH_LIMIT: "memorySearchLimit",
  MEMORY_COLLECTION: "memoryCollection",
  MEMORY_TIMEOUT_MS: "memoryTimeoutMs",
  CHROMA_URL: "chromaUrl",
  EMBEDDING_MODEL: "embeddingModel",
  CUSTOM_TOOLS_PATH: "customToolsPath",
  LOG_LEVEL: "logLevel",
  LOG_FORMAT: "logFormat",
  LOG_FILE_ENABLED: "logFileEnabled",
  LOG_FILE_PATH: "logFilePath",
  PORT: "port",
};

/**
 * Read foreman.config.json from `cwd`; missing or malformed files yield {}
 */
export function loadConfigFile(cwd: string = process.cwd()): Record<string, unknown> {
  const p = path.join(cwd, CONFIG_FILE_NAME);
  if (!fs.existsSync(p)) return {};
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(p, "utf8"));
    return typeof parsed === "object" && parsed !== null && !Array.isArray(parsed)
      ? Object.fromEntries(Object.entries(parsed))
      : {};
  } catch {
    return {};
  }
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): Settings {
  const raw: Record<string, unknown> = { ...loadConfigFile(cwd) };

  for (const [envKey, setting] of Object.entries(ENV_KEYS)) {
    const value = env[envKey];
    if (value !== undefined && value !== "") {
      raw[setting] = value;
    }
  }

  return createSettingsSchema(cwd).parse(raw);
}
