/**
 * Logger Configuration
 * Defines configuration schema and validation for the Foreman logger
 */

import type pino from "pino";

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";
export type LogFormat = "json" | "pretty";

export interface FileTransportConfig {
  enabled: boolean;
  path: string;
}

export interface LoggerConfig {
  level: LogLevel;
  format: LogFormat;
  file?: FileTransportConfig;
  source?: string;
  /** Console target; CLIs keep stdout for command output */
  stream?: "stdout" | "stderr";
  /** Write to this stream instead of stdout/file (tests, embedding hosts) */
  destination?: pino.DestinationStream;
}

/**
 * Default logger configuration
 */
const DEFAULT_CONFIG: LoggerConfig = {
  level: "info",
  format: "pretty",
  file: {
    enabled: false,
    path: "./logs/foreman.log",
  },
};

/**
 * Create logger configuration with defaults
 */
export function createLoggerConfig(config: Partial<LoggerConfig> = {}): LoggerConfig {
  return {
    ...DEFAULT_CONFIG,
    ...config,
    file: config.file ? { ...DEFAULT_CONFIG.file, ...config.file } : DEFAULT_CONFIG.file,
  };
}

const LOG_LEVELS: readonly LogLevel[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

export function isValidLogLevel(level: string): level is LogLevel {
  return LOG_LEVELS.some((l) => l === level);
}

/**
 * Parse log level from environment
 */
export function parseLogLevel(level: string | undefined): LogLevel {
  if (!level) return DEFAULT_CONFIG.level;
  if (isValidLogLevel(level)) return level;
  console.warn(`Invalid log level "${level}", using default "${DEFAULT_CONFIG.level}"`);
  return DEFAULT_CONFIG.level;
}

/**
 * Parse log format from environment
 */
export function parseLogFormat(format: string | undefined): LogFormat {
  if (!format) return DEFAULT_CONFIG.format;
  if (format === "json" || format === "pretty") return format;
  console.warn(`Invalid log format "${format}", using default "${DEFAULT_CONFIG.format}"`);
  return DEFAULT_CONFIG.format;
}
