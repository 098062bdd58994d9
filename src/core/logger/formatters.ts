/**
 * Logger Formatters
 * Custom Pino formatters for structured logging
 */

import type pino from "pino";
import { LoggerConfig } from "./config";

/**
 * Create Pino formatters based on configuration
 */
export function createFormatter(config: LoggerConfig): NonNullable<pino.LoggerOptions["formatters"]> {
  return {
    level: (label: string) => {
      return { level: label };
    },

    log: (obj: Record<string, unknown>) => {
      if (config.source) {
        obj.source = config.source;
      }

      // Correlate request-scoped lines
      if (!obj.correlationId && obj.requestId) {
        obj.correlationId = obj.requestId;
      }

      return obj;
    },
  };
}

/**
 * Format duration for display
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  } else if (ms < 60000) {
    return `${(ms / 1000).toFixed(2)}s`;
  } else {
    const minutes = Math.floor(ms / 60000);
    const seconds = ((ms % 60000) / 1000).toFixed(2);
    return `${minutes}m ${seconds}s`;
  }
}

/**
 * Sanitize a value for logging (bounded depth, no functions, truncated collections)
 */
export function sanitizeForLogging(value: unknown, maxDepth = 5, currentDepth = 0): unknown {
  if (currentDepth >= maxDepth) {
    return "[Max Depth Reached]";
  }

  if (value === null || value === undefined) {
    return value;
  }

  if (typeof value === "function") {
    return "[Function]";
  }

  if (typeof value === "symbol") {
    return value.toString();
  }

  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }

  if (typeof value !== "object") {
    return value;
  }

  if (Array.isArray(value)) {
    if (value.length > 100) {
      return `[Array(${value.length})]`;
    }
    return value.map((item) => sanitizeForLogging(item, maxDepth, currentDepth + 1));
  }

  const sanitized: Record<string, unknown> = {};
  const entries = Object.entries(value);
  const maxKeys = 50;

  for (const [key, entry] of entries.slice(0, maxKeys)) {
    sanitized[key] = sanitizeForLogging(entry, maxDepth, currentDepth + 1);
  }

  if (entries.length > maxKeys) {
    sanitized["..."] = `${entries.length - maxKeys} more keys`;
  }

  return sanitized;
}
