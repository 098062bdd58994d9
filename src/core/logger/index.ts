/**
 * Foreman Logger - Pino-based logging system
 *
 * Features:
 * - Structured JSON logging with Pino
 * - EventBus integration: core components emit events, the logger turns them into lines
 * - Configurable formatting (pretty print, JSON) and optional file output
 * - Request and agent-run tracing
 */

import pino from "pino";
import { EventBus, EventEnvelope, EventType, Listener } from "../eventBus";
import { LoggerConfig, createLoggerConfig } from "./config";
import { createDestination } from "./transports";
import { createFormatter, sanitizeForLogging } from "./formatters";

export interface LoggerContext {
  requestId?: string;
  agentId?: string;
  toolName?: string;
  correlationId?: string;
  [key: string]: unknown;
}

type EventLevel = "debug" | "info" | "warn" | "error";

interface EventMapping {
  event: EventType;
  level: EventLevel;
  message: string;
}

const EVENT_MAPPINGS: readonly EventMapping[] = [
  { event: "AgentStartEvent", level: "info", message: "Agent started" },
  { event: "AgentStepEvent", level: "debug", message: "Agent step executed" },
  { event: "AgentFinishEvent", level: "info", message: "Agent finished" },
  { event: "DecisionDegradedEvent", level: "warn", message: "Model decision could not be parsed" },
  { event: "PlanCreatedEvent", level: "info", message: "Plan created" },
  { event: "PlanFallbackEvent", level: "warn", message: "Planning failed, using single-step plan" },
  { event: "PlanRefinedEvent", level: "debug", message: "Plan refined" },
  { event: "ModelResponseEvent", level: "debug", message: "Model responded" },
  { event: "ModelRetryEvent", level: "warn", message: "Model rate limited, retrying" },
  { event: "ModelErrorEvent", level: "warn", message: "Model error" },
  { event: "ToolRegisteredEvent", level: "debug", message: "Tool registered" },
  { event: "ToolInvocationEvent", level: "debug", message: "Tool invoked" },
  { event: "ToolResultEvent", level: "debug", message: "Tool completed" },
  { event: "ToolErrorEvent", level: "warn", message: "Tool error" },
  { event: "ToolNotFoundEvent", level: "warn", message: "Tool not found" },
  { event: "ExtensionLoadedEvent", level: "info", message: "Tool extension loaded" },
  { event: "ExtensionSkippedEvent", level: "warn", message: "Tool extension skipped" },
  { event: "ExtensionErrorEvent", level: "error", message: "Tool extension failed to load" },
  { event: "MemoryErrorEvent", level: "warn", message: "Memory operation failed" },
  { event: "EventBusErrorEvent", level: "error", message: "Event listener failed" },
];

const SENSITIVE_KEYS = ["password", "token", "key", "secret", "auth"];

/**
 * Pino logger with EventBus integration
 */
export class ForemanLogger {
  private pinoLogger: pino.Logger;
  private eventBus: EventBus;
  private config: LoggerConfig;
  private subscriptions: Array<{ event: EventType; listener: Listener }> = [];

  constructor(eventBus: EventBus, config: Partial<LoggerConfig> = {}, parent?: pino.Logger) {
    this.eventBus = eventBus;
    this.config = createLoggerConfig(config);

    if (parent) {
      // Children share the parent's destination and bus subscriptions
      this.pinoLogger = parent;
      return;
    }

    this.pinoLogger = pino(
      {
        level: this.config.level,
        formatters: createFormatter(this.config),
        serializers: {
          err: pino.stdSerializers.err,
        },
      },
      createDestination(this.config)
    );

    this.setupEventBusIntegration();
  }

  /**
   * Create child logger with context
   */
  child(context: LoggerContext): ForemanLogger {
    return new ForemanLogger(this.eventBus, this.config, this.pinoLogger.child(context));
  }

  debug(message: string, context?: LoggerContext): void {
    this.pinoLogger.debug(context || {}, message);
  }

  info(message: string, context?: LoggerContext): void {
    this.pinoLogger.info(context || {}, message);
  }

  warn(message: string, context?: LoggerContext): void {
    this.pinoLogger.warn(context || {}, message);
  }

  error(message: string | Error, context?: LoggerContext): void {
    const error = message instanceof Error ? message : new Error(message);
    this.pinoLogger.error({ ...context, err: error }, error.message);
  }

  fatal(message: string | Error, context?: LoggerContext): void {
    const error = message instanceof Error ? message : new Error(message);
    this.pinoLogger.fatal({ ...context, err: error }, error.message);
  }

  /**
   * Request tracing
   */
  traceRequest(method: string, url: string, statusCode: number, duration: number, context?: LoggerContext): void {
    const level = statusCode >= 400 ? "warn" : "info";
    this.pinoLogger[level](
      {
        ...context,
        method,
        url,
        statusCode,
        duration,
        type: "request",
      },
      `${method} ${url} ${statusCode} (${duration}ms)`
    );
  }

  /**
   * Flush pending lines (file/async destinations)
   */
  flush(): Promise<void> {
    return new Promise((resolve) => {
      this.pinoLogger.flush(() => resolve());
    });
  }

  /**
   * Stop listening to the EventBus
   */
  detach(): void {
    for (const { event, listener } of this.subscriptions) {
      this.eventBus.off(event, listener);
    }
    this.subscriptions = [];
  }

  private setupEventBusIntegration(): void {
    for (const { event, level, message } of EVENT_MAPPINGS) {
      const listener: Listener = (evt: EventEnvelope) => {
        this.pinoLogger[level](
          {
            event,
            payload: redact(sanitizeForLogging(evt.payload)),
            type: "eventbus",
            correlationId: evt.id,
          },
          message
        );
      };
      this.eventBus.on(event, listener);
      this.subscriptions.push({ event, listener });
    }
  }
}

/**
 * Replace values under secret-looking keys
 */
export function redact(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(redact);
  }
  if (!value || typeof value !== "object") return value;

  const sanitized: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    sanitized[key] = SENSITIVE_KEYS.some((sensitive) => key.toLowerCase().includes(sensitive))
      ? "[REDACTED]"
      : redact(entry);
  }
  return sanitized;
}

/**
 * Global logger instance
 */
let globalLogger: ForemanLogger | null = null;

/**
 * Initialize global logger (replaces and detaches any previous one)
 */
export function initializeLogger(eventBus: EventBus, config: Partial<LoggerConfig> = {}): ForemanLogger {
  globalLogger?.detach();
  globalLogger = new ForemanLogger(eventBus, config);
  return globalLogger;
}

/**
 * Get global logger instance
 */
export function getLogger(): ForemanLogger {
  if (!globalLogger) {
    throw new Error("Logger not initialized. Call initializeLogger() first.");
  }
  return globalLogger;
}

/**
 * Utility functions for common logging patterns
 */
export const logger = {
  debug: (message: string, context?: LoggerContext) => getLogger().debug(message, context),
  info: (message: string, context?: LoggerContext) => getLogger().info(message, context),
  warn: (message: string, context?: LoggerContext) => getLogger().warn(message, context),
  error: (message: string | Error, context?: LoggerContext) => getLogger().error(message, context),
  fatal: (message: string | Error, context?: LoggerContext) => getLogger().fatal(message, context),
};
