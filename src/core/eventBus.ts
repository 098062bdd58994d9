/**
 * Minimal typed Event Bus with append-only history
 * - emits events in-process (sync)
 * - writes history entries in-memory
 */

import { ulid } from "ulid";

export type EventType =
  | "AgentStartEvent"
  | "AgentStepEvent"
  | "AgentFinishEvent"
  | "DecisionDegradedEvent"
  | "PlanCreatedEvent"
  | "PlanFallbackEvent"
  | "PlanRefinedEvent"
  | "ModelResponseEvent"
  | "ModelRetryEvent"
  | "ModelErrorEvent"
  | "ToolRegisteredEvent"
  | "ToolInvocationEvent"
  | "ToolResultEvent"
  | "ToolErrorEvent"
  | "ToolNotFoundEvent"
  | "ExtensionLoadedEvent"
  | "ExtensionSkippedEvent"
  | "ExtensionErrorEvent"
  | "MemoryErrorEvent"
  | "EventBusErrorEvent";

export interface EventEnvelope<T = unknown> {
  id: string;
  type: EventType;
  timestamp: number;
  payload: T;
  meta?: Record<string, unknown>;
}

export type Listener = (evt: EventEnvelope) => void;

export interface EventBusConfig {
  maxHistorySize?: number; // Maximum number of events in memory
  historyRetentionPolicy?: "truncate" | "circular"; // How to handle overflow
}

export class EventBus {
  private listeners: Map<EventType | "any", Set<Listener>> = new Map();
  public history: EventEnvelope[] = [];
  private config: Required<EventBusConfig>;

  constructor(config: EventBusConfig = {}) {
    this.config = {
      maxHistorySize: config.maxHistorySize ?? 10000,
      historyRetentionPolicy: config.historyRetentionPolicy ?? "truncate",
    };
  }

  on(type: EventType | "any", listener: Listener) {
    let set = this.listeners.get(type);
    if (!set) {
      set = new Set();
      this.listeners.set(type, set);
    }
    set.add(listener);
  }

  off(type: EventType | "any", listener: Listener) {
    this.listeners.get(type)?.delete(listener);
  }

  emit<T>(type: EventType, payload: T, meta?: Record<string, unknown>): EventEnvelope<T> {
    const envelope: EventEnvelope<T> = {
      id: ulid(),
      type,
      timestamp: Date.now(),
      payload,
      meta,
    };

    this.history.push(envelope);

    if (this.history.length > this.config.maxHistorySize) {
      if (this.config.historyRetentionPolicy === "truncate") {
        const excess = this.history.length - this.config.maxHistorySize;
        this.history.splice(0, excess);
      } else {
        this.history.shift();
      }
    }

    const typed = this.listeners.get(type);
    if (typed) {
      for (const l of typed) {
        try {
          l(envelope);
        } catch (e) {
          this.reportListenerError(type, l, e);
        }
      }
    }

    const any = this.listeners.get("any");
    if (any) {
      for (const l of any) {
        try {
          l(envelope);
        } catch (e) {
          console.error(`[EventBus] Listener error (any):`, e);
        }
      }
    }

    return envelope;
  }

  /**
   * Get history with optional filtering
   */
  getHistory(options?: { since?: number; limit?: number; type?: EventType }): EventEnvelope[] {
    let filtered = this.history;
    const since = options?.since;

    if (since !== undefined) {
      filtered = filtered.filter((e) => e.timestamp >= since);
    }

    if (options?.type) {
      filtered = filtered.filter((e) => e.type === options.type);
    }

    if (options?.limit) {
      filtered = filtered.slice(-options.limit);
    }

    return filtered;
  }

  private reportListenerError(type: EventType, listener: Listener, error: unknown) {
    console.error(`[EventBus] Listener error for ${type}:`, error);
    // A failing EventBusErrorEvent listener must not recurse
    if (type === "EventBusErrorEvent") return;
    this.emit("EventBusErrorEvent", {
      type,
      error: error instanceof Error ? error.message : String(error),
      listener: listener.name || "anonymous",
    });
  }
}
