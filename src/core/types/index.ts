/**
 * Core type definitions for Foreman
 */

/**
 * Tool invocation: one string in, a string (or promise of one) out, or throw
 */
export type ToolInvoke = (input: string) => string | Promise<string>;

export interface Tool {
  name: string;
  description: string;
  invoke: ToolInvoke;
}

/**
 * Uniform dispatch shape
 */
export interface ToolResult {
  success: boolean;
  result: string;
}

export type StepStatus = "pending" | "in_progress" | "completed" | "failed";

export interface Step {
  description: string;
  status: StepStatus;
  subtasks: Record<string, unknown>[];
}

/**
 * Per-step output of thinking. `action` is a tool name or "respond".
 */
export interface Decision {
  thought: string;
  action: string;
  actionInput: string;
}

export const RESPOND_ACTION = "respond";

export type MemoryMetadataValue = string | number | boolean;
export type MemoryMetadata = Record<string, MemoryMetadataValue>;

export interface MemoryRecord {
  id: string;
  text: string;
  metadata: MemoryMetadata;
}
