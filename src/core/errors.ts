/**
 * Custom error types for Foreman
 */

export class ForemanError extends Error {
  constructor(
    message: string,
    public code: string,
    public statusCode?: number,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "ForemanError";
    Object.setPrototypeOf(this, ForemanError.prototype);
  }
}

export class ExtensionLoadError extends ForemanError {
  constructor(message: string, public file: string, public originalError?: Error) {
    super(
      `Extension load error (${file}): ${message}`,
      "EXTENSION_LOAD_ERROR",
      500,
      { file, originalError: originalError?.message }
    );
    this.name = "ExtensionLoadError";
    Object.setPrototypeOf(this, ExtensionLoadError.prototype);
  }
}

export class MemoryError extends ForemanError {
  constructor(message: string, public operation: string, public originalError?: Error) {
    super(
      `Memory error (${operation}): ${message}`,
      "MEMORY_ERROR",
      500,
      { operation, originalError: originalError?.message }
    );
    this.name = "MemoryError";
    Object.setPrototypeOf(this, MemoryError.prototype);
  }
}

// Re-export standardized errors for convenience
export {
  ValidationError,
  TimeoutError,
  ModelError,
  RateLimitError,
  RetriesExhaustedError,
  ToolExecutionError,
} from "./errors/standardErrors";

/**
 * Normalise anything thrown into an Error instance
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
