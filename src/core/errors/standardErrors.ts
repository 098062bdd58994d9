/**
 * Standardized error classes shared by the model, memory and tool layers
 */

export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly details?: Record<string, unknown>,
    public readonly code: string = "validation_error"
  ) {
    super(message);
    this.name = "ValidationError";
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

export class TimeoutError extends Error {
  constructor(
    message: string,
    public readonly timeoutMs?: number,
    public readonly code: string = "timeout_error"
  ) {
    super(message);
    this.name = "TimeoutError";
    Object.setPrototypeOf(this, TimeoutError.prototype);
  }
}

export class ToolExecutionError extends Error {
  constructor(
    message: string,
    public readonly toolName?: string,
    public readonly code: string = "tool_execution_error"
  ) {
    super(message);
    this.name = "ToolExecutionError";
    Object.setPrototypeOf(this, ToolExecutionError.prototype);
  }
}

export class ModelError extends Error {
  constructor(
    message: string,
    public readonly modelName?: string,
    public readonly originalError?: Error,
    public readonly code: string = "model_error"
  ) {
    super(message);
    this.name = "ModelError";
    Object.setPrototypeOf(this, ModelError.prototype);
  }
}

/**
 * Raised by a completion adapter when the remote service rejects a request
 * for exceeding its rate limit. The only retryable model failure.
 */
export class RateLimitError extends Error {
  constructor(
    message: string,
    public readonly resetTime?: number,
    public readonly code: string = "rate_limit_error"
  ) {
    super(message);
    this.name = "RateLimitError";
    Object.setPrototypeOf(this, RateLimitError.prototype);
  }
}

export class RetriesExhaustedError extends Error {
  constructor(
    public readonly maxRetries: number,
    public readonly lastError?: Error,
    public readonly code: string = "retries_exhausted"
  ) {
    super(`Maximum retry attempts (${maxRetries}) reached`);
    this.name = "RetriesExhaustedError";
    Object.setPrototypeOf(this, RetriesExhaustedError.prototype);
  }
}
