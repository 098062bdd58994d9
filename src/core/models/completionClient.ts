/**
 * CompletionClient
 * Throttled, timeout-bounded chat completions with exponential backoff on
 * rate-limit failures. Every other failure is terminal.
 */

import { EventBus } from "../eventBus";
import {
  ModelError,
  RateLimitError,
  RetriesExhaustedError,
  TimeoutError,
  ValidationError,
} from "../errors/standardErrors";
import { Sleep, sleep as defaultSleep, withTimeout } from "../utils/timeout";
import { ChatMessage, CompletionAdapter, CompletionOptions, CompletionRequestSchema } from "./adapter";
import { RequestThrottle } from "./requestThrottle";

export interface CompletionClientConfig {
  maxRetries: number;
  backoffBaseMs: number;
  timeoutMs: number;
  temperature: number;
  maxTokens?: number;
}

export const DEFAULT_COMPLETION_CONFIG: CompletionClientConfig = {
  maxRetries: 3,
  backoffBaseMs: 1000,
  timeoutMs: 30000,
  temperature: 0.7,
};

export class CompletionClient {
  private readonly config: CompletionClientConfig;

  constructor(
    private readonly adapter: CompletionAdapter,
    private readonly throttle: RequestThrottle,
    private readonly eventBus: EventBus,
    config: Partial<CompletionClientConfig> = {},
    private readonly sleep: Sleep = defaultSleep
  ) {
    this.config = { ...DEFAULT_COMPLETION_CONFIG, ...config };
  }

  get modelId(): string {
    return this.adapter.id;
  }

  async complete(messages: ChatMessage[], options: CompletionOptions = {}): Promise<string> {
    const parsed = CompletionRequestSchema.safeParse({ messages, options });
    if (!parsed.success) {
      throw new ValidationError("Invalid completion request", { issues: parsed.error.issues });
    }

    const effective: CompletionOptions = {
      temperature: options.temperature ?? this.config.temperature,
      maxTokens: options.maxTokens ?? this.config.maxTokens,
    };

    let retries = 0;
    for (;;) {
      await this.throttle.acquire();
      const startedAt = Date.now();

      try {
        const text = await withTimeout(
          (signal) => this.adapter.complete(messages, effective, signal),
          this.config.timeoutMs,
          `Completion request to ${this.adapter.id}`
        );

        this.eventBus.emit("ModelResponseEvent", {
          modelId: this.adapter.id,
          retries,
          durationMs: Date.now() - startedAt,
          responseLength: text.length,
        });
        return text;
      } catch (error) {
        if (error instanceof RateLimitError) {
          retries += 1;
          if (retries > this.config.maxRetries) {
            const exhausted = new RetriesExhaustedError(this.config.maxRetries, error);
            this.emitError(exhausted, retries);
            throw exhausted;
          }

          const waitMs = this.config.backoffBaseMs * 2 ** retries;
          this.eventBus.emit("ModelRetryEvent", {
            modelId: this.adapter.id,
            attempt: retries,
            waitMs,
          });
          await this.sleep(waitMs);
          continue;
        }

        const failure = this.normalizeError(error);
        this.emitError(failure, retries);
        throw failure;
      }
    }
  }

  private normalizeError(error: unknown): Error {
    if (error instanceof TimeoutError || error instanceof ModelError) {
      return error;
    }
    if (error instanceof Error) {
      return new ModelError(error.message, this.adapter.id, error);
    }
    return new ModelError("Unknown model error", this.adapter.id);
  }

  private emitError(error: Error, retries: number): void {
    this.eventBus.emit("ModelErrorEvent", {
      modelId: this.adapter.id,
      error: error.message,
      code: "code" in error ? error.code : undefined,
      retries,
    });
  }
}
