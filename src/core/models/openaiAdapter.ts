/**
 * OpenAI Completion Adapter
 * Works with any OpenAI-compatible chat completions endpoint (configurable base URL).
 */

import OpenAI from "openai";
import type { ChatCompletionMessageParam } from "openai/resources/chat/completions";
import { ChatMessage, CompletionAdapter, CompletionOptions } from "./adapter";
import { ModelError, RateLimitError } from "../errors/standardErrors";

export interface OpenAIAdapterConfig {
  apiKey: string;
  model?: string;
  baseURL?: string;
}

function toOpenAIMessage(message: ChatMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case "system":
      return { role: "system", content: message.content };
    case "user":
      return { role: "user", content: message.content };
    case "assistant":
      return { role: "assistant", content: message.content };
  }
}

export class OpenAIAdapter implements CompletionAdapter {
  id: string;
  private client: OpenAI;
  private model: string;

  constructor(config: OpenAIAdapterConfig) {
    if (!config.apiKey) {
      throw new Error("OpenAI API key is required");
    }

    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseURL,
      // CompletionClient owns retries
      maxRetries: 0,
    });

    this.model = config.model || "gpt-4o-mini";
    this.id = `openai:${this.model}`;
  }

  async complete(messages: ChatMessage[], options: CompletionOptions, signal?: AbortSignal): Promise<string> {
    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: messages.map(toOpenAIMessage),
          temperature: options.temperature,
          max_tokens: options.maxTokens,
        },
        { signal }
      );

      const choice = response.choices[0];
      if (!choice) {
        throw new ModelError("No response choice from OpenAI", this.id);
      }
      return choice.message.content ?? "";
    } catch (e: unknown) {
      throw this.handleError(e);
    }
  }

  private handleError(error: unknown): Error {
    if (error instanceof OpenAI.RateLimitError) {
      const reset = Number(error.headers?.["retry-after"]);
      return new RateLimitError(error.message, Number.isFinite(reset) ? reset * 1000 : undefined);
    }
    if (error instanceof ModelError) {
      return error;
    }
    if (error instanceof Error) {
      return new ModelError(error.message, this.id, error);
    }
    return new ModelError("Unknown OpenAI error", this.id);
  }
}
