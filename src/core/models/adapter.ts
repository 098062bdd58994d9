/**
 * Completion adapter API
 * A single remote chat-completion attempt: messages in, text out.
 * Retries, throttling and timeouts live in CompletionClient, not here.
 */

import { z } from "zod";

export type ChatRole = "system" | "user" | "assistant";

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface CompletionOptions {
  temperature?: number;
  maxTokens?: number;
}

/**
 * Adapter contract. Implementations throw RateLimitError when the remote
 * service rejects a request for rate reasons, and any other error otherwise.
 */
export interface CompletionAdapter {
  id: string;
  complete(messages: ChatMessage[], options: CompletionOptions, signal?: AbortSignal): Promise<string>;
}

export const ChatMessageSchema = z.object({
  role: z.enum(["system", "user", "assistant"]),
  content: z.string(),
});

export const CompletionRequestSchema = z.object({
  messages: z.array(ChatMessageSchema).min(1),
  options: z
    .object({
      temperature: z.number().min(0).max(2).optional(),
      maxTokens: z.number().int().positive().optional(),
    })
    .strict()
    .optional(),
});

export type CompletionRequest = z.infer<typeof CompletionRequestSchema>;
