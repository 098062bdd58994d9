/**
 * Zod validation schemas for API routes
 */

import { z } from "zod";

// Agent run request - strict validation, no extra fields
export const AgentRunSchema = z
  .object({
    goal: z.string().trim().min(1).max(10000),
    maxSteps: z.number().int().min(1).max(100).optional(),
  })
  .strict();

export type AgentRunRequest = z.infer<typeof AgentRunSchema>;
