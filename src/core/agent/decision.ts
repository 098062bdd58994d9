/**
 * Tolerant parsing of the model's per-step decision.
 *
 * Stage 1: the whole text, or the largest balanced {...} inside it, as JSON
 *          validated against the wire schema.
 * Stage 2: field-by-field extraction from text that is not valid JSON.
 */

import { z } from "zod";
import { Decision, RESPOND_ACTION } from "../types";

export const INCOMPLETE_RESPONSE_MESSAGE = "I apologize, but I received an incomplete response format.";

export const DecisionWireSchema = z.object({
  thought: z.string(),
  action: z.string().trim().min(1),
  action_input: z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.array(z.unknown()),
    z.record(z.unknown()),
  ]),
});

export type DecisionWire = z.infer<typeof DecisionWireSchema>;

export type DecisionParse =
  | { kind: "parsed"; source: "json" | "extracted"; decision: Decision }
  | { kind: "degraded"; reason: "incomplete" | "unparseable"; decision: Decision };

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function tryParseObject(text: string): Record<string, unknown> | undefined {
  try {
    const value: unknown = JSON.parse(text);
    return isPlainObject(value) ? value : undefined;
  } catch {
    return undefined;
  }
}

/**
 * Top-level balanced {...} spans of `text` (string literals respected)
 */
export function findBraceSpans(text: string): string[] {
  const spans: string[] = [];
  let depth = 0;
  let start = -1;
  let inString = false;
  let escaped = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"' && depth > 0) {
      inString = true;
    } else if (ch === "{") {
      if (depth === 0) start = i;
      depth++;
    } else if (ch === "}" && depth > 0) {
      depth--;
      if (depth === 0) spans.push(text.slice(start, i + 1));
    }
  }
  return spans;
}

/**
 * The whole text as a JSON object, else the longest embedded span that parses as one
 */
export function extractJsonObject(text: string): Record<string, unknown> | undefined {
  const direct = tryParseObject(text.trim());
  if (direct) return direct;

  const candidates = findBraceSpans(text).sort((a, b) => b.length - a.length);
  for (const candidate of candidates) {
    const parsed = tryParseObject(candidate);
    if (parsed) return parsed;
  }
  return undefined;
}

function toDecision(wire: DecisionWire): Decision {
  return {
    thought: wire.thought,
    action: wire.action,
    actionInput: typeof wire.action_input === "string" ? wire.action_input : JSON.stringify(wire.action_input),
  };
}

function extractField(text: string, name: string): string | undefined {
  const match = new RegExp(`"${name}"\\s*:\\s*"((?:[^"\\\\]|\\\\.)*)"`).exec(text);
  if (!match) return undefined;
  try {
    const value: unknown = JSON.parse(`"${match[1]}"`);
    return typeof value === "string" ? value : match[1];
  } catch {
    return match[1];
  }
}

export function parseDecision(text: string): DecisionParse {
  const object = extractJsonObject(text);

  if (object) {
    const result = DecisionWireSchema.safeParse(object);
    if (result.success) {
      return { kind: "parsed", source: "json", decision: toDecision(result.data) };
    }
    return {
      kind: "degraded",
      reason: "incomplete",
      decision: {
        thought: "Incomplete response format",
        action: RESPOND_ACTION,
        actionInput: INCOMPLETE_RESPONSE_MESSAGE,
      },
    };
  }

  const action = extractField(text, "action")?.trim();
  if (action) {
    return {
      kind: "parsed",
      source: "extracted",
      decision: {
        thought: extractField(text, "thought") ?? "",
        action,
        actionInput: extractField(text, "action_input") ?? text,
      },
    };
  }

  return {
    kind: "degraded",
    reason: "unparseable",
    decision: { thought: "Failed to parse response", action: RESPOND_ACTION, actionInput: text },
  };
}
