/**
 * Mock completion adapter for local dev without an API key.
 * Recognises the agent's own prompts and answers with deterministic heuristics.
 */
import { ChatMessage, CompletionAdapter, CompletionOptions } from "./adapter";
import {
  EXPLAIN_SYSTEM_PROMPT,
  PLANNER_SYSTEM_PROMPT,
  REFINE_SYSTEM_PROMPT,
  THINK_SYSTEM_PROMPT,
} from "../agent/prompts";

const ARITHMETIC = /\(?-?\d+(?:\.\d+)?(?:\s*[-+*/%]\s*\(?-?\d+(?:\.\d+)?\)?)+/;

function field(prompt: string, label: string): string {
  const line = prompt.split("\n").find((l) => l.startsWith(`${label}:`));
  return line ? line.slice(label.length + 1).trim() : "";
}

export class MockAdapter implements CompletionAdapter {
  id: string = "mock-adapter";

  async complete(messages: ChatMessage[], _options: CompletionOptions): Promise<string> {
    const system = messages.find((m) => m.role === "system")?.content ?? "";
    const prompt = messages.filter((m) => m.role === "user").map((m) => m.content).join("\n");

    switch (system) {
      case PLANNER_SYSTEM_PROMPT:
        return `1. ${field(prompt, "Goal")}`;
      case REFINE_SYSTEM_PROMPT:
        return prompt
          .split("\n")
          .filter((l) => /^\d+\.\s/.test(l))
          .join("\n");
      case THINK_SYSTEM_PROMPT:
        return this.decide(field(prompt, "Current step"));
      case EXPLAIN_SYSTEM_PROMPT:
        return `The result is ${field(prompt, "Result")}. It answers: ${field(prompt, "Original question")}`;
      default:
        return "Mock response: no matching prompt.";
    }
  }

  private decide(step: string): string {
    const expression = step.match(ARITHMETIC)?.[0];
    if (expression) {
      return JSON.stringify({
        thought: "The step contains an arithmetic expression; use the calculator.",
        action: "calculator",
        action_input: expression.trim(),
      });
    }
    return JSON.stringify({
      thought: "No tool is needed for this step.",
      action: "respond",
      action_input: `Mock response: ${step}`,
    });
  }
}
