import { ChatMessage } from "../models/adapter";

export const PLANNER_SYSTEM_PROMPT =
  "You are a task planning expert, skilled at breaking down complex goals into executable steps.";
export const REFINE_SYSTEM_PROMPT = "You are a task planning expert, skilled at optimizing execution plans.";
export const THINK_SYSTEM_PROMPT =
  "You are an intelligent AI assistant. Analyze the situation and determine the best course of action.";
export const EXPLAIN_SYSTEM_PROMPT = "You are a helpful assistant that explains results clearly and simply.";

export const EXPLAIN_TEMPERATURE = 0.7;

/** Rough budget for recalled memories inside a single prompt */
const MEMORY_TOKEN_BUDGET = 1500;

export function promptTokenEstimate(str: string): number {
  return Math.ceil(str.length / 4);
}

/**
 * Keep the trailing lines of `text` that fit within `maxTokens`.
 */
export function ensurePromptLimit(text: string, maxTokens = 4000): string {
  const tokens = promptTokenEstimate(text);
  if (tokens <= maxTokens) return text;
  const parts = text.split("\n");
  let acc = "";
  for (let i = parts.length - 1; i >= 0; i--) {
    const next = acc ? parts[i] + "\n" + acc : parts[i];
    if (promptTokenEstimate(next) > maxTokens) break;
    acc = next;
  }
  return acc;
}

export function buildPlanMessages(goal: string, context: string): ChatMessage[] {
  const prompt = [
    `Goal: ${goal}`,
    `Context: ${context || "None"}`,
    "",
    "Break this goal down into the smallest number of concrete, executable steps.",
    "Each step should be clear and actionable. Reply with a numbered list only:",
    "1. <first step>",
    "2. <second step>",
  ].join("\n");

  return [
    { role: "system", content: PLANNER_SYSTEM_PROMPT },
    { role: "user", content: prompt },
  ];
}

export function buildRefineMessages(steps: string[], feedback: string): ChatMessage[] {
  const prompt = [
    "Current Plan:",
    ...steps.map((s, i) => `${i + 1}. ${s}`),
    "",
    "Feedback:",
    feedback,
    "",
    "Optimize the remaining plan based on the feedback. Reply with a numbered list only.",
  ].join("\n");

  return [
    { role: "system", content: REFINE_SYSTEM_PROMPT },
    { role: "user", content: prompt },
  ];
}

export interface ThinkPromptInput {
  goal: string;
  step: string;
  memories: string[];
  tools: string;
}

export function buildThinkMessages(input: ThinkPromptInput): ChatMessage[] {
  const memories = ensurePromptLimit(input.memories.join("\n"), MEMORY_TOKEN_BUDGET);

  const prompt = [
    `Goal: ${input.goal}`,
    `Current step: ${input.step}`,
    "",
    "Relevant Memories:",
    memories || "None",
    "",
    "Available Tools:",
    input.tools || "None",
    "",
    "Analyze the situation and decide the next action. Response must be in JSON format:",
    `{"thought": "your reasoning", "action": "tool_name or 'respond'", "action_input": "input for tool or response"}`,
  ].join("\n");

  return [
    { role: "system", content: THINK_SYSTEM_PROMPT },
    { role: "user", content: prompt },
  ];
}

export function buildExplainMessages(question: string, result: string): ChatMessage[] {
  const prompt = [
    `Original question: ${question}`,
    `Result: ${result}`,
    "",
    "Please provide a clear and simple explanation of this result.",
    "Focus on making it easy to understand.",
  ].join("\n");

  return [
    { role: "system", content: EXPLAIN_SYSTEM_PROMPT },
    { role: "user", content: prompt },
  ];
}
