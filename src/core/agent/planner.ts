/**
 * Model-driven planner: goal -> ordered steps.
 * createPlan degrades to a single step equal to the goal; refinePlan degrades
 * to the plan it was given.
 */

import { EventBus } from "../eventBus";
import { toError } from "../errors";
import { CompletionClient } from "../models/completionClient";
import { Step } from "../types";
import { buildPlanMessages, buildRefineMessages } from "./prompts";

const NUMBERED_LINE = /^\s*\d+[.)]\s+(.+?)\s*$/;
const MARKER_WORDS = /^(example|format|e\.g\.|\.\.\.)/i;

/**
 * Scaffolding echoed back from the prompt template rather than real steps
 */
function isScaffold(text: string): boolean {
  if (/^step\s*\d*[.:]?$/i.test(text)) return true;
  if (/^<[^>]*>$/.test(text)) return true;
  return MARKER_WORDS.test(text);
}

export function newStep(description: string): Step {
  return { description, status: "pending", subtasks: [] };
}

/**
 * Numbered lines of a completion, minus blanks and scaffolding
 */
export function parseSteps(text: string): Step[] {
  const steps: Step[] = [];
  for (const line of text.split("\n")) {
    const match = NUMBERED_LINE.exec(line);
    if (!match) continue;
    const description = match[1].trim();
    if (!description || isScaffold(description)) continue;
    steps.push(newStep(description));
  }
  return steps;
}

export function isFinished(step: Step): boolean {
  return step.status === "completed" || step.status === "failed";
}

export class Planner {
  constructor(private client: CompletionClient, private eventBus: EventBus) {}

  async createPlan(goal: string, context = ""): Promise<Step[]> {
    try {
      const text = await this.client.complete(buildPlanMessages(goal, context));
      const steps = parseSteps(text);
      if (steps.length === 0) {
        throw new Error("Completion contained no numbered steps");
      }
      this.eventBus.emit("PlanCreatedEvent", {
        goal,
        steps: steps.map((s) => s.description),
      });
      return steps;
    } catch (e) {
      this.eventBus.emit("PlanFallbackEvent", { goal, error: toError(e).message });
      return [newStep(goal)];
    }
  }

  /**
   * Re-plan the unfinished part of `steps`. Finished steps stay in front, in order.
   */
  async refinePlan(steps: Step[], feedback: string): Promise<Step[]> {
    const finished = steps.filter(isFinished);
    const remaining = steps.filter((s) => !isFinished(s));
    if (remaining.length === 0) return steps;

    try {
      const text = await this.client.complete(
        buildRefineMessages(
          remaining.map((s) => s.description),
          feedback
        )
      );
      const refined = parseSteps(text);
      if (refined.length === 0) {
        throw new Error("Completion contained no numbered steps");
      }
      this.eventBus.emit("PlanRefinedEvent", {
        feedback,
        before: remaining.map((s) => s.description),
        after: refined.map((s) => s.description),
      });
      return [...finished, ...refined];
    } catch (e) {
      this.eventBus.emit("PlanFallbackEvent", { feedback, error: toError(e).message, refine: true });
      return steps;
    }
  }
}
