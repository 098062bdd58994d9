/**
 * AgentCore: Planning -> Stepping -> Responding -> Done
 *  - one think/execute pair per iteration, bounded by maxSteps
 *  - step-safe finally increment
 *  - plan step status drives the cursor
 *  - memory failures are reported, never fatal
 *  - runs on one instance are queued, never interleaved
 */

import { ulid } from "ulid";
import { EventBus } from "../eventBus";
import { toError } from "../errors";
import { CompletionClient } from "../models/completionClient";
import { MemoryStore } from "../memory/memoryStore";
import { ToolRegistry } from "../tool-engine";
import { Decision, MemoryMetadata, RESPOND_ACTION, Step } from "../types";
import { parseDecision } from "./decision";
import { Planner, isFinished } from "./planner";
import { EXPLAIN_TEMPERATURE, buildExplainMessages, buildThinkMessages } from "./prompts";

export const ERROR_RESPONSE_MESSAGE = "I apologize, but an error occurred while processing your request.";
export const MAX_STEPS_MESSAGE =
  "I apologize, but I reached the maximum number of steps without finding a solution.";
export const EMPTY_RESPONSE_MESSAGE = "I apologize, but I could not produce an answer.";

export function toolNotFoundMessage(name: string): string {
  return `I apologize, but I couldn't find the tool: ${name}`;
}

export interface AgentConfig {
  id?: string;
  maxSteps?: number;
  memorySearchLimit?: number;
}

export interface AgentDependencies {
  client: CompletionClient;
  registry: ToolRegistry;
  memory: MemoryStore;
  planner: Planner;
  eventBus: EventBus;
}

interface ActionOutcome {
  output: string;
  failed: boolean;
}

export class AgentCore {
  readonly id: string;
  private client: CompletionClient;
  private registry: ToolRegistry;
  private memory: MemoryStore;
  private planner: Planner;
  private eventBus: EventBus;
  private plan: Step[] = [];
  private runQueue: Promise<unknown> = Promise.resolve();
  private cfg: Required<Omit<AgentConfig, "id">>;

  constructor(deps: AgentDependencies, cfg: AgentConfig = {}) {
    this.client = deps.client;
    this.registry = deps.registry;
    this.memory = deps.memory;
    this.planner = deps.planner;
    this.eventBus = deps.eventBus;
    this.id = cfg.id ?? ulid();
    this.cfg = {
      maxSteps: cfg.maxSteps ?? 5,
      memorySearchLimit: cfg.memorySearchLimit ?? 5,
    };
  }

  /**
   * Steps of the current (or last) run
   */
  get currentPlan(): Step[] {
    return this.plan.map((s) => ({ ...s }));
  }

  /**
   * Decide the next action for `step`. Never throws: failures degrade to a respond decision.
   */
  async think(step: Step, lastResult?: string, goal?: string): Promise<Decision> {
    try {
      if (lastResult !== undefined) {
        const explanation = await this.client.complete(
          buildExplainMessages(goal ?? step.description, lastResult),
          { temperature: EXPLAIN_TEMPERATURE }
        );
        return {
          thought: "We have the result, now let's explain it clearly.",
          action: RESPOND_ACTION,
          actionInput: explanation.trim() || lastResult,
        };
      }

      const memories = await this.recall(step.description);
      const text = await this.client.complete(
        buildThinkMessages({
          goal: goal ?? step.description,
          step: step.description,
          memories,
          tools: this.registry.descriptions(),
        })
      );

      const parsed = parseDecision(text);
      if (parsed.kind === "degraded") {
        this.eventBus.emit("DecisionDegradedEvent", {
          agentId: this.id,
          reason: parsed.reason,
          response: text,
        });
      }
      return parsed.decision;
    } catch (e) {
      const message = toError(e).message;
      this.eventBus.emit("DecisionDegradedEvent", { agentId: this.id, reason: "error", error: message });
      return {
        thought: `Error occurred: ${message}`,
        action: RESPOND_ACTION,
        actionInput: ERROR_RESPONSE_MESSAGE,
      };
    }
  }

  async execute(decision: Decision): Promise<string> {
    const outcome = await this.perform(decision);
    return outcome.output;
  }

  /**
   * Run a goal to completion. A call made while another run is in flight waits for it:
   * each run clears memory and owns the plan.
   */
  run(goal: string, maxSteps?: number): Promise<string> {
    const turn = this.runQueue.then(() => this.runOnce(goal, maxSteps));
    this.runQueue = turn.catch(() => undefined);
    return turn;
  }

  private async runOnce(goal: string, maxSteps?: number): Promise<string> {
    const limit = maxSteps ?? this.cfg.maxSteps;
    const start = Date.now();
    let stepCount = 0;
    let finalResponse = "";
    let responded = false;
    let lastResult: string | undefined;
    let augmentedGoal = goal;

    this.eventBus.emit("AgentStartEvent", {
      agentId: this.id,
      goal,
      maxSteps: limit,
      tools: this.registry.list(),
    });

    try {
      await this.remember("clear", () => this.memory.clear());
      await this.remember("add", () => this.memory.add(goal, { type: "user_input" }));

      this.plan = await this.planner.createPlan(goal);

      while (stepCount < limit) {
        const index = this.plan.findIndex((s) => !isFinished(s));
        if (index === -1) break;
        const step = this.plan[index];
        step.status = "in_progress";

        try {
          const decision = await this.think(step, lastResult, augmentedGoal);
          const outcome = await this.perform(decision);

          await this.remember("add", () =>
            this.memory.add(
              [
                `Step: ${step.description}`,
                `Thought: ${decision.thought}`,
                `Action: ${decision.action}`,
                `Result: ${outcome.output}`,
              ].join("\n"),
              this.traceMetadata(stepCount)
            )
          );

          this.eventBus.emit("AgentStepEvent", {
            agentId: this.id,
            step: stepCount,
            description: step.description,
            action: decision.action,
            failed: outcome.failed,
          });

          if (decision.action === RESPOND_ACTION) {
            step.status = "completed";
            finalResponse = outcome.output.trim() || EMPTY_RESPONSE_MESSAGE;
            responded = true;
            break;
          }

          lastResult = outcome.output;
          augmentedGoal = `${augmentedGoal}\nIntermediate result: ${outcome.output}`;

          // The last unfinished step stays current until a response is produced
          const hasNext = this.plan.slice(index + 1).some((s) => !isFinished(s));
          if (hasNext) {
            step.status = outcome.failed ? "failed" : "completed";
          }
        } finally {
          stepCount += 1;
        }
      }
    } finally {
      this.eventBus.emit("AgentFinishEvent", {
        agentId: this.id,
        steps: stepCount,
        durationMs: Date.now() - start,
        completed: responded,
      });
    }

    return responded ? finalResponse : MAX_STEPS_MESSAGE;
  }

  private async perform(decision: Decision): Promise<ActionOutcome> {
    if (decision.action === RESPOND_ACTION) {
      return { output: decision.actionInput, failed: false };
    }

    const tool = this.registry.get(decision.action);
    if (!tool) {
      this.eventBus.emit("ToolNotFoundEvent", { agentId: this.id, name: decision.action });
      return { output: toolNotFoundMessage(decision.action), failed: true };
    }

    const result = await this.registry.dispatch(tool, decision.actionInput);
    return { output: result.result, failed: !result.success };
  }

  private async recall(query: string): Promise<string[]> {
    try {
      return await this.memory.search(query, this.cfg.memorySearchLimit);
    } catch (e) {
      this.reportMemoryError("search", e);
      return [];
    }
  }

  private async remember(operation: string, fn: () => Promise<unknown>): Promise<void> {
    try {
      await fn();
    } catch (e) {
      this.reportMemoryError(operation, e);
    }
  }

  private reportMemoryError(operation: string, e: unknown): void {
    this.eventBus.emit("MemoryErrorEvent", {
      agentId: this.id,
      operation,
      error: toError(e).message,
    });
  }

  private traceMetadata(step: number): MemoryMetadata {
    return { type: "agent_action", agentId: this.id, step };
  }
}
