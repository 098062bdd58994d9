import path from "path";
import { createForeman } from "../src/bootstrap";
import {
  AgentConfig,
  AgentCore,
  EMPTY_RESPONSE_MESSAGE,
  ERROR_RESPONSE_MESSAGE,
  MAX_STEPS_MESSAGE,
} from "../src/core/agent/agentCore";
import { INCOMPLETE_RESPONSE_MESSAGE } from "../src/core/agent/decision";
import { Planner } from "../src/core/agent/planner";
import { loadSettings } from "../src/core/config/settings";
import { EventBus } from "../src/core/eventBus";
import { InMemorySimilarityIndex } from "../src/core/memory/inMemoryIndex";
import { MemoryStore } from "../src/core/memory/memoryStore";
import { SimilarityIndex } from "../src/core/memory/similarityIndex";
import { ToolRegistry } from "../src/core/tool-engine";
import { registerBuiltinTools } from "../src/core/tools/builtinTools";
import { ScriptedAdapter, ScriptedReply, createTestClient, decisionJson, delayed } from "./helpers/scriptedAdapter";

const NO_CONFIG_DIR = path.join(__dirname, "fixtures", "no-config");

function build(replies: ScriptedReply[], cfg: AgentConfig = {}, index: SimilarityIndex = new InMemorySimilarityIndex()) {
  const eventBus = new EventBus();
  const adapter = new ScriptedAdapter(replies);
  const client = createTestClient(adapter, eventBus);
  const registry = new ToolRegistry(eventBus);
  registerBuiltinTools(registry);
  const memory = new MemoryStore(index);
  const planner = new Planner(client, eventBus);
  const agent = new AgentCore({ client, registry, memory, planner, eventBus }, { id: "test-agent", ...cfg });
  return { agent, adapter, eventBus, memory };
}

describe("AgentCore.run", () => {
  test("should calculate and explain with the offline adapter", async () => {
    const eventBus = new EventBus();
    const settings = loadSettings({ LLM_API_MIN_REQUEST_INTERVAL: "0" }, NO_CONFIG_DIR);
    const { agent } = await createForeman(settings, eventBus);

    const response = await agent.run("Calculate 123*456 and explain the result");

    expect(response).toBe("The result is 56088. It answers: Calculate 123*456 and explain the result");
    expect(eventBus.getHistory({ type: "ToolResultEvent" })[0].payload).toMatchObject({
      name: "calculator",
      result: "56088",
    });
    expect(eventBus.getHistory({ type: "AgentFinishEvent" })[0].payload).toMatchObject({
      agentId: "default-agent",
      steps: 2,
      completed: true,
    });
  });

  test("should respond directly when no tool is needed", async () => {
    const { agent, eventBus } = build(["1. Say hello", decisionJson("respond", "Hello there", "simple")]);

    await expect(agent.run("Greet")).resolves.toBe("Hello there");
    expect(agent.currentPlan).toEqual([{ description: "Say hello", status: "completed", subtasks: [] }]);
    expect(eventBus.getHistory({ type: "AgentFinishEvent" })[0].payload).toMatchObject({ steps: 1, completed: true });
  });

  test("should explain a tool result at the explain temperature", async () => {
    const { agent, adapter } = build(["1. Multiply", decisionJson("calculator", "6*7"), "The answer is 42."]);

    await expect(agent.run("What is 6*7?")).resolves.toBe("The answer is 42.");

    const explain = adapter.calls[2];
    expect(explain.options.temperature).toBe(0.7);
    expect(explain.messages[1].content).toContain("Original question: What is 6*7?\nIntermediate result: 42\nResult: 42");
  });

  test("should fall back to the tool result when the explanation is blank", async () => {
    const { agent } = build(["1. Multiply", decisionJson("calculator", "6*7"), "   "]);

    await expect(agent.run("What is 6*7?")).resolves.toBe("42");
  });

  test("should report an unknown tool and carry on", async () => {
    const { agent, adapter, eventBus } = build([
      "1. Do it",
      decisionJson("teleport", "mars"),
      "That tool does not exist.",
    ]);

    await expect(agent.run("Go to mars")).resolves.toBe("That tool does not exist.");
    expect(adapter.calls[2].messages[1].content).toContain(
      "Result: I apologize, but I couldn't find the tool: teleport"
    );
    expect(eventBus.getHistory({ type: "ToolNotFoundEvent" })[0].payload).toEqual({
      agentId: "test-agent",
      name: "teleport",
    });
  });

  test("should finish with a fallback answer when the response is blank", async () => {
    const { agent, adapter, eventBus } = build(["1. Answer", decisionJson("respond", "  ")]);

    await expect(agent.run("Say nothing")).resolves.toBe(EMPTY_RESPONSE_MESSAGE);
    expect(adapter.calls).toHaveLength(2);
    expect(eventBus.getHistory({ type: "AgentFinishEvent" })[0].payload).toMatchObject({ steps: 1, completed: true });
  });

  test("should queue overlapping runs instead of interleaving them", async () => {
    const { agent, adapter, eventBus } = build([
      delayed("1. Answer alpha"),
      delayed(decisionJson("respond", "done alpha")),
      delayed("1. Answer beta"),
      delayed(decisionJson("respond", "done beta")),
    ]);

    const responses = await Promise.all([agent.run("alpha"), agent.run("beta")]);

    expect(responses).toEqual(["done alpha", "done beta"]);
    const prompt = (i: number) => adapter.calls[i].messages.map((m) => m.content).join("\n");
    expect(prompt(1)).toContain("alpha");
    expect(prompt(1)).not.toMatch(/beta/);
    expect(prompt(3)).toContain("beta");
    expect(prompt(3)).not.toMatch(/alpha/);
    expect(
      eventBus
        .getHistory()
        .map((e) => e.type)
        .filter((type) => type === "AgentStartEvent" || type === "AgentFinishEvent")
    ).toEqual(["AgentStartEvent", "AgentFinishEvent", "AgentStartEvent", "AgentFinishEvent"]);
    expect(eventBus.getHistory({ type: "AgentStartEvent" }).map((e) => e.payload)).toEqual([
      expect.objectContaining({ goal: "alpha" }),
      expect.objectContaining({ goal: "beta" }),
    ]);
  });

  test("should stop at the step limit", async () => {
    const { agent, adapter } = build(["1. Compute", decisionJson("calculator", "1+1")], { maxSteps: 1 });

    await expect(agent.run("Add one and one")).resolves.toBe(MAX_STEPS_MESSAGE);
    expect(adapter.calls).toHaveLength(2);
    expect(agent.currentPlan[0].status).toBe("in_progress");
  });

  test("should let the caller override the step limit", async () => {
    const { agent, adapter } = build(["1. Compute"]);

    await expect(agent.run("Anything", 0)).resolves.toBe(MAX_STEPS_MESSAGE);
    expect(adapter.calls).toHaveLength(1);
  });

  test("should degrade to the error response when the model fails", async () => {
    const { agent, eventBus } = build(["1. Step", new Error("upstream down")]);

    await expect(agent.run("Anything")).resolves.toBe(ERROR_RESPONSE_MESSAGE);
    expect(eventBus.getHistory({ type: "DecisionDegradedEvent" })[0].payload).toEqual({
      agentId: "test-agent",
      reason: "error",
      error: "upstream down",
    });
  });

  test("should answer with the incomplete message for a partial decision", async () => {
    const { agent } = build(["1. Step", '{"thought":"t"}']);

    await expect(agent.run("Anything")).resolves.toBe(INCOMPLETE_RESPONSE_MESSAGE);
  });

  test("should advance through the plan as steps complete", async () => {
    const { agent, adapter } = build(["1. First\n2. Second", decisionJson("calculator", "2+2"), "Four it is"]);

    await expect(agent.run("Two steps")).resolves.toBe("Four it is");
    expect(agent.currentPlan.map((s) => s.status)).toEqual(["completed", "completed"]);
    expect(adapter.calls[2].messages[1].content).toContain("Result: 4");
  });

  test("should mark a step failed when its tool fails", async () => {
    const { agent } = build(["1. First\n2. Second", decisionJson("calculator", "1/0"), "Could not divide"]);

    await expect(agent.run("Divide by zero")).resolves.toBe("Could not divide");
    expect(agent.currentPlan.map((s) => s.status)).toEqual(["failed", "completed"]);
  });

  test("should keep going when memory is unavailable", async () => {
    const failing: SimilarityIndex = {
      id: "failing",
      upsert: async () => {
        throw new Error("store offline");
      },
      query: async () => {
        throw new Error("store offline");
      },
      clear: async () => {
        throw new Error("store offline");
      },
    };
    const { agent, eventBus } = build(["1. Step", decisionJson("respond", "fine")], {}, failing);

    await expect(agent.run("Anything")).resolves.toBe("fine");
    expect(eventBus.getHistory({ type: "MemoryErrorEvent" }).map((e) => e.payload)).toEqual([
      { agentId: "test-agent", operation: "clear", error: "Memory error (clear): store offline" },
      { agentId: "test-agent", operation: "add", error: "Memory error (add): store offline" },
      { agentId: "test-agent", operation: "search", error: "Memory error (search): store offline" },
      { agentId: "test-agent", operation: "add", error: "Memory error (add): store offline" },
    ]);
  });

  test("should record each step in memory", async () => {
    const { agent, memory } = build(["1. Say hello", decisionJson("respond", "Hello there", "simple")]);

    await agent.run("Greet");

    await expect(memory.search("hello", 10)).resolves.toContain(
      "Step: Say hello\nThought: simple\nAction: respond\nResult: Hello there"
    );
  });

  test("should start every run with a clean memory", async () => {
    const { agent, memory } = build([
      "1. Say hello",
      decisionJson("respond", "Hello there"),
      "1. Say goodbye",
      decisionJson("respond", "Goodbye"),
    ]);

    await agent.run("Greet the user");
    await agent.run("Farewell");

    const remembered = await memory.search("Greet the user", 10);
    expect(remembered).toContain("Farewell");
    expect(remembered).not.toContain("Greet the user");
  });
});

describe("AgentCore.execute", () => {
  test("should return the response text for respond", async () => {
    const { agent } = build([]);

    await expect(agent.execute({ thought: "", action: "respond", actionInput: "done" })).resolves.toBe("done");
  });

  test("should run a registered tool", async () => {
    const { agent } = build([]);

    await expect(agent.execute({ thought: "", action: "calculator", actionInput: "2*21" })).resolves.toBe("42");
  });

  test("should apologise for a missing tool", async () => {
    const { agent } = build([]);

    await expect(agent.execute({ thought: "", action: "teleport", actionInput: "" })).resolves.toBe(
      "I apologize, but I couldn't find the tool: teleport"
    );
  });
});
