/**
 * Wire the agent from settings: throttle, adapter, client, tools, memory, planner.
 */

import { EventBus } from "./core/eventBus";
import { Settings } from "./core/config/settings";
import { AgentCore } from "./core/agent/agentCore";
import { Planner } from "./core/agent/planner";
import { CompletionAdapter } from "./core/models/adapter";
import { CompletionClient } from "./core/models/completionClient";
import { MockAdapter } from "./core/models/mockAdapter";
import { OpenAIAdapter } from "./core/models/openaiAdapter";
import { RequestThrottle } from "./core/models/requestThrottle";
import { ChromaSimilarityIndex } from "./core/memory/chromaIndex";
import { Embedder, HashingEmbedder, OpenAIEmbedder } from "./core/memory/embeddings";
import { InMemorySimilarityIndex } from "./core/memory/inMemoryIndex";
import { MemoryStore } from "./core/memory/memoryStore";
import { SimilarityIndex } from "./core/memory/similarityIndex";
import { ExtensionLoadReport, ToolRegistry } from "./core/tool-engine";
import { Sleep } from "./core/utils/timeout";

export interface ForemanOverrides {
  adapter?: CompletionAdapter;
  index?: SimilarityIndex;
  throttle?: RequestThrottle;
  sleep?: Sleep;
}

export interface Foreman {
  agent: AgentCore;
  client: CompletionClient;
  registry: ToolRegistry;
  extensions: ExtensionLoadReport;
  memory: MemoryStore;
  planner: Planner;
  throttle: RequestThrottle;
}

export function createAdapter(settings: Settings): CompletionAdapter {
  if (settings.apiKey) {
    return new OpenAIAdapter({
      apiKey: settings.apiKey,
      baseURL: settings.apiBase,
      model: settings.model,
    });
  }
  return new MockAdapter();
}

export function createSimilarityIndex(settings: Settings): SimilarityIndex {
  const embedder: Embedder = settings.apiKey
    ? new OpenAIEmbedder({ apiKey: settings.apiKey, baseURL: settings.apiBase, model: settings.embeddingModel })
    : new HashingEmbedder();

  if (settings.chromaUrl) {
    return new ChromaSimilarityIndex({ url: settings.chromaUrl, collection: settings.memoryCollection }, embedder);
  }
  return new InMemorySimilarityIndex(embedder);
}

export async function createForeman(
  settings: Settings,
  eventBus: EventBus,
  overrides: ForemanOverrides = {}
): Promise<Foreman> {
  const throttle =
    overrides.throttle ??
    new RequestThrottle(settings.minRequestInterval * 1000, {
      initialLastRequestAt: settings.lastRequestTime * 1000,
      sleep: overrides.sleep,
    });

  const client = new CompletionClient(
    overrides.adapter ?? createAdapter(settings),
    throttle,
    eventBus,
    {
      maxRetries: settings.maxRetries,
      backoffBaseMs: settings.backoffBaseMs,
      timeoutMs: settings.timeoutMs,
      temperature: settings.temperature,
    },
    overrides.sleep
  );

  const { registry, extensions } = await ToolRegistry.create(eventBus, {
    customToolsPath: settings.customToolsPath,
  });

  const memory = new MemoryStore(overrides.index ?? createSimilarityIndex(settings), {
    searchLimit: settings.memorySearchLimit,
    timeoutMs: settings.memoryTimeoutMs,
  });

  const planner = new Planner(client, eventBus);

  const agent = new AgentCore(
    { client, registry, memory, planner, eventBus },
    { id: "default-agent", maxSteps: settings.maxSteps, memorySearchLimit: settings.memorySearchLimit }
  );

  return { agent, client, registry, extensions, memory, planner, throttle };
}
