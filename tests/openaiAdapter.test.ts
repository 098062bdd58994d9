import { ModelError, RateLimitError } from "../src/core/errors";
import { OpenAIEmbedder } from "../src/core/memory/embeddings";
import { OpenAIAdapter } from "../src/core/models/openaiAdapter";
import { FakeHandler, FakeOpenAI, chatCompletion, startFakeOpenAI } from "./helpers/fakeOpenAI";

describe("OpenAIAdapter", () => {
  let fake: FakeOpenAI;
  let handler: FakeHandler;

  beforeAll(async () => {
    fake = await startFakeOpenAI((request) => handler(request));
  });

  afterAll(async () => {
    await fake.close();
  });

  beforeEach(() => {
    fake.requests.length = 0;
  });

  function adapter() {
    return new OpenAIAdapter({ apiKey: "test-secret", baseURL: fake.baseURL, model: "gpt-4o-mini" });
  }

  test("should require an API key", () => {
    expect(() => new OpenAIAdapter({ apiKey: "" })).toThrow("OpenAI API key is required");
  });

  test("should return the first choice's content", async () => {
    handler = () => ({ status: 200, body: chatCompletion("Hello from the model") });

    const text = await adapter().complete([{ role: "user", content: "hi" }], { temperature: 0.2, maxTokens: 20 });

    expect(text).toBe("Hello from the model");
    expect(fake.requests[0]).toMatchObject({
      method: "POST",
      url: "/v1/chat/completions",
      body: {
        model: "gpt-4o-mini",
        messages: [{ role: "user", content: "hi" }],
        temperature: 0.2,
        max_tokens: 20,
      },
    });
  });

  test("should map 429 responses to RateLimitError without retrying", async () => {
    handler = () => ({
      status: 429,
      body: { error: { message: "Rate limit reached", type: "rate_limit_error" } },
      headers: { "retry-after": "2" },
    });

    const failure = adapter().complete([{ role: "user", content: "hi" }], {});

    await expect(failure).rejects.toBeInstanceOf(RateLimitError);
    await expect(failure).rejects.toMatchObject({ resetTime: 2000 });
    expect(fake.requests).toHaveLength(1);
  });

  test("should map other failures to ModelError", async () => {
    handler = () => ({ status: 400, body: { error: { message: "Bad request", type: "invalid_request_error" } } });

    const failure = adapter().complete([{ role: "user", content: "hi" }], {});

    await expect(failure).rejects.toBeInstanceOf(ModelError);
    await expect(failure).rejects.toMatchObject({ modelName: "openai:gpt-4o-mini" });
  });
});

describe("OpenAIEmbedder", () => {
  let fake: FakeOpenAI;

  beforeAll(async () => {
    fake = await startFakeOpenAI((request) => {
      const input = Array.isArray(request.body.input) ? request.body.input : [];
      return {
        status: 200,
        body: {
          object: "list",
          model: "text-embedding-3-small",
          data: input.map((_text, index) => ({ object: "embedding", index, embedding: [index + 1, 0.5] })),
          usage: { prompt_tokens: 1, total_tokens: 1 },
        },
      };
    });
  });

  afterAll(async () => {
    await fake.close();
  });

  test("should embed only texts it has not seen", async () => {
    const embedder = new OpenAIEmbedder({ apiKey: "test-secret", baseURL: fake.baseURL });

    const first = await embedder.embed(["alpha", "beta"]);
    const second = await embedder.embed(["beta", "gamma", "alpha"]);

    expect(first).toEqual([
      [1, 0.5],
      [2, 0.5],
    ]);
    expect(second).toEqual([
      [2, 0.5],
      [1, 0.5],
      [1, 0.5],
    ]);
    expect(fake.requests.map((r) => r.body.input)).toEqual([["alpha", "beta"], ["gamma"]]);
  });
});
