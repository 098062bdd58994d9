import { INCOMPLETE_RESPONSE_MESSAGE, extractJsonObject, findBraceSpans, parseDecision } from "../src/core/agent/decision";

describe("parseDecision", () => {
  test("should parse a plain JSON decision", () => {
    expect(parseDecision('{"thought":"t","action":"calculator","action_input":"2+2"}')).toEqual({
      kind: "parsed",
      source: "json",
      decision: { thought: "t", action: "calculator", actionInput: "2+2" },
    });
  });

  test("should find JSON wrapped in prose and code fences", () => {
    const text = 'Sure!\n```json\n{"thought": "x", "action": "respond", "action_input": "done"}\n```';

    expect(parseDecision(text)).toEqual({
      kind: "parsed",
      source: "json",
      decision: { thought: "x", action: "respond", actionInput: "done" },
    });
  });

  test("should respect braces inside string values", () => {
    const text = 'ok {"thought":"use {braces}","action":"respond","action_input":"a } b"}';

    expect(parseDecision(text).decision).toEqual({
      thought: "use {braces}",
      action: "respond",
      actionInput: "a } b",
    });
  });

  test("should serialise structured action input", () => {
    const text = '{"thought":"t","action":"calculator","action_input":{"expression":"1+1"}}';

    expect(parseDecision(text).decision.actionInput).toBe('{"expression":"1+1"}');
  });

  test("should degrade an object with missing fields to the incomplete message", () => {
    expect(parseDecision('{"thought":"t","action":"respond"}')).toEqual({
      kind: "degraded",
      reason: "incomplete",
      decision: {
        thought: "Incomplete response format",
        action: "respond",
        actionInput: INCOMPLETE_RESPONSE_MESSAGE,
      },
    });
  });

  test("should treat a blank action as incomplete", () => {
    const parsed = parseDecision('{"thought":"t","action":"  ","action_input":"x"}');

    expect(parsed.kind).toBe("degraded");
    expect(parsed.decision.actionInput).toBe(INCOMPLETE_RESPONSE_MESSAGE);
  });

  test("should extract fields from malformed JSON", () => {
    const text = '{"thought": "t", "action": "calculator", "action_input": "1+1",}';

    expect(parseDecision(text)).toEqual({
      kind: "parsed",
      source: "extracted",
      decision: { thought: "t", action: "calculator", actionInput: "1+1" },
    });
  });

  test("should unescape extracted strings", () => {
    const text = '"action": "respond", "action_input": "say \\"hi\\""';

    expect(parseDecision(text).decision).toEqual({ thought: "", action: "respond", actionInput: 'say "hi"' });
  });

  test("should use the whole text when only the action is found", () => {
    const text = '"action": "respond" and nothing else';

    expect(parseDecision(text).decision).toEqual({ thought: "", action: "respond", actionInput: text });
  });

  test("should respond with the raw text when nothing parses", () => {
    const text = "I think the answer is 4.";

    expect(parseDecision(text)).toEqual({
      kind: "degraded",
      reason: "unparseable",
      decision: { thought: "Failed to parse response", action: "respond", actionInput: text },
    });
  });
});

describe("JSON helpers", () => {
  test("should list top-level brace spans", () => {
    expect(findBraceSpans('a {"x": {"y": 1}} b {"z": "}"}')).toEqual(['{"x": {"y": 1}}', '{"z": "}"}']);
  });

  test("should prefer the longest parseable span", () => {
    expect(extractJsonObject('{"a": 1} and {"a": 1, "b": 2}')).toEqual({ a: 1, b: 2 });
  });

  test("should ignore JSON that is not an object", () => {
    expect(extractJsonObject("[1, 2, 3]")).toBeUndefined();
  });
});
