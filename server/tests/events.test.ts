import { makeEvent, parseClientMessage } from "../src/core/events.js";

const LIMIT = 1024;

describe("makeEvent", () => {
  test("builds the envelope", () => {
    const event = makeEvent("start", "s1", 1, { prompt: "hi", maxTurns: 2 }, "evt-1", "2024-01-01T00:00:00.000Z");

    expect(event).toEqual({
      id: "evt-1",
      kind: "start",
      sessionId: "s1",
      sequence: 1,
      timestamp: "2024-01-01T00:00:00.000Z",
      payload: { prompt: "hi", maxTurns: 2 },
    });
  });
});

describe("parseClientMessage", () => {
  test("prompt with max_turns", () => {
    expect(parseClientMessage(JSON.stringify({ prompt: "  send it  ", max_turns: 4 }), LIMIT)).toEqual({
      message: { type: "prompt", prompt: "send it", maxTurns: 4 },
    });
  });

  test("query is an alias for prompt", () => {
    expect(parseClientMessage(JSON.stringify({ query: "hello" }), LIMIT)).toEqual({
      message: { type: "prompt", prompt: "hello" },
    });
  });

  test("plain text is taken as the prompt", () => {
    expect(parseClientMessage("  what time is it?  ", LIMIT)).toEqual({
      message: { type: "prompt", prompt: "what time is it?" },
    });
    expect(parseClientMessage("   ", LIMIT)).toEqual({ error: "empty_prompt" });
  });

  test("cancel", () => {
    expect(parseClientMessage('{"type":"cancel"}', LIMIT)).toEqual({ message: { type: "cancel" } });
  });

  test("rejects bad shapes", () => {
    expect(parseClientMessage("[1,2]", LIMIT)).toEqual({ error: "invalid_message" });
    expect(parseClientMessage("42", LIMIT)).toEqual({ error: "invalid_message" });
    expect(parseClientMessage('{"prompt":""}', LIMIT)).toEqual({ error: "missing_prompt" });
    expect(parseClientMessage('{"prompt":7}', LIMIT)).toEqual({ error: "missing_prompt" });
    expect(parseClientMessage('{"prompt":"x","max_turns":0}', LIMIT)).toEqual({ error: "invalid_max_turns" });
    expect(parseClientMessage('{"prompt":"x","max_turns":"3"}', LIMIT)).toEqual({ error: "invalid_max_turns" });
  });

  test("null max_turns means the default", () => {
    expect(parseClientMessage('{"prompt":"x","max_turns":null}', LIMIT)).toEqual({
      message: { type: "prompt", prompt: "x" },
    });
  });

  test("oversized messages are refused before parsing", () => {
    expect(parseClientMessage("a".repeat(20), 10)).toEqual({ error: "message_too_large:20" });
  });
});
