import type { ContentBlock, ConverseCommand, ConverseCommandOutput, StopReason } from "@aws-sdk/client-bedrock-runtime";
import type { ToolSummary } from "relay-agent-backend";
import { BackendError } from "../src/core/errors.js";
import { BedrockProvider, type ConverseClient } from "../src/providers/bedrockProvider.js";

const SEND_EMAIL_SUMMARY: ToolSummary = {
  name: "send_email",
  description: "Send an email",
  inputSchema: { type: "object", properties: { to: { type: "string" } }, required: ["to"] },
};

const CONFIG = {
  modelId: "amazon.nova-lite-v1:0",
  region: "us-east-1",
  maxTokens: 512,
  pricing: { inputPerMTok: 0.06, outputPerMTok: 0.24 },
};

function converseOutput(
  content: ContentBlock[],
  stopReason: StopReason,
  inputTokens = 0,
  outputTokens = 0,
): ConverseCommandOutput {
  return {
    $metadata: {},
    output: { message: { role: "assistant", content } },
    stopReason,
    usage: { inputTokens, outputTokens, totalTokens: inputTokens + outputTokens },
    metrics: { latencyMs: 10 },
  };
}

class FakeConverseClient implements ConverseClient {
  readonly commands: ConverseCommand[] = [];
  readonly abortSignals: Array<AbortSignal | undefined> = [];
  private readonly outputs: Array<ConverseCommandOutput | Error>;

  constructor(outputs: Array<ConverseCommandOutput | Error>) {
    this.outputs = outputs;
  }

  async send(command: ConverseCommand, options?: { abortSignal?: AbortSignal }): Promise<ConverseCommandOutput> {
    this.commands.push(command);
    this.abortSignals.push(options?.abortSignal);
    const next = this.outputs.shift();
    if (next === undefined) {
      throw new Error("no more outputs");
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }
}

const TOOL_USE_OUTPUT = converseOutput(
  [
    { text: "Sending now." },
    { toolUse: { toolUseId: "tu-1", name: "send_email", input: { to: "a@example.com" } } },
  ],
  "tool_use",
  1_000_000,
  0,
);

describe("BedrockProvider", () => {
  test("offers tools as toolSpecs and reads tool calls back", async () => {
    const client = new FakeConverseClient([TOOL_USE_OUTPUT]);
    const conversation = new BedrockProvider(CONFIG, client).startConversation({
      systemPrompt: "sys",
      tools: [SEND_EMAIL_SUMMARY],
    });

    const reply = await conversation.send({ type: "prompt", text: "Send it" }, new AbortController().signal);

    expect(reply).toEqual({
      text: "Sending now.",
      toolCalls: [{ id: "tu-1", name: "send_email", input: { to: "a@example.com" } }],
      costUsd: 0.06,
      stopReason: "tool_use",
    });
    const request = client.commands[0].input;
    expect(request.modelId).toBe("amazon.nova-lite-v1:0");
    expect(request.system).toEqual([{ text: "sys" }]);
    expect(request.inferenceConfig).toEqual({ maxTokens: 512 });
    expect(request.toolConfig).toEqual({
      tools: [
        {
          toolSpec: {
            name: "send_email",
            description: "Send an email",
            inputSchema: { json: { type: "object", properties: { to: { type: "string" } }, required: ["to"] } },
          },
        },
      ],
    });
  });

  test("tool results go back as toolResult blocks under the backend's ids", async () => {
    const client = new FakeConverseClient([
      TOOL_USE_OUTPUT,
      converseOutput([{ text: "Sent." }], "end_turn"),
    ]);
    const conversation = new BedrockProvider(CONFIG, client).startConversation({ systemPrompt: "sys", tools: [] });
    const signal = new AbortController().signal;

    await conversation.send({ type: "prompt", text: "Send it" }, signal);
    const reply = await conversation.send(
      {
        type: "tool_results",
        results: [{ callId: "local-id", status: "error", error: { kind: "ToolExecutionError", message: "boom" } }],
      },
      signal,
    );

    expect(reply).toEqual({ text: "Sent.", toolCalls: [], costUsd: 0, stopReason: "end_turn" });
    const request = client.commands[1].input;
    expect(request.toolConfig).toBeUndefined();
    expect(request.messages?.map((message) => message.role)).toEqual(["user", "assistant", "user", "assistant"]);
    expect(request.messages?.[2]).toEqual({
      role: "user",
      content: [
        {
          toolResult: {
            toolUseId: "tu-1",
            content: [{ text: "ToolExecutionError: boom" }],
            status: "error",
          },
        },
      ],
    });
  });

  test("the session signal reaches the SDK call", async () => {
    const client = new FakeConverseClient([converseOutput([{ text: "Hi." }], "end_turn")]);
    const conversation = new BedrockProvider(CONFIG, client).startConversation({ systemPrompt: "sys", tools: [] });
    const controller = new AbortController();

    await conversation.send({ type: "prompt", text: "hi" }, controller.signal);

    expect(client.abortSignals).toEqual([controller.signal]);
  });

  test("SDK failures become backend errors", async () => {
    const client = new FakeConverseClient([new Error("ThrottlingException: slow down")]);
    const conversation = new BedrockProvider(CONFIG, client).startConversation({ systemPrompt: "sys", tools: [] });

    await expect(conversation.send({ type: "prompt", text: "hi" }, new AbortController().signal))
      .rejects.toThrow(new BackendError("bedrock_converse_failed:ThrottlingException: slow down"));
  });

  test("a reply without message content is a backend error", async () => {
    const client = new FakeConverseClient([{ ...converseOutput([], "end_turn"), output: undefined }]);
    const conversation = new BedrockProvider(CONFIG, client).startConversation({ systemPrompt: "sys", tools: [] });

    await expect(conversation.send({ type: "prompt", text: "hi" }, new AbortController().signal))
      .rejects.toThrow("bedrock response has no message content");
  });
});
