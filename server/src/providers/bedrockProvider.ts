import {
  BedrockRuntimeClient,
  ConverseCommand,
  type ContentBlock,
  type ConverseCommandInput,
  type ConverseCommandOutput,
  type Message,
  type Tool,
} from "@aws-sdk/client-bedrock-runtime";
import { isRecord, resultText } from "relay-agent-backend";
import { BackendError } from "../core/errors.js";
import { logger } from "../core/logger.js";
import {
  BackendConversation,
  BackendInput,
  BackendReply,
  BackendToolCall,
  ConversationOptions,
  ModelProvider,
} from "../core/types.js";
import { TokenPricing, costFromUsage } from "./pricing.js";

export interface BedrockConfig {
  modelId: string;
  region: string;
  maxTokens: number;
  pricing: TokenPricing;
}

/** The slice of BedrockRuntimeClient this provider calls. */
export interface ConverseClient {
  send(command: ConverseCommand, options?: { abortSignal?: AbortSignal }): Promise<ConverseCommandOutput>;
}

type JsonValue = null | boolean | number | string | JsonValue[] | { [key: string]: JsonValue };

/**
 * Amazon Bedrock Converse API. Tools from the registry are offered as
 * native toolSpecs; each send() is one non-streaming Converse call.
 */
export class BedrockProvider implements ModelProvider {
  readonly name = "bedrock";

  private readonly config: BedrockConfig;
  private readonly client: ConverseClient;

  constructor(config: BedrockConfig, client?: ConverseClient) {
    this.config = config;
    this.client = client ?? new BedrockRuntimeClient({ region: config.region });
  }

  startConversation(options: ConversationOptions): BackendConversation {
    const tools: Tool[] = options.tools.map((tool): Tool => ({
      toolSpec: {
        name: tool.name,
        description: tool.description,
        inputSchema: { json: toJson(tool.inputSchema) },
      },
    }));
    return new BedrockConversation(this.client, this.config, options.systemPrompt, tools);
  }
}

class BedrockConversation implements BackendConversation {
  private readonly messages: Message[] = [];
  private pendingToolUseIds: string[] = [];

  constructor(
    private readonly client: ConverseClient,
    private readonly config: BedrockConfig,
    private readonly systemPrompt: string,
    private readonly tools: Tool[],
  ) {}

  async send(input: BackendInput, signal: AbortSignal): Promise<BackendReply> {
    this.messages.push(this.toUserMessage(input));

    const request: ConverseCommandInput = {
      modelId: this.config.modelId,
      system: [{ text: this.systemPrompt }],
      messages: this.messages,
      inferenceConfig: { maxTokens: this.config.maxTokens },
      ...(this.tools.length > 0 ? { toolConfig: { tools: this.tools } } : {}),
    };

    let response: ConverseCommandOutput;
    try {
      response = await this.client.send(new ConverseCommand(request), { abortSignal: signal });
    } catch (err) {
      const message = err instanceof Error ? err.message : "Unknown Bedrock error";
      throw new BackendError(`bedrock_converse_failed:${message}`);
    }
    if (signal.aborted) {
      throw new BackendError("bedrock reply arrived after the session was aborted");
    }

    const message = response.output?.message;
    if (!message?.content) {
      throw new BackendError("bedrock response has no message content");
    }
    this.messages.push({ role: "assistant", content: message.content });

    const { text, toolCalls } = readContent(message.content);
    this.pendingToolUseIds = toolCalls.map((call) => call.id);

    const inputTokens = response.usage?.inputTokens ?? 0;
    const outputTokens = response.usage?.outputTokens ?? 0;
    logger.debug(`bedrock converse ${this.config.modelId}: ${inputTokens} in / ${outputTokens} out`);

    return {
      text,
      toolCalls,
      costUsd: costFromUsage(inputTokens, outputTokens, this.config.pricing),
      stopReason: response.stopReason ?? "end_turn",
    };
  }

  private toUserMessage(input: BackendInput): Message {
    if (input.type === "prompt") {
      return { role: "user", content: [{ text: input.text }] };
    }

    if (input.results.length !== this.pendingToolUseIds.length) {
      throw new BackendError(
        `expected ${this.pendingToolUseIds.length} tool result(s), got ${input.results.length}`,
      );
    }

    const content: ContentBlock[] = input.results.map((result, index): ContentBlock => ({
      toolResult: {
        toolUseId: this.pendingToolUseIds[index] ?? result.callId,
        content: [{ text: resultText(result) }],
        status: result.status === "ok" ? "success" : "error",
      },
    }));
    this.pendingToolUseIds = [];
    return { role: "user", content };
  }
}

function readContent(blocks: ContentBlock[]): { text: string; toolCalls: BackendToolCall[] } {
  const texts: string[] = [];
  const toolCalls: BackendToolCall[] = [];

  for (const block of blocks) {
    if (typeof block.text === "string") {
      texts.push(block.text.trim());
    }
    if (block.toolUse) {
      const { toolUseId, name, input } = block.toolUse;
      if (!name) {
        throw new BackendError("bedrock toolUse block has no name");
      }
      toolCalls.push({ id: toolUseId ?? "", name, input: isRecord(input) ? input : {} });
    }
  }

  return { text: texts.filter(Boolean).join("\n").trim(), toolCalls };
}

function toJson(value: unknown): JsonValue {
  if (value === null || typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map(toJson);
  }
  if (isRecord(value)) {
    const out: { [key: string]: JsonValue } = {};
    for (const [key, entry] of Object.entries(value)) {
      if (entry !== undefined) {
        out[key] = toJson(entry);
      }
    }
    return out;
  }
  return null;
}
