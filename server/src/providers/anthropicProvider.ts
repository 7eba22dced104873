import { isRecord, resultText } from "relay-agent-backend";
import { BackendError } from "../core/errors.js";
import {
  BackendConversation,
  BackendInput,
  BackendReply,
  BackendToolCall,
  ConversationOptions,
  ModelProvider,
} from "../core/types.js";
import { TokenPricing, costFromUsage } from "./pricing.js";

export interface AnthropicConfig {
  apiKey: string;
  model: string;
  maxTokens: number;
  pricing: TokenPricing;
  baseUrl?: string;
  requestTimeoutMs?: number;
}

// ---------------------------------------------------------------------------
// Anthropic API wire types
// ---------------------------------------------------------------------------

export interface AnthropicTextBlock {
  type: "text";
  text: string;
}

export interface AnthropicToolUseBlock {
  type: "tool_use";
  id: string;
  name: string;
  input: Record<string, unknown>;
}

export type AnthropicContentBlock = AnthropicTextBlock | AnthropicToolUseBlock;

interface AnthropicToolResultBlock {
  type: "tool_result";
  tool_use_id: string;
  content: string;
  is_error?: boolean;
}

interface AnthropicMessage {
  role: "user" | "assistant";
  content: string | AnthropicContentBlock[] | AnthropicToolResultBlock[];
}

interface AnthropicTool {
  name: string;
  description: string;
  input_schema: object;
}

export interface AnthropicMessageResponse {
  content: AnthropicContentBlock[];
  stop_reason: string;
  usage: { input_tokens: number; output_tokens: number };
}

// ---------------------------------------------------------------------------
// Provider implementation
// ---------------------------------------------------------------------------

export class AnthropicProvider implements ModelProvider {
  readonly name = "anthropic";

  private readonly config: AnthropicConfig;

  constructor(config: AnthropicConfig) {
    this.config = config;
  }

  startConversation(options: ConversationOptions): BackendConversation {
    const tools: AnthropicTool[] = options.tools.map((tool) => ({
      name: tool.name,
      description: tool.description,
      input_schema: tool.inputSchema,
    }));
    return new AnthropicConversation(this.config, options.systemPrompt, tools);
  }
}

class AnthropicConversation implements BackendConversation {
  private readonly messages: AnthropicMessage[] = [];
  private pendingToolUseIds: string[] = [];

  constructor(
    private readonly config: AnthropicConfig,
    private readonly systemPrompt: string,
    private readonly tools: AnthropicTool[],
  ) {}

  async send(input: BackendInput, signal: AbortSignal): Promise<BackendReply> {
    this.messages.push(this.toUserMessage(input));

    const response = await this.callAPI(signal);
    this.messages.push({ role: "assistant", content: response.content });

    const toolCalls: BackendToolCall[] = response.content
      .filter((block): block is AnthropicToolUseBlock => block.type === "tool_use")
      .map((block) => ({ id: block.id, name: block.name, input: block.input }));
    this.pendingToolUseIds = toolCalls.map((call) => call.id);

    const text = response.content
      .filter((block): block is AnthropicTextBlock => block.type === "text")
      .map((block) => block.text.trim())
      .join("\n")
      .trim();

    return {
      text,
      toolCalls,
      costUsd: costFromUsage(response.usage.input_tokens, response.usage.output_tokens, this.config.pricing),
      stopReason: response.stop_reason,
    };
  }

  private toUserMessage(input: BackendInput): AnthropicMessage {
    if (input.type === "prompt") {
      return { role: "user", content: input.text };
    }

    if (input.results.length !== this.pendingToolUseIds.length) {
      throw new BackendError(
        `expected ${this.pendingToolUseIds.length} tool result(s), got ${input.results.length}`,
      );
    }

    // tool_use ids are the backend's own; our callIds may have been reissued.
    const blocks: AnthropicToolResultBlock[] = input.results.map((result, index) => ({
      type: "tool_result",
      tool_use_id: this.pendingToolUseIds[index] ?? result.callId,
      content: resultText(result),
      ...(result.status === "error" ? { is_error: true } : {}),
    }));
    this.pendingToolUseIds = [];
    return { role: "user", content: blocks };
  }

  private async callAPI(signal: AbortSignal): Promise<AnthropicMessageResponse> {
    const body: Record<string, unknown> = {
      model: this.config.model,
      max_tokens: this.config.maxTokens,
      system: this.systemPrompt,
      messages: this.messages,
    };

    if (this.tools.length > 0) {
      body.tools = this.tools;
    }

    const response = await fetch(`${this.config.baseUrl ?? "https://api.anthropic.com"}/v1/messages`, {
      method: "POST",
      headers: {
        "content-type": "application/json",
        "x-api-key": this.config.apiKey,
        "anthropic-version": "2023-06-01",
      },
      body: JSON.stringify(body),
      signal: AbortSignal.any([signal, AbortSignal.timeout(this.config.requestTimeoutMs ?? 30_000)]),
    });

    if (!response.ok) {
      const bodyText = await response.text();
      throw new BackendError(`anthropic_http_${response.status}:${bodyText.slice(0, 120)}`, response.status);
    }

    return parseMessageResponse(await response.json());
  }
}

export function parseMessageResponse(raw: unknown): AnthropicMessageResponse {
  if (!isRecord(raw) || !Array.isArray(raw.content)) {
    throw new BackendError("anthropic response has no content array");
  }

  const content: AnthropicContentBlock[] = [];
  for (const block of raw.content) {
    if (!isRecord(block)) {
      throw new BackendError("anthropic response has a malformed content block");
    }
    if (block.type === "text" && typeof block.text === "string") {
      content.push({ type: "text", text: block.text });
    } else if (block.type === "tool_use" && typeof block.id === "string" && typeof block.name === "string") {
      content.push({ type: "tool_use", id: block.id, name: block.name, input: isRecord(block.input) ? block.input : {} });
    } else if (block.type === "text" || block.type === "tool_use") {
      throw new BackendError(`anthropic response has a malformed ${block.type} block`);
    }
    // Other block kinds (thinking, etc.) carry nothing the loop needs.
  }

  const usage: Record<string, unknown> = isRecord(raw.usage) ? raw.usage : {};
  return {
    content,
    stop_reason: typeof raw.stop_reason === "string" ? raw.stop_reason : "end_turn",
    usage: {
      input_tokens: typeof usage.input_tokens === "number" ? usage.input_tokens : 0,
      output_tokens: typeof usage.output_tokens === "number" ? usage.output_tokens : 0,
    },
  };
}
