import type { ToolCallResult, ToolErrorDetail, ToolSummary } from "relay-agent-backend";

// ---------------------------------------------------------------------------
// Events
// ---------------------------------------------------------------------------

export type EventKind = "start" | "reasoning" | "tool_call" | "tool_result" | "response" | "done" | "error";

export const TERMINAL_EVENT_KINDS: ReadonlySet<EventKind> = new Set<EventKind>(["done", "error"]);

export interface EventPayloads {
  start: { prompt: string; maxTurns: number };
  reasoning: { message: string; icon: string };
  tool_call: { callId: string; name: string; arguments: Record<string, unknown> };
  tool_result: { callId: string; name: string; status: "ok" | "error"; output?: unknown; error?: ToolErrorDetail };
  response: { text: string; toolsUsed: string[]; turns: number; costUsd: number; elapsedSeconds: number };
  done: { status: "completed"; turns: number; costUsd: number; elapsedSeconds: number };
  error: { kind: string; message: string; turns: number; costUsd: number; elapsedSeconds: number };
}

export interface EventEnvelope<K extends EventKind = EventKind> {
  id: string;
  kind: K;
  sessionId: string;
  sequence: number;
  timestamp: string;
  payload: EventPayloads[K];
}

/** Discriminated union over every event kind. */
export type AgentEvent = { [K in EventKind]: EventEnvelope<K> }[EventKind];

export type EventListener = (event: AgentEvent) => void;

// ---------------------------------------------------------------------------
// Sessions
// ---------------------------------------------------------------------------

export type SessionStatus = "running" | "completed" | "failed" | "cancelled";

export type SessionPhase =
  | "started"
  | "awaiting_backend"
  | "awaiting_tool"
  | "completed"
  | "failed"
  | "cancelled";

export interface SessionState {
  sessionId: string;
  prompt: string;
  turnCount: number;
  maxTurns: number;
  accumulatedCost: number;
  status: SessionStatus;
  phase: SessionPhase;
  toolsUsed: string[];
  startedAt: number;
  finishedAt?: number;
  controller: AbortController;
}

export interface SessionOutcome {
  sessionId: string;
  status: Exclude<SessionStatus, "running">;
  response: string;
  toolsUsed: string[];
  turns: number;
  costUsd: number;
  elapsedSeconds: number;
  error?: { kind: string; message: string };
}

/** Blocking-mode response body. */
export type AggregateResult =
  | {
    success: true;
    prompt: string;
    response: string;
    tools_used: string[];
    turns: number;
    cost_usd: number;
    elapsed_seconds: number;
  }
  | {
    success: false;
    prompt: string;
    error: string;
    error_kind: string;
    response: string;
    tools_used: string[];
    turns: number;
    cost_usd: number;
    elapsed_seconds: number;
  };

// ---------------------------------------------------------------------------
// Reasoning backend
// ---------------------------------------------------------------------------

export interface BackendToolCall {
  id: string;
  name: string;
  input: Record<string, unknown>;
}

export interface BackendReply {
  text: string;
  toolCalls: BackendToolCall[];
  costUsd: number;
  stopReason: string;
}

/** Tool results come back in the order of the reply's `toolCalls`. */
export type BackendInput =
  | { type: "prompt"; text: string }
  | { type: "tool_results"; results: ToolCallResult[] };

export interface ConversationOptions {
  systemPrompt: string;
  tools: ToolSummary[];
}

/** One agent conversation; keeps its own message history. */
export interface BackendConversation {
  send(input: BackendInput, signal: AbortSignal): Promise<BackendReply>;
}

export interface ModelProvider {
  readonly name: string;
  startConversation(options: ConversationOptions): BackendConversation;
}
