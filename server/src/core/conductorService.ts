import crypto from "node:crypto";
import type { ToolCallRequest, ToolCallResult, ToolRegistry } from "relay-agent-backend";
import { raceAbort } from "./abort.js";
import { BackendError, CancelledError, SessionError, TimeoutError, TurnLimitError, toSessionError } from "./errors.js";
import { EventStreamPublisher } from "./eventPublisher.js";
import { logger } from "./logger.js";
import { SessionStore } from "./sessionStore.js";
import {
  AggregateResult,
  BackendConversation,
  BackendInput,
  BackendReply,
  BackendToolCall,
  EventListener,
  ModelProvider,
  SessionOutcome,
  SessionState,
} from "./types.js";

export interface ConductorServiceConfig {
  defaultMaxTurns: number;
  maxTurnsLimit: number;
  sessionTimeoutMs: number;
  systemPrompt: string;
}

export interface StartSessionOptions {
  maxTurns?: number;
  timeoutMs?: number;
  /** Attached before `start` is emitted, so it sees the whole stream. */
  listener?: EventListener;
}

export interface StartedSession {
  sessionId: string;
  /** Never rejects; failures are reported in the outcome. */
  outcome: Promise<SessionOutcome>;
}

const REASONING_ICON = "⚙️";

export const DEFAULT_SYSTEM_PROMPT =
  "You are an assistant that completes the user's request using the available tools. " +
  "Call a tool when an action is needed, then answer with a short summary of what was done.";

export class ConductorService {
  readonly publisher: EventStreamPublisher;
  private readonly provider: ModelProvider;
  private readonly registry: ToolRegistry;
  private readonly sessions = new SessionStore();
  private readonly config: ConductorServiceConfig;

  constructor(
    provider: ModelProvider,
    registry: ToolRegistry,
    config: ConductorServiceConfig,
    publisher: EventStreamPublisher = new EventStreamPublisher(),
  ) {
    this.provider = provider;
    this.registry = registry;
    this.config = config;
    this.publisher = publisher;
  }

  get runningSessions(): number {
    return this.sessions.runningCount;
  }

  getSession(sessionId: string): SessionState | undefined {
    return this.sessions.get(sessionId);
  }

  resolveMaxTurns(requested?: number): number {
    if (requested === undefined) {
      return Math.min(this.config.defaultMaxTurns, this.config.maxTurnsLimit);
    }
    if (!Number.isInteger(requested) || requested < 1) {
      throw new RangeError("max_turns must be a positive integer");
    }
    return Math.min(requested, this.config.maxTurnsLimit);
  }

  startSession(prompt: string, options: StartSessionOptions = {}): StartedSession {
    const text = prompt.trim();
    if (!text) {
      throw new RangeError("prompt must not be empty");
    }

    const state = this.sessions.create({ prompt: text, maxTurns: this.resolveMaxTurns(options.maxTurns) });
    if (options.listener) {
      this.publisher.subscribe(state.sessionId, options.listener);
    }

    this.publisher.emit(state.sessionId, "start", { prompt: text, maxTurns: state.maxTurns });
    logger.info(`session started (maxTurns=${state.maxTurns}, provider=${this.provider.name})`, {
      sessionId: state.sessionId,
    });

    const outcome = this.drive(state, options.timeoutMs ?? this.config.sessionTimeoutMs);
    return { sessionId: state.sessionId, outcome };
  }

  /** Returns false when the session is unknown or already terminal. */
  cancel(sessionId: string, reason?: string): boolean {
    const state = this.sessions.get(sessionId);
    if (!state || state.status !== "running") {
      return false;
    }

    state.controller.abort(new CancelledError(reason));
    return true;
  }

  /** Blocking mode: runs one session to its end and returns the aggregate. */
  async query(prompt: string, options: Omit<StartSessionOptions, "listener"> = {}): Promise<AggregateResult> {
    const started = this.startSession(prompt, options);
    const outcome = await started.outcome;
    this.publisher.release(started.sessionId);
    return toAggregate(outcome, prompt.trim());
  }

  private async drive(state: SessionState, timeoutMs: number): Promise<SessionOutcome> {
    const { signal } = state.controller;
    const timer = setTimeout(() => state.controller.abort(new TimeoutError(timeoutMs)), timeoutMs);
    timer.unref();
    const trace: string[] = [];

    try {
      const conversation = this.provider.startConversation({
        systemPrompt: this.config.systemPrompt,
        tools: this.registry.summaries(),
      });
      const text = await this.loop(state, conversation, signal, trace);
      return this.complete(state, text);
    } catch (error) {
      // After an abort the reason, not the rejection it caused, is the failure.
      const failure = signal.aborted ? toSessionError(signal.reason) : toSessionError(error);
      return this.fail(state, failure);
    } finally {
      clearTimeout(timer);
      logger.info(`session trace: ${trace.join(" -> ") || "(empty)"}`, { sessionId: state.sessionId });
    }
  }

  private async loop(
    state: SessionState,
    conversation: BackendConversation,
    signal: AbortSignal,
    trace: string[],
  ): Promise<string> {
    const seenCallIds = new Set<string>();
    let reply = await this.exchange(state, conversation, { type: "prompt", text: state.prompt }, signal, trace);

    while (reply.toolCalls.length > 0) {
      if (reply.text.trim()) {
        this.publisher.emit(state.sessionId, "reasoning", { message: reply.text.trim(), icon: REASONING_ICON });
      }
      if (state.turnCount >= state.maxTurns) {
        throw new TurnLimitError(state.maxTurns);
      }

      state.phase = "awaiting_tool";
      const results = await this.runTools(state, reply.toolCalls, seenCallIds, signal, trace);
      reply = await this.exchange(state, conversation, { type: "tool_results", results }, signal, trace);
    }

    return reply.text.trim();
  }

  private async exchange(
    state: SessionState,
    conversation: BackendConversation,
    input: BackendInput,
    signal: AbortSignal,
    trace: string[],
  ): Promise<BackendReply> {
    state.phase = "awaiting_backend";
    const reply = await raceAbort(conversation.send(input, signal), signal);
    assertWellFormed(reply);

    this.sessions.recordTurn(state, reply.costUsd);
    trace.push(`turn:${state.turnCount}`);
    logger.debug(`backend replied (stop=${reply.stopReason}, toolCalls=${reply.toolCalls.length})`, {
      sessionId: state.sessionId,
    });
    return reply;
  }

  private async runTools(
    state: SessionState,
    calls: BackendToolCall[],
    seenCallIds: Set<string>,
    signal: AbortSignal,
    trace: string[],
  ): Promise<ToolCallResult[]> {
    const requests: ToolCallRequest[] = calls.map((call) => {
      const callId = call.id && !seenCallIds.has(call.id) ? call.id : crypto.randomUUID();
      seenCallIds.add(callId);
      return { callId, toolName: call.name, arguments: call.input };
    });

    for (const request of requests) {
      this.publisher.emit(state.sessionId, "tool_call", {
        callId: request.callId,
        name: request.toolName,
        arguments: request.arguments,
      });
      trace.push(`tool_call:${request.toolName}`);
    }

    const pending = requests.map(async (request) => {
      const result = await this.registry.invoke(request, signal);
      if (!signal.aborted) {
        this.publishResult(state, request, result);
      }
      return result;
    });

    return raceAbort(Promise.all(pending), signal);
  }

  private publishResult(state: SessionState, request: ToolCallRequest, result: ToolCallResult): void {
    if (result.status === "ok") {
      this.sessions.recordToolUse(state, request.toolName);
      this.publisher.emit(state.sessionId, "tool_result", {
        callId: result.callId,
        name: request.toolName,
        status: "ok",
        output: result.payload,
      });
      return;
    }

    if (result.error.kind !== "UnknownToolError") {
      this.sessions.recordToolUse(state, request.toolName);
    }
    this.publisher.emit(state.sessionId, "tool_result", {
      callId: result.callId,
      name: request.toolName,
      status: "error",
      error: result.error,
    });
    logger.warn(`tool ${request.toolName} failed: ${result.error.kind}`, {
      sessionId: state.sessionId,
      callId: result.callId,
    });
  }

  private complete(state: SessionState, text: string): SessionOutcome {
    this.sessions.finish(state, "completed");
    const outcome = outcomeOf(state, "completed", text);

    this.publisher.emit(state.sessionId, "response", {
      text,
      toolsUsed: outcome.toolsUsed,
      turns: outcome.turns,
      costUsd: outcome.costUsd,
      elapsedSeconds: outcome.elapsedSeconds,
    });
    this.publisher.emit(state.sessionId, "done", {
      status: "completed",
      turns: outcome.turns,
      costUsd: outcome.costUsd,
      elapsedSeconds: outcome.elapsedSeconds,
    });
    logger.info(`session completed in ${outcome.turns} turn(s)`, { sessionId: state.sessionId });
    return outcome;
  }

  private fail(state: SessionState, failure: SessionError): SessionOutcome {
    const status = failure instanceof CancelledError ? "cancelled" : "failed";
    this.sessions.finish(state, status);
    const outcome = outcomeOf(state, status, "", { kind: failure.kind, message: failure.message });

    this.publisher.emit(state.sessionId, "error", {
      kind: failure.kind,
      message: failure.message,
      turns: outcome.turns,
      costUsd: outcome.costUsd,
      elapsedSeconds: outcome.elapsedSeconds,
    });
    logger.warn(`session ${status}: ${failure.kind}: ${failure.message}`, { sessionId: state.sessionId });
    return outcome;
  }
}

function assertWellFormed(reply: BackendReply): void {
  if (typeof reply.text !== "string" || !Array.isArray(reply.toolCalls)) {
    throw new BackendError("Backend reply is missing text or tool calls");
  }
  for (const call of reply.toolCalls) {
    if (typeof call.name !== "string" || !call.name) {
      throw new BackendError("Backend requested a tool call without a name");
    }
  }
}

function outcomeOf(
  state: SessionState,
  status: SessionOutcome["status"],
  response: string,
  error?: SessionOutcome["error"],
): SessionOutcome {
  const finishedAt = state.finishedAt ?? Date.now();
  return {
    sessionId: state.sessionId,
    status,
    response,
    toolsUsed: [...state.toolsUsed],
    turns: state.turnCount,
    costUsd: state.accumulatedCost,
    elapsedSeconds: (finishedAt - state.startedAt) / 1000,
    error,
  };
}

export function toAggregate(outcome: SessionOutcome, prompt: string): AggregateResult {
  if (outcome.status === "completed") {
    return {
      success: true,
      prompt,
      response: outcome.response,
      tools_used: outcome.toolsUsed,
      turns: outcome.turns,
      cost_usd: outcome.costUsd,
      elapsed_seconds: outcome.elapsedSeconds,
    };
  }

  return {
    success: false,
    prompt,
    error: outcome.error?.message ?? "Session did not complete",
    error_kind: outcome.error?.kind ?? "BackendError",
    response: "",
    tools_used: outcome.toolsUsed,
    turns: outcome.turns,
    cost_usd: outcome.costUsd,
    elapsed_seconds: outcome.elapsedSeconds,
  };
}
