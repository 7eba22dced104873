import { ConductorService } from "./core/conductorService.js";
import { makeEvent, parseClientMessage } from "./core/events.js";
import { logger } from "./core/logger.js";
import { AgentEvent, TERMINAL_EVENT_KINDS } from "./core/types.js";

/** What the channel needs from a socket; `ws` sockets are adapted to this in app.ts. */
export interface ChannelSocket {
  readonly isOpen: boolean;
  send(data: string): void;
  close(code?: number, reason?: string): void;
}

const NORMAL_CLOSURE = 1000;
const POLICY_VIOLATION = 1008;

/**
 * One live push channel = one session. The first message carries the prompt;
 * afterwards only `{ "type": "cancel" }` is meaningful. The socket is closed
 * once the session's terminal event has been sent.
 */
export class StreamingChannel {
  private readonly conductor: ConductorService;
  private readonly socket: ChannelSocket;
  private readonly maxEventBytes: number;
  private sessionId: string | null = null;
  private finished = false;

  constructor(conductor: ConductorService, socket: ChannelSocket, maxEventBytes: number) {
    this.conductor = conductor;
    this.socket = socket;
    this.maxEventBytes = maxEventBytes;
  }

  get activeSessionId(): string | null {
    return this.finished ? null : this.sessionId;
  }

  receive(raw: string): void {
    if (this.finished) {
      return;
    }

    const parsed = parseClientMessage(raw, this.maxEventBytes);
    if (!parsed.message) {
      this.rejectOrIgnore(parsed.error ?? "invalid_message");
      return;
    }

    if (parsed.message.type === "cancel") {
      if (!this.sessionId) {
        this.reject("no_session_to_cancel");
        return;
      }
      logger.info("cancel requested by client", { sessionId: this.sessionId });
      this.conductor.cancel(this.sessionId);
      return;
    }

    if (this.sessionId) {
      logger.warn("ignored second prompt on a busy channel", { sessionId: this.sessionId });
      return;
    }

    try {
      const started = this.conductor.startSession(parsed.message.prompt, {
        maxTurns: parsed.message.maxTurns,
        listener: (event) => this.forward(event),
      });
      this.sessionId = started.sessionId;
    } catch (error) {
      this.reject(error instanceof Error ? error.message : "invalid_prompt");
    }
  }

  /** The peer went away; a running session is cancelled. */
  disconnected(): void {
    if (this.sessionId && !this.finished) {
      logger.info("client disconnected mid-session", { sessionId: this.sessionId });
      this.conductor.cancel(this.sessionId, "Client disconnected");
    }
  }

  private forward(event: AgentEvent): void {
    this.send(event);
    logger.debug(`outbound ${event.kind}`, { sessionId: event.sessionId, eventId: event.id });

    if (TERMINAL_EVENT_KINDS.has(event.kind)) {
      this.finished = true;
      this.conductor.publisher.release(event.sessionId);
      this.close(NORMAL_CLOSURE, event.kind);
    }
  }

  private rejectOrIgnore(reason: string): void {
    if (this.sessionId) {
      logger.warn(`ignored invalid client message: ${reason}`, { sessionId: this.sessionId });
      return;
    }
    this.reject(reason);
  }

  private reject(reason: string): void {
    this.finished = true;
    this.send(makeEvent("error", "unknown", 1, {
      kind: "InvalidRequest",
      message: reason,
      turns: 0,
      costUsd: 0,
      elapsedSeconds: 0,
    }));
    this.close(POLICY_VIOLATION, "invalid_request");
  }

  private send(event: object): void {
    if (!this.socket.isOpen) {
      return;
    }

    try {
      this.socket.send(JSON.stringify(event));
    } catch (error) {
      const message = error instanceof Error ? error.message : "unknown send error";
      logger.warn(`failed to send websocket event: ${message}`);
    }
  }

  private close(code: number, reason: string): void {
    if (this.socket.isOpen) {
      this.socket.close(code, reason);
    }
  }
}
