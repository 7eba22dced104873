import { makeEvent } from "./events.js";
import { logger } from "./logger.js";
import { AgentEvent, EventEnvelope, EventKind, EventListener, EventPayloads, TERMINAL_EVENT_KINDS } from "./types.js";

interface SessionLog {
  events: AgentEvent[];
  listeners: Set<EventListener>;
  closed: boolean;
}

export interface SubscribeOptions {
  /** Deliver the events already in the log before live ones. */
  replay?: boolean;
}

/**
 * Append-only, per-session event log with live subscribers.
 *
 * A session's log is written only by the task running that session, so
 * ordering within a session is the order of emit() calls. Once a terminal
 * event (`done` or `error`) is appended the log is closed.
 */
export class EventStreamPublisher {
  private readonly logs = new Map<string, SessionLog>();

  emit<K extends EventKind>(sessionId: string, kind: K, payload: EventPayloads[K]): EventEnvelope<K> | undefined {
    const log = this.logFor(sessionId);
    if (log.closed) {
      logger.warn(`dropped ${kind} event after terminal event`, { sessionId });
      return undefined;
    }

    const event = makeEvent(kind, sessionId, log.events.length + 1, payload);
    const stored = event as AgentEvent;
    log.events.push(stored);
    if (TERMINAL_EVENT_KINDS.has(kind)) {
      log.closed = true;
    }

    for (const listener of [...log.listeners]) {
      this.deliver(listener, stored);
    }
    return event;
  }

  collect(sessionId: string): AgentEvent[] {
    return [...(this.logs.get(sessionId)?.events ?? [])];
  }

  isClosed(sessionId: string): boolean {
    return this.logs.get(sessionId)?.closed ?? false;
  }

  subscribe(sessionId: string, listener: EventListener, options: SubscribeOptions = {}): () => void {
    const log = this.logFor(sessionId);
    if (options.replay) {
      for (const event of log.events) {
        this.deliver(listener, event);
      }
    }

    log.listeners.add(listener);
    return () => {
      log.listeners.delete(listener);
    };
  }

  /** Forgets a session's log once nobody needs it any more. */
  release(sessionId: string): void {
    this.logs.delete(sessionId);
  }

  private logFor(sessionId: string): SessionLog {
    let log = this.logs.get(sessionId);
    if (!log) {
      log = { events: [], listeners: new Set(), closed: false };
      this.logs.set(sessionId, log);
    }
    return log;
  }

  private deliver(listener: EventListener, event: AgentEvent): void {
    try {
      listener(event);
    } catch (error) {
      const message = error instanceof Error ? error.message : "unknown listener error";
      logger.warn(`event listener failed on ${event.kind}: ${message}`, { sessionId: event.sessionId, eventId: event.id });
    }
  }
}
