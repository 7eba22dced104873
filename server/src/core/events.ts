import crypto from "node:crypto";
import { isRecord } from "relay-agent-backend";
import { EventEnvelope, EventKind, EventPayloads } from "./types.js";

export function makeEvent<K extends EventKind>(
  kind: K,
  sessionId: string,
  sequence: number,
  payload: EventPayloads[K],
  id: string = crypto.randomUUID(),
  timestamp: string = new Date().toISOString(),
): EventEnvelope<K> {
  return {
    id,
    kind,
    sessionId,
    sequence,
    timestamp,
    payload,
  };
}

// ---------------------------------------------------------------------------
// Inbound client messages (WebSocket)
// ---------------------------------------------------------------------------

export type ClientMessage =
  | { type: "prompt"; prompt: string; maxTurns?: number }
  | { type: "cancel" };

export interface ParseResult {
  message?: ClientMessage;
  error?: string;
}

/**
 * Accepts `{ "prompt": "...", "max_turns": 5 }` (`query` is an alias for
 * `prompt`), `{ "type": "cancel" }`, or plain text taken as the prompt.
 */
export function parseClientMessage(raw: string, maxBytes: number): ParseResult {
  const size = Buffer.byteLength(raw, "utf8");
  if (size > maxBytes) {
    return { error: `message_too_large:${size}` };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    const text = raw.trim();
    return text ? { message: { type: "prompt", prompt: text } } : { error: "empty_prompt" };
  }

  if (!isRecord(parsed)) {
    return { error: "invalid_message" };
  }

  if (parsed.type === "cancel") {
    return { message: { type: "cancel" } };
  }

  const prompt = asString(parsed.prompt) ?? asString(parsed.query);
  if (!prompt || !prompt.trim()) {
    return { error: "missing_prompt" };
  }

  const maxTurns = parsed.max_turns;
  if (maxTurns === undefined || maxTurns === null) {
    return { message: { type: "prompt", prompt: prompt.trim() } };
  }
  if (typeof maxTurns !== "number" || !Number.isInteger(maxTurns) || maxTurns <= 0) {
    return { error: "invalid_max_turns" };
  }

  return { message: { type: "prompt", prompt: prompt.trim(), maxTurns } };
}

export function asString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}
