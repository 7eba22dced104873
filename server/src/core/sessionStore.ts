import crypto from "node:crypto";
import { SessionState, SessionStatus } from "./types.js";

export interface NewSession {
  prompt: string;
  maxTurns: number;
}

/**
 * Running sessions by id, plus a bounded archive of finished ones.
 */
export class SessionStore {
  private readonly running = new Map<string, SessionState>();
  private readonly archive = new Map<string, SessionState>();
  private readonly archiveLimit: number;

  constructor(archiveLimit = 100) {
    this.archiveLimit = archiveLimit;
  }

  create(input: NewSession): SessionState {
    const created: SessionState = {
      sessionId: crypto.randomUUID(),
      prompt: input.prompt,
      turnCount: 0,
      maxTurns: input.maxTurns,
      accumulatedCost: 0,
      status: "running",
      phase: "started",
      toolsUsed: [],
      startedAt: Date.now(),
      controller: new AbortController(),
    };

    this.running.set(created.sessionId, created);
    return created;
  }

  get(sessionId: string): SessionState | undefined {
    return this.running.get(sessionId) ?? this.archive.get(sessionId);
  }

  isRunning(sessionId: string): boolean {
    return this.running.has(sessionId);
  }

  get runningCount(): number {
    return this.running.size;
  }

  recordTurn(state: SessionState, costUsd: number): void {
    if (state.turnCount >= state.maxTurns) {
      throw new Error(`session ${state.sessionId} already used its ${state.maxTurns} turns`);
    }
    state.turnCount += 1;
    state.accumulatedCost += costUsd;
  }

  recordToolUse(state: SessionState, toolName: string): void {
    if (!state.toolsUsed.includes(toolName)) {
      state.toolsUsed.push(toolName);
    }
  }

  /** Moves a session to its terminal status exactly once. Returns false if it was already terminal. */
  finish(state: SessionState, status: Exclude<SessionStatus, "running">): boolean {
    if (state.status !== "running") {
      return false;
    }

    state.status = status;
    state.phase = status;
    state.finishedAt = Date.now();

    this.running.delete(state.sessionId);
    this.archive.set(state.sessionId, state);
    if (this.archive.size > this.archiveLimit) {
      const oldest = this.archive.keys().next();
      if (!oldest.done) {
        this.archive.delete(oldest.value);
      }
    }
    return true;
  }
}
