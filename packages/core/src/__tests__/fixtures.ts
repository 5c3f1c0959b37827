/**
 * Shared fixtures for core tests: transcript line builders, a turn factory
 * and an in-memory adapter that records what it receives.
 */

import type { Turn } from "@trace-relay/shared";
import type { TraceAdapter } from "../adapters/types.js";

// ---------------------------------------------------------------------------
// Transcript lines
// ---------------------------------------------------------------------------

export function userLine(sessionId: string, text: string) {
  return { type: "user", sessionId, message: { role: "user", content: text } };
}

export function assistantLine(sessionId: string, messageId: string, text: string) {
  return {
    type: "assistant",
    sessionId,
    message: {
      id: messageId,
      role: "assistant",
      model: "claude-sonnet-4",
      content: [{ type: "text", text }],
    },
  };
}

export function toolUseLine(sessionId: string, messageId: string, toolId: string) {
  return {
    type: "assistant",
    sessionId,
    message: {
      id: messageId,
      role: "assistant",
      model: "claude-sonnet-4",
      content: [{ type: "tool_use", id: toolId, name: "Bash", input: { command: "npm test" } }],
    },
  };
}

export function toolResultLine(sessionId: string, toolId: string, output: string) {
  return {
    type: "user",
    sessionId,
    message: {
      role: "user",
      content: [{ type: "tool_result", tool_use_id: toolId, content: output }],
    },
  };
}

/** Serialize lines as a complete JSONL file body */
export function jsonl(lines: object[]): string {
  return lines.map((line) => JSON.stringify(line) + "\n").join("");
}

// ---------------------------------------------------------------------------
// Turns
// ---------------------------------------------------------------------------

export function makeTurn(turnNumber: number, sessionId = "sess-1"): Turn {
  return {
    sessionId,
    turnNumber,
    projectName: "demo",
    userMessage: userLine(sessionId, `question ${turnNumber}`),
    assistantMessages: [assistantLine(sessionId, `msg_${turnNumber}`, `answer ${turnNumber}`)],
    toolResults: [],
  };
}

// ---------------------------------------------------------------------------
// Adapter stand-in
// ---------------------------------------------------------------------------

export interface FakeAdapterOptions {
  name?: string;
  healthy?: boolean;
  /** Reject emit for these turn numbers */
  failTurns?: number[];
}

/** In-memory TraceAdapter that records every call */
export class FakeAdapter implements TraceAdapter {
  readonly name: string;
  readonly endpoint = "http://127.0.0.1:1";
  readonly emitted: Turn[] = [];
  healthChecks = 0;
  flushed = 0;
  shutDown = 0;
  /** Flip to simulate an outage or a recovery between passes */
  healthy: boolean;

  private readonly failTurns: Set<number>;

  constructor(options: FakeAdapterOptions = {}) {
    this.name = options.name ?? "fake";
    this.healthy = options.healthy ?? true;
    this.failTurns = new Set(options.failTurns ?? []);
  }

  async healthCheck(): Promise<boolean> {
    this.healthChecks++;
    return this.healthy;
  }

  async emit(turn: Turn): Promise<void> {
    if (this.failTurns.has(turn.turnNumber)) {
      throw new Error(`${this.name} rejected turn ${turn.turnNumber}`);
    }
    this.emitted.push(turn);
  }

  async flush(): Promise<void> {
    this.flushed++;
  }

  async shutdown(): Promise<void> {
    this.shutDown++;
  }

  /** Turn numbers received, in order */
  turnNumbers(): number[] {
    return this.emitted.map((turn) => turn.turnNumber);
  }
}
