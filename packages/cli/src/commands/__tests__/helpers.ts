/**
 * Test helpers for CLI commands: a runtime over a temp state directory, a
 * recording adapter and an output stream that captures what is written.
 */

import * as fs from "node:fs";
import * as net from "node:net";
import * as os from "node:os";
import * as path from "node:path";
import { Writable } from "node:stream";
import type { TraceAdapter } from "@trace-relay/core";
import { createSilentLogger, type Turn } from "@trace-relay/shared";
import { loadConfig } from "../../lib/config.js";
import { stripAnsi } from "../../lib/formatters.js";
import { createRuntime, type Runtime } from "../../lib/runtime.js";

export function makeTempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

/** Runtime with default config and a silent logger, state kept in stateDir */
export function tempRuntime(stateDir: string): Runtime {
  const config = loadConfig({ TRACE_RELAY_HOME: stateDir });
  return createRuntime(config, createSilentLogger());
}

export function makeTurn(turnNumber: number, sessionId = "sess-1"): Turn {
  return {
    sessionId,
    turnNumber,
    projectName: "demo",
    userMessage: {
      type: "user",
      sessionId,
      message: { role: "user", content: `question ${turnNumber}` },
    },
    assistantMessages: [
      {
        type: "assistant",
        sessionId,
        message: {
          id: `msg_${turnNumber}`,
          role: "assistant",
          model: "claude-sonnet-4",
          content: [{ type: "text", text: `answer ${turnNumber}` }],
        },
      },
    ],
    toolResults: [],
  };
}

export class RecordingAdapter implements TraceAdapter {
  readonly emitted: number[] = [];

  constructor(
    readonly name: string,
    readonly endpoint: string,
    private readonly healthy = true,
    private readonly failTurns: number[] = [],
  ) {}

  async healthCheck(): Promise<boolean> {
    return this.healthy;
  }

  async emit(turn: Turn): Promise<void> {
    if (this.failTurns.includes(turn.turnNumber)) {
      throw new Error(`rejected turn ${turn.turnNumber}`);
    }
    this.emitted.push(turn.turnNumber);
  }

  async flush(): Promise<void> {}

  async shutdown(): Promise<void> {}
}

/** Writable that keeps everything written to it, ANSI codes stripped on read */
export function captureOutput(): { stream: Writable; text: () => string } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk, _encoding, callback) {
      chunks.push(String(chunk));
      callback();
    },
  });
  return { stream, text: () => stripAnsi(chunks.join("")) };
}

/** A loopback port that was free a moment ago, so connecting is refused */
export async function closedPort(): Promise<number> {
  const server = net.createServer();
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  const port = typeof address === "object" && address !== null ? address.port : 0;
  await new Promise<void>((resolve, reject) =>
    server.close((err) => (err ? reject(err) : resolve())),
  );
  return port;
}
