/**
 * Tests for the `trace-relay queue` command group.
 */

import { afterEach, beforeEach, describe, expect, it } from "vitest";
import * as fs from "node:fs";
import { stripAnsi } from "../../lib/formatters.js";
import type { Runtime } from "../../lib/runtime.js";
import {
  formatDrainResult,
  formatQueueStatus,
  runQueueClear,
  runQueueDrain,
} from "../queue.js";
import { RecordingAdapter, captureOutput, makeTempDir, makeTurn, tempRuntime } from "./helpers.js";

let stateDir: string;
let runtime: Runtime;

beforeEach(() => {
  stateDir = makeTempDir("relay-queue-cmd-test-");
  runtime = tempRuntime(stateDir);
});

afterEach(() => {
  fs.rmSync(stateDir, { recursive: true, force: true });
});

function enqueue(...turnNumbers: number[]): void {
  for (const n of turnNumbers) {
    runtime.queue.enqueue(makeTurn(n));
  }
}

// ---------------------------------------------------------------------------
// queue status
// ---------------------------------------------------------------------------

describe("queue status", () => {
  it("reports an empty queue", () => {
    expect(formatQueueStatus(runtime)).toBe("Queue:   0 turns pending\nOldest:  n/a");
  });

  it("reports depth and the age of the oldest turn", () => {
    enqueue(1, 2);
    expect(formatQueueStatus(runtime)).toBe("Queue:   2 turns pending\nOldest:  just now");
  });
});

// ---------------------------------------------------------------------------
// queue drain
// ---------------------------------------------------------------------------

describe("queue drain", () => {
  it("does nothing for an empty queue", async () => {
    const out = captureOutput();
    const code = await runQueueDrain(runtime, [new RecordingAdapter("a", "http://a:1")], out.stream);

    expect(code).toBe(0);
    expect(out.text()).toBe("Queue is empty.\n");
  });

  it("fails when no backend is configured", async () => {
    enqueue(1);
    const out = captureOutput();

    expect(await runQueueDrain(runtime, [], out.stream)).toBe(1);
    expect(out.text()).toBe(
      "No backend is enabled and configured. Run `trace-relay status` for details.\n",
    );
    expect(runtime.queue.depth()).toBe(1);
  });

  it("keeps the queue when every backend is down", async () => {
    enqueue(1, 2);
    const down = new RecordingAdapter("otlp", "http://127.0.0.1:4318", false);
    const out = captureOutput();

    expect(await runQueueDrain(runtime, [down], out.stream)).toBe(1);
    expect(out.text()).toBe(
      "✗ otlp unreachable (http://127.0.0.1:4318)\nNo backend reachable; 2 turns stay queued.\n",
    );
    expect(runtime.queue.depth()).toBe(2);
    expect(down.emitted).toEqual([]);
  });

  it("delivers to the healthy backends only and empties the queue", async () => {
    enqueue(1, 2);
    const up = new RecordingAdapter("langfuse", "http://localhost:3050");
    const down = new RecordingAdapter("otlp", "http://127.0.0.1:4318", false);
    const out = captureOutput();

    expect(await runQueueDrain(runtime, [up, down], out.stream)).toBe(0);
    expect(up.emitted).toEqual([1, 2]);
    expect(down.emitted).toEqual([]);
    expect(runtime.queue.depth()).toBe(0);
    expect(out.text()).toBe(
      [
        "✗ otlp unreachable (http://127.0.0.1:4318)",
        "Draining: 1/2 turns...\rDraining: 2/2 turns...\r",
        "Delivered:       2 turns",
        "Failed emits:    0",
        "Still queued:    0",
        "",
      ].join("\n"),
    );
  });

  it("counts rejected emits without stopping", async () => {
    enqueue(1, 2, 3);
    const flaky = new RecordingAdapter("langfuse", "http://localhost:3050", true, [2]);
    const out = captureOutput();

    expect(await runQueueDrain(runtime, [flaky], out.stream)).toBe(0);
    expect(flaky.emitted).toEqual([1, 3]);
    expect(out.text()).toContain("Failed emits:    1\n");
    expect(runtime.queue.depth()).toBe(0);
  });
});

describe("formatDrainResult", () => {
  it("notes an interrupted drain", () => {
    const text = formatDrainResult({
      delivered: 1,
      failedDeliveries: 0,
      requeued: 4,
      aborted: true,
    });
    expect(stripAnsi(text)).toBe(
      [
        "Delivered:       1 turn",
        "Failed emits:    0",
        "Still queued:    4",
        "Drain stopped early; the remaining turns stay queued.",
      ].join("\n"),
    );
  });
});

// ---------------------------------------------------------------------------
// queue clear
// ---------------------------------------------------------------------------

describe("queue clear", () => {
  it("deletes every queued turn", () => {
    enqueue(1, 2);
    expect(runQueueClear(runtime)).toBe("Cleared 2 queued turns.");
    expect(runtime.queue.depth()).toBe(0);
  });

  it("is fine on an empty queue", () => {
    expect(runQueueClear(runtime)).toBe("Cleared 0 queued turns.");
  });
});
