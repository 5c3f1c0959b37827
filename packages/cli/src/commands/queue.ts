/**
 * `trace-relay queue` command group.
 *
 * Subcommands for the local delivery queue:
 *   - status: Show queue depth and the age of the oldest turn
 *   - drain : Health-check backends, then send every queued turn
 *   - clear : Delete the queue without sending it
 *
 * Turns land in the queue when no backend is reachable during a hook run.
 * The next hook run with a healthy backend drains it automatically; these
 * commands are for inspecting or forcing that by hand.
 */

import { Command } from "commander";
import pc from "picocolors";
import { createAdapters, type DrainResult, type TraceAdapter } from "@trace-relay/core";
import { formatRelativeTime, plural } from "../lib/formatters.js";
import { checkHealth, closeAdapters, withRuntime, type Runtime } from "../lib/runtime.js";

// ---------------------------------------------------------------------------
// Command group factory
// ---------------------------------------------------------------------------

export function createQueueCommand(): Command {
  const cmd = new Command("queue").description("Manage the local delivery queue");

  cmd
    .command("status")
    .description("Show queue depth and oldest turn age")
    .action(async () => {
      await withRuntime((runtime) => {
        console.log(formatQueueStatus(runtime));
      });
    });

  cmd
    .command("drain")
    .description("Send queued turns to every reachable backend")
    .action(async () => {
      await withRuntime(async (runtime) => {
        const adapters = createAdapters(runtime.config, runtime.logger);
        try {
          process.exitCode = await runQueueDrain(runtime, adapters);
        } finally {
          await closeAdapters(adapters, runtime.logger);
        }
      });
    });

  cmd
    .command("clear")
    .description("Delete all queued turns without sending them")
    .action(async () => {
      await withRuntime((runtime) => {
        console.log(runQueueClear(runtime));
      });
    });

  return cmd;
}

// ---------------------------------------------------------------------------
// Subcommand implementations
// ---------------------------------------------------------------------------

/** Text for `queue status` */
export function formatQueueStatus(runtime: Runtime): string {
  const depth = runtime.queue.depth();
  const oldest = runtime.queue.oldestQueuedAt();
  return [
    `Queue:   ${depth} ${plural(depth, "turn")} pending`,
    `Oldest:  ${depth > 0 ? formatRelativeTime(oldest) : "n/a"}`,
  ].join("\n");
}

/**
 * `queue drain`: deliver the queue to the healthy adapters, printing
 * progress in the foreground. Ctrl-C stops after the turn in flight and
 * keeps the rest queued.
 *
 * @returns the exit code
 */
export async function runQueueDrain(
  runtime: Runtime,
  adapters: readonly TraceAdapter[],
  output: NodeJS.WritableStream = process.stdout,
): Promise<number> {
  const print = (line: string) => output.write(line + "\n");

  const depth = runtime.queue.depth();
  if (depth === 0) {
    print("Queue is empty.");
    return 0;
  }
  if (adapters.length === 0) {
    print(pc.red("No backend is enabled and configured. Run `trace-relay status` for details."));
    return 1;
  }

  const { healthy, unhealthy } = await checkHealth(adapters);
  for (const adapter of unhealthy) {
    print(`${pc.red("✗")} ${adapter.name} unreachable (${adapter.endpoint})`);
  }
  if (healthy.length === 0) {
    print(`No backend reachable; ${depth} ${plural(depth, "turn")} stay queued.`);
    return 1;
  }

  const controller = new AbortController();
  const onInterrupt = () => controller.abort();
  process.once("SIGINT", onInterrupt);

  let result: DrainResult;
  try {
    result = await runtime.queue.drain(healthy, {
      signal: controller.signal,
      onProgress: (delivered, total) => {
        output.write(`Draining: ${delivered}/${total} turns...\r`);
      },
    });
  } finally {
    process.removeListener("SIGINT", onInterrupt);
  }
  output.write("\n");

  print(formatDrainResult(result));
  return result.aborted ? 1 : 0;
}

export function formatDrainResult(result: DrainResult): string {
  const lines = [
    `Delivered:       ${result.delivered} ${plural(result.delivered, "turn")}`,
    `Failed emits:    ${result.failedDeliveries}`,
    `Still queued:    ${result.requeued}`,
  ];
  if (result.aborted) {
    lines.push(pc.yellow("Drain stopped early; the remaining turns stay queued."));
  }
  return lines.join("\n");
}

/** `queue clear`: returns the message to print */
export function runQueueClear(runtime: Runtime): string {
  const depth = runtime.queue.depth();
  runtime.queue.clear();
  return `Cleared ${depth} queued ${plural(depth, "turn")}.`;
}
