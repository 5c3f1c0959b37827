/**
 * `trace-relay status` command: relay state at a glance.
 *
 * Shows every backend (disabled, missing credentials, reachable or not),
 * how many sessions have a checkpoint, queue depth, and whether the Stop
 * hook is installed. Reachability uses the same TCP probe as the hook.
 */

import { Command } from "commander";
import pc from "picocolors";
import {
  createAdapters,
  describeBackends,
  type BackendDescription,
} from "@trace-relay/core";
import { formatRelativeTime, outputResult, plural } from "../lib/formatters.js";
import { checkHealth, closeAdapters, withRuntime, type Runtime } from "../lib/runtime.js";
import { isStopHookInstalled } from "./hooks.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface BackendStatus extends BackendDescription {
  /** null when the backend was not probed (disabled or not configured) */
  reachable: boolean | null;
}

export interface StatusData {
  backends: BackendStatus[];
  sessionsTracked: number;
  queue: { depth: number; oldestQueuedAt: string | null };
  hookInstalled: boolean;
  paths: { stateDir: string; projectsDir: string };
}

// ---------------------------------------------------------------------------
// Command factory
// ---------------------------------------------------------------------------

export function createStatusCommand(): Command {
  return new Command("status")
    .description("Show backends, tracked sessions, queue depth and hook state")
    .option("--json", "Output as JSON")
    .action(async (opts: { json?: boolean }) => {
      await withRuntime(async (runtime) => {
        const data = await fetchStatus(runtime);
        outputResult(data, { json: opts.json, format: formatStatus });
      });
    });
}

// ---------------------------------------------------------------------------
// Data Layer
// ---------------------------------------------------------------------------

export async function fetchStatus(
  runtime: Runtime,
  hookInstalled: () => boolean = isStopHookInstalled,
): Promise<StatusData> {
  const { config, logger, checkpoints, queue } = runtime;

  const adapters = createAdapters(config, logger);
  let reachable: Set<string>;
  try {
    const { healthy } = await checkHealth(adapters);
    reachable = new Set(healthy.map((adapter) => adapter.name));
  } finally {
    await closeAdapters(adapters, logger);
  }
  const probed = new Set(adapters.map((adapter) => adapter.name));

  let installed = false;
  try {
    installed = hookInstalled();
  } catch (err) {
    logger.warn({ err }, "Cannot read Claude Code settings");
  }

  return {
    backends: describeBackends(config).map((description) => ({
      ...description,
      reachable: probed.has(description.name) ? reachable.has(description.name) : null,
    })),
    sessionsTracked: Object.keys(checkpoints.load()).length,
    queue: { depth: queue.depth(), oldestQueuedAt: queue.oldestQueuedAt() ?? null },
    hookInstalled: installed,
    paths: { ...config.paths },
  };
}

// ---------------------------------------------------------------------------
// Presentation
// ---------------------------------------------------------------------------

function formatBackend(backend: BackendStatus): string {
  const label = `${backend.name}:`.padEnd(10);
  const where = backend.endpoint ? ` (${backend.endpoint})` : "";

  if (backend.state === "disabled") {
    return `  ${label}${pc.dim("disabled")}`;
  }
  if (backend.state === "missing-credentials") {
    return `  ${label}${pc.yellow("!")} not configured, missing ${backend.missing.join(", ")}`;
  }
  if (backend.reachable) {
    return `  ${label}${pc.green("✓")} reachable${where}`;
  }
  return `  ${label}${pc.red("✗")} unreachable${where}`;
}

export function formatStatus(data: StatusData): string {
  const lines: string[] = [];
  lines.push("trace-relay status");
  lines.push("");

  lines.push("  Backends:");
  for (const backend of data.backends) {
    lines.push("  " + formatBackend(backend));
  }
  lines.push("");

  lines.push(`  Sessions:   ${data.sessionsTracked} tracked`);
  const { depth, oldestQueuedAt } = data.queue;
  lines.push(
    `  Queue:      ${depth} ${plural(depth, "turn")} pending` +
      (depth > 0 ? ` · oldest ${formatRelativeTime(oldestQueuedAt)}` : ""),
  );
  lines.push(
    `  Stop hook:  ${data.hookInstalled ? pc.green("installed") : pc.yellow("not installed")}`,
  );
  lines.push("");
  lines.push(pc.dim(`  State:       ${data.paths.stateDir}`));
  lines.push(pc.dim(`  Transcripts: ${data.paths.projectsDir}`));

  return lines.join("\n");
}
