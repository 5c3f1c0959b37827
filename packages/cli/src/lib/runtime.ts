/**
 * Wiring shared by every command: the logger, the state files and the
 * backend adapters, all built from one RelayConfig.
 */

import * as path from "node:path";
import { CheckpointStore, DeliveryQueue, type TraceAdapter } from "@trace-relay/core";
import { createLogger, type Logger, type RelayConfig } from "@trace-relay/shared";
import { loadConfig } from "./config.js";
import { formatError } from "./formatters.js";

export const LOG_FILENAME = "trace-relay.log";

export interface Runtime {
  config: RelayConfig;
  logger: Logger;
  checkpoints: CheckpointStore;
  queue: DeliveryQueue;
}

/**
 * JSON log under the state directory; mirrored to stderr in debug mode.
 * Nothing goes to stdout.
 */
export function createRelayLogger(config: RelayConfig, env = process.env): Logger {
  return createLogger({
    name: "trace-relay",
    level: config.debug ? "debug" : (env.LOG_LEVEL ?? "info"),
    file: path.join(config.paths.stateDir, LOG_FILENAME),
    stderr: config.debug,
  });
}

export function createRuntime(config: RelayConfig, logger: Logger): Runtime {
  return {
    config,
    logger,
    checkpoints: new CheckpointStore({ stateDir: config.paths.stateDir, logger }),
    queue: new DeliveryQueue({ stateDir: config.paths.stateDir, logger }),
  };
}

export interface HealthReport {
  healthy: TraceAdapter[];
  unhealthy: TraceAdapter[];
}

/** Probe every adapter; a probe that throws counts as unhealthy */
export async function checkHealth(adapters: readonly TraceAdapter[]): Promise<HealthReport> {
  const report: HealthReport = { healthy: [], unhealthy: [] };
  for (const adapter of adapters) {
    const ok = await adapter.healthCheck().catch(() => false);
    (ok ? report.healthy : report.unhealthy).push(adapter);
  }
  return report;
}

/** Flush and shut down adapters, logging failures */
export async function closeAdapters(
  adapters: readonly TraceAdapter[],
  logger: Logger,
): Promise<void> {
  for (const adapter of adapters) {
    try {
      await adapter.flush();
      await adapter.shutdown();
    } catch (err) {
      logger.warn({ err, backend: adapter.name }, "Failed to close backend");
    }
  }
}

/**
 * Load config, build the runtime and run an interactive command with it.
 * Errors are printed to stderr and set a non-zero exit code.
 */
export async function withRuntime(
  fn: (runtime: Runtime) => void | Promise<void>,
): Promise<void> {
  let runtime: Runtime;
  try {
    const config = loadConfig();
    runtime = createRuntime(config, createRelayLogger(config));
  } catch (err) {
    console.error(formatError(err));
    process.exitCode = 1;
    return;
  }

  try {
    await fn(runtime);
  } catch (err) {
    runtime.logger.error({ err }, "Command failed");
    console.error(formatError(err));
    process.exitCode = 1;
  }
}
