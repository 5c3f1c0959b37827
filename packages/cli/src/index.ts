#!/usr/bin/env -S node --import tsx

/**
 * trace-relay CLI entry point.
 *
 * Relays Claude Code conversation turns to Langfuse and/or an OTLP
 * collector. Uses Commander for argument parsing and subcommand routing.
 *
 * Available commands:
 *   hook   : Run one relay pass (the Claude Code Stop hook calls this)
 *   status : Backends, tracked sessions, queue depth, hook state
 *   queue  : Inspect, drain or clear the local delivery queue
 *   hooks  : Install/uninstall the Stop hook in ~/.claude/settings.json
 */

import { Command } from "commander";
import { createLogger } from "@trace-relay/shared";
import { createHookCommand } from "./commands/hook.js";
import { createHooksCommand } from "./commands/hooks.js";
import { createQueueCommand } from "./commands/queue.js";
import { createStatusCommand } from "./commands/status.js";

// ---------------------------------------------------------------------------
// Logger: last-resort errors only; commands log through their own logger
// ---------------------------------------------------------------------------

const logger = createLogger({
  name: "trace-relay",
  level: process.env.LOG_LEVEL ?? "warn",
  stderr: true,
});

/** The hook must never fail Claude Code's Stop event */
const isHook = process.argv[2] === "hook";

// ---------------------------------------------------------------------------
// Program setup
// ---------------------------------------------------------------------------

const program = new Command();

program
  .name("trace-relay")
  .description("Relay Claude Code conversation turns to tracing backends")
  .version("0.1.0");

program.addCommand(createHookCommand());
program.addCommand(createStatusCommand());
program.addCommand(createQueueCommand());
program.addCommand(createHooksCommand());

// ---------------------------------------------------------------------------
// Global error handling
// ---------------------------------------------------------------------------

process.on("unhandledRejection", (reason) => {
  if (!isHook) logger.fatal({ err: reason }, "Unhandled rejection");
  process.exit(isHook ? 0 : 1);
});

process.on("uncaughtException", (err) => {
  if (!isHook) logger.fatal({ err }, "Uncaught exception");
  process.exit(isHook ? 0 : 1);
});

// ---------------------------------------------------------------------------
// Parse and execute
// ---------------------------------------------------------------------------

program.parseAsync(process.argv).catch((err: unknown) => {
  if (!isHook) logger.fatal({ err }, "CLI execution failed");
  process.exit(isHook ? 0 : 1);
});
