/**
 * `trace-relay hook`: the Stop-hook entry point.
 *
 * Registered in ~/.claude/settings.json by `trace-relay hooks install` and
 * run by Claude Code after every assistant response. Runs one relay pass.
 *
 * Constraints:
 *   - Must produce NO stdout (could confuse Claude Code)
 *   - Always exits 0; every failure ends up in the log file
 *   - The hook context JSON on stdin names the session that just finished.
 *     The pass still finds every changed transcript itself, but closes the
 *     last turn only for that session; others may still be mid-response.
 *     Missing or unparseable context closes no trailing turn.
 */

import { Command } from "commander";
import { z } from "zod";
import { createAdapters, runPass, type PassResult, type PassTrigger } from "@trace-relay/core";
import { createSilentLogger, type Logger } from "@trace-relay/shared";
import { loadConfigLenient, type Env } from "../lib/config.js";
import { createRelayLogger, createRuntime } from "../lib/runtime.js";

export interface HookOptions {
  env?: Env;
  /** Hook context stream; null skips reading */
  stdin?: NodeJS.ReadableStream | null;
  /** Logger override for tests */
  logger?: Logger;
}

/** The fields of Claude Code's Stop hook context that the pass uses */
const hookContextSchema = z
  .object({
    session_id: z.string().optional(),
    transcript_path: z.string().optional(),
  })
  .passthrough();

// ---------------------------------------------------------------------------
// Command factory
// ---------------------------------------------------------------------------

export function createHookCommand(): Command {
  return new Command("hook")
    .description("Run one relay pass (called by the Claude Code Stop hook)")
    .action(async () => {
      await runHook();
      process.exitCode = 0;
    });
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

/** Run one pass. Never throws; null when the pass could not run */
export async function runHook(options: HookOptions = {}): Promise<PassResult | null> {
  const env = options.env ?? process.env;
  const input = await readInput(options.stdin === undefined ? process.stdin : options.stdin);
  const trigger = parseTrigger(input);

  const { config, error } = loadConfigLenient(env);
  let logger: Logger;
  try {
    logger = options.logger ?? createRelayLogger(config, env);
  } catch {
    // No usable log destination; the pass still runs
    logger = createSilentLogger();
  }

  if (error) {
    logger.error({ err: error }, "Config ignored, using environment and defaults");
  }
  if (!trigger) {
    logger.debug("No session in hook input, leaving trailing turns open");
  }

  try {
    const runtime = createRuntime(config, logger);
    const adapters = createAdapters(config, logger);
    return await runPass({ ...runtime, adapters, trigger });
  } catch (err) {
    logger.error({ err }, "Relay pass failed");
    return null;
  }
}

/**
 * Extract the finished session from the hook context. Undefined when the
 * input is not JSON or names neither a session id nor a transcript path.
 */
export function parseTrigger(input: string): PassTrigger | undefined {
  let json: unknown;
  try {
    json = JSON.parse(input);
  } catch {
    return undefined;
  }
  const parsed = hookContextSchema.safeParse(json);
  if (!parsed.success) return undefined;

  const sessionId = (parsed.data.session_id ?? "").trim();
  const transcriptPath = (parsed.data.transcript_path ?? "").trim();
  if (!sessionId && !transcriptPath) return undefined;
  return {
    ...(sessionId ? { sessionId } : {}),
    ...(transcriptPath ? { transcriptPath } : {}),
  };
}

/** Read stdin to the end so Claude Code never blocks writing to it */
async function readInput(stream: NodeJS.ReadableStream | null): Promise<string> {
  if (!stream || ("isTTY" in stream && stream.isTTY === true)) return "";
  const chunks: string[] = [];
  try {
    for await (const chunk of stream) {
      chunks.push(typeof chunk === "string" ? chunk : Buffer.from(chunk).toString("utf-8"));
    }
  } catch {
    // A closed or broken pipe is as good as an empty one
    return "";
  }
  return chunks.join("");
}
