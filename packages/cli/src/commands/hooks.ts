/**
 * `trace-relay hooks` command group.
 *
 * Manages the Claude Code Stop hook that runs `trace-relay hook` after every
 * assistant response. The hook lives in ~/.claude/settings.json next to
 * hooks from other tools, which are always preserved.
 *
 * Subcommands:
 *   install  : Add or update the Stop hook (idempotent)
 *   uninstall: Remove it
 *   status   : Report whether it is installed
 */

import { Command } from "commander";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { isNotFound, writeFileAtomic } from "@trace-relay/core";
import { ConfigError } from "@trace-relay/shared";
import { RELAY_ENV_KEYS, type Env } from "../lib/config.js";
import { formatError } from "../lib/formatters.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Path to the Claude Code settings file */
const CLAUDE_SETTINGS_PATH = path.join(os.homedir(), ".claude", "settings.json");

const STOP_EVENT = "Stop";

/**
 * Substrings that identify a relay hook command: the CLI's own entry point,
 * the installed bin, and the earlier standalone Stop-hook script that this
 * relay replaces.
 */
const HOOK_MARKERS = ["trace-relay hook", "/cli/src/index.ts", "langfuse_hook.py"];

// ---------------------------------------------------------------------------
// Settings schema: only the fields we touch are typed, the rest pass through
// ---------------------------------------------------------------------------

const hookEntrySchema = z
  .object({
    type: z.string(),
    command: z.string().optional(),
  })
  .passthrough();

const hookConfigSchema = z
  .object({
    matcher: z.string().optional(),
    hooks: z.array(hookEntrySchema).default([]),
  })
  .passthrough();

const claudeSettingsSchema = z
  .object({
    hooks: z.record(z.string(), z.array(hookConfigSchema)).optional(),
    env: z.record(z.string(), z.string()).optional(),
  })
  .passthrough();

type HookEntry = z.infer<typeof hookEntrySchema>;
type HookConfig = z.infer<typeof hookConfigSchema>;
type ClaudeSettings = z.infer<typeof claudeSettingsSchema>;

export type InstallOutcome = "installed" | "updated" | "unchanged";

// ---------------------------------------------------------------------------
// Test overrides
// ---------------------------------------------------------------------------

let settingsPathOverride: string | undefined;
let hookCommandOverride: string | undefined;

/** Override the settings path (for tests only). Set to undefined to reset. */
export function overrideSettingsPath(p: string | undefined): void {
  settingsPathOverride = p;
}

/** Override the installed hook command (for tests only) */
export function overrideHookCommand(command: string | undefined): void {
  hookCommandOverride = command;
}

export function getSettingsPath(): string {
  return settingsPathOverride ?? CLAUDE_SETTINGS_PATH;
}

/**
 * Command Claude Code runs: this checkout's CLI entry under tsx, so the hook
 * works without a global install.
 */
export function getHookCommand(): string {
  if (hookCommandOverride) return hookCommandOverride;
  const entry = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..", "index.ts");
  return `node --import tsx ${JSON.stringify(entry)} hook`;
}

// ---------------------------------------------------------------------------
// Command factory
// ---------------------------------------------------------------------------

export function createHooksCommand(): Command {
  const cmd = new Command("hooks").description("Manage the Claude Code Stop hook");

  cmd
    .command("install")
    .description("Install the Stop hook into ~/.claude/settings.json")
    .option("--with-env", "Also copy the relay's environment variables into settings.json")
    .action((opts: { withEnv?: boolean }) => {
      report(() => {
        const outcome = installStopHook({ withEnv: opts.withEnv ?? false });
        const verb = { installed: "installed", updated: "updated", unchanged: "already installed" };
        console.log(`Stop hook ${verb[outcome]}.`);
        console.log(`  Command   → ${getHookCommand()}`);
        console.log(`  Settings  → ${getSettingsPath()}`);
      });
    });

  cmd
    .command("uninstall")
    .description("Remove the Stop hook")
    .action(() => {
      report(() => {
        console.log(
          uninstallStopHook() ? "Stop hook uninstalled." : "Stop hook was not installed.",
        );
      });
    });

  cmd
    .command("status")
    .description("Check whether the Stop hook is installed")
    .action(() => {
      report(() => {
        console.log(`Stop hook: ${isStopHookInstalled() ? "installed" : "not installed"}`);
      });
    });

  return cmd;
}

function report(fn: () => void): void {
  try {
    fn();
  } catch (err) {
    console.error(formatError(err));
    process.exitCode = 1;
  }
}

// ---------------------------------------------------------------------------
// Operations
// ---------------------------------------------------------------------------

export interface InstallOptions {
  /** Copy set relay env vars into settings.env without overwriting existing keys */
  withEnv?: boolean;
  env?: Env;
}

/**
 * Upsert the relay's Stop hook.
 *
 * @throws ConfigError CONFIG_SETTINGS_CORRUPTED when settings.json cannot be parsed
 */
export function installStopHook(options: InstallOptions = {}): InstallOutcome {
  const settingsPath = getSettingsPath();
  const settings: ClaudeSettings = readSettings(settingsPath) ?? {};
  const before = JSON.stringify(settings);

  settings.hooks ??= {};
  const outcome = upsertHook(settings.hooks, STOP_EVENT, getHookCommand());

  if (options.withEnv) {
    const env = options.env ?? process.env;
    settings.env ??= {};
    for (const key of RELAY_ENV_KEYS) {
      const value = env[key];
      if (value !== undefined && settings.env[key] === undefined) {
        settings.env[key] = value;
      }
    }
  }

  if (JSON.stringify(settings) === before) return "unchanged";
  writeFileAtomic(settingsPath, JSON.stringify(settings, null, 2) + "\n");
  return outcome;
}

/** Remove the relay's Stop hook; false when there was nothing to remove */
export function uninstallStopHook(): boolean {
  const settingsPath = getSettingsPath();
  const settings = readSettings(settingsPath);
  if (!settings?.hooks || !removeHook(settings.hooks, STOP_EVENT)) return false;

  writeFileAtomic(settingsPath, JSON.stringify(settings, null, 2) + "\n");
  return true;
}

export function isStopHookInstalled(): boolean {
  const hooks = readSettings(getSettingsPath())?.hooks;
  return (hooks?.[STOP_EVENT] ?? []).some((config) => config.hooks.some(isRelayHook));
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Parsed settings, or undefined when the file does not exist */
function readSettings(settingsPath: string): ClaudeSettings | undefined {
  let raw: string;
  try {
    raw = fs.readFileSync(settingsPath, "utf-8");
  } catch (err) {
    if (isNotFound(err)) return undefined;
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new ConfigError(
      `${settingsPath} is not valid JSON. Fix it manually or back it up and delete it.`,
      "CONFIG_SETTINGS_CORRUPTED",
      { path: settingsPath },
    );
  }

  const result = claudeSettingsSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigError(
      `${settingsPath} has an unexpected structure: ${result.error.message}`,
      "CONFIG_SETTINGS_CORRUPTED",
      { path: settingsPath, zodErrors: result.error.issues },
    );
  }
  return result.data;
}

function isRelayHook(entry: HookEntry): boolean {
  const command = entry.command;
  return command !== undefined && HOOK_MARKERS.some((marker) => command.includes(marker));
}

/**
 * Replace an existing relay hook in place, or append one to the first
 * catch-all config block (creating it if needed).
 */
function upsertHook(
  hooks: Record<string, HookConfig[]>,
  eventName: string,
  command: string,
): InstallOutcome {
  const entry: HookEntry = { type: "command", command };
  const configs = hooks[eventName] ?? [];
  hooks[eventName] = configs;

  for (const config of configs) {
    const index = config.hooks.findIndex(isRelayHook);
    if (index !== -1) {
      // Keep fields Claude Code may have added, such as a timeout
      config.hooks[index] = { ...config.hooks[index], ...entry };
      return "updated";
    }
  }

  const catchAll = configs.find((config) => !config.matcher);
  if (catchAll) {
    catchAll.hooks.push(entry);
  } else {
    configs.push({ matcher: "", hooks: [entry] });
  }
  return "installed";
}

/** Drop relay hooks and any config block left empty; true if anything was removed */
function removeHook(hooks: Record<string, HookConfig[]>, eventName: string): boolean {
  const configs = hooks[eventName];
  if (!configs) return false;

  let removed = false;
  for (const config of configs) {
    const kept = config.hooks.filter((entry) => !isRelayHook(entry));
    removed ||= kept.length !== config.hooks.length;
    config.hooks = kept;
  }

  const remaining = configs.filter((config) => config.hooks.length > 0);
  if (remaining.length > 0) {
    hooks[eventName] = remaining;
  } else {
    delete hooks[eventName];
  }
  return removed;
}
