/**
 * Configuration loading for the trace-relay CLI.
 *
 * One RelayConfig is built at startup and passed to every component.
 * Sources, later wins:
 *
 *   1. Built-in defaults
 *   2. <stateDir>/config.yaml (optional)
 *   3. Environment variables (the same names the Stop hook's settings.json
 *      `env` block sets)
 *
 * Directory layout:
 *   ~/.trace-relay/           (TRACE_RELAY_HOME)
 *     config.yaml      optional overrides
 *     checkpoint.json  per-session progress
 *     queue.jsonl      turns waiting for a backend
 *     trace-relay.log  JSON log
 */

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import {
  ConfigError,
  relayConfigFileSchema,
  relayConfigSchema,
  type RelayConfig,
  type RelayConfigFile,
} from "@trace-relay/shared";

// ---------------------------------------------------------------------------
// Path constants
// ---------------------------------------------------------------------------

export const CONFIG_FILENAME = "config.yaml";

/** Default state directory under the user's home */
export const DEFAULT_STATE_DIR = path.join(os.homedir(), ".trace-relay");

/** Where Claude Code keeps one transcript directory per project */
export const DEFAULT_PROJECTS_DIR = path.join(os.homedir(), ".claude", "projects");

export const DEFAULT_LANGFUSE_HOST = "http://localhost:3050";

/**
 * Environment variables the relay reads. `hooks install --with-env` copies
 * the ones that are set into Claude Code's settings so the hook sees them.
 */
export const RELAY_ENV_KEYS = [
  "TRACE_TO_LANGFUSE",
  "LANGFUSE_PUBLIC_KEY",
  "LANGFUSE_SECRET_KEY",
  "LANGFUSE_HOST",
  "TRACE_TO_OTLP",
  "TRACE_TO_GRAFANA",
  "OTLP_ENDPOINT",
  "GRAFANA_OTLP_ENDPOINT",
  "GRAFANA_INSTANCE_ID",
  "GRAFANA_API_TOKEN",
  "TRACE_RELAY_HEALTH_TIMEOUT_MS",
  "TRACE_RELAY_MAX_SESSIONS",
  "TRACE_RELAY_REDACT",
  "TRACE_RELAY_DEBUG",
  "TRACE_RELAY_HOME",
  "CLAUDE_PROJECTS_DIR",
] as const;

export type Env = Readonly<Record<string, string | undefined>>;

/** Numeric environment values: whole numbers above zero */
const envCountSchema = z.coerce.number().int().positive();

// ---------------------------------------------------------------------------
// Paths
// ---------------------------------------------------------------------------

/** State directory: TRACE_RELAY_HOME or ~/.trace-relay */
export function getStateDir(env: Env = process.env): string {
  return env.TRACE_RELAY_HOME ? expandHome(env.TRACE_RELAY_HOME) : DEFAULT_STATE_DIR;
}

export function getConfigPath(env: Env = process.env): string {
  return path.join(getStateDir(env), CONFIG_FILENAME);
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Build and validate the config.
 *
 * @throws ConfigError CONFIG_CORRUPTED: config.yaml is not valid YAML
 * @throws ConfigError CONFIG_INVALID: file or environment yields an invalid config
 */
export function loadConfig(env: Env = process.env): RelayConfig {
  return buildConfig(env, readConfigFile(getConfigPath(env)));
}

export interface LenientConfig {
  config: RelayConfig;
  /** Why the full config could not be used, if it could not */
  error?: ConfigError;
}

/**
 * Like loadConfig, but never throws. An environment variable with an invalid
 * value is skipped and every other setting kept; a broken config.yaml is
 * ignored in favour of environment and defaults. Used by the hook, which
 * must not fail.
 */
export function loadConfigLenient(env: Env = process.env): LenientConfig {
  try {
    return { config: loadConfig(env) };
  } catch (err) {
    const error = err instanceof ConfigError
      ? err
      : new ConfigError(String(err), "CONFIG_ERROR", { path: getConfigPath(env) });

    let file: RelayConfigFile | undefined;
    try {
      file = readConfigFile(getConfigPath(env));
    } catch {
      file = undefined;
    }
    try {
      return { config: buildConfig(env, file, { skipInvalidEnv: true }), error };
    } catch {
      try {
        return { config: buildConfig(env, undefined, { skipInvalidEnv: true }), error };
      } catch {
        return { config: defaults(env), error };
      }
    }
  }
}

// ---------------------------------------------------------------------------
// Layers
// ---------------------------------------------------------------------------

function defaults(env: Env): RelayConfig {
  return {
    langfuse: { enabled: false, host: DEFAULT_LANGFUSE_HOST },
    otlp: { enabled: false, headers: {} },
    healthCheckTimeoutMs: 2000,
    maxSessionsPerPass: 10,
    redactSecrets: true,
    debug: false,
    paths: { stateDir: getStateDir(env), projectsDir: DEFAULT_PROJECTS_DIR },
  };
}

/** Parse config.yaml; undefined when it does not exist or is empty */
function readConfigFile(configPath: string): RelayConfigFile | undefined {
  if (!fs.existsSync(configPath)) return undefined;

  const raw = fs.readFileSync(configPath, "utf-8");
  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (err) {
    throw new ConfigError(
      `Config file at ${configPath} is not valid YAML.`,
      "CONFIG_CORRUPTED",
      { path: configPath, parseError: String(err) },
    );
  }
  if (parsed === null || parsed === undefined) return undefined;

  const result = relayConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigError(
      `Config file at ${configPath} has invalid structure: ${result.error.message}`,
      "CONFIG_INVALID",
      { path: configPath, zodErrors: result.error.issues },
    );
  }
  return result.data;
}

interface BuildOptions {
  /** Leave a field at its file or default value when its env value is invalid */
  skipInvalidEnv?: boolean;
}

function buildConfig(
  env: Env,
  file: RelayConfigFile | undefined,
  options: BuildOptions = {},
): RelayConfig {
  const base = defaults(env);
  const fromFile: RelayConfigFile = file ?? {};

  const merged: RelayConfig = {
    langfuse: {
      enabled: fromFile.langfuse?.enabled ?? base.langfuse.enabled,
      publicKey: fromFile.langfuse?.publicKey,
      secretKey: fromFile.langfuse?.secretKey,
      host: fromFile.langfuse?.host ?? base.langfuse.host,
    },
    otlp: {
      enabled: fromFile.otlp?.enabled ?? base.otlp.enabled,
      endpoint: fromFile.otlp?.endpoint,
      instanceId: fromFile.otlp?.instanceId,
      apiToken: fromFile.otlp?.apiToken,
      headers: { ...fromFile.otlp?.headers },
    },
    healthCheckTimeoutMs: fromFile.healthCheckTimeoutMs ?? base.healthCheckTimeoutMs,
    maxSessionsPerPass: fromFile.maxSessionsPerPass ?? base.maxSessionsPerPass,
    redactSecrets: fromFile.redactSecrets ?? base.redactSecrets,
    debug: fromFile.debug ?? base.debug,
    paths: {
      stateDir: fromFile.paths?.stateDir
        ? expandHome(fromFile.paths.stateDir)
        : base.paths.stateDir,
      projectsDir: fromFile.paths?.projectsDir
        ? expandHome(fromFile.paths.projectsDir)
        : base.paths.projectsDir,
    },
  };

  const rejected = applyEnv(merged, env);
  if (rejected.length > 0 && !options.skipInvalidEnv) {
    throw new ConfigError(
      `Invalid environment: ${rejected.join(", ")} must be a positive whole number`,
      "CONFIG_INVALID",
      { keys: rejected },
    );
  }

  // YAML strings may be empty
  const result = relayConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError(
      `Invalid configuration: ${result.error.message}`,
      "CONFIG_INVALID",
      { zodErrors: result.error.issues },
    );
  }
  return result.data;
}

/**
 * Environment overrides, applied in place. Returns the keys whose values
 * were invalid; those fields are left unchanged.
 */
function applyEnv(config: RelayConfig, env: Env): string[] {
  const rejected: string[] = [];
  const count = (key: "TRACE_RELAY_HEALTH_TIMEOUT_MS" | "TRACE_RELAY_MAX_SESSIONS") => {
    const raw = env[key];
    if (!raw) return undefined;
    const parsed = envCountSchema.safeParse(raw);
    if (parsed.success) return parsed.data;
    rejected.push(key);
    return undefined;
  };

  const langfuseEnabled = env.TRACE_TO_LANGFUSE;
  if (langfuseEnabled !== undefined) config.langfuse.enabled = parseFlag(langfuseEnabled);
  if (env.LANGFUSE_PUBLIC_KEY) config.langfuse.publicKey = env.LANGFUSE_PUBLIC_KEY;
  if (env.LANGFUSE_SECRET_KEY) config.langfuse.secretKey = env.LANGFUSE_SECRET_KEY;
  if (env.LANGFUSE_HOST) config.langfuse.host = env.LANGFUSE_HOST;

  const otlpEnabled = env.TRACE_TO_OTLP ?? env.TRACE_TO_GRAFANA;
  if (otlpEnabled !== undefined) config.otlp.enabled = parseFlag(otlpEnabled);
  const endpoint = env.OTLP_ENDPOINT || env.GRAFANA_OTLP_ENDPOINT;
  if (endpoint) config.otlp.endpoint = endpoint;
  if (env.GRAFANA_INSTANCE_ID) config.otlp.instanceId = env.GRAFANA_INSTANCE_ID;
  if (env.GRAFANA_API_TOKEN) config.otlp.apiToken = env.GRAFANA_API_TOKEN;

  config.healthCheckTimeoutMs = count("TRACE_RELAY_HEALTH_TIMEOUT_MS") ?? config.healthCheckTimeoutMs;
  config.maxSessionsPerPass = count("TRACE_RELAY_MAX_SESSIONS") ?? config.maxSessionsPerPass;
  if (env.TRACE_RELAY_REDACT !== undefined) {
    config.redactSecrets = parseFlag(env.TRACE_RELAY_REDACT);
  }
  if (env.TRACE_RELAY_DEBUG !== undefined) config.debug = parseFlag(env.TRACE_RELAY_DEBUG);

  if (env.TRACE_RELAY_HOME) config.paths.stateDir = getStateDir(env);
  if (env.CLAUDE_PROJECTS_DIR) config.paths.projectsDir = expandHome(env.CLAUDE_PROJECTS_DIR);
  return rejected;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** "true", "1", "yes" and "on" (any case) are true; anything else false */
export function parseFlag(value: string): boolean {
  return ["true", "1", "yes", "on"].includes(value.trim().toLowerCase());
}

/** Replace a leading "~" with the home directory */
export function expandHome(p: string): string {
  if (p === "~") return os.homedir();
  if (p.startsWith("~/")) return path.join(os.homedir(), p.slice(2));
  return p;
}

