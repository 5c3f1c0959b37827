/**
 * Zod schema for the relay configuration.
 *
 * The CLI builds one RelayConfig at startup (defaults → config.yaml → env) and
 * hands it to every component. Backend credentials are optional here: an
 * enabled backend with missing credentials is disabled for the run by the
 * adapter factory instead of failing validation for everything else.
 */

import { z } from "zod";

export const langfuseConfigSchema = z.object({
  enabled: z.boolean(),
  publicKey: z.string().min(1).optional(),
  secretKey: z.string().min(1).optional(),
  /** Base URL of the Langfuse server */
  host: z.string().min(1),
});

export const otlpConfigSchema = z.object({
  enabled: z.boolean(),
  /** OTLP/HTTP traces URL, e.g. https://otlp-gateway.example.net/otlp/v1/traces */
  endpoint: z.string().min(1).optional(),
  /** Basic-auth user (Grafana Cloud instance id) */
  instanceId: z.string().min(1).optional(),
  /** Basic-auth password (Grafana Cloud API token) */
  apiToken: z.string().min(1).optional(),
  /** Extra headers sent with every export request */
  headers: z.record(z.string(), z.string()),
});

export const relayConfigSchema = z.object({
  langfuse: langfuseConfigSchema,
  otlp: otlpConfigSchema,
  /** Timeout for the TCP reachability probe per backend */
  healthCheckTimeoutMs: z.number().int().positive(),
  /** Cap on sessions processed in one pass; oldest excess waits for the next run */
  maxSessionsPerPass: z.number().int().positive(),
  /** Redact obvious secrets from text and tool payloads before sending */
  redactSecrets: z.boolean(),
  /** Verbose logging, mirrored to stderr */
  debug: z.boolean(),
  paths: z.object({
    /** Holds checkpoint.json, queue.jsonl, trace-relay.log and config.yaml */
    stateDir: z.string().min(1),
    /** Claude Code transcript root (one directory per project) */
    projectsDir: z.string().min(1),
  }),
});

/** Shape accepted from config.yaml: every key optional */
export const relayConfigFileSchema = relayConfigSchema.deepPartial();

export type LangfuseConfig = z.infer<typeof langfuseConfigSchema>;
export type OtlpConfig = z.infer<typeof otlpConfigSchema>;
export type RelayConfig = z.infer<typeof relayConfigSchema>;
export type RelayConfigFile = z.infer<typeof relayConfigFileSchema>;
