/**
 * Adapter factory: turns the relay config into the list of backends for
 * this run.
 *
 * A backend that is disabled, lacks credentials or fails to construct is
 * left out and logged; the others are still built.
 */

import {
  type LangfuseConfig,
  type Logger,
  type OtlpConfig,
  type RelayConfig,
} from "@trace-relay/shared";
import { LangfuseAdapter } from "./langfuse.js";
import { OtlpAdapter } from "./otlp.js";
import type { TraceAdapter } from "./types.js";

export type { TraceAdapter } from "./types.js";
export { LangfuseAdapter, type LangfuseAdapterOptions } from "./langfuse.js";
export { OtlpAdapter, exportHeaders, tracesUrl, type OtlpAdapterOptions } from "./otlp.js";
export { probeEndpoint, probeTargetOf, type ProbeTarget } from "./probe.js";

/** Why a backend is not in the adapter list */
export type BackendState = "ready" | "disabled" | "missing-credentials";

export interface BackendDescription {
  name: "langfuse" | "otlp";
  state: BackendState;
  endpoint: string | undefined;
  /** Config keys that must be set before the backend can be used */
  missing: string[];
}

function describeLangfuse(config: LangfuseConfig): BackendDescription {
  const missing: string[] = [];
  if (!config.publicKey) missing.push("LANGFUSE_PUBLIC_KEY");
  if (!config.secretKey) missing.push("LANGFUSE_SECRET_KEY");
  return {
    name: "langfuse",
    state: !config.enabled ? "disabled" : missing.length > 0 ? "missing-credentials" : "ready",
    endpoint: config.host,
    missing,
  };
}

function describeOtlp(config: OtlpConfig): BackendDescription {
  const missing: string[] = [];
  if (!config.endpoint) missing.push("OTLP_ENDPOINT");
  // Basic auth needs both halves; one without the other is a typo
  if (Boolean(config.instanceId) !== Boolean(config.apiToken)) {
    missing.push(config.instanceId ? "GRAFANA_API_TOKEN" : "GRAFANA_INSTANCE_ID");
  }
  return {
    name: "otlp",
    state: !config.enabled ? "disabled" : missing.length > 0 ? "missing-credentials" : "ready",
    endpoint: config.endpoint,
    missing,
  };
}

/** Configuration state of every known backend, for status output */
export function describeBackends(config: RelayConfig): BackendDescription[] {
  return [describeLangfuse(config.langfuse), describeOtlp(config.otlp)];
}

/**
 * Build an adapter for every enabled, fully configured backend.
 * Never throws.
 */
export function createAdapters(config: RelayConfig, logger: Logger): TraceAdapter[] {
  const log = logger.child({ component: "adapters" });
  const adapters: TraceAdapter[] = [];

  const build = (description: BackendDescription, construct: () => TraceAdapter): void => {
    if (description.state === "disabled") return;
    if (description.state === "missing-credentials") {
      log.warn(
        { backend: description.name, missing: description.missing },
        "Backend enabled but not configured, skipping for this run",
      );
      return;
    }
    try {
      adapters.push(construct());
    } catch (err) {
      log.error(
        { err, backend: description.name },
        "Backend failed to initialize, skipping for this run",
      );
    }
  };

  const { langfuse, otlp } = config;
  build(describeLangfuse(langfuse), () => {
    if (!langfuse.publicKey || !langfuse.secretKey) {
      throw new Error("Langfuse keys missing");
    }
    return new LangfuseAdapter({
      publicKey: langfuse.publicKey,
      secretKey: langfuse.secretKey,
      host: langfuse.host,
      healthCheckTimeoutMs: config.healthCheckTimeoutMs,
      redact: config.redactSecrets,
      logger,
    });
  });

  build(describeOtlp(otlp), () => {
    if (!otlp.endpoint) {
      throw new Error("OTLP endpoint missing");
    }
    return new OtlpAdapter({
      endpoint: otlp.endpoint,
      instanceId: otlp.instanceId,
      apiToken: otlp.apiToken,
      headers: otlp.headers,
      healthCheckTimeoutMs: config.healthCheckTimeoutMs,
      redact: config.redactSecrets,
      logger,
    });
  });

  return adapters;
}
