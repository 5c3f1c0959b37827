/**
 * Langfuse adapter: renders a turn's span tree through the Langfuse SDK.
 *
 * Mapping:
 *   - root span   → trace (id = deterministic trace id, sessionId, tags)
 *   - generation  → trace.generation
 *   - tool spans  → trace.span, level ERROR when the tool result was an error
 *
 * Observations get ids derived from the trace id as well, so re-sending a
 * turn upserts the same trace instead of creating a second one.
 *
 * The SDK batches events in memory; emit() flushes after each turn so a
 * rejected batch surfaces as a rejected emit. flushAsync() itself always
 * resolves: the SDK reports failed uploads as "error" events, so those are
 * collected for the duration of the flush.
 */

import { Langfuse } from "langfuse";
import { NetworkError, errorMessage, type Logger, type Turn } from "@trace-relay/shared";
import { buildTurnTrace } from "../span-tree.js";
import { probeEndpoint } from "./probe.js";
import type { TraceAdapter } from "./types.js";

export interface LangfuseAdapterOptions {
  publicKey: string;
  secretKey: string;
  /** Base URL of the Langfuse server */
  host: string;
  healthCheckTimeoutMs: number;
  redact: boolean;
  logger: Logger;
}

export class LangfuseAdapter implements TraceAdapter {
  readonly name = "langfuse";
  readonly endpoint: string;

  private readonly client: Langfuse;
  private readonly healthCheckTimeoutMs: number;
  private readonly redact: boolean;
  private readonly logger: Logger;

  constructor(options: LangfuseAdapterOptions) {
    this.endpoint = options.host;
    this.healthCheckTimeoutMs = options.healthCheckTimeoutMs;
    this.redact = options.redact;
    this.logger = options.logger.child({ adapter: this.name });
    this.client = new Langfuse({
      publicKey: options.publicKey,
      secretKey: options.secretKey,
      baseUrl: options.host,
    });
  }

  healthCheck(): Promise<boolean> {
    return probeEndpoint(this.endpoint, this.healthCheckTimeoutMs);
  }

  async emit(turn: Turn): Promise<void> {
    const tree = buildTurnTrace(turn, { redact: this.redact });

    const trace = this.client.trace({
      id: tree.traceId,
      name: tree.name,
      sessionId: tree.sessionId,
      tags: tree.tags,
      metadata: tree.metadata,
      input: tree.input,
      output: tree.output,
      timestamp: tree.startTime,
    });

    trace.generation({
      id: `${tree.traceId}-generation`,
      name: tree.generation.name,
      model: tree.generation.model,
      input: tree.generation.input,
      output: tree.generation.output,
      metadata: tree.generation.metadata,
      startTime: tree.startTime,
      endTime: tree.endTime,
    });

    tree.tools.forEach((tool, index) => {
      trace.span({
        id: `${tree.traceId}-tool-${index}`,
        name: tool.name,
        input: tool.input,
        output: tool.output,
        metadata: tool.metadata,
        level: tool.isError ? "ERROR" : "DEFAULT",
      });
    });

    const failure = await this.flushCollectingErrors();
    if (failure !== undefined) {
      throw new NetworkError(
        `Langfuse rejected turn ${turn.turnNumber}: ${failure}`,
        "NETWORK_LANGFUSE_EXPORT",
        { sessionId: turn.sessionId, turnNumber: turn.turnNumber, host: this.endpoint },
      );
    }

    this.logger.debug(
      { sessionId: turn.sessionId, turnNumber: turn.turnNumber, tools: tree.tools.length },
      "Sent turn to Langfuse",
    );
  }

  async flush(): Promise<void> {
    const failure = await this.flushCollectingErrors();
    if (failure !== undefined) {
      throw new NetworkError(`Langfuse flush failed: ${failure}`, "NETWORK_LANGFUSE_EXPORT", {
        host: this.endpoint,
      });
    }
  }

  /**
   * Flush pending events. Returns the first error the SDK reported while
   * flushing, or undefined when the upload went through.
   */
  private async flushCollectingErrors(): Promise<string | undefined> {
    const errors: string[] = [];
    const offError = this.client.on("error", (err: unknown) => {
      errors.push(errorMessage(err));
    });
    const offWarning = this.client.on("warning", (warning: unknown) => {
      this.logger.warn({ warning: errorMessage(warning) }, "Langfuse SDK warning");
    });
    try {
      await this.client.flushAsync();
    } catch (err) {
      errors.push(errorMessage(err));
    } finally {
      offError();
      offWarning();
    }
    return errors[0];
  }

  async shutdown(): Promise<void> {
    await this.client.shutdownAsync();
  }
}
