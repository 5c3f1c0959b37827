/**
 * OTLP adapter: exports a turn's span tree as OpenTelemetry spans over
 * OTLP/HTTP (Grafana Cloud, Tempo, any collector).
 *
 * Span layout mirrors the Langfuse trace: one root span per turn with the
 * generation and tool spans as its children. Attributes follow the GenAI
 * semantic conventions where one exists (gen_ai.*); everything specific to
 * the relay lives under trace_relay.*.
 *
 * The root span's trace id is the deterministic turn trace id, supplied by
 * an id generator that is primed just before the root span starts.
 *
 * Auth: Basic (instance id + API token, as Grafana Cloud issues them) when
 * both are configured, plus any extra headers.
 */

import {
  ROOT_CONTEXT,
  SpanKind,
  SpanStatusCode,
  trace,
  type Attributes,
  type Span,
} from "@opentelemetry/api";
import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-http";
import { resourceFromAttributes } from "@opentelemetry/resources";
import {
  BasicTracerProvider,
  BatchSpanProcessor,
  RandomIdGenerator,
  type IdGenerator,
  type SpanExporter,
} from "@opentelemetry/sdk-trace-base";
import { NetworkError, errorMessage, type Logger, type Turn } from "@trace-relay/shared";
import { TRACE_SOURCE, buildTurnTrace, type TurnTrace } from "../span-tree.js";
import { probeEndpoint } from "./probe.js";
import type { TraceAdapter } from "./types.js";

/** Path of the traces receiver under OTLP/HTTP */
const TRACES_PATH = "/v1/traces";

/** Export request timeout */
const EXPORT_TIMEOUT_MS = 10_000;

export interface OtlpAdapterOptions {
  /** OTLP base URL or full traces URL */
  endpoint: string;
  instanceId?: string;
  apiToken?: string;
  headers?: Record<string, string>;
  healthCheckTimeoutMs: number;
  redact: boolean;
  logger: Logger;
  /** Replaces the OTLP/HTTP exporter (tests pass an in-memory one) */
  exporter?: SpanExporter;
}

// ---------------------------------------------------------------------------
// Trace id control
// ---------------------------------------------------------------------------

/**
 * Random ids, except that the next trace id can be fixed in advance. Spans
 * are started synchronously one turn at a time, so the primed id is always
 * taken by the root span it was primed for.
 */
class TurnIdGenerator implements IdGenerator {
  private readonly random = new RandomIdGenerator();
  private nextTraceId: string | undefined;

  prime(traceId: string): void {
    this.nextTraceId = traceId;
  }

  generateTraceId(): string {
    const id = this.nextTraceId ?? this.random.generateTraceId();
    this.nextTraceId = undefined;
    return id;
  }

  generateSpanId(): string {
    return this.random.generateSpanId();
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Append /v1/traces unless the URL already points at it */
export function tracesUrl(endpoint: string): string {
  const trimmed = endpoint.replace(/\/+$/, "");
  return trimmed.endsWith(TRACES_PATH) ? trimmed : `${trimmed}${TRACES_PATH}`;
}

/** Request headers: extra headers plus Basic auth when both parts are set */
export function exportHeaders(
  options: Pick<OtlpAdapterOptions, "instanceId" | "apiToken" | "headers">,
): Record<string, string> {
  const headers: Record<string, string> = { ...(options.headers ?? {}) };
  if (options.instanceId && options.apiToken) {
    const credentials = Buffer.from(`${options.instanceId}:${options.apiToken}`).toString("base64");
    headers.Authorization = `Basic ${credentials}`;
  }
  return headers;
}

/** Attribute values must be primitives; structured payloads go as JSON */
function jsonAttribute(value: unknown): string {
  return typeof value === "string" ? value : JSON.stringify(value) ?? "null";
}

// ---------------------------------------------------------------------------
// Adapter
// ---------------------------------------------------------------------------

export class OtlpAdapter implements TraceAdapter {
  readonly name = "otlp";
  readonly endpoint: string;

  private readonly provider: BasicTracerProvider;
  private readonly processor: BatchSpanProcessor;
  private readonly ids = new TurnIdGenerator();
  private readonly healthCheckTimeoutMs: number;
  private readonly redact: boolean;
  private readonly logger: Logger;

  constructor(options: OtlpAdapterOptions) {
    this.endpoint = tracesUrl(options.endpoint);
    this.healthCheckTimeoutMs = options.healthCheckTimeoutMs;
    this.redact = options.redact;
    this.logger = options.logger.child({ adapter: this.name });

    const exporter =
      options.exporter ??
      new OTLPTraceExporter({
        url: this.endpoint,
        headers: exportHeaders(options),
        timeoutMillis: EXPORT_TIMEOUT_MS,
      });

    this.processor = new BatchSpanProcessor(exporter);
    this.provider = new BasicTracerProvider({
      resource: resourceFromAttributes({ "service.name": TRACE_SOURCE }),
      idGenerator: this.ids,
      spanProcessors: [this.processor],
    });
  }

  healthCheck(): Promise<boolean> {
    return probeEndpoint(this.endpoint, this.healthCheckTimeoutMs);
  }

  async emit(turn: Turn): Promise<void> {
    const tree = buildTurnTrace(turn, { redact: this.redact });
    this.record(tree);

    // The processor rejects with the exporter's error; the provider would
    // wrap it in an array
    try {
      await this.processor.forceFlush();
    } catch (err) {
      throw new NetworkError(
        `OTLP export failed for turn ${turn.turnNumber}: ${errorMessage(err)}`,
        "NETWORK_OTLP_EXPORT",
        { sessionId: turn.sessionId, turnNumber: turn.turnNumber, endpoint: this.endpoint },
      );
    }

    this.logger.debug(
      { sessionId: turn.sessionId, turnNumber: turn.turnNumber, tools: tree.tools.length },
      "Exported turn over OTLP",
    );
  }

  async flush(): Promise<void> {
    await this.provider.forceFlush();
  }

  async shutdown(): Promise<void> {
    await this.provider.shutdown();
  }

  /** Start and end every span of the tree */
  private record(tree: TurnTrace): void {
    const tracer = this.provider.getTracer("trace-relay");
    const startTime = tree.startTime ?? new Date();
    const endTime =
      tree.endTime && tree.endTime.getTime() >= startTime.getTime() ? tree.endTime : startTime;

    this.ids.prime(tree.traceId);
    const root: Span = tracer.startSpan(
      tree.name,
      {
        kind: SpanKind.INTERNAL,
        startTime,
        attributes: {
          "gen_ai.conversation.id": tree.sessionId,
          "session.id": tree.sessionId,
          "trace_relay.source": tree.metadata.source,
          "trace_relay.turn_number": tree.turnNumber,
          "trace_relay.project": tree.projectName,
          "trace_relay.tags": tree.tags,
          "trace_relay.input": tree.input.content,
          "trace_relay.output": tree.output.content,
        },
      },
      ROOT_CONTEXT,
    );
    const parent = trace.setSpan(ROOT_CONTEXT, root);

    const generation = tree.generation;
    const generationAttributes: Attributes = {
      "gen_ai.operation.name": "chat",
      "gen_ai.system": "anthropic",
      "gen_ai.request.model": generation.model,
      "gen_ai.input.messages": JSON.stringify([generation.input]),
      "gen_ai.output.messages": JSON.stringify([generation.output]),
      "trace_relay.tool_count": generation.metadata.tool_count,
    };
    tracer
      .startSpan(
        generation.name,
        { kind: SpanKind.CLIENT, startTime, attributes: generationAttributes },
        parent,
      )
      .end(endTime);

    for (const tool of tree.tools) {
      const attributes: Attributes = {
        "gen_ai.operation.name": "execute_tool",
        "gen_ai.tool.name": tool.toolName,
        "gen_ai.tool.call.id": tool.toolId,
        "trace_relay.tool.input": jsonAttribute(tool.input),
      };
      if (tool.output !== null) {
        attributes["trace_relay.tool.output"] = jsonAttribute(tool.output);
      }

      const span = tracer.startSpan(
        tool.name,
        { kind: SpanKind.INTERNAL, startTime, attributes },
        parent,
      );
      if (tool.isError) {
        span.setStatus({ code: SpanStatusCode.ERROR, message: "Tool returned an error" });
      }
      span.end(endTime);
    }

    root.end(endTime);
  }
}
