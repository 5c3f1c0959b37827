/**
 * Backend-agnostic span tree for one turn.
 *
 * Both adapters render the same structure:
 *
 *   Turn <n>                      root span (user text in, final answer out)
 *     Claude Response             generation (model, same in/out, tool_count)
 *     Tool: <name>                one per tool_use block, in call order
 *
 * A tool call's output is the content of the tool_result block carrying the
 * same call id. A call without a result (interrupted, or answered in a later
 * turn) gets a null output.
 */

import * as crypto from "node:crypto";
import type { RawTranscriptLine, Turn } from "@trace-relay/shared";
import { modelOf, textOf, toolResultBlocks, toolUseBlocks } from "./record-model.js";
import { redactText, redactValue } from "./redact.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Tag and metadata value identifying traces produced by this relay */
export const TRACE_SOURCE = "claude-code";

/** Model name used when no assistant message records one */
export const DEFAULT_MODEL = "claude";

export interface ChatPayload {
  role: "user" | "assistant";
  content: string;
}

export interface GenerationNode {
  name: string;
  model: string;
  input: ChatPayload;
  output: ChatPayload;
  metadata: { tool_count: number };
}

export interface ToolNode {
  name: string;
  /** tool_use id; "" when the transcript did not record one */
  toolId: string;
  toolName: string;
  input: unknown;
  /** null when no matching tool_result was seen */
  output: unknown;
  isError: boolean;
  metadata: { tool_name: string; tool_id: string };
}

export interface TurnTrace {
  /** 32 hex chars, stable for a (session, turn) pair */
  traceId: string;
  name: string;
  sessionId: string;
  turnNumber: number;
  projectName: string;
  tags: string[];
  input: ChatPayload;
  output: ChatPayload;
  metadata: {
    source: string;
    turn_number: number;
    session_id: string;
    project: string;
  };
  /** From the user line's timestamp, when recorded */
  startTime: Date | undefined;
  /** From the last assistant line's timestamp, when recorded */
  endTime: Date | undefined;
  generation: GenerationNode;
  tools: ToolNode[];
}

export interface BuildTraceOptions {
  /** Mask credentials in text and tool payloads */
  redact: boolean;
}

// ---------------------------------------------------------------------------
// Builder
// ---------------------------------------------------------------------------

export function buildTurnTrace(turn: Turn, options: BuildTraceOptions): TurnTrace {
  const cleanText = options.redact ? redactText : (text: string) => text;
  const cleanValue = options.redact ? redactValue : (value: unknown) => value;

  const userText = cleanText(textOf(turn.userMessage));
  const lastAssistant = turn.assistantMessages[turn.assistantMessages.length - 1];
  const finalOutput = cleanText(lastAssistant ? textOf(lastAssistant) : "");

  const [firstAssistant] = turn.assistantMessages;
  const model = (firstAssistant && modelOf(firstAssistant)) || DEFAULT_MODEL;

  // Later results for the same id replace earlier ones
  const results = new Map<string, { content: unknown; isError: boolean }>();
  for (const carrier of turn.toolResults) {
    for (const block of toolResultBlocks(carrier)) {
      results.set(block.tool_use_id, { content: block.content, isError: block.is_error });
    }
  }

  const tools: ToolNode[] = [];
  for (const message of turn.assistantMessages) {
    for (const call of toolUseBlocks(message)) {
      const result = call.id ? results.get(call.id) : undefined;
      tools.push({
        name: `Tool: ${call.name}`,
        toolId: call.id,
        toolName: call.name,
        input: cleanValue(call.input),
        output: result ? cleanValue(result.content) : null,
        isError: result?.isError ?? false,
        metadata: { tool_name: call.name, tool_id: call.id },
      });
    }
  }

  const input: ChatPayload = { role: "user", content: userText };
  const output: ChatPayload = { role: "assistant", content: finalOutput };

  const tags = [TRACE_SOURCE];
  if (turn.projectName) tags.push(turn.projectName);

  return {
    traceId: traceIdFor(turn.sessionId, turn.turnNumber),
    name: `Turn ${turn.turnNumber}`,
    sessionId: turn.sessionId,
    turnNumber: turn.turnNumber,
    projectName: turn.projectName,
    tags,
    input,
    output,
    metadata: {
      source: TRACE_SOURCE,
      turn_number: turn.turnNumber,
      session_id: turn.sessionId,
      project: turn.projectName,
    },
    startTime: timestampOf(turn.userMessage),
    endTime: lastAssistant ? timestampOf(lastAssistant) : undefined,
    generation: {
      name: "Claude Response",
      model,
      input,
      output,
      metadata: { tool_count: tools.length },
    },
    tools,
  };
}

/**
 * Deterministic trace id for a turn: the first 32 hex chars of
 * sha256("<sessionId>:<turnNumber>"). Re-sending a turn targets the same
 * trace, so backends that upsert by id do not duplicate it.
 */
export function traceIdFor(sessionId: string, turnNumber: number): string {
  return crypto
    .createHash("sha256")
    .update(`${sessionId}:${turnNumber}`)
    .digest("hex")
    .slice(0, 32);
}

function timestampOf(line: RawTranscriptLine): Date | undefined {
  if (!line.timestamp) return undefined;
  const date = new Date(line.timestamp);
  return Number.isNaN(date.getTime()) ? undefined : date;
}
