/**
 * Record model: typed views over raw Claude Code transcript lines.
 *
 * Pure and total. The stream may contain partial JSON, record types we do
 * not care about, or missing fields; every function here degrades to an
 * empty string, empty list or `undefined` instead of throwing, so one bad
 * line can never abort a pass.
 */

import {
  transcriptLineSchema,
  type RawContent,
  type RawContentBlock,
  type RawTranscriptLine,
  type TextBlock,
  type ToolResultBlock,
  type ToolUseBlock,
  type TranscriptRecord,
} from "@trace-relay/shared";

// ---------------------------------------------------------------------------
// Line classification
// ---------------------------------------------------------------------------

/**
 * Parse one JSONL line into a classified record.
 *
 * The discriminator is the top-level `type`, falling back to `message.role`
 * for producers that omit it. Only user and assistant lines are useful;
 * everything else (system, summary, progress, snapshots) is `malformed`.
 */
export function parseRecordLine(
  line: string,
  lineIndex: number,
): TranscriptRecord {
  if (line.trim().length === 0) {
    return { kind: "malformed", lineIndex, reason: "Empty line" };
  }

  let json: unknown;
  try {
    json = JSON.parse(line);
  } catch {
    return { kind: "malformed", lineIndex, reason: "Invalid JSON" };
  }

  const parsed = transcriptLineSchema.safeParse(json);
  if (!parsed.success) {
    return { kind: "malformed", lineIndex, reason: "Unrecognized line shape" };
  }

  const raw = parsed.data;
  const sessionId = raw.sessionId ?? null;
  const role = raw.type ?? raw.message?.role;

  switch (role) {
    case "user":
      return isToolResultCarrier(raw)
        ? { kind: "tool_result", lineIndex, sessionId, raw }
        : { kind: "user", lineIndex, sessionId, raw };
    case "assistant":
      return {
        kind: "assistant",
        lineIndex,
        sessionId,
        raw,
        messageId: raw.message?.id || null,
      };
    case undefined:
      return { kind: "malformed", lineIndex, reason: "Missing type field" };
    default:
      return { kind: "malformed", lineIndex, reason: `Skipped line type: ${role}` };
  }
}

// ---------------------------------------------------------------------------
// Content accessors
// ---------------------------------------------------------------------------

/**
 * Content of a line: `message.content` when the line nests a message,
 * otherwise the top-level `content`.
 */
export function contentOf(raw: RawTranscriptLine): RawContent | undefined {
  if (raw.message) {
    return raw.message.content ?? undefined;
  }
  return raw.content ?? undefined;
}

/** Block objects in the content list, skipping bare strings and nulls */
function blocksOf(raw: RawTranscriptLine): RawContentBlock[] {
  const content = contentOf(raw);
  if (!Array.isArray(content)) return [];

  const blocks: RawContentBlock[] = [];
  for (const item of content) {
    if (item !== null && typeof item === "object") blocks.push(item);
  }
  return blocks;
}

/** True when the content list holds at least one tool_result block */
export function isToolResultCarrier(raw: RawTranscriptLine): boolean {
  return blocksOf(raw).some((block) => block.type === "tool_result");
}

/** tool_use blocks in order. Missing id/name become "" / "unknown". */
export function toolUseBlocks(raw: RawTranscriptLine): ToolUseBlock[] {
  return blocksOf(raw)
    .filter((block) => block.type === "tool_use")
    .map((block) => ({
      type: "tool_use",
      id: block.id ?? "",
      name: block.name ?? "unknown",
      input: block.input ?? {},
    }));
}

/** tool_result blocks in order */
export function toolResultBlocks(raw: RawTranscriptLine): ToolResultBlock[] {
  return blocksOf(raw)
    .filter((block) => block.type === "tool_result")
    .map((block) => ({
      type: "tool_result",
      tool_use_id: block.tool_use_id ?? "",
      content: block.content ?? null,
      is_error: block.is_error ?? false,
    }));
}

/** text blocks in order */
export function textBlocks(raw: RawTranscriptLine): TextBlock[] {
  return blocksOf(raw)
    .filter((block) => block.type === "text")
    .map((block) => ({ type: "text", text: block.text ?? "" }));
}

/**
 * Plain text of a line. String content is returned as-is; for a block list,
 * text blocks and bare string items are joined with newlines.
 */
export function textOf(raw: RawTranscriptLine): string {
  const content = contentOf(raw);
  if (typeof content === "string") return content;
  if (!Array.isArray(content)) return "";

  const parts: string[] = [];
  for (const item of content) {
    if (typeof item === "string") {
      parts.push(item);
    } else if (item !== null && item.type === "text") {
      parts.push(item.text ?? "");
    }
  }
  return parts.join("\n");
}

/** Model name from an assistant line, if recorded */
export function modelOf(raw: RawTranscriptLine): string | undefined {
  return raw.message?.model;
}
