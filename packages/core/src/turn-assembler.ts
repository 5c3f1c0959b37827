/**
 * Turn assembler: folds an ordered list of transcript records into
 * completed conversation turns.
 *
 * Single forward pass over the records read since the session's checkpoint.
 * Pure: no I/O, no clock, so the same records and start count always give
 * the same turns.
 *
 * Grouping rules:
 *   1. A tool_result line is collected into the current turn; it never
 *      starts a new one
 *   2. A genuine user line closes the current turn (if it has at least one
 *      assistant message) and opens the next
 *   3. Consecutive assistant lines sharing a message.id are merged into one
 *      message; an assistant line without an id stands alone
 *   4. End of stream closes the last turn only when the caller knows the
 *      response is finished (closeTrailingTurn); otherwise the last turn is
 *      left open
 *
 * An open trailing turn is not emitted. Its user line index is reported as
 * the consumed boundary, so the next pass reads it again and sees the tool
 * results and assistant lines written after this one.
 */

import type {
  AssistantRecord,
  RawContentBlock,
  RawTranscriptLine,
  TranscriptRecord,
  Turn,
  UserRecord,
} from "@trace-relay/shared";
import { contentOf } from "./record-model.js";

// ---------------------------------------------------------------------------
// Public interface
// ---------------------------------------------------------------------------

export interface AssembleOptions {
  sessionId: string;
  projectName: string;
  /** Turns already handled for this session; the first new turn is start + 1 */
  startTurnCount: number;
  /** Number of lines the records were parsed from */
  totalLines: number;
  /**
   * Line index of the first record in this batch. Records carry their
   * physical line index in the file, so a pass that starts mid-file passes
   * its start line here. Defaults to 0.
   */
  firstLineIndex?: number;
  /**
   * Emit the last turn at end of stream. Only safe when the response is
   * known to be complete, i.e. for the session whose Stop hook fired.
   * Defaults to false.
   */
  closeTrailingTurn?: boolean;
}

export interface AssembleResult {
  turns: Turn[];
  /**
   * Lines of this batch that are fully folded into `turns` or skipped.
   * Equal to `totalLines` unless the last turn was left open.
   */
  consumedLines: number;
}

/**
 * Group records into turns numbered from `startTurnCount + 1`.
 */
export function assembleTurns(
  records: readonly TranscriptRecord[],
  options: AssembleOptions,
): AssembleResult {
  const firstLineIndex = options.firstLineIndex ?? 0;
  const turns: Turn[] = [];

  let currentUser: UserRecord | null = null;
  let currentAssistants: RawTranscriptLine[] = [];
  let currentAssistantParts: RawTranscriptLine[] = [];
  let currentMessageId: string | null = null;
  let currentToolResults: RawTranscriptLine[] = [];

  /** Close the open multi-part accumulation, if any */
  const flushParts = (): void => {
    if (currentAssistantParts.length > 0) {
      currentAssistants.push(mergeAssistantParts(currentAssistantParts));
    }
    currentAssistantParts = [];
    currentMessageId = null;
  };

  /** Emit the current turn when it has both sides of the exchange */
  const emitTurn = (): void => {
    if (currentUser === null || currentAssistants.length === 0) return;
    turns.push({
      sessionId: options.sessionId,
      turnNumber: options.startTurnCount + turns.length + 1,
      projectName: options.projectName,
      userMessage: currentUser.raw,
      assistantMessages: currentAssistants,
      toolResults: currentToolResults,
    });
  };

  const onAssistant = (record: AssistantRecord): void => {
    if (record.messageId === null) {
      flushParts();
      currentAssistants.push(record.raw);
    } else if (record.messageId === currentMessageId) {
      currentAssistantParts.push(record.raw);
    } else {
      flushParts();
      currentMessageId = record.messageId;
      currentAssistantParts = [record.raw];
    }
  };

  for (const record of records) {
    switch (record.kind) {
      case "malformed":
        break;
      case "tool_result":
        currentToolResults.push(record.raw);
        break;
      case "user":
        flushParts();
        emitTurn();
        currentUser = record;
        currentAssistants = [];
        currentToolResults = [];
        break;
      case "assistant":
        onAssistant(record);
        break;
      default:
        assertNever(record);
    }
  }

  flushParts();
  const closeLast = options.closeTrailingTurn === true && currentAssistants.length > 0;
  if (closeLast) emitTurn();

  // Open turn: hand its user line back to the next pass
  const consumedLines =
    currentUser !== null && !closeLast
      ? currentUser.lineIndex - firstLineIndex
      : options.totalLines;

  return { turns, consumedLines };
}

// ---------------------------------------------------------------------------
// Assistant merging
// ---------------------------------------------------------------------------

/**
 * Merge the physical lines of one streamed assistant response.
 *
 * Content blocks are concatenated in order; string content becomes a text
 * block. The result keeps the first part's shape: nested `message.content`
 * when the first part has a message object, top-level `content` otherwise.
 */
export function mergeAssistantParts(
  parts: readonly RawTranscriptLine[],
): RawTranscriptLine {
  const [first] = parts;
  if (first === undefined) return {};

  const merged: Array<string | RawContentBlock | null> = [];
  for (const part of parts) {
    const content = contentOf(part);
    if (Array.isArray(content)) {
      merged.push(...content);
    } else if (typeof content === "string" && content.length > 0) {
      merged.push({ type: "text", text: content });
    }
  }

  if (first.message) {
    return { ...first, message: { ...first.message, content: merged } };
  }
  return { ...first, content: merged };
}

function assertNever(value: never): never {
  throw new Error(`Unhandled record: ${JSON.stringify(value)}`);
}
