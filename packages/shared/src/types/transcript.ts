/**
 * Transcript record types for the trace relay.
 *
 * Two layers:
 *   1. Raw: the parsed JSONL line (see schemas/transcript-line.ts), passed
 *      through untouched so backends and the queue see the original object
 *   2. Record: a tagged union classifying each physical line, which is what
 *      the turn assembler switches on
 */

import type { RawTranscriptLine } from "../schemas/transcript-line.js";

// ---------------------------------------------------------------------------
// Typed content blocks (views produced by the record model)
// ---------------------------------------------------------------------------

export interface TextBlock {
  type: "text";
  text: string;
}

export interface ToolUseBlock {
  type: "tool_use";
  /** Call identifier, matched by a later tool_result's tool_use_id */
  id: string;
  name: string;
  input: unknown;
}

export interface ToolResultBlock {
  type: "tool_result";
  tool_use_id: string;
  content: unknown;
  is_error: boolean;
}

// ---------------------------------------------------------------------------
// Records: one per physical line
// ---------------------------------------------------------------------------

/** Fields shared by every well-formed record */
interface RecordBase {
  /** 0-based physical line index in the transcript file */
  lineIndex: number;
  sessionId: string | null;
  raw: RawTranscriptLine;
}

/** A genuine user prompt: starts a new turn */
export interface UserRecord extends RecordBase {
  kind: "user";
}

/**
 * One physical assistant line. Claude Code streams a single response as
 * several lines sharing `message.id`; those are merged by the assembler.
 */
export interface AssistantRecord extends RecordBase {
  kind: "assistant";
  messageId: string | null;
}

/** A user-typed line carrying tool_result blocks: never starts a turn */
export interface ToolResultRecord extends RecordBase {
  kind: "tool_result";
}

/** Anything we cannot or do not use; always skipped */
export interface MalformedRecord {
  kind: "malformed";
  lineIndex: number;
  reason: string;
}

export type TranscriptRecord =
  | UserRecord
  | AssistantRecord
  | ToolResultRecord
  | MalformedRecord;
