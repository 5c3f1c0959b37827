/**
 * Schemas for the two files the relay persists between runs:
 *
 *   - checkpoint.json: per-session position and turn count
 *   - queue.jsonl    : turns that could not be delivered, one per line
 *
 * Both are validated on load. Anything that fails validation is treated as
 * absent rather than crashing the run.
 */

import { z } from "zod";
import { transcriptLineSchema } from "./transcript-line.js";

// ---------------------------------------------------------------------------
// Turn payload
// ---------------------------------------------------------------------------

/** A completed conversation turn as delivered to backends and stored in the queue */
export const turnSchema = z.object({
  sessionId: z.string().min(1),
  /** 1-based, monotonic per session across runs */
  turnNumber: z.number().int().positive(),
  /** Human-readable project derived from the transcript directory */
  projectName: z.string().default(""),
  userMessage: transcriptLineSchema,
  /** At least one merged assistant message: a turn never exists without one */
  assistantMessages: z.array(transcriptLineSchema).min(1),
  toolResults: z.array(transcriptLineSchema),
});

/** One line of queue.jsonl */
export const queuedTurnSchema = turnSchema.extend({
  /** ISO-8601 time the turn was put in the queue */
  queuedAt: z.string().min(1),
});

// ---------------------------------------------------------------------------
// Checkpoint file
// ---------------------------------------------------------------------------

export const sessionCheckpointSchema = z.object({
  /** Number of raw lines already folded into a turn or discarded */
  lastLineConsumed: z.number().int().nonnegative(),
  /** Cumulative turns delivered or queued */
  turnCount: z.number().int().nonnegative(),
  /** ISO-8601; compared against the transcript's mtime during discovery */
  updatedAt: z.string().min(1),
});

/**
 * Whole checkpoint.json document: sessionId → entry. Entries are checked
 * one by one against sessionCheckpointSchema so a bad one costs only its
 * own session.
 */
export const checkpointFileSchema = z.record(z.string(), z.unknown());
