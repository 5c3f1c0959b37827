/**
 * Lenient Zod schemas for raw Claude Code transcript lines.
 *
 * Transcripts are an external, append-only format we only read. These schemas
 * type the fields we look at and pass everything else through untouched, so a
 * merged or queued message still carries the full original object.
 *
 * A line whose known fields have the wrong JSON type fails to parse and is
 * classified as malformed by the record model. Individual content items that
 * are neither strings nor objects with a string `type` are replaced by `null`
 * instead of failing the whole line.
 */

import { z } from "zod";

/** One block inside a message's content list (text, tool_use, tool_result, ...) */
export const rawContentBlockSchema = z
  .object({
    type: z.string(),
    text: z.string().optional(),
    id: z.string().optional(),
    name: z.string().optional(),
    input: z.unknown().optional(),
    tool_use_id: z.string().optional(),
    content: z.unknown().optional(),
    is_error: z.boolean().optional(),
  })
  .passthrough();

/** Message content: a plain string or an ordered list of blocks */
export const rawContentSchema = z.union([
  z.string(),
  z.array(
    z.union([z.string(), rawContentBlockSchema]).nullable().catch(null),
  ),
]);

/** The nested `message` object carried by user and assistant lines */
export const rawMessageSchema = z
  .object({
    id: z.string().optional(),
    role: z.string().optional(),
    model: z.string().optional(),
    content: rawContentSchema.nullish(),
  })
  .passthrough();

/** A single JSONL line from a transcript */
export const transcriptLineSchema = z
  .object({
    /** Discriminator: "user", "assistant", "system", "summary", "progress", ... */
    type: z.string().optional(),
    sessionId: z.string().optional(),
    uuid: z.string().optional(),
    timestamp: z.string().optional(),
    cwd: z.string().optional(),
    /** Some producers put content at the top level instead of under `message` */
    content: rawContentSchema.nullish(),
    message: rawMessageSchema.optional(),
  })
  .passthrough();

export type RawContentBlock = z.infer<typeof rawContentBlockSchema>;
export type RawContent = z.infer<typeof rawContentSchema>;
export type RawTranscriptLine = z.infer<typeof transcriptLineSchema>;
