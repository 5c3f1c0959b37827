/**
 * Turn, queue and checkpoint types. Derived from the Zod schemas so the
 * persisted shape and the in-memory shape cannot drift apart.
 */

import type { z } from "zod";
import type {
  queuedTurnSchema,
  sessionCheckpointSchema,
  turnSchema,
} from "../schemas/queued-turn.js";

/**
 * One user-message-to-assistant-response exchange, including tool calls and
 * their results. The unit of delivery.
 */
export type Turn = z.infer<typeof turnSchema>;

/** A Turn waiting in queue.jsonl for a healthy backend */
export type QueuedTurn = z.infer<typeof queuedTurnSchema>;

/** How far a session's transcript has been turned into delivered/queued turns */
export type SessionCheckpoint = z.infer<typeof sessionCheckpointSchema>;

/** Contents of checkpoint.json: sessionId → checkpoint */
export type CheckpointMap = Record<string, SessionCheckpoint>;
