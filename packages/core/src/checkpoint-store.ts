/**
 * Checkpoint store: per-session progress through each transcript.
 *
 * Stored at <stateDir>/checkpoint.json as one pretty-printed JSON document
 * keyed by session id. The file is rewritten whole on every save, so callers
 * update a single session through set(), which reads the current document,
 * replaces one entry and writes it back.
 *
 * Loading never fails the caller: a missing file is an empty mapping, a
 * file that is not a JSON object is logged and treated as empty, and an
 * entry that does not match the schema is logged and dropped on its own.
 *
 * Not safe against two processes saving at once; the Stop hook runs one
 * pass at a time.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import {
  StorageError,
  checkpointFileSchema,
  errorMessage,
  sessionCheckpointSchema,
  type CheckpointMap,
  type Logger,
  type SessionCheckpoint,
} from "@trace-relay/shared";
import { isNotFound, writeFileAtomic } from "./fs-utils.js";

/** Filename of the checkpoint document inside the state directory */
export const CHECKPOINT_FILENAME = "checkpoint.json";

export interface CheckpointStoreOptions {
  /** Directory holding checkpoint.json */
  stateDir: string;
  logger: Logger;
}

export class CheckpointStore {
  readonly filePath: string;
  private readonly logger: Logger;

  constructor(options: CheckpointStoreOptions) {
    this.filePath = path.join(options.stateDir, CHECKPOINT_FILENAME);
    this.logger = options.logger.child({ component: "checkpoint" });
  }

  /**
   * Read every session's checkpoint. Returns {} when the file is missing or
   * unreadable or is not a JSON object; invalid entries are left out.
   */
  load(): CheckpointMap {
    let contents: string;
    try {
      contents = fs.readFileSync(this.filePath, "utf-8");
    } catch (err) {
      if (isNotFound(err)) return {};
      this.logger.warn({ err, path: this.filePath }, "Checkpoint file unreadable, starting empty");
      return {};
    }

    let json: unknown;
    try {
      json = JSON.parse(contents);
    } catch (err) {
      this.logger.warn({ err, path: this.filePath }, "Checkpoint file is not valid JSON, starting empty");
      return {};
    }

    const parsed = checkpointFileSchema.safeParse(json);
    if (!parsed.success) {
      this.logger.warn(
        { path: this.filePath, issues: parsed.error.issues },
        "Checkpoint file is not a session map, starting empty",
      );
      return {};
    }

    const mapping: CheckpointMap = {};
    for (const [sessionId, entry] of Object.entries(parsed.data)) {
      const checked = sessionCheckpointSchema.safeParse(entry);
      if (!checked.success) {
        // The session starts over from line 0; its trace ids keep resends idempotent
        this.logger.warn(
          { path: this.filePath, sessionId, issues: checked.error.issues },
          "Skipping invalid checkpoint entry",
        );
        continue;
      }
      mapping[sessionId] = checked.data;
    }
    return mapping;
  }

  /**
   * Overwrite the whole checkpoint document.
   * @throws StorageError when the file cannot be written
   */
  save(mapping: CheckpointMap): void {
    try {
      writeFileAtomic(this.filePath, JSON.stringify(mapping, null, 2) + "\n");
    } catch (err) {
      throw new StorageError("Failed to write checkpoint file", "STORAGE_CHECKPOINT_WRITE", {
        path: this.filePath,
        cause: errorMessage(err),
      });
    }
  }

  /** One session's checkpoint, or undefined if the session is new */
  get(sessionId: string): SessionCheckpoint | undefined {
    return this.load()[sessionId];
  }

  /**
   * Replace one session's checkpoint, leaving the others as they are on disk.
   * @throws StorageError when the file cannot be written
   */
  set(sessionId: string, checkpoint: SessionCheckpoint): void {
    const mapping = this.load();
    mapping[sessionId] = checkpoint;
    this.save(mapping);
  }
}
