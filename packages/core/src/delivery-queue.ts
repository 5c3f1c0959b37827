/**
 * Local delivery queue for turns no backend could take.
 *
 * When every backend fails its health check, the orchestrator appends each
 * new turn here instead of dropping it, and the next run with a healthy
 * backend drains the queue before sending anything new.
 *
 * Stored at <stateDir>/queue.jsonl, one QueuedTurn per line, oldest first.
 *
 * Key behaviors:
 *   - enqueue never throws: it is the last-resort path. If even the append
 *     fails, the turn is logged as lost and the run carries on.
 *   - A full drain deletes the file. An interrupted drain rewrites it with
 *     the undelivered remainder in original order.
 *   - A per-adapter emit failure is counted and logged; it does not stop
 *     the drain or the other adapters.
 *   - A crash between delivering and rewriting the file means those turns
 *     are sent again next time. Adapters upsert by trace id.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import {
  StorageError,
  errorMessage,
  queuedTurnSchema,
  type Logger,
  type QueuedTurn,
  type Turn,
} from "@trace-relay/shared";
import type { TraceAdapter } from "./adapters/types.js";
import { isNotFound, writeFileAtomic } from "./fs-utils.js";

/** Filename of the queue inside the state directory */
export const QUEUE_FILENAME = "queue.jsonl";

// ---------------------------------------------------------------------------
// Public types
// ---------------------------------------------------------------------------

export interface DeliveryQueueOptions {
  /** Directory holding queue.jsonl */
  stateDir: string;
  logger: Logger;
  /** Clock for queuedAt stamps (tests pin it) */
  now?: () => Date;
}

/** Result summary returned after a drain attempt */
export interface DrainResult {
  /** Turns taken off the queue (every adapter was tried for each) */
  delivered: number;
  /** Individual adapter emits that failed */
  failedDeliveries: number;
  /** Turns written back to the queue after an interruption */
  requeued: number;
  /** True when the drain stopped before the end of the queue */
  aborted: boolean;
}

export interface DrainOptions {
  /** Called after each turn has been sent to every adapter */
  onProgress?: (delivered: number, total: number) => void;
  /** Stop before the next turn once aborted; the rest stays queued */
  signal?: AbortSignal;
}

// ---------------------------------------------------------------------------
// Queue
// ---------------------------------------------------------------------------

export class DeliveryQueue {
  readonly filePath: string;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: DeliveryQueueOptions) {
    this.filePath = path.join(options.stateDir, QUEUE_FILENAME);
    this.logger = options.logger.child({ component: "queue" });
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Append a turn to the queue.
   *
   * @returns true when the turn is on disk, false when the write failed.
   *          NEVER throws.
   */
  enqueue(turn: Turn): boolean {
    const queued: QueuedTurn = { ...turn, queuedAt: this.now().toISOString() };

    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.appendFileSync(this.filePath, JSON.stringify(queued) + "\n", "utf-8");
      return true;
    } catch (err) {
      this.logger.error(
        { err, sessionId: turn.sessionId, turnNumber: turn.turnNumber },
        "Failed to enqueue turn",
      );
      return false;
    }
  }

  /**
   * Read every queued turn in insertion order. Lines that are not valid
   * JSON or not a valid turn are skipped with a warning.
   *
   * @throws StorageError when the file exists but cannot be read
   */
  loadAll(): QueuedTurn[] {
    let contents: string;
    try {
      contents = fs.readFileSync(this.filePath, "utf-8");
    } catch (err) {
      if (isNotFound(err)) return [];
      throw new StorageError("Failed to read queue file", "STORAGE_QUEUE_READ", {
        path: this.filePath,
        cause: errorMessage(err),
      });
    }

    const turns: QueuedTurn[] = [];
    const lines = contents.split("\n");
    for (let i = 0; i < lines.length; i++) {
      const line = lines[i];
      if (line.trim().length === 0) continue;

      let json: unknown;
      try {
        json = JSON.parse(line);
      } catch {
        this.logger.warn({ line: i + 1 }, "Skipping unparseable queue line");
        continue;
      }

      const parsed = queuedTurnSchema.safeParse(json);
      if (!parsed.success) {
        this.logger.warn(
          { line: i + 1, issues: parsed.error.issues },
          "Skipping invalid queued turn",
        );
        continue;
      }
      turns.push(parsed.data);
    }
    return turns;
  }

  /**
   * Delete the queue file.
   * @throws StorageError when the file exists but cannot be removed
   */
  clear(): void {
    try {
      fs.rmSync(this.filePath, { force: true });
    } catch (err) {
      throw new StorageError("Failed to remove queue file", "STORAGE_QUEUE_CLEAR", {
        path: this.filePath,
        cause: errorMessage(err),
      });
    }
  }

  /** Number of valid turns waiting. 0 when the queue cannot be read. */
  depth(): number {
    return this.safeLoad().length;
  }

  /** queuedAt of the oldest waiting turn, if any */
  oldestQueuedAt(): string | undefined {
    return this.safeLoad()[0]?.queuedAt;
  }

  /**
   * Send every queued turn to every adapter, oldest first.
   *
   * Each turn is offered to each adapter independently; a rejected emit is
   * logged and counted. When the queue is exhausted the file is deleted.
   * If the loop stops early (abort signal or an unexpected exception), the
   * turns from the one in flight onward are written back in order and the
   * delivered prefix is gone from the file.
   *
   * With no adapters the queue is left untouched. NEVER throws.
   */
  async drain(
    adapters: readonly TraceAdapter[],
    options: DrainOptions = {},
  ): Promise<DrainResult> {
    const result: DrainResult = {
      delivered: 0,
      failedDeliveries: 0,
      requeued: 0,
      aborted: false,
    };

    let queued: QueuedTurn[];
    try {
      queued = this.loadAll();
    } catch (err) {
      this.logger.error({ err }, "Cannot read queue, skipping drain");
      result.aborted = true;
      return result;
    }

    if (queued.length === 0) return result;
    if (adapters.length === 0) {
      result.requeued = queued.length;
      return result;
    }

    try {
      for (const entry of queued) {
        if (options.signal?.aborted) {
          throw new Error("Drain aborted");
        }

        result.failedDeliveries += await this.deliver(stripQueuedAt(entry), adapters);
        result.delivered++;
        options.onProgress?.(result.delivered, queued.length);
      }
    } catch (err) {
      result.aborted = true;
      // Everything from the turn in flight onward
      const remainder = queued.slice(result.delivered);
      result.requeued = remainder.length;
      this.logger.warn(
        { err, delivered: result.delivered, remaining: remainder.length },
        "Drain interrupted, re-queuing undelivered turns",
      );
      this.rewrite(remainder);
      return result;
    }

    try {
      this.clear();
    } catch (err) {
      // Everything is still in the file and will be sent again next run
      this.logger.error({ err }, "Drained queue but could not remove it");
    }

    this.logger.info(
      { delivered: result.delivered, failedDeliveries: result.failedDeliveries },
      "Queue drained",
    );
    return result;
  }

  // -------------------------------------------------------------------------
  // Internal helpers
  // -------------------------------------------------------------------------

  /** Emit one turn to each adapter; returns the number of failed emits */
  private async deliver(
    turn: Turn,
    adapters: readonly TraceAdapter[],
  ): Promise<number> {
    let failures = 0;
    for (const adapter of adapters) {
      try {
        await adapter.emit(turn);
      } catch (err) {
        failures++;
        this.logger.warn(
          {
            err,
            adapter: adapter.name,
            sessionId: turn.sessionId,
            turnNumber: turn.turnNumber,
          },
          "Queued turn delivery failed for adapter",
        );
      }
    }
    return failures;
  }

  /** Replace the file with the given turns; empty means delete */
  private rewrite(turns: readonly QueuedTurn[]): void {
    try {
      if (turns.length === 0) {
        this.clear();
        return;
      }
      writeFileAtomic(
        this.filePath,
        turns.map((turn) => JSON.stringify(turn)).join("\n") + "\n",
      );
    } catch (err) {
      // The old file is intact, so the delivered prefix will be resent
      this.logger.error({ err }, "Failed to rewrite queue after interrupted drain");
    }
  }

  private safeLoad(): QueuedTurn[] {
    try {
      return this.loadAll();
    } catch (err) {
      this.logger.warn({ err }, "Cannot read queue");
      return [];
    }
  }
}

function stripQueuedAt(queued: QueuedTurn): Turn {
  const { queuedAt: _queuedAt, ...turn } = queued;
  return turn;
}
