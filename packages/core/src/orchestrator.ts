/**
 * One relay pass, run each time the Stop hook fires.
 *
 * Steps:
 *   1. Discover sessions whose transcripts changed since their checkpoint
 *   2. Health-check every adapter; unhealthy ones sit out the whole pass
 *   3. No healthy adapter: enqueue the new turns of every session
 *      Otherwise: drain the queue, then emit each session's new turns
 *   4. Advance the session's checkpoint right after its turns are handled
 *   5. Flush and shut down every adapter
 *
 * Only the session whose Stop hook fired (the trigger) is known to have a
 * finished response, so only its last turn is closed at end of file. Other
 * changed sessions may be mid-response; their last turn stays open and is
 * re-read next time.
 *
 * With no backend configured at all the pass does nothing. Queuing a turn
 * counts as handling it, so the checkpoint advances during an
 * outage too and the turn is sent later by a drain. Per-adapter emit errors
 * are logged and do not hold the checkpoint back.
 */

import * as path from "node:path";
import {
  errorMessage,
  type Logger,
  type RelayConfig,
  type SessionCheckpoint,
  type Turn,
} from "@trace-relay/shared";
import type { TraceAdapter } from "./adapters/types.js";
import type { CheckpointStore } from "./checkpoint-store.js";
import type { DeliveryQueue, DrainResult } from "./delivery-queue.js";
import { parseRecordLine } from "./record-model.js";
import {
  discoverSessions,
  readTranscriptLines,
  type DiscoveredSession,
} from "./session-discovery.js";
import { assembleTurns } from "./turn-assembler.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** A pass slower than this is logged as a warning */
export const SLOW_PASS_THRESHOLD_MS = 180_000;

// ---------------------------------------------------------------------------
// Dependencies and result types
// ---------------------------------------------------------------------------

/** The session whose Stop hook started this pass, from the hook's stdin */
export interface PassTrigger {
  sessionId?: string;
  transcriptPath?: string;
}

export interface PassDeps {
  config: RelayConfig;
  logger: Logger;
  adapters: readonly TraceAdapter[];
  checkpoints: CheckpointStore;
  queue: DeliveryQueue;
  /** Without a trigger every session's last turn is left open */
  trigger?: PassTrigger;
  now?: () => Date;
}

/** Result of a pass. Always returned, never thrown */
export interface PassResult {
  healthy: string[];
  unhealthy: string[];
  sessionsProcessed: number;
  /** Changed sessions left for the next pass by maxSessionsPerPass */
  sessionsDeferred: number;
  turnsEmitted: number;
  turnsQueued: number;
  /** Individual adapter emit calls that failed */
  emitFailures: number;
  /** null when the queue was not drained (no healthy adapter) */
  drain: DrainResult | null;
  errors: string[];
  durationMs: number;
}

/** What happened to one session's new turns */
interface SessionOutcome {
  emitted: number;
  queued: number;
  emitFailures: number;
}

// ---------------------------------------------------------------------------
// Pass
// ---------------------------------------------------------------------------

export async function runPass(deps: PassDeps): Promise<PassResult> {
  const { config, adapters, checkpoints, queue } = deps;
  const now = deps.now ?? (() => new Date());
  const log = deps.logger.child({ component: "orchestrator" });
  const startedAt = now();

  const result: PassResult = {
    healthy: [],
    unhealthy: [],
    sessionsProcessed: 0,
    sessionsDeferred: 0,
    turnsEmitted: 0,
    turnsQueued: 0,
    emitFailures: 0,
    drain: null,
    errors: [],
    durationMs: 0,
  };

  if (adapters.length === 0) {
    // Checkpoints stay put so history is sent once a backend is configured
    log.debug("No backend enabled, nothing to do");
    return result;
  }

  // -------------------------------------------------------------------------
  // Step 1: Discover changed sessions
  // -------------------------------------------------------------------------

  const discovery = discoverSessions(config.paths.projectsDir, checkpoints.load(), {
    maxSessions: config.maxSessionsPerPass,
    isTrigger: (stem, filePath) => isTrigger({ sessionId: stem, filePath }, deps.trigger),
  });
  result.sessionsDeferred = discovery.deferred;
  for (const failure of discovery.errors) {
    log.warn({ path: failure.path, error: failure.error }, "Cannot scan transcript path");
    result.errors.push(`${failure.path}: ${failure.error}`);
  }
  if (discovery.deferred > 0) {
    log.info({ deferred: discovery.deferred }, "Session cap reached, deferring older sessions");
  }

  // -------------------------------------------------------------------------
  // Step 2: Health-check adapters
  // -------------------------------------------------------------------------

  const healthy: TraceAdapter[] = [];
  for (const adapter of adapters) {
    let ok = false;
    try {
      ok = await adapter.healthCheck();
    } catch (err) {
      log.warn({ err, backend: adapter.name }, "Health check threw");
    }
    if (ok) {
      healthy.push(adapter);
      result.healthy.push(adapter.name);
    } else {
      log.warn(
        { backend: adapter.name, endpoint: adapter.endpoint },
        "Backend unreachable, excluded for this pass",
      );
      result.unhealthy.push(adapter.name);
    }
  }

  // -------------------------------------------------------------------------
  // Step 3: Drain the backlog before sending anything new
  // -------------------------------------------------------------------------

  if (healthy.length > 0) {
    result.drain = await queue.drain(healthy);
    result.emitFailures += result.drain.failedDeliveries;
  } else {
    log.warn("No healthy backend, queuing new turns");
  }

  // -------------------------------------------------------------------------
  // Step 4: Process each session and advance its checkpoint
  // -------------------------------------------------------------------------

  for (const session of discovery.sessions) {
    try {
      const outcome = await processSession(session, healthy, deps, log, now);
      result.sessionsProcessed++;
      result.turnsEmitted += outcome.emitted;
      result.turnsQueued += outcome.queued;
      result.emitFailures += outcome.emitFailures;
    } catch (err) {
      log.error({ err, sessionId: session.sessionId }, "Session pass failed");
      result.errors.push(`${session.sessionId}: ${errorMessage(err)}`);
    }
  }

  // -------------------------------------------------------------------------
  // Step 5: Flush and shut down
  // -------------------------------------------------------------------------

  for (const adapter of adapters) {
    try {
      await adapter.flush();
    } catch (err) {
      log.warn({ err, backend: adapter.name }, "Flush failed");
    }
    try {
      await adapter.shutdown();
    } catch (err) {
      log.warn({ err, backend: adapter.name }, "Shutdown failed");
    }
  }

  result.durationMs = now().getTime() - startedAt.getTime();
  const summary = {
    durationMs: result.durationMs,
    sessions: result.sessionsProcessed,
    deferred: result.sessionsDeferred,
    emitted: result.turnsEmitted,
    queued: result.turnsQueued,
    emitFailures: result.emitFailures,
    drained: result.drain?.delivered ?? 0,
  };
  if (result.durationMs > SLOW_PASS_THRESHOLD_MS) {
    log.warn(summary, "Pass exceeded the expected duration");
  } else {
    log.info(summary, "Pass complete");
  }
  return result;
}

/** True when the session is the one whose response just finished */
function isTrigger(
  session: Pick<DiscoveredSession, "sessionId" | "filePath">,
  trigger: PassTrigger | undefined,
): boolean {
  if (!trigger) return false;
  if (trigger.sessionId && trigger.sessionId === session.sessionId) return true;
  return (
    trigger.transcriptPath !== undefined &&
    trigger.transcriptPath.length > 0 &&
    path.resolve(trigger.transcriptPath) === path.resolve(session.filePath)
  );
}

// ---------------------------------------------------------------------------
// Per-session pass
// ---------------------------------------------------------------------------

/**
 * Read a session's new lines, turn them into turns, deliver or queue them,
 * then save the checkpoint. Throws only when the transcript cannot be read;
 * the checkpoint is then left where it was.
 */
async function processSession(
  session: DiscoveredSession,
  healthy: readonly TraceAdapter[],
  deps: PassDeps,
  log: Logger,
  now: () => Date,
): Promise<SessionOutcome> {
  const { checkpoints, queue } = deps;
  const outcome: SessionOutcome = { emitted: 0, queued: 0, emitFailures: 0 };
  const sessionLog = log.child({ sessionId: session.sessionId });

  const previous = checkpoints.get(session.sessionId);
  const startLine = previous?.lastLineConsumed ?? 0;
  const startTurnCount = previous?.turnCount ?? 0;

  // Taken before reading so a write that lands mid-pass is seen next time
  const readAt = now().toISOString();
  const lines = readTranscriptLines(session.filePath);

  let turns: Turn[] = [];
  let consumedLines = 0;
  if (lines.length > startLine) {
    const records = lines
      .slice(startLine)
      .map((line, offset) => parseRecordLine(line, startLine + offset));

    const malformed = records.filter((record) => record.kind === "malformed").length;
    if (malformed > 0) {
      sessionLog.debug({ malformed }, "Skipped unusable transcript lines");
    }

    const assembled = assembleTurns(records, {
      sessionId: session.sessionId,
      projectName: session.projectName,
      startTurnCount,
      totalLines: lines.length - startLine,
      firstLineIndex: startLine,
      closeTrailingTurn: isTrigger(session, deps.trigger),
    });
    turns = assembled.turns;
    consumedLines = assembled.consumedLines;
  }

  if (healthy.length === 0) {
    for (const turn of turns) {
      if (!queue.enqueue(turn)) {
        // Nothing durable holds this turn; re-read the session next pass
        sessionLog.error(
          { turnNumber: turn.turnNumber },
          "Could not queue turn, checkpoint not advanced",
        );
        return outcome;
      }
      outcome.queued++;
    }
  } else {
    for (const turn of turns) {
      for (const adapter of healthy) {
        try {
          await adapter.emit(turn);
        } catch (err) {
          outcome.emitFailures++;
          sessionLog.warn(
            { err, backend: adapter.name, turnNumber: turn.turnNumber },
            "Emit failed",
          );
        }
      }
      outcome.emitted++;
    }
  }

  const checkpoint: SessionCheckpoint = {
    lastLineConsumed: startLine + consumedLines,
    turnCount: startTurnCount + turns.length,
    updatedAt: readAt,
  };
  try {
    checkpoints.set(session.sessionId, checkpoint);
  } catch (err) {
    // Turns of this pass will be sent again; trace ids keep that idempotent
    sessionLog.error({ err }, "Could not save checkpoint");
  }

  if (turns.length > 0) {
    sessionLog.debug(
      { turns: turns.length, firstTurn: startTurnCount + 1, lastLineConsumed: checkpoint.lastLineConsumed },
      healthy.length > 0 ? "Delivered turns" : "Queued turns",
    );
  }
  return outcome;
}
