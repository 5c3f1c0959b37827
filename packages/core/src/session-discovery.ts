/**
 * Finds transcripts that changed since they were last processed.
 *
 * Claude Code writes one JSONL file per session under
 * <projectsDir>/<project-dir>/<session-id>.jsonl. A session is a candidate
 * when its file's mtime is newer than its checkpoint's updatedAt, or when it
 * has no checkpoint at all. The session whose Stop hook fired is always a
 * candidate: an earlier pass may have read its last turn before it finished.
 * Candidates are ordered most recently modified first and capped, so a large
 * backlog cannot starve the active session; the rest wait for a later run.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { errorMessage, type CheckpointMap } from "@trace-relay/shared";
import { isNotFound } from "./fs-utils.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const TRANSCRIPT_EXTENSION = ".jsonl";

/** Bytes read from the head of a transcript when looking for its session id */
const FIRST_LINE_READ_BYTES = 64 * 1024;

/** Leading dash-separated parts of a project dir that encode the home path */
const HOME_PREFIX_PARTS = 3;

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface DiscoveredSession {
  sessionId: string;
  filePath: string;
  /** Name of the project directory, e.g. "-Users-alice-my-app" */
  projectDir: string;
  /** Human-readable project, e.g. "my-app" */
  projectName: string;
  mtimeMs: number;
}

export interface DiscoveryResult {
  /** Changed sessions, most recently modified first, at most maxSessions */
  sessions: DiscoveredSession[];
  /** Changed sessions left for a later run because of the cap */
  deferred: number;
  /** Paths that could not be read, with the reason */
  errors: Array<{ path: string; error: string }>;
}

export interface DiscoverOptions {
  maxSessions: number;
  /**
   * Marks the session whose Stop hook fired. It is a candidate even when its
   * file has not changed since the checkpoint, and it is never deferred.
   */
  isTrigger?: (stem: string, filePath: string) => boolean;
}

// ---------------------------------------------------------------------------
// Discovery
// ---------------------------------------------------------------------------

/**
 * Scan every project directory for changed transcripts. Never throws; a
 * missing projects directory yields no sessions.
 */
export function discoverSessions(
  projectsDir: string,
  checkpoints: CheckpointMap,
  options: DiscoverOptions,
): DiscoveryResult {
  const result: DiscoveryResult = { sessions: [], deferred: 0, errors: [] };

  let projectEntries: fs.Dirent[];
  try {
    projectEntries = fs.readdirSync(projectsDir, { withFileTypes: true });
  } catch (err) {
    if (!isNotFound(err)) {
      result.errors.push({ path: projectsDir, error: errorMessage(err) });
    }
    return result;
  }

  const changed: DiscoveredSession[] = [];
  const triggers = new Set<string>();

  for (const projectEntry of projectEntries) {
    if (!projectEntry.isDirectory()) continue;
    const projectPath = path.join(projectsDir, projectEntry.name);

    let files: fs.Dirent[];
    try {
      files = fs.readdirSync(projectPath, { withFileTypes: true });
    } catch (err) {
      result.errors.push({ path: projectPath, error: errorMessage(err) });
      continue;
    }

    for (const file of files) {
      // Subdirectories hold subagent transcripts; only top-level sessions count
      if (!file.isFile() || !file.name.endsWith(TRANSCRIPT_EXTENSION)) continue;
      const filePath = path.join(projectPath, file.name);

      try {
        const mtimeMs = fs.statSync(filePath).mtimeMs;
        const stem = path.basename(file.name, TRANSCRIPT_EXTENSION);
        const trigger = options.isTrigger?.(stem, filePath) === true;

        // Cheap check first: Claude Code names files after the session
        if (!trigger && !isChanged(checkpoints[stem]?.updatedAt, mtimeMs)) continue;

        const sessionId = sessionIdOf(filePath) ?? stem;
        if (
          !trigger &&
          sessionId !== stem &&
          !isChanged(checkpoints[sessionId]?.updatedAt, mtimeMs)
        ) {
          continue;
        }

        if (trigger) triggers.add(filePath);
        changed.push({
          sessionId,
          filePath,
          projectDir: projectEntry.name,
          projectName: projectNameFromDir(projectEntry.name),
          mtimeMs,
        });
      } catch (err) {
        result.errors.push({ path: filePath, error: errorMessage(err) });
      }
    }
  }

  changed.sort(
    (a, b) =>
      Number(triggers.has(b.filePath)) - Number(triggers.has(a.filePath)) || b.mtimeMs - a.mtimeMs,
  );
  result.sessions = changed.slice(0, options.maxSessions);
  result.deferred = changed.length - result.sessions.length;
  return result;
}

/** True when there is no checkpoint or the file was modified after it */
function isChanged(updatedAt: string | undefined, mtimeMs: number): boolean {
  if (updatedAt === undefined) return true;
  const checkpointMs = Date.parse(updatedAt);
  return Number.isNaN(checkpointMs) || mtimeMs > checkpointMs;
}

/**
 * sessionId field of the transcript's first line, or undefined when the
 * first line is missing, too long or not JSON.
 */
function sessionIdOf(filePath: string): string | undefined {
  const fd = fs.openSync(filePath, "r");
  let head: string;
  try {
    const buffer = Buffer.alloc(FIRST_LINE_READ_BYTES);
    const bytesRead = fs.readSync(fd, buffer, 0, buffer.length, 0);
    head = buffer.subarray(0, bytesRead).toString("utf-8");
  } finally {
    fs.closeSync(fd);
  }

  const newline = head.indexOf("\n");
  if (newline === -1) return undefined;

  try {
    const first: unknown = JSON.parse(head.slice(0, newline));
    if (first !== null && typeof first === "object" && "sessionId" in first) {
      return typeof first.sessionId === "string" && first.sessionId.length > 0
        ? first.sessionId
        : undefined;
    }
  } catch {
    // Not JSON: fall back to the file name
  }
  return undefined;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Project name from a Claude Code project directory name. The directory is
 * the project path with "/" replaced by "-", so "-Users-alice-my-app" gives
 * "my-app". Names with three or fewer parts are returned unchanged.
 */
export function projectNameFromDir(dirName: string): string {
  const parts = dirName.split("-");
  if (parts.length > HOME_PREFIX_PARTS) {
    return parts.slice(HOME_PREFIX_PARTS).join("-");
  }
  return dirName;
}

/**
 * Complete lines of a transcript. A final line without a terminating
 * newline is still being written and is left for the next pass.
 */
export function readTranscriptLines(filePath: string): string[] {
  const contents = fs.readFileSync(filePath, "utf-8");
  const lines = contents.split("\n");
  // Either "" after the final newline, or a partial line
  lines.pop();
  return lines;
}
