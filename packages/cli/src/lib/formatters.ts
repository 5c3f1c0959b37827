/**
 * Output formatting for the trace-relay CLI. Colors via picocolors.
 */

import pc from "picocolors";
import { RelayError } from "@trace-relay/shared";

// ---------------------------------------------------------------------------
// ANSI
// ---------------------------------------------------------------------------

const ANSI_REGEX = /\x1b\[[0-9;]*[a-zA-Z]/g;

/** Strip all ANSI escape codes from a string */
export function stripAnsi(str: string): string {
  return str.replace(ANSI_REGEX, "");
}

// ---------------------------------------------------------------------------
// Text
// ---------------------------------------------------------------------------

/** "turn" / "turns" */
export function plural(count: number, noun: string): string {
  return count === 1 ? noun : `${noun}s`;
}

/**
 * Coarse age of an ISO timestamp: "just now", "12m ago", "3h ago", "2d ago".
 * Returns "-" for a missing or unparseable value.
 */
export function formatRelativeTime(iso: string | null | undefined, now = new Date()): string {
  if (!iso) return "-";
  const then = Date.parse(iso);
  if (Number.isNaN(then)) return "-";

  const diffSec = Math.floor((now.getTime() - then) / 1000);
  if (diffSec < 60) return "just now";
  const diffMin = Math.floor(diffSec / 60);
  if (diffMin < 60) return `${diffMin}m ago`;
  const diffHr = Math.floor(diffMin / 60);
  if (diffHr < 24) return `${diffHr}h ago`;
  return `${Math.floor(diffHr / 24)}d ago`;
}

/**
 * Format an error for user-facing display. Relay errors show their code.
 */
export function formatError(error: unknown): string {
  if (error instanceof RelayError) {
    return pc.red(`Error (${error.code}): ${error.message}`);
  }
  if (error instanceof Error) {
    return pc.red(`Error: ${error.message}`);
  }
  return pc.red(`Error: ${String(error)}`);
}

// ---------------------------------------------------------------------------
// Output Result Helper
// ---------------------------------------------------------------------------

/**
 * Output structured data to stdout as either JSON or formatted text.
 */
export function outputResult<T>(
  data: T,
  opts: { json?: boolean; format: (data: T) => string },
): void {
  if (opts.json) {
    process.stdout.write(JSON.stringify(data, null, 2) + "\n");
  } else {
    process.stdout.write(opts.format(data) + "\n");
  }
}
