/**
 * pino logger factory for trace-relay.
 *
 * The hook runs inside Claude Code, so stdout must stay clean. Logs go to a
 * JSON log file under the state directory and, when debug is on, to stderr
 * as well. Each component takes a child logger from the one created at
 * startup; nothing in the relay holds a module-level logger.
 *
 * Configuration:
 *   - level: "debug" when debug is enabled, else LOG_LEVEL or "info"
 *   - file:  <stateDir>/trace-relay.log (directory created on first write)
 */

import pino from "pino";

export type Logger = pino.Logger;

export interface LoggerOptions {
  /** Logger name (appears in log entries) */
  name: string;
  /** pino level; defaults to "info" */
  level?: string;
  /** JSON log file path */
  file?: string;
  /** Mirror log lines to stderr */
  stderr?: boolean;
}

/**
 * Create a pino logger writing to a log file and/or stderr through pino's
 * file transport. With neither destination it returns a silent logger.
 */
export function createLogger(options: LoggerOptions): Logger {
  const level = options.level ?? "info";

  const targets: pino.TransportTargetOptions[] = [];
  if (options.file) {
    targets.push({
      target: "pino/file",
      options: { destination: options.file, mkdir: true },
      level,
    });
  }
  if (options.stderr) {
    targets.push({
      target: "pino/file",
      options: { destination: 2 },
      level,
    });
  }

  if (targets.length === 0) {
    return pino({ name: options.name, level: "silent" });
  }

  return pino({
    name: options.name,
    level,
    transport: { targets },
  });
}

/** Logger that discards everything: used by tests and dry runs */
export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
