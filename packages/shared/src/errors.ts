/**
 * Structured error hierarchy for trace-relay.
 *
 * All relay errors extend RelayError, which adds:
 *   - `code`: Machine-readable error code (e.g., "CONFIG_INVALID")
 *   - `context`: Arbitrary metadata for debugging (logged, not shown to user)
 *   - JSON serialization via toJSON()
 *
 * Error categories:
 *   - ConfigError:  config.yaml or environment problems, missing credentials
 *   - NetworkError: backend export failures (HTTP errors, timeouts, refused)
 *   - StorageError: checkpoint or queue file I/O failures
 *
 * None of these ever escape the `hook` command: they end up as log lines.
 */

/**
 * Base error class for all relay errors.
 * Adds a machine-readable code and structured context for debugging.
 */
export class RelayError extends Error {
  /** Machine-readable error code (e.g., "CONFIG_INVALID", "STORAGE_WRITE") */
  readonly code: string;
  /** Structured debugging context: logged alongside the message */
  readonly context: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    context: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = "RelayError";
    this.code = code;
    this.context = context;
  }

  /** Serialize to a plain object for JSON logging */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

/**
 * Configuration errors: config file corrupted or invalid, backend
 * credentials missing.
 * Code prefix: CONFIG_*
 *
 * @example
 *   throw new ConfigError("Langfuse keys not set", "CONFIG_MISSING_CREDENTIALS", { backend: "langfuse" })
 */
export class ConfigError extends RelayError {
  constructor(
    message: string,
    code: string = "CONFIG_ERROR",
    context: Record<string, unknown> = {},
  ) {
    super(message, code, context);
    this.name = "ConfigError";
  }
}

/**
 * Network errors: a backend rejected or failed to receive a span export.
 * Code prefix: NETWORK_*
 *
 * @example
 *   throw new NetworkError("OTLP export failed", "NETWORK_EXPORT_FAILED", { endpoint })
 */
export class NetworkError extends RelayError {
  constructor(
    message: string,
    code: string = "NETWORK_ERROR",
    context: Record<string, unknown> = {},
  ) {
    super(message, code, context);
    this.name = "NetworkError";
  }
}

/**
 * Storage errors: reading or writing checkpoint.json / queue.jsonl.
 * Code prefix: STORAGE_*
 *
 * @example
 *   throw new StorageError("Failed to write checkpoint", "STORAGE_WRITE", { path })
 */
export class StorageError extends RelayError {
  constructor(
    message: string,
    code: string = "STORAGE_ERROR",
    context: Record<string, unknown> = {},
  ) {
    super(message, code, context);
    this.name = "StorageError";
  }
}

/** Render any thrown value as a one-line message */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
