/**
 * Capability interface every tracing backend implements.
 *
 * The orchestrator and the delivery queue hold a list of these and never
 * look at which backend is behind one.
 */

import type { Turn } from "@trace-relay/shared";

export interface TraceAdapter {
  /** Short backend name used in logs and status output ("langfuse", "otlp") */
  readonly name: string;
  /** URL the backend is reached at; the health probe connects to its host and port */
  readonly endpoint: string;

  /** TCP reachability probe. Resolves false on any failure, never rejects. */
  healthCheck(): Promise<boolean>;

  /**
   * Send one turn as a span tree. Resolves once the backend has it (or the
   * SDK has buffered it), rejects on failure. Must tolerate the same turn
   * being sent twice.
   */
  emit(turn: Turn): Promise<void>;

  /** Push anything buffered to the backend */
  flush(): Promise<void>;

  /** Flush and release network resources; the adapter is unusable after */
  shutdown(): Promise<void>;
}
