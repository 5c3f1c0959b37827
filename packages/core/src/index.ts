/**
 * @trace-relay/core: transcript-to-trace pipeline.
 *
 * Records and turns are pure; the checkpoint store and delivery queue own
 * the files under the state directory; adapters own the network. runPass
 * ties them together for one Stop-hook invocation.
 */

// Record model: one classified record per transcript line
export {
  parseRecordLine,
  contentOf,
  isToolResultCarrier,
  toolUseBlocks,
  toolResultBlocks,
  textBlocks,
  textOf,
  modelOf,
} from "./record-model.js";

// Turn assembly: records -> numbered turns
export {
  assembleTurns,
  mergeAssistantParts,
  type AssembleOptions,
  type AssembleResult,
} from "./turn-assembler.js";

// Persisted state
export {
  CheckpointStore,
  CHECKPOINT_FILENAME,
  type CheckpointStoreOptions,
} from "./checkpoint-store.js";
export {
  DeliveryQueue,
  QUEUE_FILENAME,
  type DeliveryQueueOptions,
  type DrainOptions,
  type DrainResult,
} from "./delivery-queue.js";

export { writeFileAtomic, isNotFound } from "./fs-utils.js";

// Span tree and redaction shared by the adapters
export { redactText, redactValue } from "./redact.js";
export {
  buildTurnTrace,
  traceIdFor,
  TRACE_SOURCE,
  DEFAULT_MODEL,
  type TurnTrace,
  type GenerationNode,
  type ToolNode,
} from "./span-tree.js";

// Backends
export * from "./adapters/index.js";

// Discovery and the pass itself
export {
  discoverSessions,
  projectNameFromDir,
  readTranscriptLines,
  type DiscoveredSession,
  type DiscoveryResult,
} from "./session-discovery.js";
export {
  runPass,
  SLOW_PASS_THRESHOLD_MS,
  type PassDeps,
  type PassTrigger,
  type PassResult,
} from "./orchestrator.js";
