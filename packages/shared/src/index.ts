/**
 * @trace-relay/shared: the contract layer for the trace-relay monorepo.
 *
 * Every other package imports from here. Contains:
 *   - Transcript record, turn, queue and checkpoint types
 *   - Zod schemas for transcript lines, persisted state and configuration
 *   - Structured error hierarchy
 *   - pino logger factory
 */

// Type definitions for records, turns, checkpoints
export * from "./types/index.js";

// Zod schemas for transcript lines, persisted state and config
export * from "./schemas/index.js";

// Structured error classes
export * from "./errors.js";

// Logger factory
export * from "./logger.js";
