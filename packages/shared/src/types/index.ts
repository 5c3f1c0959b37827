/**
 * Barrel re-export for all type definitions.
 * Import from "@trace-relay/shared" to access these.
 */
export * from "./transcript.js";
export * from "./turn.js";
