/**
 * Barrel export for all Zod schemas.
 */

export * from "./transcript-line.js";
export * from "./queued-turn.js";
export * from "./config.js";
