/**
 * Seeded sampling and cross-run statistics.
 * @packageDocumentation
 */

export * from "./types.js";
export * from "./random.js";
export * from "./normal.js";
export * from "./aggregate.js";
