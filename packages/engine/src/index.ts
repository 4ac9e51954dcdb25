export { runBacktest } from "./engine.js";
export type { ExitLevels, OpenPosition, Position } from "./types.js";
