export { createTaskPool, type TaskPool } from "./taskPool.js";
export { sampleInstruments } from "./sampling.js";
export { loadUniverse, resolveUniverse, UniverseSchema, type Universe } from "./universe.js";
export {
  runStrategy,
  runStrategyRepeatedly,
  summarizeRun,
  type RepeatedRunOutcome,
  type RepeatedRunRequest,
  type RunDependencies,
  type SeriesProvider,
  type StrategyRun,
  type StrategyRunRequest,
} from "./runStrategy.js";
