import { config as loadEnv } from "dotenv";
import { join } from "node:path";

import { createLogger } from "@backtest-lab/logger";

import { loadRunnerConfig, REPO_ROOT } from "./config.js";
import { runAllStrategies } from "./runner.js";

export { loadRunnerConfig, REPO_ROOT, type RunnerConfig } from "./config.js";
export { createDefaultFetcher, runAllStrategies, type RunnerDependencies } from "./runner.js";
export {
  aggregateFileName,
  createResultsWriter,
  individualFileName,
  type AggregateDocument,
  type IndividualRunDocument,
  type ResultsWriter,
  type ResultsWriterOptions,
} from "./resultsWriter.js";

const logger = createLogger("services/runner");

const main = async (): Promise<void> => {
  loadEnv({ path: join(REPO_ROOT, ".env") });
  loadEnv();
  const config = loadRunnerConfig();
  await runAllStrategies(config);
};

const shouldAutostart = process.env.RUNNER_AUTOSTART !== "false";

if (shouldAutostart) {
  void main().catch((error) => {
    logger.error("Runner failed", {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
  });
}
