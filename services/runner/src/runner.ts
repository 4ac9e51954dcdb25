import {
  FilePriceCache,
  IncrementalFetcher,
  StooqSource,
  createHttpClient,
} from "@backtest-lab/data";
import { createLogger, type Logger } from "@backtest-lab/logger";
import {
  createTaskPool,
  loadUniverse,
  resolveUniverse,
  runStrategyRepeatedly,
  type SeriesProvider,
  type Universe,
} from "@backtest-lab/orchestrator";
import { getRuleSet, resolveBacktestPeriod } from "@backtest-lab/sdk";
import type { AggregateResult } from "@backtest-lab/stats";

import type { RunnerConfig } from "./config.js";
import { createResultsWriter, type ResultsWriter } from "./resultsWriter.js";

export interface RunnerDependencies {
  readonly logger?: Logger;
  readonly fetcher?: SeriesProvider;
  readonly writer?: ResultsWriter;
  readonly universe?: Universe;
  readonly now?: () => Date;
}

/** Stooq-backed fetcher with the on-disk cache, as configured. */
export const createDefaultFetcher = (config: RunnerConfig, logger: Logger): IncrementalFetcher => {
  const source = new StooqSource({
    baseUrl: config.stooqBaseUrl,
    timeoutMs: config.fetchTimeoutMs,
    httpClient: createHttpClient({ defaultTimeoutMs: config.fetchTimeoutMs }),
  });
  return new IncrementalFetcher({
    source,
    cache: new FilePriceCache({ cacheDir: config.cacheDir, logger: logger.child({ component: "price-cache" }) }),
    maxAttempts: config.fetchMaxAttempts,
    baseDelayMs: config.fetchBaseDelayMs,
    logger: logger.child({ component: "fetcher" }),
  });
};

/**
 * Runs every configured strategy in turn, writing each run and each aggregate as it
 * completes. Returns the aggregates keyed by strategy.
 */
export const runAllStrategies = async (
  config: RunnerConfig,
  deps: RunnerDependencies = {},
): Promise<Record<string, AggregateResult>> => {
  const logger = deps.logger ?? createLogger("services/runner", { level: config.logLevel });
  const now = deps.now ?? (() => new Date());
  const writer = deps.writer ?? createResultsWriter({ resultsDir: config.resultsDir, now });
  const fetcher = deps.fetcher ?? createDefaultFetcher(config, logger);
  const universe = resolveUniverse(
    deps.universe ?? (await loadUniverse(config.universePath)),
    config.universeIndices,
  );

  // One pair of pools for the whole process, shared by every strategy.
  const fetchPool = createTaskPool(config.fetchConcurrency);
  const computePool = createTaskPool(config.computeConcurrency);

  logger.info("Runner started", {
    strategies: config.strategies,
    runs: config.numRuns,
    sampleSize: config.sampleSize,
    universeSize: universe.length,
  });

  const aggregates: Record<string, AggregateResult> = {};
  for (const name of config.strategies) {
    const ruleSet = getRuleSet(name);
    const period = resolveBacktestPeriod(ruleSet.periodYears, now());
    const strategyLogger = logger.child({ strategy: name });
    strategyLogger.info("Strategy started", { ...period, interval: ruleSet.interval });

    const outcome = await runStrategyRepeatedly(
      {
        ruleSet,
        universe,
        runs: config.numRuns,
        baseSeed: config.baseSeed,
        sampleSize: config.sampleSize,
        start: period.start,
        end: period.end,
        confidenceLevel: config.confidenceLevel,
      },
      { fetcher, fetchPool, computePool, logger: strategyLogger },
      async (run, summary, runNumber) => {
        const path = await writer.writeRun(run, summary, runNumber);
        strategyLogger.info("Run written", {
          runNumber,
          seed: run.seed,
          instruments: summary.instrumentCount,
          failures: Object.keys(run.failures).length,
          path,
        });
      },
    );

    const path = await writer.writeAggregate(outcome.aggregate);
    if (outcome.aggregate.contributingRuns === 0) {
      strategyLogger.warn("No run produced results, aggregate is empty", { path });
    } else {
      strategyLogger.info("Aggregate written", {
        contributingRuns: outcome.aggregate.contributingRuns,
        path,
      });
    }
    aggregates[name] = outcome.aggregate;
  }

  logger.info("Runner finished", { strategies: Object.keys(aggregates) });
  return aggregates;
};
