import { setImmediate as yieldToEventLoop } from "node:timers/promises";

import { FetchError } from "@backtest-lab/data";
import { runBacktest } from "@backtest-lab/engine";
import { createLogger, type Logger } from "@backtest-lab/logger";
import { mean } from "@backtest-lab/metrics";
import {
  METRIC_KEYS,
  type Interval,
  type ISODate,
  type PriceSeries,
  type RuleSet,
  type RunMetrics,
  type RunResult,
} from "@backtest-lab/sdk";
import { aggregate, type AggregateResult } from "@backtest-lab/stats";

import { sampleInstruments } from "./sampling.js";
import type { TaskPool } from "./taskPool.js";

/** Anything that resolves a price window, typically an IncrementalFetcher. */
export interface SeriesProvider {
  getSeries(symbol: string, start: ISODate, end: ISODate, interval: Interval): Promise<PriceSeries>;
}

export interface RunDependencies {
  readonly fetcher: SeriesProvider;
  /** Bounds concurrent price retrievals. */
  readonly fetchPool: TaskPool;
  /** Bounds concurrent backtests. */
  readonly computePool: TaskPool;
  readonly logger?: Logger;
  readonly backtest?: (series: PriceSeries, ruleSet: RuleSet) => RunResult;
}

export interface StrategyRunRequest {
  readonly ruleSet: RuleSet;
  readonly universe: ReadonlyArray<string>;
  readonly seed: number;
  readonly sampleSize: number;
  readonly start: ISODate;
  readonly end: ISODate;
}

export interface StrategyRun {
  readonly strategy: string;
  readonly seed: number;
  /** Sampled instruments, whether or not their data could be fetched. */
  readonly instruments: ReadonlyArray<string>;
  readonly results: Readonly<Record<string, RunResult>>;
  /** Reason per instrument whose data could not be retrieved. */
  readonly failures: Readonly<Record<string, string>>;
}

const defaultLogger = createLogger("orchestrator/run-strategy");

const sortedRecord = <T>(entries: Map<string, T>): Record<string, T> => {
  const record: Record<string, T> = {};
  for (const key of [...entries.keys()].sort()) {
    const value = entries.get(key);
    if (value !== undefined) {
      record[key] = value;
    }
  }
  return record;
};

/**
 * One run of one strategy: samples instruments, then pipes each through the fetch pool
 * and on to the compute pool as soon as its series is ready.
 *
 * An instrument whose retrieval fails for any reason is recorded under `failures` and
 * skipped. Errors raised by the backtest itself abort the run.
 */
export const runStrategy = async (
  request: StrategyRunRequest,
  deps: RunDependencies,
): Promise<StrategyRun> => {
  const { ruleSet, seed, start, end } = request;
  const logger = (deps.logger ?? defaultLogger).child({ strategy: ruleSet.name, seed });
  const backtest = deps.backtest ?? runBacktest;
  const instruments = sampleInstruments(request.universe, seed, request.sampleSize, logger);

  logger.info("Run started", { instruments: instruments.length, start, end, interval: ruleSet.interval });

  const results = new Map<string, RunResult>();
  const failures = new Map<string, string>();

  await Promise.all(
    instruments.map(async (symbol) => {
      let series: PriceSeries;
      try {
        series = await deps.fetchPool.run(() =>
          deps.fetcher.getSeries(symbol, start, end, ruleSet.interval),
        );
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        failures.set(symbol, message);
        logger.warn("Instrument skipped", {
          symbol,
          failure: error instanceof FetchError ? "no-data" : "fetch-error",
          error: message,
        });
        return;
      }

      const result = await deps.computePool.run(async () => {
        await yieldToEventLoop();
        return backtest(series, ruleSet);
      });
      results.set(symbol, result);
      logger.debug("Instrument backtested", { symbol, trades: result.trades.length });
    }),
  );

  logger.info("Run finished", { succeeded: results.size, failed: failures.size });

  return {
    strategy: ruleSet.name,
    seed,
    instruments,
    results: sortedRecord(results),
    failures: sortedRecord(failures),
  };
};

/** Mean of every metric across the run's instruments. */
export const summarizeRun = (run: StrategyRun): RunMetrics => {
  const results = Object.values(run.results);
  const metrics: Record<string, number> = {};
  for (const key of METRIC_KEYS) {
    const values = results.map((result) => result.metrics[key]).filter((value) => Number.isFinite(value));
    if (values.length > 0) {
      metrics[key] = mean(values);
    }
  }
  return {
    seed: run.seed,
    instrumentCount: results.length,
    instruments: Object.keys(run.results),
    metrics,
  };
};

export interface RepeatedRunRequest extends Omit<StrategyRunRequest, "seed"> {
  /** Number of independent runs; run `k` (1-based) uses seed `baseSeed + k`. */
  readonly runs: number;
  readonly baseSeed: number;
  readonly confidenceLevel: number;
}

export interface RepeatedRunOutcome {
  readonly runs: ReadonlyArray<StrategyRun>;
  readonly summaries: ReadonlyArray<RunMetrics>;
  readonly aggregate: AggregateResult;
}

/** Runs the strategy `runs` times in sequence and aggregates the per-run summaries. */
export const runStrategyRepeatedly = async (
  request: RepeatedRunRequest,
  deps: RunDependencies,
  onRunComplete?: (run: StrategyRun, summary: RunMetrics, runNumber: number) => Promise<void>,
): Promise<RepeatedRunOutcome> => {
  if (!Number.isInteger(request.runs) || request.runs < 1) {
    throw new Error(`Number of runs must be a positive integer, received ${request.runs}`);
  }

  const runs: StrategyRun[] = [];
  const summaries: RunMetrics[] = [];
  for (let runNumber = 1; runNumber <= request.runs; runNumber++) {
    const run = await runStrategy({ ...request, seed: request.baseSeed + runNumber }, deps);
    const summary = summarizeRun(run);
    runs.push(run);
    summaries.push(summary);
    if (onRunComplete) {
      await onRunComplete(run, summary, runNumber);
    }
  }

  return {
    runs,
    summaries,
    aggregate: aggregate(request.ruleSet.name, summaries, { confidenceLevel: request.confidenceLevel }),
  };
};
