import { mkdir, rename, writeFile } from "node:fs/promises";
import { join } from "node:path";

import type { StrategyRun } from "@backtest-lab/orchestrator";
import type { RunMetrics } from "@backtest-lab/sdk";
import type { AggregateResult } from "@backtest-lab/stats";

export interface ResultsWriterOptions {
  readonly resultsDir: string;
  readonly now?: () => Date;
}

export interface IndividualRunDocument {
  readonly strategy: string;
  readonly runNumber: number;
  readonly seed: number;
  readonly createdAt: string;
  readonly instruments: ReadonlyArray<string>;
  readonly summary: RunMetrics;
  readonly failures: StrategyRun["failures"];
  readonly results: StrategyRun["results"];
}

export interface AggregateDocument extends AggregateResult {
  readonly createdAt: string;
}

export interface ResultsWriter {
  /** Writes one run and returns the file path. */
  writeRun(run: StrategyRun, summary: RunMetrics, runNumber: number): Promise<string>;
  /** Writes the strategy aggregate and returns the file path. */
  writeAggregate(aggregate: AggregateResult): Promise<string>;
}

export const individualFileName = (strategy: string, runNumber: number, seed: number): string =>
  `${strategy}_run_${String(runNumber).padStart(3, "0")}_seed_${seed}.json`;

export const aggregateFileName = (strategy: string): string => `${strategy}_aggregated.json`;

const writeJson = async (path: string, payload: unknown): Promise<void> => {
  const tempPath = `${path}.${process.pid}.tmp`;
  await writeFile(tempPath, `${JSON.stringify(payload, null, 2)}\n`, { encoding: "utf-8" });
  await rename(tempPath, path);
};

export const createResultsWriter = (options: ResultsWriterOptions): ResultsWriter => {
  const now = options.now ?? (() => new Date());
  const individualDir = join(options.resultsDir, "individual");
  const aggregatedDir = join(options.resultsDir, "aggregated");

  return {
    async writeRun(run, summary, runNumber) {
      await mkdir(individualDir, { recursive: true });
      const document: IndividualRunDocument = {
        strategy: run.strategy,
        runNumber,
        seed: run.seed,
        createdAt: now().toISOString(),
        instruments: run.instruments,
        summary,
        failures: run.failures,
        results: run.results,
      };
      const path = join(individualDir, individualFileName(run.strategy, runNumber, run.seed));
      await writeJson(path, document);
      return path;
    },

    async writeAggregate(aggregate) {
      await mkdir(aggregatedDir, { recursive: true });
      const document: AggregateDocument = { ...aggregate, createdAt: now().toISOString() };
      const path = join(aggregatedDir, aggregateFileName(aggregate.strategy));
      await writeJson(path, document);
      return path;
    },
  };
};
