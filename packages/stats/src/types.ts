import type { RunMetrics } from "@backtest-lab/sdk";

/** Cross-run summary of one metric. */
export interface MetricStatistics {
  /** Contributing runs that reported the metric. */
  readonly count: number;
  readonly mean: number;
  /** Sample (n - 1) standard deviation; 0 for a single run. */
  readonly stdDev: number;
  readonly ciLower: number;
  readonly ciUpper: number;
  readonly min: number;
  readonly max: number;
  readonly median: number;
  readonly q25: number;
  readonly q75: number;
}

export interface AggregateOptions {
  /** Two-sided confidence level of the interval around the mean. */
  readonly confidenceLevel: number;
}

export interface AggregateResult {
  readonly strategy: string;
  readonly totalRuns: number;
  /** Runs with at least one instrument. Only these feed the statistics. */
  readonly contributingRuns: number;
  readonly confidenceLevel: number;
  readonly statistics: Readonly<Record<string, MetricStatistics>>;
  /** Number of runs in which each instrument produced a result. */
  readonly instrumentUsage: Readonly<Record<string, number>>;
  readonly runs: ReadonlyArray<RunMetrics>;
}
