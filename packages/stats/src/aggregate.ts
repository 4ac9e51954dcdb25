import { METRIC_KEYS, type RunMetrics } from "@backtest-lab/sdk";

import { percentile, zScoreForConfidence } from "./normal.js";
import type { AggregateOptions, AggregateResult, MetricStatistics } from "./types.js";

const summarize = (values: ReadonlyArray<number>, z: number): MetricStatistics => {
  const count = values.length;
  const mean = values.reduce((sum, value) => sum + value, 0) / count;
  const stdDev =
    count < 2
      ? 0
      : Math.sqrt(values.reduce((sum, value) => sum + (value - mean) ** 2, 0) / (count - 1));
  const halfWidth = count < 2 ? 0 : (z * stdDev) / Math.sqrt(count);
  const sorted = [...values].sort((a, b) => a - b);
  return {
    count,
    mean,
    stdDev,
    ciLower: mean - halfWidth,
    ciUpper: mean + halfWidth,
    min: sorted[0],
    max: sorted[sorted.length - 1],
    median: percentile(sorted, 0.5),
    q25: percentile(sorted, 0.25),
    q75: percentile(sorted, 0.75),
  };
};

/** Known metrics first in their canonical order, then anything else alphabetically. */
const orderMetricNames = (names: Set<string>): string[] => {
  const known: string[] = METRIC_KEYS.filter((key) => names.has(key));
  const extra = [...names].filter((name) => !known.includes(name)).sort();
  return [...known, ...extra];
};

/**
 * Summarises per-run metric means for one strategy.
 *
 * Runs with no instruments are kept in `runs` but excluded from every statistic. Empty
 * input yields empty statistics.
 */
export function aggregate(
  strategy: string,
  runs: ReadonlyArray<RunMetrics>,
  options: AggregateOptions,
): AggregateResult {
  const z = zScoreForConfidence(options.confidenceLevel);
  const contributing = runs.filter((run) => run.instrumentCount > 0);

  const valuesByMetric = new Map<string, number[]>();
  for (const run of contributing) {
    for (const [name, value] of Object.entries(run.metrics)) {
      if (value === undefined || !Number.isFinite(value)) {
        continue;
      }
      const values = valuesByMetric.get(name) ?? [];
      values.push(value);
      valuesByMetric.set(name, values);
    }
  }

  const statistics: Record<string, MetricStatistics> = {};
  for (const name of orderMetricNames(new Set(valuesByMetric.keys()))) {
    const values = valuesByMetric.get(name);
    if (values) {
      statistics[name] = Object.freeze(summarize(values, z));
    }
  }

  const instrumentUsage: Record<string, number> = {};
  for (const run of contributing) {
    for (const instrument of new Set(run.instruments)) {
      instrumentUsage[instrument] = (instrumentUsage[instrument] ?? 0) + 1;
    }
  }

  return Object.freeze({
    strategy,
    totalRuns: runs.length,
    contributingRuns: contributing.length,
    confidenceLevel: options.confidenceLevel,
    statistics: Object.freeze(statistics),
    instrumentUsage: Object.freeze(instrumentUsage),
    runs: Object.freeze([...runs]),
  });
}
