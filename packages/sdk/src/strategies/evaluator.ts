import type { Bar } from "../index.js";
import { rsi, sma, type IndicatorSeries } from "../indicators.js";
import { computeMinLookback, type RuleSet } from "./types.js";

/** Entry and exit predicates bound to one bar sequence. */
export interface RuleEvaluator {
  /** Bars required before {@link RuleEvaluator.entry} can hold. */
  readonly minLookback: number;
  entry(index: number): boolean;
  exit(index: number): boolean;
}

/**
 * Precomputes every indicator the rule set needs over `bars` and returns index-based predicates.
 * A predicate whose indicator is still undefined at `index` evaluates to false.
 */
export const createRuleEvaluator = (ruleSet: RuleSet, bars: ReadonlyArray<Bar>): RuleEvaluator => {
  const closes = bars.map((bar) => bar.close);
  const volumes = bars.map((bar) => bar.volume);
  const smaCache = new Map<number, IndicatorSeries>();
  const rsiCache = new Map<number, IndicatorSeries>();

  const closeSma = (period: number): IndicatorSeries => {
    let series = smaCache.get(period);
    if (!series) {
      series = sma(closes, period);
      smaCache.set(period, series);
    }
    return series;
  };

  const closeRsi = (period: number): IndicatorSeries => {
    let series = rsiCache.get(period);
    if (!series) {
      series = rsi(closes, period);
      rsiCache.set(period, series);
    }
    return series;
  };

  const { crossover, rsiBand, volumeSurge, trendFilter } = ruleSet.entry;
  const { rsiOverbought, belowSma } = ruleSet.exit;
  const volumeAverage = volumeSurge ? sma(volumes, volumeSurge.period) : null;

  const entryChecks: Array<(index: number) => boolean> = [];

  if (crossover) {
    const fast = closeSma(crossover.fast);
    const slow = closeSma(crossover.slow);
    entryChecks.push((index) => {
      if (index < 1) {
        return false;
      }
      const fastNow = fast[index];
      const slowNow = slow[index];
      const fastPrev = fast[index - 1];
      const slowPrev = slow[index - 1];
      if (fastNow === null || slowNow === null || fastPrev === null || slowPrev === null) {
        return false;
      }
      return fastNow > slowNow && fastPrev <= slowPrev;
    });
  }

  if (rsiBand) {
    const values = closeRsi(rsiBand.period);
    entryChecks.push((index) => {
      const value = values[index];
      return value !== null && value >= rsiBand.min && value <= rsiBand.max;
    });
  }

  if (volumeSurge && volumeAverage) {
    entryChecks.push((index) => {
      const average = volumeAverage[index];
      if (average === null || average <= 0) {
        return false;
      }
      const ratio = volumes[index] / average;
      return volumeSurge.strict ? ratio > volumeSurge.multiplier : ratio >= volumeSurge.multiplier;
    });
  }

  if (trendFilter) {
    const values = closeSma(trendFilter.period);
    entryChecks.push((index) => {
      const average = values[index];
      return average !== null && closes[index] > average;
    });
  }

  const exitChecks: Array<(index: number) => boolean> = [];

  if (rsiOverbought) {
    const values = closeRsi(rsiOverbought.period);
    exitChecks.push((index) => {
      const value = values[index];
      return value !== null && value > rsiOverbought.level;
    });
  }

  if (belowSma) {
    const values = closeSma(belowSma.period);
    exitChecks.push((index) => {
      const average = values[index];
      return average !== null && closes[index] < average;
    });
  }

  const inRange = (index: number): boolean => Number.isInteger(index) && index >= 0 && index < bars.length;

  return {
    minLookback: computeMinLookback(ruleSet),
    entry: (index) => inRange(index) && entryChecks.every((check) => check(index)),
    exit: (index) => inRange(index) && exitChecks.some((check) => check(index)),
  };
};
