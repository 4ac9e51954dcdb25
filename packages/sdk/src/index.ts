// Source of truth for the data shapes shared by the fetcher, engine, orchestrator and aggregator.

import { z } from "zod";

import { RuleSetSchema } from "./strategies/types.js";

/** -----------------------------------------------------------------------
 *  Shared enums & primitives
 *  -------------------------------------------------------------------- */

/** Bar granularity of a price series. */
export type Interval = "1d" | "1wk";

/** Calendar date formatted as YYYY-MM-DD (UTC). */
export type ISODate = string;

/** Number of bars per year used to annualise per-bar statistics. */
export const ANNUALIZATION_FACTORS: Readonly<Record<Interval, number>> = {
  "1d": 252,
  "1wk": 52,
};

/** Metric identifiers emitted per instrument by the engine. */
export type MetricKey =
  | "total_return"
  | "max_drawdown"
  | "win_rate"
  | "num_trades"
  | "sharpe"
  | "sortino"
  | "cagr"
  | "avg_trade_return"
  | "avg_win"
  | "avg_loss"
  | "avg_holding_bars"
  | "profit_factor"
  | "volatility";

export const METRIC_KEYS: ReadonlyArray<MetricKey> = [
  "total_return",
  "max_drawdown",
  "win_rate",
  "num_trades",
  "sharpe",
  "sortino",
  "cagr",
  "avg_trade_return",
  "avg_win",
  "avg_loss",
  "avg_holding_bars",
  "profit_factor",
  "volatility",
];

/** -----------------------------------------------------------------------
 *  Price data
 *  -------------------------------------------------------------------- */

/** One OHLCV observation for a single instrument at one interval. */
export interface Bar {
  readonly date: ISODate;
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;
  readonly volume: number;
}

/**
 * Ordered bars for one (symbol, interval) pair.
 * Dates are strictly increasing; missing trading dates are simply absent.
 */
export interface PriceSeries {
  readonly symbol: string;
  readonly interval: Interval;
  readonly bars: ReadonlyArray<Bar>;
}

const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/u;

export const IntervalSchema = z.enum(["1d", "1wk"]);

export const IsoDateSchema = z
  .string()
  .regex(ISO_DATE_PATTERN, "expected YYYY-MM-DD")
  .refine((value) => !Number.isNaN(Date.parse(`${value}T00:00:00.000Z`)), "invalid date");

/** Runtime validator for {@link Bar}. */
export const BarSchema = z.object({
  date: IsoDateSchema,
  open: z.number().finite(),
  high: z.number().finite(),
  low: z.number().finite(),
  close: z.number().finite(),
  volume: z.number().finite(),
});

/** -----------------------------------------------------------------------
 *  Backtest output
 *  -------------------------------------------------------------------- */

export type ExitReason = "stop-loss" | "take-profit" | "time-exit" | "signal-exit" | "end-of-data";

/** A closed long round-trip. */
export interface Trade {
  readonly entryDate: ISODate;
  readonly entryPrice: number;
  readonly exitDate: ISODate;
  readonly exitPrice: number;
  readonly exitReason: ExitReason;
  /** Fractional return, `exitPrice / entryPrice - 1`. */
  readonly return: number;
  readonly barsHeld: number;
}

/** Equity value after processing one bar; starts at 1.0. */
export interface EquityPoint {
  readonly date: ISODate;
  readonly equity: number;
}

export type MetricValues = Readonly<Record<MetricKey, number>>;

/** Output of one engine invocation for one instrument. */
export interface RunResult {
  readonly symbol: string;
  readonly interval: Interval;
  readonly ruleSet: string;
  readonly trades: ReadonlyArray<Trade>;
  readonly equityCurve: ReadonlyArray<EquityPoint>;
  readonly metrics: MetricValues;
}

/**
 * Per-run metric means handed to the aggregator.
 * `instrumentCount` is the number of instruments that produced a {@link RunResult}.
 */
export interface RunMetrics {
  readonly seed: number;
  readonly instrumentCount: number;
  readonly instruments: ReadonlyArray<string>;
  readonly metrics: Readonly<Partial<Record<string, number>>>;
}

export const RunMetricsSchema = z.object({
  seed: z.number().int(),
  instrumentCount: z.number().int().nonnegative(),
  instruments: z.array(z.string().min(1)),
  metrics: z.record(z.number()),
});

/** -----------------------------------------------------------------------
 *  Helper: runtime assertion using zod
 *  -------------------------------------------------------------------- */

/**
 * Validates the supplied payload against the provided schema.
 *
 * @param label - Descriptive label for error reporting.
 * @throws Error when validation fails.
 */
export function assertValid<Output, Input = Output>(
  schema: z.ZodType<Output, z.ZodTypeDef, Input>,
  value: unknown,
  label = "payload",
): Output {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => {
      const path = issue.path.join(".") || "(root)";
      return `${path}: ${issue.message}`;
    });
    throw new Error(`Invalid ${label}: ${issues.join("; ")}`);
  }
  return parsed.data;
}

export * from "./dates.js";
export * from "./indicators.js";
export * from "./strategies/types.js";
export { createRuleEvaluator, type RuleEvaluator } from "./strategies/evaluator.js";
export {
  ruleSets,
  ruleSetNames,
  getRuleSet,
  isRuleSetName,
  type RuleSetName,
} from "./strategies/index.js";

/** Namespaced access to the primary schemas. */
export const Schemas = {
  Bar: BarSchema,
  Interval: IntervalSchema,
  IsoDate: IsoDateSchema,
  RuleSet: RuleSetSchema,
  RunMetrics: RunMetricsSchema,
};
