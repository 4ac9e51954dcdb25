import {
  ANNUALIZATION_FACTORS,
  parseIsoDate,
  type EquityPoint,
  type Interval,
  type Trade,
} from "@backtest-lab/sdk";

const MS_PER_YEAR = 365.25 * 24 * 60 * 60 * 1000;

/** Simple per-bar returns of an equity curve. */
export const calculateReturns = (points: ReadonlyArray<EquityPoint>): number[] => {
  if (points.length < 2) {
    return [];
  }
  const returns: number[] = [];
  for (let i = 1; i < points.length; i += 1) {
    const prev = points[i - 1];
    const current = points[i];
    if (prev.equity <= 0) {
      continue;
    }
    returns.push((current.equity - prev.equity) / prev.equity);
  }
  return returns;
};

export const mean = (values: ReadonlyArray<number>): number => {
  if (values.length === 0) {
    return 0;
  }
  const sum = values.reduce((acc, value) => acc + value, 0);
  return sum / values.length;
};

/** Sample (n - 1) standard deviation; 0 for fewer than two values. */
export const sampleStandardDeviation = (values: ReadonlyArray<number>): number => {
  if (values.length < 2) {
    return 0;
  }
  const avg = mean(values);
  const variance =
    values.reduce((acc, value) => {
      const diff = value - avg;
      return acc + diff * diff;
    }, 0) /
    (values.length - 1);
  return Math.sqrt(variance);
};

export const calculateTotalReturn = (points: ReadonlyArray<EquityPoint>): number => {
  if (points.length === 0) {
    return 0;
  }
  const start = points[0].equity;
  const end = points[points.length - 1].equity;
  if (start <= 0) {
    return 0;
  }
  return end / start - 1;
};

/**
 * Mean over sample deviation of per-bar returns, annualised for the interval.
 * Defined as 0 when there are fewer than two returns or no dispersion.
 */
export const calculateSharpe = (points: ReadonlyArray<EquityPoint>, interval: Interval): number => {
  const returns = calculateReturns(points);
  const std = sampleStandardDeviation(returns);
  if (std === 0) {
    return 0;
  }
  return (mean(returns) / std) * Math.sqrt(ANNUALIZATION_FACTORS[interval]);
};

/** Annualised sample deviation of per-bar returns. */
export const calculateVolatility = (points: ReadonlyArray<EquityPoint>, interval: Interval): number => {
  return sampleStandardDeviation(calculateReturns(points)) * Math.sqrt(ANNUALIZATION_FACTORS[interval]);
};

/** Like {@link calculateSharpe} but divides by the root mean square of negative returns. */
export const calculateSortino = (points: ReadonlyArray<EquityPoint>, interval: Interval): number => {
  const returns = calculateReturns(points);
  const downside = returns.filter((value) => value < 0);
  if (downside.length === 0) {
    return 0;
  }
  const downsideVariance = downside.reduce((acc, value) => acc + value * value, 0) / downside.length;
  const downsideStd = Math.sqrt(downsideVariance);
  if (downsideStd === 0) {
    return 0;
  }
  return (mean(returns) / downsideStd) * Math.sqrt(ANNUALIZATION_FACTORS[interval]);
};

/** Largest peak-to-trough decline as a non-positive fraction, e.g. -0.25. */
export const calculateMaxDrawdown = (points: ReadonlyArray<EquityPoint>): number => {
  if (points.length === 0) {
    return 0;
  }
  let peak = points[0].equity;
  let maxDrawdown = 0;
  for (const point of points) {
    if (point.equity > peak) {
      peak = point.equity;
    }
    if (peak > 0) {
      const drawdown = (point.equity - peak) / peak;
      if (drawdown < maxDrawdown) {
        maxDrawdown = drawdown;
      }
    }
  }
  return maxDrawdown;
};

export const calculateCagr = (points: ReadonlyArray<EquityPoint>): number => {
  if (points.length < 2) {
    return 0;
  }
  const start = points[0];
  const end = points[points.length - 1];
  if (start.equity <= 0 || end.equity <= 0) {
    return 0;
  }
  const startTime = parseIsoDate(start.date);
  const endTime = parseIsoDate(end.date);
  if (startTime === null || endTime === null || startTime >= endTime) {
    return 0;
  }
  const years = (endTime - startTime) / MS_PER_YEAR;
  return Math.pow(end.equity / start.equity, 1 / years) - 1;
};

export interface TradeStatistics {
  readonly numTrades: number;
  /** Fraction of trades with a strictly positive return; 0 without trades. */
  readonly winRate: number;
  readonly avgTradeReturn: number;
  readonly avgWin: number;
  /** Mean of losing trade returns, reported as a non-positive number. */
  readonly avgLoss: number;
  readonly avgHoldingBars: number;
  /** Gross winning return over gross losing return; 0 when no trade lost. */
  readonly profitFactor: number;
}

export const calculateTradeStatistics = (trades: ReadonlyArray<Trade>): TradeStatistics => {
  const returns = trades.map((trade) => trade.return);
  const wins = returns.filter((value) => value > 0);
  const losses = returns.filter((value) => value <= 0);
  const grossWin = wins.reduce((acc, value) => acc + value, 0);
  const grossLoss = -losses.reduce((acc, value) => acc + value, 0);
  return {
    numTrades: trades.length,
    winRate: trades.length === 0 ? 0 : wins.length / trades.length,
    avgTradeReturn: mean(returns),
    avgWin: mean(wins),
    avgLoss: mean(losses),
    avgHoldingBars: mean(trades.map((trade) => trade.barsHeld)),
    profitFactor: grossLoss === 0 ? 0 : grossWin / grossLoss,
  };
};
