import {
  createRuleEvaluator,
  type Bar,
  type EquityPoint,
  type ExitReason,
  type MetricValues,
  type PriceSeries,
  type RuleSet,
  type RunResult,
  type Trade,
} from "@backtest-lab/sdk";
import {
  calculateCagr,
  calculateMaxDrawdown,
  calculateSharpe,
  calculateSortino,
  calculateTotalReturn,
  calculateTradeStatistics,
  calculateVolatility,
} from "@backtest-lab/metrics";

import type { ExitCheck, ExitLevels, OpenPosition, Position } from "./types.js";

const INITIAL_EQUITY = 1;

const FLAT: Position = { state: "flat" };

const exitLevels = (position: OpenPosition, ruleSet: RuleSet): ExitLevels => ({
  stopPrice: position.entryPrice * (1 - ruleSet.stopLoss),
  targetPrice: position.entryPrice * (1 + ruleSet.takeProfit),
});

/**
 * Picks the single exit reason for a held bar. Stop-loss beats take-profit, which beats
 * the holding limit, which beats the rule set's exit signal.
 */
const checkExit = (
  bar: Bar,
  barsHeld: number,
  levels: ExitLevels,
  ruleSet: RuleSet,
  signal: () => boolean,
): ExitCheck => {
  if (bar.low <= levels.stopPrice) {
    return "stop-loss";
  }
  if (bar.high >= levels.targetPrice) {
    return "take-profit";
  }
  if (barsHeld >= ruleSet.maxHoldingBars) {
    return "time-exit";
  }
  if (signal()) {
    return "signal-exit";
  }
  return null;
};

/**
 * Price an exit fills at. A stop or target fills at its level, or at the open when the bar
 * gaps through it; every other exit fills at the close.
 */
const fillPrice = (bar: Bar, reason: ExitReason, levels: ExitLevels): number => {
  switch (reason) {
    case "stop-loss":
      return Math.min(bar.open, levels.stopPrice);
    case "take-profit":
      return Math.max(bar.open, levels.targetPrice);
    default:
      return bar.close;
  }
};

const closePosition = (
  position: OpenPosition,
  bar: Bar,
  exitPrice: number,
  barsHeld: number,
  exitReason: ExitReason,
): Trade => ({
  entryDate: position.entryDate,
  entryPrice: position.entryPrice,
  exitDate: bar.date,
  exitPrice,
  exitReason,
  return: exitPrice / position.entryPrice - 1,
  barsHeld,
});

const buildMetrics = (
  equityCurve: ReadonlyArray<EquityPoint>,
  trades: ReadonlyArray<Trade>,
  series: PriceSeries,
): MetricValues => {
  const tradeStats = calculateTradeStatistics(trades);
  return {
    total_return: calculateTotalReturn(equityCurve),
    max_drawdown: calculateMaxDrawdown(equityCurve),
    win_rate: tradeStats.winRate,
    num_trades: tradeStats.numTrades,
    sharpe: calculateSharpe(equityCurve, series.interval),
    sortino: calculateSortino(equityCurve, series.interval),
    cagr: calculateCagr(equityCurve),
    avg_trade_return: tradeStats.avgTradeReturn,
    avg_win: tradeStats.avgWin,
    avg_loss: tradeStats.avgLoss,
    avg_holding_bars: tradeStats.avgHoldingBars,
    profit_factor: tradeStats.profitFactor,
    volatility: calculateVolatility(equityCurve, series.interval),
  };
};

/**
 * Replays `series` bar by bar through a long-only position state machine.
 *
 * Entries fill at the bar's close; exits fill as described by {@link fillPrice}. Equity
 * starts at 1.0 and compounds bar to bar while the position is held, ending at the exit
 * price on the exit bar. A position still open after
 * the last bar is closed at the last close with reason "end-of-data". A series shorter
 * than the rule set's lookback produces no trades and a flat curve.
 */
export function runBacktest(series: PriceSeries, ruleSet: RuleSet): RunResult {
  if (series.interval !== ruleSet.interval) {
    throw new Error(
      `Rule set ${ruleSet.name} expects ${ruleSet.interval} bars, received ${series.interval} for ${series.symbol}`,
    );
  }

  const bars = series.bars;
  const evaluator = createRuleEvaluator(ruleSet, bars);
  const firstEntryIndex = evaluator.minLookback - 1;
  const equityCurve: EquityPoint[] = [];
  const trades: Trade[] = [];
  let equity = INITIAL_EQUITY;
  let position: Position = FLAT;

  for (let index = 0; index < bars.length; index += 1) {
    const bar = bars[index];

    if (position.state === "long") {
      const previousClose = bars[index - 1].close;
      const barsHeld = position.barsHeld + 1;
      const levels = exitLevels(position, ruleSet);
      const reason = checkExit(bar, barsHeld, levels, ruleSet, () => evaluator.exit(index));
      if (reason) {
        const exitPrice = fillPrice(bar, reason, levels);
        equity *= exitPrice / previousClose;
        trades.push(closePosition(position, bar, exitPrice, barsHeld, reason));
        position = FLAT;
      } else {
        equity *= bar.close / previousClose;
        position = { ...position, barsHeld };
      }
    } else if (index >= firstEntryIndex && evaluator.entry(index)) {
      position = {
        state: "long",
        entryDate: bar.date,
        entryPrice: bar.close,
        entryIndex: index,
        barsHeld: 0,
      };
    }

    equityCurve.push({ date: bar.date, equity });
  }

  if (position.state === "long") {
    const lastBar = bars[bars.length - 1];
    trades.push(closePosition(position, lastBar, lastBar.close, position.barsHeld, "end-of-data"));
  }

  return {
    symbol: series.symbol,
    interval: series.interval,
    ruleSet: ruleSet.name,
    trades,
    equityCurve,
    metrics: buildMetrics(equityCurve, trades, series),
  };
}
