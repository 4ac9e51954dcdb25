import { strict as assert } from "node:assert";
import test from "node:test";

import { createRuleSet, type Bar, type PriceSeries, type RuleSetInput } from "@backtest-lab/sdk";

import { runBacktest } from "../src/index.js";

interface BarSpec {
  readonly close: number;
  readonly open?: number;
  readonly high?: number;
  readonly low?: number;
  readonly volume?: number;
}

const buildSeries = (specs: BarSpec[]): PriceSeries => ({
  symbol: "TEST",
  interval: "1d",
  bars: specs.map(
    (spec, index): Bar => ({
      date: new Date(Date.UTC(2024, 0, index + 1)).toISOString().slice(0, 10),
      open: spec.open ?? spec.close,
      high: spec.high ?? spec.close,
      low: spec.low ?? spec.close,
      close: spec.close,
      volume: spec.volume ?? 100,
    }),
  ),
});

// Entry holds whenever volume is at least 1.5x the two-bar average: 100 followed by 300.
const buildRules = (overrides: Partial<RuleSetInput> = {}) =>
  createRuleSet({
    name: "surge",
    interval: "1d",
    periodYears: 1,
    entry: { volumeSurge: { period: 2, multiplier: 1.5 } },
    stopLoss: 0.05,
    takeProfit: 0.05,
    maxHoldingBars: 10,
    ...overrides,
  });

const approx = (actual: number, expected: number): void => {
  assert.ok(Math.abs(actual - expected) < 1e-12, `expected ${actual} to be close to ${expected}`);
};

test("stop-loss wins when a bar crosses both thresholds and fills at the stop level", () => {
  const series = buildSeries([
    { close: 100 },
    { close: 100, volume: 300 },
    { close: 100, high: 110, low: 90 },
  ]);
  const result = runBacktest(series, buildRules());

  assert.equal(result.trades.length, 1);
  const [trade] = result.trades;
  assert.equal(trade.exitReason, "stop-loss");
  assert.equal(trade.entryDate, "2024-01-02");
  assert.equal(trade.exitDate, "2024-01-03");
  approx(trade.exitPrice, 95);
  approx(trade.return, -0.05);
  assert.equal(trade.barsHeld, 1);
  approx(result.equityCurve[2].equity, 0.95);
});

test("a stop-loss never books a gain when the bar closes above the entry", () => {
  const series = buildSeries([
    { close: 100 },
    { close: 100, volume: 300 },
    { open: 103, close: 103, high: 104, low: 94 },
  ]);
  const [trade] = runBacktest(series, buildRules({ takeProfit: 0.1 })).trades;

  assert.equal(trade.exitReason, "stop-loss");
  approx(trade.exitPrice, 95);
  assert.ok(trade.return < 0);
});

test("a bar that gaps through the stop fills at its open", () => {
  const series = buildSeries([
    { close: 100 },
    { close: 100, volume: 300 },
    { open: 92, close: 96, high: 97, low: 91 },
  ]);
  const result = runBacktest(series, buildRules());

  assert.equal(result.trades[0].exitReason, "stop-loss");
  assert.equal(result.trades[0].exitPrice, 92);
  approx(result.trades[0].return, -0.08);
  approx(result.equityCurve[2].equity, 0.92);
});

test("take-profit fills at the target level", () => {
  const series = buildSeries([
    { close: 100 },
    { close: 100, volume: 300 },
    { close: 104, high: 106, low: 99 },
  ]);
  const result = runBacktest(series, buildRules());

  assert.equal(result.trades[0].exitReason, "take-profit");
  approx(result.trades[0].exitPrice, 105);
  approx(result.trades[0].return, 0.05);
  assert.deepEqual(
    result.equityCurve.map((point) => point.date),
    ["2024-01-01", "2024-01-02", "2024-01-03"],
  );
  approx(result.equityCurve[2].equity, 1.05);
  assert.equal(result.metrics.num_trades, 1);
  assert.equal(result.metrics.win_rate, 1);
  approx(result.metrics.total_return, 0.05);
  assert.equal(result.metrics.profit_factor, 0);
  // Per-bar returns are 0 then 0.05.
  approx(result.metrics.volatility, 0.025 * Math.sqrt(2) * Math.sqrt(252));
});

test("a bar that gaps above the target fills at its open", () => {
  const series = buildSeries([
    { close: 100 },
    { close: 100, volume: 300 },
    { open: 108, close: 101, high: 109, low: 100 },
  ]);
  const [trade] = runBacktest(series, buildRules()).trades;

  assert.equal(trade.exitReason, "take-profit");
  assert.equal(trade.exitPrice, 108);
  approx(trade.return, 0.08);
});

test("time exit closes after the holding limit and never re-enters on the exit bar", () => {
  const series = buildSeries([
    { close: 100 },
    { close: 100, volume: 300 },
    { close: 100 },
    { close: 100, volume: 300 },
    { close: 100 },
  ]);
  const result = runBacktest(series, buildRules({ maxHoldingBars: 2 }));

  assert.equal(result.trades.length, 1);
  assert.equal(result.trades[0].exitReason, "time-exit");
  assert.equal(result.trades[0].exitDate, "2024-01-04");
  assert.equal(result.trades[0].barsHeld, 2);
});

test("signal exit fires when the close drops below its average", () => {
  const series = buildSeries([
    { close: 100 },
    { close: 100, volume: 300 },
    { close: 98, high: 100, low: 98 },
  ]);
  const result = runBacktest(
    series,
    buildRules({ exit: { belowSma: { period: 2 } }, takeProfit: 0.1 }),
  );

  assert.equal(result.trades[0].exitReason, "signal-exit");
  approx(result.trades[0].return, -0.02);
  assert.equal(result.metrics.win_rate, 0);
  approx(result.metrics.avg_loss, -0.02);
});

test("an open position is closed at the last bar with end-of-data", () => {
  const series = buildSeries([{ close: 100 }, { close: 100, volume: 300 }, { close: 102 }]);
  const result = runBacktest(series, buildRules({ takeProfit: 0.1 }));

  assert.equal(result.trades.length, 1);
  assert.equal(result.trades[0].exitReason, "end-of-data");
  assert.equal(result.trades[0].exitDate, "2024-01-03");
  assert.equal(result.trades[0].barsHeld, 1);
  approx(result.trades[0].return, 0.02);
  assert.deepEqual(
    result.equityCurve.map((point) => point.equity),
    [1, 1, 1.02],
  );
});

test("an entry on the last bar is closed with zero bars held", () => {
  const series = buildSeries([{ close: 100 }, { close: 100, volume: 300 }]);
  const result = runBacktest(series, buildRules());

  assert.equal(result.trades.length, 1);
  assert.equal(result.trades[0].exitReason, "end-of-data");
  assert.equal(result.trades[0].barsHeld, 0);
  assert.equal(result.trades[0].return, 0);
});

test("every entry produces exactly one trade", () => {
  const series = buildSeries([
    { close: 100 },
    { close: 100, volume: 300 },
    { close: 100, low: 90 },
    { close: 100 },
    { close: 100, volume: 300 },
    { close: 100 },
  ]);
  const result = runBacktest(series, buildRules());

  assert.deepEqual(
    result.trades.map((trade) => [trade.entryDate, trade.exitReason]),
    [
      ["2024-01-02", "stop-loss"],
      ["2024-01-05", "end-of-data"],
    ],
  );
  assert.equal(result.equityCurve.length, series.bars.length);
});

test("a series shorter than the lookback yields no trades and a flat curve", () => {
  const result = runBacktest(buildSeries([{ close: 100, volume: 300 }]), buildRules());

  assert.deepEqual(result.trades, []);
  assert.deepEqual(
    result.equityCurve.map((point) => point.equity),
    [1],
  );
  assert.equal(result.metrics.total_return, 0);
  assert.equal(result.metrics.num_trades, 0);
  assert.equal(result.metrics.sharpe, 0);
});

test("replaying the same input twice gives identical results", () => {
  const series = buildSeries([
    { close: 100 },
    { close: 100, volume: 300 },
    { close: 103, high: 104, low: 99 },
    { close: 101 },
    { close: 106, volume: 300 },
    { close: 99 },
  ]);
  const rules = buildRules();
  assert.deepEqual(runBacktest(series, rules), runBacktest(series, rules));
});

test("rejects a series whose interval does not match the rule set", () => {
  const series: PriceSeries = { ...buildSeries([{ close: 100 }]), interval: "1wk" };
  assert.throws(() => runBacktest(series, buildRules()), /expects 1d bars, received 1wk for TEST/);
});
