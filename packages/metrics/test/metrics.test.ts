import assert from "node:assert/strict";
import test from "node:test";

import type { EquityPoint, Trade } from "@backtest-lab/sdk";

import {
  calculateCagr,
  calculateMaxDrawdown,
  calculateReturns,
  calculateSharpe,
  calculateSortino,
  calculateTotalReturn,
  calculateTradeStatistics,
  calculateVolatility,
  mean,
  sampleStandardDeviation,
} from "../src/index.js";

const approx = (actual: number, expected: number, tolerance = 1e-9): void => {
  assert.ok(Math.abs(actual - expected) <= tolerance, `expected ${expected}, received ${actual}`);
};

const curve = (values: number[]): EquityPoint[] =>
  values.map((equity, index) => ({
    date: new Date(Date.UTC(2024, 0, index + 1)).toISOString().slice(0, 10),
    equity,
  }));

const swingCurve = curve([1, 1.1, 0.99, 1.089]);

test("calculateReturns yields one simple return per step", () => {
  const returns = calculateReturns(swingCurve);
  assert.equal(returns.length, 3);
  approx(returns[0] ?? 0, 0.1);
  approx(returns[1] ?? 0, -0.1);
  approx(returns[2] ?? 0, 0.1);
});

test("sampleStandardDeviation divides by n - 1", () => {
  approx(sampleStandardDeviation([0.1, 0.2, 0.3]), 0.1);
  assert.equal(sampleStandardDeviation([0.4]), 0);
  assert.equal(mean([]), 0);
});

test("calculateSharpe annualises by interval", () => {
  const expectedRatio = 0.1 / 3 / Math.sqrt(0.04 / 3);
  approx(calculateSharpe(swingCurve, "1d"), expectedRatio * Math.sqrt(252), 1e-6);
  approx(calculateSharpe(swingCurve, "1wk"), expectedRatio * Math.sqrt(52), 1e-6);
});

test("calculateSharpe is zero for a flat curve", () => {
  assert.equal(calculateSharpe(curve([1, 1, 1, 1]), "1d"), 0);
  assert.equal(calculateSharpe(curve([1, 1.05]), "1d"), 0, "a single return has no dispersion");
});

test("calculateSortino uses only negative returns for the denominator", () => {
  approx(calculateSortino(swingCurve, "1d"), (0.1 / 3 / 0.1) * Math.sqrt(252), 1e-6);
  assert.equal(calculateSortino(curve([1, 1.1, 1.2]), "1d"), 0);
});

test("calculateMaxDrawdown reports the deepest decline as a negative fraction", () => {
  approx(calculateMaxDrawdown(swingCurve), -0.1);
  approx(calculateMaxDrawdown(curve([1, 2, 1.5, 3, 1.2])), -0.6);
  assert.equal(calculateMaxDrawdown(curve([1, 1.2, 1.4])), 0);
  assert.equal(calculateMaxDrawdown([]), 0);
});

test("calculateTotalReturn compares the last point to the first", () => {
  approx(calculateTotalReturn(swingCurve), 0.089);
  assert.equal(calculateTotalReturn([]), 0);
});

test("calculateCagr compounds over calendar time", () => {
  const points: EquityPoint[] = [
    { date: "2023-01-01", equity: 1 },
    { date: "2025-01-01", equity: 1.21 },
  ];
  approx(calculateCagr(points), Math.pow(1.21, 365.25 / 731) - 1);
  assert.equal(calculateCagr(points.slice(0, 1)), 0);
});

test("calculateTradeStatistics splits wins from losses", () => {
  const base = { entryDate: "2024-01-01", entryPrice: 100, exitDate: "2024-01-05", exitPrice: 100 };
  const trades: Trade[] = [
    { ...base, exitReason: "take-profit", return: 0.1, barsHeld: 3 },
    { ...base, exitReason: "stop-loss", return: -0.05, barsHeld: 5 },
    { ...base, exitReason: "time-exit", return: 0, barsHeld: 1 },
  ];
  const stats = calculateTradeStatistics(trades);
  assert.equal(stats.numTrades, 3);
  approx(stats.winRate, 1 / 3);
  approx(stats.avgWin, 0.1);
  approx(stats.avgLoss, -0.025);
  approx(stats.avgTradeReturn, 0.05 / 3);
  assert.equal(stats.avgHoldingBars, 3);
  approx(stats.profitFactor, 2);
});

test("profit factor is zero when no trade lost", () => {
  const base = { entryDate: "2024-01-01", entryPrice: 100, exitDate: "2024-01-05", exitPrice: 110 };
  const stats = calculateTradeStatistics([{ ...base, exitReason: "take-profit", return: 0.1, barsHeld: 2 }]);
  assert.equal(stats.profitFactor, 0);
});

test("calculateTradeStatistics is all zeros without trades", () => {
  assert.deepEqual(calculateTradeStatistics([]), {
    numTrades: 0,
    winRate: 0,
    avgTradeReturn: 0,
    avgWin: 0,
    avgLoss: 0,
    avgHoldingBars: 0,
    profitFactor: 0,
  });
});

test("calculateVolatility annualises the deviation of per-bar returns", () => {
  const std = sampleStandardDeviation(calculateReturns(swingCurve));
  approx(calculateVolatility(swingCurve, "1d"), std * Math.sqrt(252));
  approx(calculateVolatility(swingCurve, "1wk"), std * Math.sqrt(52));
  assert.equal(calculateVolatility(curve([1, 1, 1]), "1d"), 0);
});
