import { strict as assert } from "node:assert";
import test from "node:test";

import {
  createRuleEvaluator,
  getRuleSet,
  ruleSetNames,
  type Bar,
  type Interval,
  type PriceSeries,
} from "@backtest-lab/sdk";

import { runBacktest } from "../src/index.js";

const DAY_MS = 86_400_000;

const buildSyntheticSeries = (interval: Interval, length: number): PriceSeries => {
  const stepDays = interval === "1d" ? 1 : 7;
  const start = Date.UTC(2005, 0, 3);
  const bars: Bar[] = [];
  for (let index = 0; index < length; index += 1) {
    const close = 100 + 12 * Math.sin(index / 13) + 6 * Math.sin(index / 41) + index * 0.04;
    bars.push({
      date: new Date(start + index * stepDays * DAY_MS).toISOString().slice(0, 10),
      open: close,
      high: close * 1.02,
      low: close * 0.985,
      close,
      volume: index % 11 === 0 ? 400_000 : 100_000,
    });
  }
  return { symbol: "SYNTH", interval, bars };
};

for (const name of ruleSetNames) {
  test(`${name} produces a consistent run over a synthetic series`, () => {
    const ruleSet = getRuleSet(name);
    const series = buildSyntheticSeries(ruleSet.interval, 900);
    const result = runBacktest(series, ruleSet);
    const dates = series.bars.map((bar) => bar.date);
    const minLookback = createRuleEvaluator(ruleSet, series.bars).minLookback;

    assert.equal(result.symbol, "SYNTH");
    assert.equal(result.ruleSet, name);
    assert.equal(result.equityCurve.length, series.bars.length);
    assert.equal(result.metrics.num_trades, result.trades.length);

    let previousExit = -1;
    let compounded = 1;
    for (const trade of result.trades) {
      const entryIndex = dates.indexOf(trade.entryDate);
      const exitIndex = dates.indexOf(trade.exitDate);
      assert.ok(entryIndex >= minLookback - 1, `${trade.entryDate} precedes the lookback`);
      assert.ok(entryIndex > previousExit, "positions must not overlap or re-enter on an exit bar");
      assert.equal(exitIndex - entryIndex, trade.barsHeld);
      assert.ok(trade.barsHeld <= ruleSet.maxHoldingBars);
      previousExit = exitIndex;
      compounded *= 1 + trade.return;
    }

    const finalEquity = result.equityCurve[result.equityCurve.length - 1].equity;
    assert.ok(Math.abs(finalEquity - compounded) < 1e-9, `${finalEquity} vs ${compounded}`);
    assert.ok(result.metrics.max_drawdown <= 0);
  });

  test(`${name} is deterministic`, () => {
    const ruleSet = getRuleSet(name);
    const series = buildSyntheticSeries(ruleSet.interval, 600);
    assert.deepEqual(runBacktest(series, ruleSet), runBacktest(series, ruleSet));
  });
}
