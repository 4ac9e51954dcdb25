import { createRuleSet } from "./types.js";

export const name = "swing_trading" as const;

/** Daily bars: golden cross of SMA5 over SMA25 with RSI14 in 40-50 and a 1.5x volume surge. */
export const ruleSet = createRuleSet({
  name,
  interval: "1d",
  periodYears: 5,
  entry: {
    crossover: { fast: 5, slow: 25 },
    rsiBand: { period: 14, min: 40, max: 50 },
    volumeSurge: { period: 20, multiplier: 1.5 },
  },
  exit: {
    rsiOverbought: { period: 14, level: 70 },
    belowSma: { period: 25 },
  },
  stopLoss: 0.05,
  takeProfit: 0.075,
  maxHoldingBars: 30,
});
