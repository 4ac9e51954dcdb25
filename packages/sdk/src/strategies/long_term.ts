import { createRuleSet } from "./types.js";

export const name = "long_term" as const;

/**
 * Weekly bars: close above SMA200 with a 1.5x volume surge; exits when close falls below SMA200.
 * 104 weekly bars is the two-year holding limit.
 */
export const ruleSet = createRuleSet({
  name,
  interval: "1wk",
  periodYears: 20,
  entry: {
    volumeSurge: { period: 20, multiplier: 1.5, strict: true },
    trendFilter: { period: 200 },
  },
  exit: {
    belowSma: { period: 200 },
  },
  stopLoss: 0.085,
  takeProfit: 0.3,
  maxHoldingBars: 104,
});
