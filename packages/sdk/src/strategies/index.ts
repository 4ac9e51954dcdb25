import * as longTerm from "./long_term.js";
import * as swingTrading from "./swing_trading.js";
import type { RuleSet } from "./types.js";

export type RuleSetName = typeof swingTrading.name | typeof longTerm.name;

/** Built-in rule sets keyed by name. */
export const ruleSets: Readonly<Record<RuleSetName, RuleSet>> = Object.freeze({
  [swingTrading.name]: swingTrading.ruleSet,
  [longTerm.name]: longTerm.ruleSet,
});

export const ruleSetNames: ReadonlyArray<RuleSetName> = [swingTrading.name, longTerm.name];

export const isRuleSetName = (value: string): value is RuleSetName => {
  return ruleSetNames.some((known) => known === value);
};

/**
 * Looks up a built-in rule set.
 * @throws Error naming the known rule sets when `name` is unknown.
 */
export const getRuleSet = (name: string): RuleSet => {
  if (!isRuleSetName(name)) {
    throw new Error(`Unknown rule set "${name}". Expected one of: ${ruleSetNames.join(", ")}`);
  }
  return ruleSets[name];
};
