import { strict as assert } from "node:assert";
import test from "node:test";

import { inverseNormalCdf, percentile, zScoreForConfidence } from "../src/index.js";

const approx = (actual: number, expected: number, tolerance = 1e-7): void => {
  assert.ok(Math.abs(actual - expected) < tolerance, `expected ${actual} to be close to ${expected}`);
};

test("inverseNormalCdf matches known quantiles", () => {
  assert.equal(inverseNormalCdf(0.5), 0);
  approx(inverseNormalCdf(0.975), 1.959963984540054);
  approx(inverseNormalCdf(0.95), 1.6448536269514715);
  approx(inverseNormalCdf(0.01), -2.3263478740408408);
});

test("inverseNormalCdf is antisymmetric around one half", () => {
  for (const p of [0.001, 0.02, 0.2, 0.4]) {
    approx(inverseNormalCdf(p), -inverseNormalCdf(1 - p));
  }
});

test("inverseNormalCdf rejects probabilities outside (0, 1)", () => {
  assert.throws(() => inverseNormalCdf(0), /strictly between 0 and 1/);
  assert.throws(() => inverseNormalCdf(1), /strictly between 0 and 1/);
  assert.throws(() => inverseNormalCdf(Number.NaN), /strictly between 0 and 1/);
});

test("zScoreForConfidence converts a two-sided level", () => {
  approx(zScoreForConfidence(0.95), 1.959963984540054);
  assert.throws(() => zScoreForConfidence(1.2), /Confidence level/);
});

test("percentile interpolates linearly between ranks", () => {
  const sorted = [1, 2, 3, 4];
  assert.equal(percentile(sorted, 0), 1);
  assert.equal(percentile(sorted, 1), 4);
  assert.equal(percentile(sorted, 0.5), 2.5);
  assert.equal(percentile(sorted, 0.25), 1.75);
  assert.equal(percentile([], 0.5), 0);
});
