/**
 * Indicator series aligned with their input: element `i` uses values up to and including `i`,
 * and is `null` until enough values exist. Windows count elements, so gaps in the
 * underlying calendar are never filled.
 */
export type IndicatorSeries = ReadonlyArray<number | null>;

/** Simple moving average over `period` values. */
export const sma = (values: ReadonlyArray<number>, period: number): IndicatorSeries => {
  assertPeriod(period, "SMA");
  const output: Array<number | null> = [];
  let windowSum = 0;
  for (let i = 0; i < values.length; i += 1) {
    windowSum += values[i];
    if (i >= period) {
      windowSum -= values[i - period];
    }
    output.push(i >= period - 1 ? windowSum / period : null);
  }
  return output;
};

/**
 * Wilder's relative strength index.
 *
 * Seeded with the simple average gain/loss of the first `period` changes, so the first
 * defined value sits at index `period`. A window without losses reads 100, and a
 * window without any movement reads 50.
 */
export const rsi = (closes: ReadonlyArray<number>, period: number): IndicatorSeries => {
  assertPeriod(period, "RSI");
  const output: Array<number | null> = closes.map(() => null);
  if (closes.length <= period) {
    return output;
  }

  let avgGain = 0;
  let avgLoss = 0;
  for (let i = 1; i <= period; i += 1) {
    const change = closes[i] - closes[i - 1];
    avgGain += Math.max(change, 0);
    avgLoss += Math.max(-change, 0);
  }
  avgGain /= period;
  avgLoss /= period;
  output[period] = toRsi(avgGain, avgLoss);

  for (let i = period + 1; i < closes.length; i += 1) {
    const change = closes[i] - closes[i - 1];
    avgGain = (avgGain * (period - 1) + Math.max(change, 0)) / period;
    avgLoss = (avgLoss * (period - 1) + Math.max(-change, 0)) / period;
    output[i] = toRsi(avgGain, avgLoss);
  }
  return output;
};

const toRsi = (avgGain: number, avgLoss: number): number => {
  if (avgLoss === 0) {
    return avgGain === 0 ? 50 : 100;
  }
  const relativeStrength = avgGain / avgLoss;
  return 100 - 100 / (1 + relativeStrength);
};

const assertPeriod = (period: number, label: string): void => {
  if (!Number.isInteger(period) || period < 1) {
    throw new Error(`${label} period must be a positive integer, received ${period}`);
  }
};
