import type { ISODate } from "./index.js";

const DAY_MS = 24 * 60 * 60 * 1000;

/** Parses a YYYY-MM-DD (or full ISO) string to epoch milliseconds at UTC midnight. */
export const parseIsoDate = (value: string): number | null => {
  const epoch = Date.parse(value.length === 10 ? `${value}T00:00:00.000Z` : value);
  if (Number.isNaN(epoch)) {
    return null;
  }
  return Math.floor(epoch / DAY_MS) * DAY_MS;
};

export const formatIsoDate = (epochMs: number): ISODate => {
  return new Date(epochMs).toISOString().slice(0, 10);
};

/**
 * Shifts a calendar date by whole days.
 * @throws Error when `date` cannot be parsed.
 */
export const addDays = (date: ISODate, days: number): ISODate => {
  const epoch = parseIsoDate(date);
  if (epoch === null) {
    throw new Error(`Invalid date "${date}"`);
  }
  return formatIsoDate(epoch + days * DAY_MS);
};

export interface BacktestPeriod {
  readonly start: ISODate;
  readonly end: ISODate;
}

/**
 * Window of `years` whole years ending on the last day of the month before `executionDate`.
 *
 * An execution date of 2024-03-15 with `years = 5` yields 2019-03-01 .. 2024-02-29.
 */
export const resolveBacktestPeriod = (years: number, executionDate: Date): BacktestPeriod => {
  if (!Number.isInteger(years) || years < 1) {
    throw new Error(`Backtest period must be a positive whole number of years, received ${years}`);
  }
  const year = executionDate.getUTCFullYear();
  const month = executionDate.getUTCMonth();
  // day 0 of the current month is the last day of the previous one
  const end = Date.UTC(year, month, 0);
  const start = Date.UTC(year - years, month, 1);
  return { start: formatIsoDate(start), end: formatIsoDate(end) };
};
