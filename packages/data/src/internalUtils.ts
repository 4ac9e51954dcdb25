import { BarSchema, type Bar, type ISODate } from "@backtest-lab/sdk";

import type { DataIntegrityWarning } from "./errors.js";

/**
 * Shared helpers for the source and the cache.
 */
export const slugify = (value: string): string => {
  return value
    .toLowerCase()
    .replace(/[^a-z0-9]+/gu, "_")
    .replace(/^_+|_+$/gu, "");
};

/**
 * Normalises bars read from the cache or a remote payload; anything malformed becomes null.
 */
export const sanitizeBar = (maybeBar: unknown): Bar | null => {
  const parsed = BarSchema.safeParse(maybeBar);
  return parsed.success ? parsed.data : null;
};

/** Keeps bars whose date lies inside [start, end]; ISO dates compare lexicographically. */
export const filterBarsToWindow = (
  bars: ReadonlyArray<Bar>,
  start: ISODate,
  end: ISODate,
): Bar[] => {
  return bars.filter((bar) => bar.date >= start && bar.date <= end);
};

export const sortBarsByDate = (bars: ReadonlyArray<Bar>): Bar[] => {
  return [...bars].sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
};

/**
 * Reports dates that repeat or go backwards inside one payload as received.
 */
export const inspectOrdering = (bars: ReadonlyArray<Bar>): DataIntegrityWarning[] => {
  const warnings: DataIntegrityWarning[] = [];
  const seen = new Set<ISODate>();
  const duplicates: ISODate[] = [];
  const outOfOrder: ISODate[] = [];
  for (let i = 0; i < bars.length; i += 1) {
    const { date } = bars[i];
    if (seen.has(date)) {
      duplicates.push(date);
    } else if (i > 0 && date < bars[i - 1].date) {
      outOfOrder.push(date);
    }
    seen.add(date);
  }
  if (duplicates.length > 0) {
    warnings.push({ kind: "duplicate-date", dates: duplicates });
  }
  if (outOfOrder.length > 0) {
    warnings.push({ kind: "out-of-order", dates: outOfOrder });
  }
  return warnings;
};

export interface MergeResult {
  readonly bars: Bar[];
  readonly warnings: DataIntegrityWarning[];
}

/**
 * Merges `incoming` into `existing` by date. Incoming bars win on a shared date, and
 * within `incoming` the last bar for a date wins. The result is ascending and unique.
 */
export const mergeBars = (existing: ReadonlyArray<Bar>, incoming: ReadonlyArray<Bar>): MergeResult => {
  const warnings = inspectOrdering(incoming);
  const byDate = new Map<ISODate, Bar>();
  for (const bar of existing) {
    byDate.set(bar.date, bar);
  }

  const overwritten: ISODate[] = [];
  const incomingDates = new Set<ISODate>();
  for (const bar of incoming) {
    const previous = byDate.get(bar.date);
    if (previous && !incomingDates.has(bar.date) && !sameValues(previous, bar)) {
      overwritten.push(bar.date);
    }
    incomingDates.add(bar.date);
    byDate.set(bar.date, bar);
  }
  if (overwritten.length > 0) {
    warnings.push({ kind: "overwritten", dates: overwritten });
  }

  return { bars: sortBarsByDate([...byDate.values()]), warnings };
};

const sameValues = (a: Bar, b: Bar): boolean => {
  return (
    a.open === b.open &&
    a.high === b.high &&
    a.low === b.low &&
    a.close === b.close &&
    a.volume === b.volume
  );
};
