import { createLogger, type Logger } from "@backtest-lab/logger";
import {
  addDays,
  formatIsoDate,
  parseIsoDate,
  type Bar,
  type Interval,
  type ISODate,
  type PriceSeries,
} from "@backtest-lab/sdk";

import { FetchError, type FetchOutcome } from "./errors.js";
import type { PriceSource, RangeRequest } from "./IDataSource.js";
import { filterBarsToWindow, mergeBars } from "./internalUtils.js";
import { KeyedMutex } from "./keyedMutex.js";
import type { CacheEntry, PriceCacheStore } from "./PriceCache.js";
import { canonicalSymbol } from "./symbols.js";

const DEFAULT_MAX_ATTEMPTS = 3;
const DEFAULT_BASE_DELAY_MS = 2_000;

export interface IncrementalFetcherOptions {
  readonly source: PriceSource;
  readonly cache: PriceCacheStore;
  /** Attempts per sub-range, including the first. */
  readonly maxAttempts?: number;
  readonly baseDelayMs?: number;
  readonly sleep?: (ms: number) => Promise<void>;
  readonly now?: () => number;
  readonly logger?: Logger;
  /** Share one mutex between fetchers that share a cache directory. */
  readonly mutex?: KeyedMutex;
}

export interface DateRange {
  readonly start: ISODate;
  readonly end: ISODate;
}

/** Delay before attempt `attempt + 1`: the base delay doubled per attempt already made. */
export const computeBackoffDelay = (baseDelayMs: number, attempt: number): number => {
  return baseDelayMs * 2 ** (attempt - 1);
};

const latestDate = (bars: ReadonlyArray<Bar>): ISODate =>
  bars.reduce((latest, bar) => (bar.date > latest ? bar.date : latest), bars[0].date);

/**
 * Sub-ranges of [start, end] outside `coverage`. Each range touches the coverage so the
 * union with it stays contiguous; a request far before the covered span also fetches
 * the gap up to it.
 */
export const computeMissingRanges = (
  coverage: DateRange | null,
  start: ISODate,
  end: ISODate,
): DateRange[] => {
  if (start > end) {
    return [];
  }
  if (!coverage) {
    return [{ start, end }];
  }
  const ranges: DateRange[] = [];
  if (start < coverage.start) {
    ranges.push({ start, end: addDays(coverage.start, -1) });
  }
  if (end > coverage.end) {
    ranges.push({ start: addDays(coverage.end, 1), end });
  }
  return ranges;
};

/**
 * Cache-backed price retrieval that only asks the source for dates the cache does not
 * already cover. Read-modify-write of one (symbol, interval) entry is serialised.
 */
export class IncrementalFetcher {
  private readonly source: PriceSource;
  private readonly cache: PriceCacheStore;
  private readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;
  private readonly logger: Logger;
  private readonly mutex: KeyedMutex;

  public constructor(options: IncrementalFetcherOptions) {
    this.source = options.source;
    this.cache = options.cache;
    this.maxAttempts = Math.max(1, Math.floor(options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS));
    this.baseDelayMs = Math.max(0, options.baseDelayMs ?? DEFAULT_BASE_DELAY_MS);
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? createLogger("data/incremental-fetcher");
    this.mutex = options.mutex ?? new KeyedMutex();
  }

  /**
   * Returns the bars inside [start, end] as an immutable series.
   *
   * @throws FetchError when no bar exists in the window after every sub-range was tried.
   */
  public async getSeries(
    symbol: string,
    start: ISODate,
    end: ISODate,
    interval: Interval,
  ): Promise<PriceSeries> {
    const canonical = canonicalSymbol(symbol);
    if (parseIsoDate(start) === null || parseIsoDate(end) === null || start > end) {
      throw new Error(`Invalid date window ${start}..${end} for ${canonical}`);
    }

    const key = `${canonical}|${interval}`;
    const bars = await this.mutex.runExclusive(key, () =>
      this.refresh(canonical, interval, start, end),
    );
    return Object.freeze({
      symbol: canonical,
      interval,
      bars: Object.freeze(bars),
    });
  }

  private async refresh(
    symbol: string,
    interval: Interval,
    start: ISODate,
    end: ISODate,
  ): Promise<Bar[]> {
    const logger = this.logger.child({ symbol, interval });
    const today = formatIsoDate(this.now());
    const fetchEnd = end < today ? end : today;

    const entry = await this.cache.load({ symbol, interval });
    const ranges = computeMissingRanges(entry?.coverage ?? null, start, fetchEnd);

    let bars: ReadonlyArray<Bar> = entry?.bars ?? [];
    let coverage: DateRange | null = entry?.coverage ?? null;
    const failures: string[] = [];

    for (const range of ranges) {
      const request: RangeRequest = { symbol, interval, start: range.start, end: range.end };
      const outcome = await this.fetchWithRetry(request, logger);

      if (outcome.kind !== "ok") {
        failures.push(`${range.start}..${range.end}: ${outcome.error.message}`);
        logger.warn("Sub-range unavailable, continuing with partial data", {
          start: range.start,
          end: range.end,
          failure: outcome.kind,
          error: outcome.error.message,
        });
        continue;
      }

      const received = filterBarsToWindow(outcome.bars, range.start, range.end);
      if (received.length === 0) {
        logger.debug("Source returned no bars for sub-range", { start: range.start, end: range.end });
        continue;
      }

      const merged = mergeBars(bars, received);
      for (const warning of merged.warnings) {
        logger.warn("DataIntegrityWarning", {
          kind: warning.kind,
          dates: warning.dates,
          start: range.start,
          end: range.end,
        });
      }
      bars = merged.bars;
      // A range reaching today only covers what the source has published so far.
      const coveredEnd = range.end >= today ? latestDate(received) : range.end;
      coverage = coverage
        ? {
            start: range.start < coverage.start ? range.start : coverage.start,
            end: coveredEnd > coverage.end ? coveredEnd : coverage.end,
          }
        : { start: range.start, end: coveredEnd };
    }

    if (coverage && (!entry || coverage.start !== entry.coverage.start || coverage.end !== entry.coverage.end)) {
      const updated: CacheEntry = {
        symbol,
        interval,
        coverage,
        bars,
        updatedAt: new Date(this.now()).toISOString(),
      };
      try {
        await this.cache.save(updated);
        logger.debug("Cache entry updated", { coverage, bars: bars.length });
      } catch (error) {
        logger.warn("Cache write failed, returning uncached series", {
          coverage,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    const windowBars = filterBarsToWindow(bars, start, end);
    if (windowBars.length === 0) {
      throw new FetchError(
        { symbol, interval, start, end },
        failures.length > 0 ? failures.join("; ") : "source returned no bars",
      );
    }
    if (failures.length > 0) {
      logger.warn("Returning degraded series", { start, end, bars: windowBars.length, failures });
    }
    return windowBars;
  }

  private async fetchWithRetry(request: RangeRequest, logger: Logger): Promise<FetchOutcome> {
    let attempt = 1;
    let outcome = await this.source.fetchRange(request);
    while (outcome.kind === "transient" && attempt < this.maxAttempts) {
      const delayMs = computeBackoffDelay(this.baseDelayMs, attempt);
      logger.warn("Transient fetch failure, retrying", {
        attempt,
        maxAttempts: this.maxAttempts,
        delayMs,
        error: outcome.error.message,
      });
      await this.sleep(delayMs);
      attempt += 1;
      outcome = await this.source.fetchRange(request);
    }
    return outcome;
  }
}

const defaultSleep = (ms: number): Promise<void> => {
  return new Promise((resolve) => setTimeout(resolve, ms));
};
