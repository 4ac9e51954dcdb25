import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { join } from "node:path";

import { createLogger, type Logger } from "@backtest-lab/logger";
import { BarSchema, IntervalSchema, IsoDateSchema, type Bar, type Interval, type ISODate } from "@backtest-lab/sdk";
import { z } from "zod";

import { slugify } from "./internalUtils.js";

/** Persisted series for one (symbol, interval) key plus the date range it is known to cover. */
export interface CacheEntry {
  readonly symbol: string;
  readonly interval: Interval;
  readonly coverage: { readonly start: ISODate; readonly end: ISODate };
  readonly bars: ReadonlyArray<Bar>;
  readonly updatedAt: string;
}

const CacheEntrySchema = z
  .object({
    symbol: z.string().min(1),
    interval: IntervalSchema,
    coverage: z.object({ start: IsoDateSchema, end: IsoDateSchema }),
    bars: z.array(BarSchema),
    updatedAt: z.string(),
  })
  .refine((entry) => entry.coverage.start <= entry.coverage.end, {
    message: "coverage start must not be after its end",
    path: ["coverage"],
  })
  .refine(
    (entry) => entry.bars.every((bar, index) => index === 0 || entry.bars[index - 1].date < bar.date),
    { message: "bars must be strictly ascending by date", path: ["bars"] },
  );

export interface CacheKey {
  readonly symbol: string;
  readonly interval: Interval;
}

/**
 * Keyed store for cache entries. `load` initialises an entry from durable storage and
 * `save` flushes it; nothing else reads or writes the backing files.
 */
export interface PriceCacheStore {
  load(key: CacheKey): Promise<CacheEntry | null>;
  save(entry: CacheEntry): Promise<void>;
}

export interface FilePriceCacheOptions {
  readonly cacheDir: string;
  readonly logger?: Logger;
}

/**
 * One JSON document per key under `cacheDir`. Writes go to a temporary file first and are
 * renamed into place, so a reader never observes a half-written record.
 */
export class FilePriceCache implements PriceCacheStore {
  private readonly cacheDir: string;
  private readonly logger: Logger;
  private writeSequence = 0;

  public constructor(options: FilePriceCacheOptions) {
    this.cacheDir = options.cacheDir;
    this.logger = options.logger ?? createLogger("data/price-cache");
  }

  public resolvePath(key: CacheKey): string {
    return join(this.cacheDir, `${slugify(key.symbol)}_${key.interval}.json`);
  }

  /** Returns null for a missing record; a corrupt record is logged and also treated as missing. */
  public async load(key: CacheKey): Promise<CacheEntry | null> {
    const path = this.resolvePath(key);
    let raw: string;
    try {
      raw = await readFile(path, { encoding: "utf-8" });
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      this.logger.warn("Cache record unreadable, refetching", {
        symbol: key.symbol,
        interval: key.interval,
        path,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }

    let payload: unknown;
    try {
      payload = JSON.parse(raw);
    } catch (error) {
      this.logger.warn("Cache record is not valid JSON, refetching", {
        symbol: key.symbol,
        interval: key.interval,
        path,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }

    const parsed = CacheEntrySchema.safeParse(payload);
    if (!parsed.success || parsed.data.symbol !== key.symbol || parsed.data.interval !== key.interval) {
      this.logger.warn("Cache record failed validation, refetching", {
        symbol: key.symbol,
        interval: key.interval,
        path,
        issues: parsed.success ? ["key mismatch"] : parsed.error.issues.map((issue) => issue.message),
      });
      return null;
    }
    return parsed.data;
  }

  public async save(entry: CacheEntry): Promise<void> {
    await mkdir(this.cacheDir, { recursive: true });
    const path = this.resolvePath(entry);
    this.writeSequence += 1;
    const tempPath = `${path}.${process.pid}.${this.writeSequence}.tmp`;
    await writeFile(tempPath, JSON.stringify(entry), { encoding: "utf-8" });
    await rename(tempPath, path);
  }
}

/** In-memory store with the same contract, for callers that do not want disk persistence. */
export class MemoryPriceCache implements PriceCacheStore {
  private readonly entries = new Map<string, CacheEntry>();

  public async load(key: CacheKey): Promise<CacheEntry | null> {
    return this.entries.get(memoryKey(key)) ?? null;
  }

  public async save(entry: CacheEntry): Promise<void> {
    this.entries.set(memoryKey(entry), entry);
  }
}

const memoryKey = (key: CacheKey): string => `${key.symbol}|${key.interval}`;

const isMissingFile = (error: unknown): boolean => {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
};
