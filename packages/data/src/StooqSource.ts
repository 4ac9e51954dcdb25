import type { Bar, Interval } from "@backtest-lab/sdk";

import { ok, permanent, transient, type FetchOutcome } from "./errors.js";
import { createHttpClient, type HttpClient, type HttpResponse } from "./httpClient.js";
import type { PriceSource, RangeRequest } from "./IDataSource.js";
import { sanitizeBar } from "./internalUtils.js";
import { toSourceSymbol } from "./symbols.js";

const DEFAULT_BASE_URL = "https://stooq.com";
const DEFAULT_TIMEOUT_MS = 30_000;

const INTERVAL_CODES: Readonly<Record<Interval, string>> = {
  "1d": "d",
  "1wk": "w",
};

const REQUIRED_COLUMNS = ["date", "open", "high", "low", "close"] as const;

export interface StooqSourceOptions {
  readonly baseUrl?: string;
  readonly httpClient?: HttpClient;
  readonly timeoutMs?: number;
}

/**
 * Downloads OHLCV history as CSV from Stooq.
 *
 * Failures are classified rather than thrown: an explicit "No data" answer or a 404 is
 * permanent, throttling, 5xx, socket errors and unreadable payloads are transient.
 */
export class StooqSource implements PriceSource {
  public readonly id = "stooq";

  private readonly baseUrl: string;
  private readonly httpClient: HttpClient;
  private readonly timeoutMs: number;

  public constructor(options: StooqSourceOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/u, "");
    this.httpClient = options.httpClient ?? createHttpClient();
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  public buildUrl(request: RangeRequest): string {
    const url = new URL(`${this.baseUrl}/q/d/l/`);
    url.searchParams.set("s", toSourceSymbol(request.symbol));
    url.searchParams.set("d1", compactDate(request.start));
    url.searchParams.set("d2", compactDate(request.end));
    url.searchParams.set("i", INTERVAL_CODES[request.interval]);
    return url.toString();
  }

  public async fetchRange(request: RangeRequest): Promise<FetchOutcome> {
    const url = this.buildUrl(request);

    let response: HttpResponse;
    try {
      response = await this.httpClient.get(url, { timeoutMs: this.timeoutMs });
    } catch (error) {
      return transient(`Request for ${request.symbol} failed: ${describe(error)}`, error);
    }

    if (response.statusCode === 404) {
      return permanent(`Stooq has no instrument ${request.symbol}`);
    }
    if (response.statusCode === 429 || response.statusCode >= 500) {
      return transient(`Stooq responded with status ${response.statusCode}`);
    }
    if (response.statusCode < 200 || response.statusCode >= 300) {
      return permanent(`Stooq rejected the request with status ${response.statusCode}`);
    }

    const body = response.body.trim();
    if (/^no data/iu.test(body)) {
      return permanent(`Stooq returned no data for ${request.symbol} ${request.start}..${request.end}`);
    }

    const parsed = parseStooqCsv(body);
    if (!parsed) {
      return transient(`Unreadable Stooq payload for ${request.symbol}: ${body.slice(0, 80)}`);
    }
    return ok(parsed);
  }
}

/**
 * Parses a Stooq CSV export. Columns are located by header name and anything beyond the
 * OHLCV set (such as an adjusted close) is ignored. Rows with a non-positive close or a
 * negative volume are dropped. Returns null when the header lacks a required column.
 */
export const parseStooqCsv = (content: string): Bar[] | null => {
  const lines = content.split(/\r?\n/u).filter((line) => line.trim().length > 0);
  if (lines.length === 0) {
    return null;
  }
  const header = lines[0].split(",").map((column) => column.trim().toLowerCase());
  const columnIndex = (name: string): number => header.indexOf(name);
  if (REQUIRED_COLUMNS.some((name) => columnIndex(name) === -1)) {
    return null;
  }
  const volumeIndex = columnIndex("volume");

  const bars: Bar[] = [];
  for (const line of lines.slice(1)) {
    const cells = line.split(",").map((cell) => cell.trim());
    const candidate = sanitizeBar({
      date: cells[columnIndex("date")],
      open: Number(cells[columnIndex("open")]),
      high: Number(cells[columnIndex("high")]),
      low: Number(cells[columnIndex("low")]),
      close: Number(cells[columnIndex("close")]),
      volume: volumeIndex === -1 ? 0 : Number(cells[volumeIndex] ?? "0"),
    });
    if (!candidate || candidate.close <= 0 || candidate.volume < 0) {
      continue;
    }
    bars.push(candidate);
  }
  return bars;
};

const compactDate = (isoDate: string): string => isoDate.replace(/-/gu, "");

const describe = (error: unknown): string => (error instanceof Error ? error.message : String(error));
