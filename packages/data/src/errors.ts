import type { Bar, Interval, ISODate } from "@backtest-lab/sdk";

/** Retryable failure: network error, timeout, throttling or an unparseable payload. */
export class TransientFetchError extends Error {
  public constructor(message: string, options?: { readonly cause?: unknown }) {
    super(message, options);
    this.name = "TransientFetchError";
  }
}

/** The source confirmed it has nothing for this instrument or range; retrying will not help. */
export class PermanentFetchError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = "PermanentFetchError";
  }
}

/** Result of one request against a price source. */
export type FetchOutcome =
  | { readonly kind: "ok"; readonly bars: ReadonlyArray<Bar> }
  | { readonly kind: "transient"; readonly error: TransientFetchError }
  | { readonly kind: "permanent"; readonly error: PermanentFetchError };

export const ok = (bars: ReadonlyArray<Bar>): FetchOutcome => ({ kind: "ok", bars });

export const transient = (message: string, cause?: unknown): FetchOutcome => ({
  kind: "transient",
  error: new TransientFetchError(message, cause === undefined ? undefined : { cause }),
});

export const permanent = (message: string): FetchOutcome => ({
  kind: "permanent",
  error: new PermanentFetchError(message),
});

/**
 * Raised by the fetcher when no bar at all is available for the requested window
 * after every sub-range has been attempted.
 */
export class FetchError extends Error {
  public readonly symbol: string;
  public readonly interval: Interval;
  public readonly start: ISODate;
  public readonly end: ISODate;

  public constructor(
    details: { readonly symbol: string; readonly interval: Interval; readonly start: ISODate; readonly end: ISODate },
    reason: string,
  ) {
    super(`No ${details.interval} data for ${details.symbol} between ${details.start} and ${details.end}: ${reason}`);
    this.name = "FetchError";
    this.symbol = details.symbol;
    this.interval = details.interval;
    this.start = details.start;
    this.end = details.end;
  }
}

/** Non-fatal inconsistency resolved during a merge and reported through the logger. */
export interface DataIntegrityWarning {
  readonly kind: "duplicate-date" | "out-of-order" | "overwritten";
  readonly dates: ReadonlyArray<ISODate>;
}
