import type { Interval, ISODate } from "@backtest-lab/sdk";

import type { FetchOutcome } from "./errors.js";

/** Inclusive date range for one instrument in the repository's own symbol convention. */
export interface RangeRequest {
  readonly symbol: string;
  readonly interval: Interval;
  readonly start: ISODate;
  readonly end: ISODate;
}

/**
 * Contract for an external price source.
 * Implementations report failures through the returned outcome and never throw for them.
 */
export interface PriceSource {
  readonly id: string;
  fetchRange(request: RangeRequest): Promise<FetchOutcome>;
}
