export type { PriceSource, RangeRequest } from "./IDataSource.js";
export {
  FetchError,
  PermanentFetchError,
  TransientFetchError,
  ok,
  permanent,
  transient,
  type DataIntegrityWarning,
  type FetchOutcome,
} from "./errors.js";
export { createHttpClient, HttpTimeoutError, type HttpClient, type HttpResponse } from "./httpClient.js";
export { StooqSource, parseStooqCsv, type StooqSourceOptions } from "./StooqSource.js";
export {
  FilePriceCache,
  MemoryPriceCache,
  type CacheEntry,
  type CacheKey,
  type PriceCacheStore,
} from "./PriceCache.js";
export { KeyedMutex } from "./keyedMutex.js";
export {
  IncrementalFetcher,
  computeBackoffDelay,
  computeMissingRanges,
  type DateRange,
  type IncrementalFetcherOptions,
} from "./IncrementalFetcher.js";
export { canonicalSymbol, fromSourceSymbol, toSourceSymbol } from "./symbols.js";
export { mergeBars } from "./internalUtils.js";
