/**
 * Mapping between market suffixes used for instruments here (Yahoo-style, e.g. `7203.T`)
 * and Stooq's lower-case country suffixes (e.g. `7203.jp`). Identifiers without a known
 * suffix are US listings.
 */
const MARKET_SUFFIXES: ReadonlyArray<{ readonly local: string; readonly source: string }> = [
  { local: "T", source: "jp" },
  { local: "L", source: "uk" },
  { local: "DE", source: "de" },
  { local: "HK", source: "hk" },
];

const US_SUFFIX = "us";

/** Upper-cased, trimmed identifier; the form every other function here expects. */
export const canonicalSymbol = (symbol: string): string => {
  const trimmed = symbol.trim().toUpperCase();
  if (trimmed.length === 0) {
    throw new Error("Instrument identifier must not be empty");
  }
  return trimmed;
};

export const toSourceSymbol = (symbol: string): string => {
  const canonical = canonicalSymbol(symbol);
  for (const market of MARKET_SUFFIXES) {
    const suffix = `.${market.local}`;
    if (canonical.endsWith(suffix) && canonical.length > suffix.length) {
      return `${canonical.slice(0, -suffix.length).toLowerCase()}.${market.source}`;
    }
  }
  return `${canonical.toLowerCase()}.${US_SUFFIX}`;
};

/**
 * Inverse of {@link toSourceSymbol}.
 * @throws Error when the source identifier carries no recognised suffix.
 */
export const fromSourceSymbol = (sourceSymbol: string): string => {
  const lowered = sourceSymbol.trim().toLowerCase();
  const dot = lowered.lastIndexOf(".");
  if (dot <= 0) {
    throw new Error(`Source symbol "${sourceSymbol}" has no market suffix`);
  }
  const base = lowered.slice(0, dot).toUpperCase();
  const suffix = lowered.slice(dot + 1);
  if (suffix === US_SUFFIX) {
    return base;
  }
  const market = MARKET_SUFFIXES.find((candidate) => candidate.source === suffix);
  if (!market) {
    throw new Error(`Source symbol "${sourceSymbol}" has unknown market suffix ".${suffix}"`);
  }
  return `${base}.${market.local}`;
};
