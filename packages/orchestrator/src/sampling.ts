import { createLogger, type Logger } from "@backtest-lab/logger";
import { sampleWithoutReplacement } from "@backtest-lab/stats";

const defaultLogger = createLogger("orchestrator/sampling");

/**
 * Seeded subset of `universe` without duplicates. The same universe, seed and size always
 * give the same instruments in the same order.
 */
export const sampleInstruments = (
  universe: ReadonlyArray<string>,
  seed: number,
  sampleSize: number,
  logger: Logger = defaultLogger,
): string[] => {
  const unique = [...new Set(universe)];
  if (sampleSize >= unique.length) {
    logger.info("Sample size covers the whole universe", {
      seed,
      sampleSize,
      universeSize: unique.length,
    });
    return unique;
  }
  return sampleWithoutReplacement(unique, sampleSize, seed);
};
