import { isAbsolute, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";

import type { LogLevel } from "@backtest-lab/logger";
import { assertValid, isRuleSetName, ruleSetNames, type RuleSetName } from "@backtest-lab/sdk";
import { z } from "zod";

const MODULE_DIR = fileURLToPath(new URL(".", import.meta.url));
export const REPO_ROOT = join(MODULE_DIR, "..", "..", "..");

const commaList = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((value) =>
      value
        .split(",")
        .map((item) => item.trim())
        .filter((item) => item.length > 0),
    );

const positiveInt = (fallback: number) => z.coerce.number().int().min(1).default(fallback);

const EnvSchema = z.object({
  STRATEGIES: commaList("swing_trading,long_term").transform((names, ctx) => {
    const valid: RuleSetName[] = [];
    for (const name of names) {
      if (isRuleSetName(name)) {
        valid.push(name);
      } else {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `unknown strategy "${name}", expected one of ${ruleSetNames.join(", ")}`,
        });
      }
    }
    if (names.length === 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "at least one strategy is required" });
    }
    return valid;
  }),
  NUM_RUNS: positiveInt(2),
  BASE_SEED: z.coerce.number().int().default(42),
  SAMPLE_SIZE: positiveInt(30),
  UNIVERSE_PATH: z.string().default("storage/universe/indices.json"),
  UNIVERSE_INDICES: commaList("SP500,NASDAQ100,NIKKEI225").refine((indices) => indices.length > 0, {
    message: "at least one index is required",
  }),
  CACHE_DIR: z.string().default("storage/cache"),
  RESULTS_DIR: z.string().default("storage/results"),
  FETCH_CONCURRENCY: positiveInt(3),
  COMPUTE_CONCURRENCY: positiveInt(2),
  FETCH_MAX_ATTEMPTS: positiveInt(3),
  FETCH_BASE_DELAY_MS: z.coerce.number().int().min(0).default(2_000),
  FETCH_TIMEOUT_MS: positiveInt(30_000),
  CONFIDENCE_LEVEL: z.coerce.number().gt(0).lt(1).default(0.95),
  STOOQ_BASE_URL: z.string().url().default("https://stooq.com"),
  LOG_LEVEL: z
    .string()
    .default("info")
    .transform((value) => value.toLowerCase())
    .pipe(z.enum(["debug", "info", "warn", "error"])),
});

export interface RunnerConfig {
  readonly strategies: ReadonlyArray<RuleSetName>;
  readonly numRuns: number;
  readonly baseSeed: number;
  readonly sampleSize: number;
  readonly universePath: string;
  readonly universeIndices: ReadonlyArray<string>;
  readonly cacheDir: string;
  readonly resultsDir: string;
  readonly fetchConcurrency: number;
  readonly computeConcurrency: number;
  readonly fetchMaxAttempts: number;
  readonly fetchBaseDelayMs: number;
  readonly fetchTimeoutMs: number;
  readonly confidenceLevel: number;
  readonly stooqBaseUrl: string;
  readonly logLevel: LogLevel;
}

/** Blank variables count as unset so `KEY=` in a .env file falls back to the default. */
const dropBlank = (env: Readonly<Record<string, string | undefined>>): Record<string, string> => {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim().length > 0) {
      present[key] = value;
    }
  }
  return present;
};

/**
 * Reads runner settings from the environment. Relative paths resolve against `rootDir`.
 *
 * @throws Error listing every invalid variable.
 */
export const loadRunnerConfig = (
  env: Readonly<Record<string, string | undefined>> = process.env,
  rootDir: string = REPO_ROOT,
): RunnerConfig => {
  const parsed = assertValid(EnvSchema, dropBlank(env), "runner environment");
  const fromRoot = (path: string): string => (isAbsolute(path) ? path : resolve(rootDir, path));

  return {
    strategies: parsed.STRATEGIES,
    numRuns: parsed.NUM_RUNS,
    baseSeed: parsed.BASE_SEED,
    sampleSize: parsed.SAMPLE_SIZE,
    universePath: fromRoot(parsed.UNIVERSE_PATH),
    universeIndices: parsed.UNIVERSE_INDICES,
    cacheDir: fromRoot(parsed.CACHE_DIR),
    resultsDir: fromRoot(parsed.RESULTS_DIR),
    fetchConcurrency: parsed.FETCH_CONCURRENCY,
    computeConcurrency: parsed.COMPUTE_CONCURRENCY,
    fetchMaxAttempts: parsed.FETCH_MAX_ATTEMPTS,
    fetchBaseDelayMs: parsed.FETCH_BASE_DELAY_MS,
    fetchTimeoutMs: parsed.FETCH_TIMEOUT_MS,
    confidenceLevel: parsed.CONFIDENCE_LEVEL,
    stooqBaseUrl: parsed.STOOQ_BASE_URL,
    logLevel: parsed.LOG_LEVEL,
  };
};
