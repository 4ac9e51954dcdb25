import { z } from "zod";

const period = z.number().int().min(1);

const CrossoverSchema = z
  .object({
    fast: period,
    slow: period,
  })
  .superRefine((value, ctx) => {
    if (value.fast >= value.slow) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "fast must be less than slow",
        path: ["fast"],
      });
    }
  });

const RsiBandSchema = z
  .object({
    period,
    min: z.number().min(0).max(100),
    max: z.number().min(0).max(100),
  })
  .superRefine((value, ctx) => {
    if (value.min >= value.max) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "min must be less than max",
        path: ["min"],
      });
    }
  });

const EntrySchema = z
  .object({
    /** Fast SMA of closes crosses above the slow SMA on this bar. */
    crossover: CrossoverSchema.nullable().default(null),
    /** Wilder RSI of closes within [min, max]. */
    rsiBand: RsiBandSchema.nullable().default(null),
    /** volume / SMA(volume, period) >= multiplier, or > multiplier when `strict`. */
    volumeSurge: z
      .object({ period, multiplier: z.number().positive(), strict: z.boolean().default(false) })
      .nullable()
      .default(null),
    /** Close strictly above SMA(close, period). */
    trendFilter: z.object({ period }).nullable().default(null),
  })
  .refine(
    (entry) =>
      entry.crossover !== null ||
      entry.rsiBand !== null ||
      entry.volumeSurge !== null ||
      entry.trendFilter !== null,
    { message: "at least one entry predicate must be enabled" },
  );

const ExitSchema = z.object({
  /** Wilder RSI strictly above `level`. */
  rsiOverbought: z
    .object({ period, level: z.number().min(0).max(100) })
    .nullable()
    .default(null),
  /** Close strictly below SMA(close, period). */
  belowSma: z.object({ period }).nullable().default(null),
});

/** Runtime validator for {@link RuleSet}; unset predicates default to disabled. */
export const RuleSetSchema = z.object({
  name: z
    .string()
    .min(1)
    .regex(/^[a-z0-9_]+$/u, "use lowercase letters, digits and underscores"),
  interval: z.enum(["1d", "1wk"]),
  /** Length of the evaluated history in whole years. */
  periodYears: z.number().int().min(1),
  entry: EntrySchema,
  exit: ExitSchema.default({}),
  /** Fractional fall from the entry price that forces an exit, e.g. 0.05. */
  stopLoss: z.number().gt(0).lt(1),
  /** Fractional rise from the entry price that forces an exit, e.g. 0.075. */
  takeProfit: z.number().gt(0),
  /** Bars after entry at which the position is closed regardless of price. */
  maxHoldingBars: z.number().int().min(1),
});

export type RuleSetInput = z.input<typeof RuleSetSchema>;

/** Immutable, validated trading rules for one strategy. */
export type RuleSet = Readonly<z.output<typeof RuleSetSchema>>;

/**
 * Validates `input` and returns a deeply frozen {@link RuleSet}.
 *
 * @throws Error listing every invalid field.
 */
export const createRuleSet = (input: RuleSetInput): RuleSet => {
  const parsed = RuleSetSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => {
      const path = issue.path.join(".") || "(root)";
      return `${path}: ${issue.message}`;
    });
    throw new Error(`Invalid rule set: ${issues.join("; ")}`);
  }
  return deepFreeze(parsed.data);
};

/**
 * Bars that must be present before every enabled entry predicate is defined.
 * A crossover needs the slow SMA on the previous bar too, and RSI needs `period` changes.
 */
export const computeMinLookback = (ruleSet: RuleSet): number => {
  const { crossover, rsiBand, volumeSurge, trendFilter } = ruleSet.entry;
  return Math.max(
    1,
    crossover ? crossover.slow + 1 : 0,
    rsiBand ? rsiBand.period + 1 : 0,
    volumeSurge ? volumeSurge.period : 0,
    trendFilter ? trendFilter.period : 0,
  );
};

const deepFreeze = <T extends object>(value: T): T => {
  for (const nested of Object.values(value)) {
    if (nested !== null && typeof nested === "object" && !Object.isFrozen(nested)) {
      deepFreeze(nested);
    }
  }
  Object.freeze(value);
  return value;
};
