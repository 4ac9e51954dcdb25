import { readFile } from "node:fs/promises";

import { canonicalSymbol } from "@backtest-lab/data";
import { assertValid } from "@backtest-lab/sdk";
import { z } from "zod";

/** Index name mapped to its member symbols. */
export type Universe = Readonly<Record<string, ReadonlyArray<string>>>;

export const UniverseSchema = z.record(
  z.string().min(1),
  z.array(z.string().trim().min(1)).min(1, "an index needs at least one symbol"),
);

export const loadUniverse = async (path: string): Promise<Universe> => {
  const raw = await readFile(path, { encoding: "utf-8" });
  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch (error) {
    throw new Error(
      `Universe file ${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    );
  }
  return assertValid(UniverseSchema, payload, `universe file ${path}`);
};

/**
 * Union of the chosen indices' members as canonical symbols, first occurrence wins.
 *
 * @throws Error naming any index the universe does not define.
 */
export const resolveUniverse = (universe: Universe, indices: ReadonlyArray<string>): string[] => {
  const unknown = indices.filter((index) => !Object.hasOwn(universe, index));
  if (unknown.length > 0) {
    throw new Error(
      `Unknown index ${unknown.map((index) => `"${index}"`).join(", ")}. Available: ${Object.keys(universe).join(", ")}`,
    );
  }
  const seen = new Set<string>();
  for (const index of indices) {
    for (const symbol of universe[index]) {
      seen.add(canonicalSymbol(symbol));
    }
  }
  return [...seen];
};
