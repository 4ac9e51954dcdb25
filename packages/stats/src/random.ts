const MODULUS = 2147483648;
const MULTIPLIER = 1103515245;
const INCREMENT = 12345;

/**
 * Seeded linear congruential generator. The same seed always yields the same sequence,
 * which is what makes instrument sampling reproducible across processes.
 */
export class SeededRandom {
  private state: number;

  public constructor(seed: number) {
    if (!Number.isSafeInteger(seed)) {
      throw new Error(`Seed must be a safe integer, received ${seed}`);
    }
    this.state = ((seed % MODULUS) + MODULUS) % MODULUS;
  }

  /** Next value in [0, 1). */
  public next(): number {
    // imul keeps the low 32 bits of the product exact before reducing mod 2^31.
    this.state = (Math.imul(this.state, MULTIPLIER) + INCREMENT) & (MODULUS - 1);
    return this.state / MODULUS;
  }

  /** Integer in [min, max). */
  public nextInt(min: number, max: number): number {
    return Math.floor(this.next() * (max - min)) + min;
  }
}

/** Fisher-Yates shuffle of a copy of `items`. */
export function shuffle<T>(items: ReadonlyArray<T>, rng: SeededRandom): T[] {
  const copy = [...items];
  for (let i = copy.length - 1; i > 0; i--) {
    const j = rng.nextInt(0, i + 1);
    const held = copy[i];
    copy[i] = copy[j];
    copy[j] = held;
  }
  return copy;
}

/**
 * Draws `size` distinct items. A size at or above the population returns every item
 * in shuffled order.
 */
export function sampleWithoutReplacement<T>(
  items: ReadonlyArray<T>,
  size: number,
  seed: number,
): T[] {
  if (!Number.isInteger(size) || size < 0) {
    throw new Error(`Sample size must be a non-negative integer, received ${size}`);
  }
  return shuffle(items, new SeededRandom(seed)).slice(0, size);
}
