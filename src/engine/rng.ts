/**
 * Seeded Random Number Generator for the quiz games.
 *
 * Uses the Mulberry32 algorithm, which produces identical sequences for
 * identical seeds on every platform. Game code takes randomness only from
 * here, never from Math.random(), so a round can be replayed from its seed.
 */

// =============================================================================
// Mulberry32 Algorithm
// =============================================================================

function mulberry32Step(state: number): { value: number; nextState: number } {
  let t = (state + 0x6D2B79F5) | 0;
  t = Math.imul(t ^ (t >>> 15), t | 1);
  t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
  const value = ((t ^ (t >>> 14)) >>> 0);
  return { value, nextState: (state + 0x6D2B79F5) | 0 };
}

// =============================================================================
// SeededRNG Class
// =============================================================================

/**
 * Usage:
 *   const rng = new SeededRNG(12345);
 *   const offset = rng.nextInt(1, 5);
 *   const order = rng.shuffle(entities);
 */
export class SeededRNG {
  private state: number;
  private readonly initialSeed: number;

  /**
   * @param seed - Any 32-bit integer; converted to unsigned.
   */
  constructor(seed: number) {
    this.initialSeed = seed >>> 0;
    this.state = this.initialSeed;
  }

  getSeed(): number {
    return this.initialSeed;
  }

  reset(): void {
    this.state = this.initialSeed;
  }

  /**
   * Next number in [0, 1). Every other method draws from this.
   */
  next(): number {
    const { value, nextState } = mulberry32Step(this.state);
    this.state = nextState;
    return value / 0x100000000;
  }

  /**
   * Integer in [min, max] (inclusive).
   */
  nextInt(min: number, max: number): number {
    if (min > max) {
      throw new Error(`Invalid range: min (${min}) > max (${max})`);
    }
    return min + Math.floor(this.next() * (max - min + 1));
  }

  /**
   * @param probability - Chance of returning true (0-1). Default 0.5.
   */
  nextBoolean(probability: number = 0.5): boolean {
    return this.next() < probability;
  }

  /**
   * Random element, or undefined for an empty array.
   */
  pick<T>(array: readonly T[]): T | undefined {
    if (array.length === 0) return undefined;
    return array[this.nextInt(0, array.length - 1)];
  }

  /**
   * Fisher-Yates shuffle into a new array.
   */
  shuffle<T>(array: readonly T[]): T[] {
    const result = [...array];
    for (let i = result.length - 1; i > 0; i--) {
      const j = this.nextInt(0, i);
      const a = result[i];
      const b = result[j];
      if (a === undefined || b === undefined) continue;
      result[i] = b;
      result[j] = a;
    }
    return result;
  }

  /**
   * `n` distinct elements without replacement, in draw order.
   */
  sample<T>(array: readonly T[], n: number): T[] {
    if (n >= array.length) {
      return this.shuffle(array);
    }

    const result: T[] = [];
    const available = [...array];
    for (let i = 0; i < n; i++) {
      const index = this.nextInt(0, available.length - 1);
      const [chosen] = available.splice(index, 1);
      if (chosen !== undefined) result.push(chosen);
    }
    return result;
  }
}

// =============================================================================
// Seed Utilities
// =============================================================================

/**
 * Deterministic seed from a string, e.g. a quiz session id.
 */
export function seedFromString(text: string): number {
  let hash = 0;
  for (let i = 0; i < text.length; i++) {
    hash = ((hash << 5) - hash) + text.charCodeAt(i);
    hash = hash & hash; // Convert to 32-bit integer
  }
  return hash >>> 0;
}
