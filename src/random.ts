import { randomInt } from 'crypto';
import type { RandomSource } from './types';

/**
 * Default random source, backed by the platform CSPRNG.
 */
export class CryptoRandom implements RandomSource {
  nextInt(maxExclusive: number): number {
    return randomInt(maxExclusive);
  }
}

/**
 * Deterministic Seeded PRNG (Mulberry32)
 *
 * Same seed, same sequence. Used when the service runs with RANDOM_SEED set,
 * and in tests that need reproducible output without scripting every draw.
 *
 * ```typescript
 * const index = new SeededRandom(42).nextInt(10); // 0 to 9
 * ```
 */
export class SeededRandom implements RandomSource {
  private state: number;

  constructor(seed: number) {
    // Ensure seed is a valid 32-bit integer
    this.state = seed >>> 0;
  }

  /**
   * Generate the next random number in [0, 1)
   */
  next(): number {
    this.state |= 0;
    this.state = (this.state + 0x6D2B79F5) | 0;
    let t = Math.imul(this.state ^ (this.state >>> 15), 1 | this.state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  nextInt(maxExclusive: number): number {
    return Math.floor(this.next() * maxExclusive);
  }
}

/**
 * Pick a uniformly random item.
 * Callers guarantee `items` is non-empty.
 */
export function pick<T>(random: RandomSource, items: readonly T[]): T {
  if (items.length === 0) {
    throw new Error('Cannot pick from empty array');
  }
  return items[random.nextInt(items.length)];
}

export function coinFlip(random: RandomSource): boolean {
  return random.nextInt(2) === 1;
}
