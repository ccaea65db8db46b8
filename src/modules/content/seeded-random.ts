import { randomInt } from 'crypto';

const UINT32_RANGE = 0x100000000;

/**
 * Small seeded PRNG (mulberry32). Fast and reproducible, not secure.
 */
export class SeededRandom {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  /**
   * Seed drawn from system entropy, for non-deterministic mode
   */
  static entropySeed(): number {
    return randomInt(0, UINT32_RANGE);
  }

  nextUint32(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return (t ^ (t >>> 14)) >>> 0;
  }

  /**
   * Float in [0, 1)
   */
  next(): number {
    return this.nextUint32() / UINT32_RANGE;
  }

  /**
   * Integer in [min, maxExclusive)
   */
  int(min: number, maxExclusive: number): number {
    if (maxExclusive <= min) {
      throw new RangeError(`Empty range [${min}, ${maxExclusive})`);
    }
    return min + Math.floor(this.next() * (maxExclusive - min));
  }

  pick<T>(items: readonly T[]): T {
    if (items.length === 0) {
      throw new RangeError('Cannot pick from an empty list');
    }
    return items[this.int(0, items.length)];
  }
}
