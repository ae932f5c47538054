/**
 * Seedable random source for template filling. A fixed seed gives the same
 * sequence on every run.
 */

export interface RandomSource {
  /** Float in [0, 1) */
  next(): number;
  /** Integer in [min, max], both inclusive */
  int(min: number, max: number): number;
  choice<T>(items: readonly T[]): T;
}

/**
 * Linear congruential generator (glibc constants), 31-bit state
 */
export class SeededRandom implements RandomSource {
  private seed: number;

  constructor(seed: number = Date.now()) {
    this.seed = Math.abs(Math.trunc(seed)) & 0x7fffffff;
  }

  next(): number {
    this.seed = (Math.imul(this.seed, 1103515245) + 12345) & 0x7fffffff;
    return this.seed / 0x80000000;
  }

  int(min: number, max: number): number {
    const lo = Math.ceil(Math.min(min, max));
    const hi = Math.floor(Math.max(min, max));
    return lo + Math.floor(this.next() * (hi - lo + 1));
  }

  choice<T>(items: readonly T[]): T {
    if (items.length === 0) {
      throw new RangeError('choice() needs at least one item');
    }
    return items[Math.floor(this.next() * items.length)];
  }
}
