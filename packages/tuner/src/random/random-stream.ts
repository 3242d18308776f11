/** Anything that can draw a uniform real in [lo, hi). Lets tests script exact draws. */
export interface UniformSource {
  uniform(lo: number, hi: number): number;
}

const TWO_POW_32 = 4294967296;

/**
 * Seeded mulberry32 stream. Identical seed and identical call sequence give
 * identical draws on every platform (pure 32-bit integer math).
 *
 * Seeds are folded to 32 bits; the high word is mixed in so that seeds which
 * differ only above bit 32 still diverge.
 */
export class RandomStream implements UniformSource {
  private state: number;

  constructor(seed: number) {
    const whole = Math.trunc(seed);
    const low = whole >>> 0;
    const high = Math.floor(whole / TWO_POW_32);
    this.state = (low ^ Math.imul(high, 0x9e3779b9)) >>> 0;
  }

  /** Next value in [0, 1). */
  next(): number {
    this.state = (this.state + 0x6d2b79f5) | 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / TWO_POW_32;
  }

  uniform(lo: number, hi: number): number {
    return lo + (hi - lo) * this.next();
  }
}
