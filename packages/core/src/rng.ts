/**
 * Seeded xorshift128+ source. Scrambled alphabets are derived from it, so a
 * seed fully determines the alphabet it produces.
 */
import type { Rng } from "./interfaces.js";

const TWO_32 = 0x100000000;

export class SeededRng implements Rng {
  private _s0 = 0;
  private _s1 = 0;
  private _seed = 0;

  constructor(seed = 42) {
    this.seed(seed);
  }

  seed(s: number): void {
    this._seed = s;
    this._s0 = s | 0;
    this._s1 = (s ^ 0xdeadbeef) | 0;
    // discard the weakly mixed first outputs
    for (let i = 0; i < 20; i++) this.nextUint32();
  }

  state(): number {
    return this._seed;
  }

  /** Raw 32-bit output. */
  nextUint32(): number {
    let x = this._s0;
    const y = this._s1;
    this._s0 = y;
    x ^= x << 23;
    x ^= x >>> 17;
    x ^= y ^ (y >>> 26);
    this._s1 = x;
    return (this._s0 + this._s1) >>> 0;
  }

  next(): number {
    return this.nextUint32() / TWO_32;
  }

  /**
   * Uniform integer in [0, bound), without modulo bias. A bound below 1
   * yields 0.
   */
  nextInt(bound: number): number {
    const n = Math.min(Math.floor(bound), TWO_32);
    if (n <= 1) return 0;
    const limit = TWO_32 - (TWO_32 % n);
    let r = this.nextUint32();
    while (r >= limit) r = this.nextUint32();
    return r % n;
  }
}
