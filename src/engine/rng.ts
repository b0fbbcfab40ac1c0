/**
 * Seeded PRNG handle (mulberry32) with normal draws.
 *
 * Every generator takes an Rng explicitly. Two runs that start from the same
 * seed and make the same calls see the same stream.
 */

export function randomSeed(): number {
  return (Date.now() ^ (Math.random() * 0xffffffff)) | 0;
}

export class Rng {
  readonly seed: number;
  private state: number;

  constructor(seed: number = randomSeed()) {
    this.seed = seed | 0;
    this.state = this.seed;
  }

  /** Uniform float in [0, 1). */
  next(): number {
    let t = (this.state = (this.state + 0x6d2b79f5) | 0);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  /**
   * Normal draw via Box-Muller. Consumes exactly two uniforms per call
   * (plus a redraw for each exact zero), so `std = 0` returns `mean` while
   * keeping the stream aligned with a noisy run.
   */
  normal(mean: number, std: number): number {
    let u = 0;
    let v = 0;
    while (u === 0) u = this.next();
    while (v === 0) v = this.next();
    const z = Math.sqrt(-2.0 * Math.log(u)) * Math.cos(2 * Math.PI * v);
    return mean + std * z;
  }

  normals(mean: number, std: number, count: number): number[] {
    const out = new Array<number>(count);
    for (let i = 0; i < count; i++) out[i] = this.normal(mean, std);
    return out;
  }
}
