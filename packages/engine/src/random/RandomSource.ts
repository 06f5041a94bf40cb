import type { IRandomSource, Rgb } from "@tessera/contracts";

/**
 * Random source backed by `Math.random`. Used by the running app.
 */
export class MathRandomSource implements IRandomSource {
  next(): number {
    return Math.random();
  }
}

/**
 * Seeded linear congruential generator for reproducible sequences.
 * Output is in [0, 1); the same seed always yields the same sequence.
 */
export class SeededRandom implements IRandomSource {
  private state: number;

  constructor(seed: number) {
    this.state = Math.abs(Math.floor(seed)) & 0x7fffffff;
  }

  next(): number {
    this.state = (Math.imul(this.state, 1103515245) + 12345) & 0x7fffffff;
    return this.state / 0x80000000;
  }
}

/**
 * Uniform integer in [0, maxExclusive).
 */
export function randomInt(rng: IRandomSource, maxExclusive: number): number {
  const value = Math.floor(rng.next() * maxExclusive);
  // Guard against sources that return exactly 1
  return Math.min(value, maxExclusive - 1);
}

/**
 * A color with each channel drawn independently and uniformly from 0..255.
 */
export function randomRgb(rng: IRandomSource): Rgb {
  return [randomInt(rng, 256), randomInt(rng, 256), randomInt(rng, 256)];
}
