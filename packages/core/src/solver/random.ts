/**
 * Deterministic pseudo-random numbers for reproducible sampling.
 * @packageDocumentation
 */

/**
 * Seed used when a caller does not supply one.
 * @public
 */
export const DEFAULT_SAMPLE_SEED = 0x5eed

/**
 * xorshift32 generator; the same seed always yields the same sequence.
 * @public
 */
export class SeededRandom {
  private state: number

  constructor(seed: number) {
    // Force into uint32.
    this.state = seed >>> 0 || 0x12345678
  }

  private nextU32(): number {
    let x = this.state
    x ^= x << 13
    x ^= x >>> 17
    x ^= x << 5
    this.state = x >>> 0
    return this.state
  }

  /** Uniform float in [0, 1) */
  nextFloat(): number {
    return this.nextU32() / 0x1_0000_0000
  }

  nextBoolean(): boolean {
    return this.nextFloat() < 0.5
  }
}
