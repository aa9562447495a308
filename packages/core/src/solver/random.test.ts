import { describe, it, expect } from 'vitest'
import { SeededRandom } from './random'

function draw(random: SeededRandom, count: number): number[] {
  return Array.from({ length: count }, () => random.nextFloat())
}

describe('SeededRandom', () => {
  it('repeats its sequence for the same seed', () => {
    expect(draw(new SeededRandom(42), 5)).toEqual(draw(new SeededRandom(42), 5))
  })

  it('differs between seeds', () => {
    expect(draw(new SeededRandom(1), 5)).not.toEqual(draw(new SeededRandom(2), 5))
  })

  it('draws floats in [0, 1)', () => {
    for (const value of draw(new SeededRandom(7), 100)) {
      expect(value).toBeGreaterThanOrEqual(0)
      expect(value).toBeLessThan(1)
    }
  })

  it('replaces a zero seed', () => {
    expect(draw(new SeededRandom(0), 3)).toEqual(draw(new SeededRandom(0x12345678), 3))
  })
})
