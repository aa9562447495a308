import { describe, it, expect } from 'vitest'
import { countModels } from './counter'
import { Deadline } from './deadline'
import { AnalysisTimeoutError } from '../types'

describe('countModels', () => {
  it('counts every assignment of an unconstrained formula', () => {
    expect(countModels(2, [])).toBe(4n)
  })

  it('counts past the safe integer range', () => {
    expect(countModels(60, [])).toBe(2n ** 60n)
  })

  it('counts satisfying assignments', () => {
    expect(
      countModels(3, [
        [1, 2],
        [-1, 3],
      ]),
    ).toBe(4n)
  })

  it('multiplies independent components', () => {
    expect(
      countModels(4, [
        [1, 2],
        [3, 4],
      ]),
    ).toBe(9n)
  })

  it('applies assumptions', () => {
    const clauses = [
      [1, 2],
      [-1, 3],
    ]

    expect(countModels(3, clauses, { assumptions: [1] })).toBe(2n)
    expect(countModels(3, clauses, { assumptions: [1, -3] })).toBe(0n)
  })

  it('returns zero for contradictions and the empty clause', () => {
    expect(countModels(1, [[1], [-1]])).toBe(0n)
    expect(countModels(3, [[1], []])).toBe(0n)
  })

  it('follows chains of unit clauses', () => {
    expect(countModels(4, [[1], [-1, 2], [-2, 3], [-3, -4]])).toBe(1n)
    expect(countModels(3, [[1], [-1, 2], [-2]])).toBe(0n)
    expect(countModels(3, [[1], [-1, 2], [-1, 2]])).toBe(2n)
  })

  it('counts a deep chain of optional features', () => {
    // Feature i is an optional child of feature i - 1; feature 1 is the root
    const depth = 1000
    const clauses: number[][] = [[1]]
    for (let v = 2; v <= depth; v++) clauses.push([-v, v - 1])

    expect(countModels(depth, clauses)).toBe(BigInt(depth))
  })

  it('agrees with brute force on an exactly-one constraint', () => {
    // Exactly one of 1..5
    const clauses: number[][] = [[1, 2, 3, 4, 5]]
    for (let a = 1; a <= 5; a++) {
      for (let b = a + 1; b <= 5; b++) clauses.push([-a, -b])
    }

    expect(countModels(5, clauses)).toBe(5n)
    expect(countModels(7, clauses)).toBe(20n)
  })

  it('gives the same count with a tiny cache', () => {
    const clauses = [
      [1, 2],
      [-2, 3],
      [3, 4],
      [-4, 5],
      [5, 6],
    ]

    expect(countModels(6, clauses, { cacheSize: 1 })).toBe(countModels(6, clauses))
  })

  it('stops at an expired deadline', () => {
    const deadline = new Deadline({ timeoutMs: 5 }, Date.now() - 1000)

    expect(() => countModels(3, [[1, 2]], { deadline })).toThrow(AnalysisTimeoutError)
  })
})
