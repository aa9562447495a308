import { describe, it, expect } from 'vitest'
import { estimateConfigurationCount } from './estimate'
import { parseModel } from '../parse'
import {
  ALTERNATIVE_MODEL,
  CARDINALITY_MODEL,
  CONTRADICTION_MODEL,
  OPTIONAL_MODEL,
  PHONE_MODEL,
  engineFor,
} from '../testing/fixtures'

function estimate(source: string): bigint {
  return estimateConfigurationCount(parseModel(source))
}

describe('estimateConfigurationCount', () => {
  it('is one for a lone root', () => {
    expect(estimate('features\n  Solo')).toBe(1n)
  })

  it('doubles per optional leaf', () => {
    expect(estimate('features\n  R\n    optional\n      A\n      B\n      C')).toBe(8n)
  })

  it('counts non-empty subsets of an or group', () => {
    expect(estimate('features\n  R\n    or\n      A\n      B\n      C')).toBe(7n)
  })

  it('sums the children of an alternative group', () => {
    expect(estimate('features\n  R\n    alternative\n      A\n      B\n      C')).toBe(3n)
  })

  it('counts the allowed subset sizes of a cardinality group', () => {
    expect(estimate('features\n  R\n    [1..2]\n      A\n      B\n      C')).toBe(6n)
    expect(estimate('features\n  R\n    [0..*]\n      A\n      B\n      C')).toBe(8n)
    expect(estimate('features\n  R\n    [3..4]\n      A\n      B')).toBe(0n)
  })

  it('multiplies through nested groups', () => {
    const source = `features
  R
    mandatory
      M
        alternative
          X
          Y
    optional
      O
        or
          P
          Q`

    // M: 2 ways, O: absent or 3 ways
    expect(estimate(source)).toBe(8n)
  })

  it('ignores cross-tree constraints', () => {
    expect(estimate(PHONE_MODEL)).toBe(24n)
    expect(estimate(CONTRADICTION_MODEL)).toBe(2n)
  })

  it.each([
    ['optional', OPTIONAL_MODEL],
    ['alternative', ALTERNATIVE_MODEL],
    ['contradiction', CONTRADICTION_MODEL],
    ['phone', PHONE_MODEL],
    ['cardinality', CARDINALITY_MODEL],
  ])('bounds the exact count of the %s model', (_name, source) => {
    expect(estimate(source)).toBeGreaterThanOrEqual(engineFor(source).countConfigurations())
  })

  it('equals the exact count without constraints', () => {
    const source = 'features\n  R\n    [1..2]\n      A\n        or\n          B\n          C\n      D\n    optional\n      E'

    expect(estimate(source)).toBe(engineFor(source).countConfigurations())
  })
})
