import { describe, it, expect } from 'vitest'
import { classifyFeatures, computeAtomicSets, falseOptionalFeatures, uniqueFeatures } from './classification'
import { optionalFeatures } from './structure'
import { parseModel } from '../parse'
import {
  ALTERNATIVE_MODEL,
  CONTRADICTION_MODEL,
  DEAD_FEATURE_MODEL,
  FALSE_OPTIONAL_MODEL,
  OPTIONAL_MODEL,
  PHONE_MODEL,
  engineFor,
} from '../testing/fixtures'
import { AnalysisTimeoutError } from '../types'

const EQUIVALENT_MODEL = 'features\n  R\n    optional\n      A\n      B\n      C\nconstraints\n  A <=> B'

function classify(source: string) {
  return classifyFeatures(engineFor(source))
}

function atomicSets(source: string): string[][] {
  const engine = engineFor(source)
  return computeAtomicSets(engine, classifyFeatures(engine))
}

describe('classifyFeatures', () => {
  it('finds the root as the only core feature', () => {
    const result = classify(OPTIONAL_MODEL)

    expect(result.core).toEqual(['Root'])
    expect(result.dead).toEqual([])
    expect(result.variant).toEqual(['A'])
  })

  it('classifies the phone model', () => {
    const result = classify(PHONE_MODEL)

    expect(result.satisfiable).toBe(true)
    expect(result.core).toEqual(['Phone', 'Calls', 'Screen'])
    expect(result.dead).toEqual([])
    expect(result.variant).toEqual(['GPS', 'Media', 'Basic', 'Camera', 'Color', 'HighRes', 'MP3'])
  })

  it('finds dead features', () => {
    const result = classify(DEAD_FEATURE_MODEL)

    expect(result.core).toEqual(['R'])
    expect(result.dead).toEqual(['A'])
    expect(result.variant).toEqual(['B'])
  })

  it('marks every feature dead in an unsatisfiable model', () => {
    const result = classify(CONTRADICTION_MODEL)

    expect(result.satisfiable).toBe(false)
    expect(result.core).toEqual([])
    expect(result.dead).toEqual(['Root', 'A'])
    expect(result.variant).toEqual([])
  })

  it('partitions the features', () => {
    const result = classify(PHONE_MODEL)
    const all = [...result.core, ...result.dead, ...result.variant].sort()

    expect(all).toEqual([...engineFor(PHONE_MODEL).formula.variables].sort())
  })

  it('keeps only satisfying witnesses', () => {
    const engine = engineFor(PHONE_MODEL)

    for (const witness of classifyFeatures(engine).witnesses) {
      const selected = engine.formula.variables.filter((_, i) => witness[i + 1] > 0)
      expect(engine.isConfigurationValid(selected)).toBe(true)
    }
  })
})

describe('computeAtomicSets', () => {
  it('groups core features with the root', () => {
    expect(atomicSets(PHONE_MODEL)).toEqual([
      ['Phone', 'Calls', 'Screen'],
      ['GPS'],
      ['Media'],
      ['Basic'],
      ['Camera'],
      ['Color'],
      ['HighRes'],
      ['MP3'],
    ])
  })

  it('groups equivalent features', () => {
    expect(atomicSets(EQUIVALENT_MODEL)).toEqual([['R'], ['A', 'B'], ['C']])
  })

  it('groups all core features of a false-optional model', () => {
    expect(atomicSets(FALSE_OPTIONAL_MODEL)).toEqual([['Root', 'A', 'B']])
  })

  it('keeps dead features apart from the rest', () => {
    expect(atomicSets(DEAD_FEATURE_MODEL)).toEqual([['R'], ['A'], ['B']])
  })

  it('puts every feature in one set when unsatisfiable', () => {
    expect(atomicSets(CONTRADICTION_MODEL)).toEqual([['Root', 'A']])
  })
})

describe('deadlines', () => {
  it('stops classification when aborted', () => {
    const controller = new AbortController()
    controller.abort()

    expect(() => classifyFeatures(engineFor(PHONE_MODEL), { signal: controller.signal })).toThrow(
      AnalysisTimeoutError,
    )
  })

  it('stops atomic sets with a spent budget', () => {
    const engine = engineFor(PHONE_MODEL)
    const classification = classifyFeatures(engine)

    expect(() => computeAtomicSets(engine, classification, { timeoutMs: 0 })).toThrow(AnalysisTimeoutError)
  })
})

describe('uniqueFeatures', () => {
  it('lists members of singleton atomic sets', () => {
    expect(uniqueFeatures(atomicSets(EQUIVALENT_MODEL))).toEqual(['R', 'C'])
    expect(uniqueFeatures(atomicSets(ALTERNATIVE_MODEL))).toEqual(['Root', 'X', 'Y'])
  })
})

describe('falseOptionalFeatures', () => {
  it('finds optional features implied by mandatory ones', () => {
    const model = parseModel(FALSE_OPTIONAL_MODEL)

    expect(falseOptionalFeatures(classify(FALSE_OPTIONAL_MODEL), optionalFeatures(model))).toEqual(['A'])
  })

  it('finds none when optional features are free', () => {
    const model = parseModel(PHONE_MODEL)

    expect(falseOptionalFeatures(classify(PHONE_MODEL), optionalFeatures(model))).toEqual([])
  })

  it('finds none in an unsatisfiable model', () => {
    const model = parseModel(CONTRADICTION_MODEL)

    expect(falseOptionalFeatures(classify(CONTRADICTION_MODEL), optionalFeatures(model))).toEqual([])
  })
})
