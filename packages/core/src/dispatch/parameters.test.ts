import { describe, it, expect } from 'vitest'
import {
  DEFAULT_SAMPLE_COUNT,
  parseCriteriaParameter,
  parseFeatureParameter,
  parseSampleCountParameter,
  parseSelectionParameter,
} from './parameters'
import { InvalidInputError } from '../types'

describe('parseFeatureParameter', () => {
  it('trims the name', () => {
    expect(parseFeatureParameter('  Engine \n')).toBe('Engine')
  })

  it('removes surrounding quotes', () => {
    expect(parseFeatureParameter('"Rear Camera"')).toBe('Rear Camera')
  })

  it('requires a name', () => {
    expect(() => parseFeatureParameter(undefined)).toThrow(InvalidInputError)
    expect(() => parseFeatureParameter('   ')).toThrow('Operation requires a feature name')
  })
})

describe('parseSelectionParameter', () => {
  it('reads a JSON array', () => {
    expect(parseSelectionParameter('["Root", "X"]')).toEqual(['Root', 'X'])
  })

  it('reads names separated by commas and newlines', () => {
    expect(parseSelectionParameter('Root, X\nY')).toEqual(['Root', 'X', 'Y'])
  })

  it('reads name,value lines', () => {
    expect(parseSelectionParameter('Root,True\nX,True\nY,False')).toEqual(['Root', 'X'])
  })

  it('accepts an empty selection', () => {
    expect(parseSelectionParameter('')).toEqual([])
  })

  it('requires config', () => {
    expect(() => parseSelectionParameter(undefined)).toThrow(InvalidInputError)
  })

  it('rejects arrays of non-strings', () => {
    expect(() => parseSelectionParameter('[1, 2]')).toThrow('Selection must be an array of feature names')
  })

  it('rejects malformed JSON', () => {
    expect(() => parseSelectionParameter('["Root"')).toThrow('Config is not valid JSON')
  })
})

describe('parseCriteriaParameter', () => {
  it('reads a JSON object of booleans', () => {
    expect(parseCriteriaParameter('{"A": true, "B": false}')).toEqual({ selected: ['A'], deselected: ['B'] })
  })

  it('reads names, negated names and assignments', () => {
    expect(parseCriteriaParameter('A, !B\nC=false, D = true')).toEqual({ selected: ['A', 'D'], deselected: ['B', 'C'] })
  })

  it('reads name,value lines', () => {
    expect(parseCriteriaParameter('A,true\nB,FALSE')).toEqual({ selected: ['A'], deselected: ['B'] })
  })

  it('accepts empty criteria', () => {
    expect(parseCriteriaParameter('  ')).toEqual({ selected: [], deselected: [] })
  })

  it('rejects non-boolean values', () => {
    try {
      parseCriteriaParameter('{"A": 1}')
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidInputError)
      expect(error).toMatchObject({ message: 'Criteria must map feature names to booleans' })
      if (error instanceof InvalidInputError) {
        expect(error.issues.map((issue) => issue.path)).toEqual(['config.A'])
      }
    }
  })

  it('requires config', () => {
    expect(() => parseCriteriaParameter(undefined)).toThrow('Operation requires filter criteria')
  })
})

describe('parseSampleCountParameter', () => {
  it('defaults when missing', () => {
    expect(parseSampleCountParameter(undefined)).toBe(DEFAULT_SAMPLE_COUNT)
    expect(parseSampleCountParameter(' ')).toBe(DEFAULT_SAMPLE_COUNT)
  })

  it('reads a positive integer', () => {
    expect(parseSampleCountParameter(' 4 ')).toBe(4)
  })

  it.each(['0', '-3', '2.5', 'many'])('rejects %s', (text) => {
    expect(() => parseSampleCountParameter(text)).toThrow(InvalidInputError)
  })
})
