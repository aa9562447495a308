import { describe, it, expect } from 'vitest'
import { parseModel } from './parser'
import { MalformedModelError } from '../types'

const CAR = `namespace Garage

features
    Car {abstract}
        mandatory
            Engine
        optional
            Radio
            "Rear Camera"
        alternative
            Manual
            Automatic
        [1..2]
            Seats
            Roof

constraints
    Radio => Engine
    "Rear Camera" | !Roof
`

function codeOf(source: string): string | undefined {
  try {
    parseModel(source)
  } catch (error) {
    if (error instanceof MalformedModelError) return error.code
    throw error
  }
  return undefined
}

describe('parseModel', () => {
  describe('feature tree', () => {
    it('reads the root and its groups', () => {
      const model = parseModel(CAR)

      expect(model.namespace).toBe('Garage')
      expect(model.root.name).toBe('Car')
      expect(model.root.abstract).toBe(true)
      expect(model.root.groups.map((g) => g.kind)).toEqual(['mandatory', 'optional', 'alternative', 'cardinality'])
    })

    it('lists features in declaration order', () => {
      const model = parseModel(CAR)

      expect([...model.features.keys()]).toEqual([
        'Car',
        'Engine',
        'Radio',
        'Rear Camera',
        'Manual',
        'Automatic',
        'Seats',
        'Roof',
      ])
    })

    it('links children to their parent', () => {
      const model = parseModel(CAR)

      expect(model.features.get('Automatic')?.parent?.name).toBe('Car')
      expect(model.root.parent).toBeUndefined()
    })

    it('reads group cardinalities', () => {
      const group = parseModel(CAR).root.groups[3]

      expect(group).toMatchObject({ kind: 'cardinality', min: 1, max: 2 })
      expect(group.children.map((c) => c.name)).toEqual(['Seats', 'Roof'])
    })

    it('reads single and unbounded cardinalities', () => {
      const model = parseModel('features\n  R\n    [2]\n      A\n      B\n    cardinality [0..*]\n      C')

      expect(model.root.groups[0]).toMatchObject({ kind: 'cardinality', min: 2, max: 2 })
      expect(model.root.groups[1]).toMatchObject({ kind: 'cardinality', min: 0, max: Infinity })
    })

    it('records source lines', () => {
      const model = parseModel(CAR)

      expect(model.root.line).toBe(4)
      expect(model.features.get('Roof')?.line).toBe(15)
    })

    it('reads typed features, feature cardinalities and attributes', () => {
      const model = parseModel(
        'features\n  Root\n    optional\n      Integer Speed {unit "kmh", max 240, tuned}\n      Slot cardinality [0..3]',
      )

      const speed = model.features.get('Speed')
      expect(speed?.featureType).toBe('Integer')
      expect(speed?.attributes).toEqual({ unit: 'kmh', max: 240, tuned: true })
      expect(speed?.abstract).toBe(false)
      expect(model.features.get('Slot')?.cardinality).toEqual({ min: 0, max: 3 })
    })

    it('accepts tabs as indentation', () => {
      const model = parseModel('features\n\tRoot\n\t\tor\n\t\t\tA\n\t\t\tB')

      expect(model.root.groups).toHaveLength(1)
      expect(model.root.groups[0].children.map((c) => c.name)).toEqual(['A', 'B'])
    })

    it('records imports and includes', () => {
      const model = parseModel('imports\n  lib.Base as base\ninclude\n  Boolean.group-cardinality\nfeatures\n  Root')

      expect(model.imports).toEqual(['lib.Base as base'])
      expect(model.includes).toEqual(['Boolean.group-cardinality'])
    })
  })

  describe('constraints', () => {
    it('parses each constraint line', () => {
      const model = parseModel(CAR)

      expect(model.constraints.map((c) => c.source)).toEqual(['Radio => Engine', '"Rear Camera" | !Roof'])
      expect(model.constraints[0].line).toBe(18)
      expect(model.constraints[0].expression).toEqual({
        type: 'implies',
        left: { type: 'var', name: 'Radio' },
        right: { type: 'var', name: 'Engine' },
      })
    })

    it('allows a model without constraints', () => {
      expect(parseModel('features\n  Root').constraints).toEqual([])
    })

    it('rejects undefined feature references with a location', () => {
      expect(() => parseModel('features\n  Root\nconstraints\n  Root => Ghost')).toThrow(
        'Constraint references undefined feature "Ghost" (line 4, column 11)',
      )
    })

    it('rejects arithmetic constraints', () => {
      expect(codeOf('features\n  Root\nconstraints\n  Root > 2')).toBe('UNSUPPORTED_CONSTRUCT')
    })
  })

  describe('errors', () => {
    it('rejects an empty model', () => {
      expect(codeOf('  // nothing here\n')).toBe('EMPTY_MODEL')
    })

    it('rejects a model without a features section', () => {
      expect(codeOf('namespace Lonely')).toBe('MISSING_FEATURES_SECTION')
    })

    it('rejects text after a section keyword', () => {
      expect(() => parseModel('features foo\n  Root')).toThrow(
        expect.objectContaining({ code: 'UNEXPECTED_TOKEN', line: 1, column: 10 }),
      )
      expect(() => parseModel('features\n  Root\nconstraints Root')).toThrow(
        'Unexpected "Root" after "constraints" (line 3, column 13)',
      )
      expect(codeOf('imports lib\nfeatures\n  Root')).toBe('UNEXPECTED_TOKEN')
    })

    it('rejects a features section without a root', () => {
      expect(codeOf('features\nconstraints\n  true')).toBe('MISSING_ROOT')
    })

    it('rejects a second root', () => {
      expect(() => parseModel('features\n  One\n  Two')).toThrow(
        expect.objectContaining({ code: 'MULTIPLE_ROOTS', line: 3, column: 3 }),
      )
    })

    it('rejects duplicate feature names', () => {
      expect(codeOf('features\n  Root\n    optional\n      A\n    or\n      A')).toBe('DUPLICATE_FEATURE')
    })

    it('rejects a feature directly under a feature', () => {
      expect(() => parseModel('features\n  Root\n    Child')).toThrow(
        expect.objectContaining({ code: 'INVALID_GROUP', line: 3, column: 5 }),
      )
    })

    it('rejects a group without children', () => {
      expect(codeOf('features\n  Root\n    optional')).toBe('INVALID_GROUP')
    })

    it('rejects a cardinality with min above max', () => {
      expect(codeOf('features\n  Root\n    [3..1]\n      A')).toBe('INVALID_GROUP')
    })

    it('rejects children at mismatched indentation', () => {
      expect(codeOf('features\n  Root\n    optional\n        A\n      B')).toBe('INCONSISTENT_INDENTATION')
    })

    it('rejects unknown section keywords', () => {
      expect(codeOf('features\n  Root\nextras\n  X')).toBe('UNEXPECTED_TOKEN')
    })

    it('rejects trailing text on a feature line', () => {
      expect(() => parseModel('features\n  Root extra')).toThrow('Unexpected "extra" after feature "Root" (line 2, column 8)')
    })
  })
})
