import { describe, it, expect } from 'vitest'
import { splitLines } from './lines'
import { MalformedModelError } from '../types'

describe('splitLines', () => {
  it('drops blank lines and keeps line numbers', () => {
    const lines = splitLines('features\n\n    Root\n')

    expect(lines).toEqual([
      { line: 1, indent: 0, offset: 0, text: 'features' },
      { line: 3, indent: 4, offset: 4, text: 'Root' },
    ])
  })

  it('expands tabs to four columns', () => {
    const lines = splitLines('\tRoot\n  \tChild')

    expect(lines.map((l) => l.indent)).toEqual([4, 4])
    expect(lines.map((l) => l.offset)).toEqual([1, 3])
  })

  it('removes line comments', () => {
    const lines = splitLines('features // the tree\n    Root')

    expect(lines[0].text).toBe('features')
  })

  it('removes block comments without shifting later lines', () => {
    const lines = splitLines('/* header\n   spanning lines */\nfeatures')

    expect(lines).toEqual([{ line: 3, indent: 0, offset: 0, text: 'features' }])
  })

  it('keeps comment markers inside quoted names', () => {
    const lines = splitLines('"http://host" {abstract}')

    expect(lines[0].text).toBe('"http://host" {abstract}')
  })

  it('joins a line with an open brace until it closes', () => {
    const lines = splitLines('Root {\n  abstract,\n  cost 3\n}\nNext')

    expect(lines).toEqual([
      { line: 1, indent: 0, offset: 0, text: 'Root { abstract, cost 3 }' },
      { line: 5, indent: 0, offset: 0, text: 'Next' },
    ])
  })

  it('throws on an unclosed brace', () => {
    expect(() => splitLines('  Root {abstract')).toThrow(MalformedModelError)
    expect(() => splitLines('  Root {abstract')).toThrow('Unclosed "{" (line 1, column 3)')
  })
})
