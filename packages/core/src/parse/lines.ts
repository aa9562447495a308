/**
 * Source splitting - turns model text into indented logical lines.
 * @packageDocumentation
 */

import { MalformedModelError } from '../types'

/**
 * Width of a tab when measuring indentation.
 * @public
 */
export const TAB_WIDTH = 4

/**
 * One non-blank logical line of a model.
 * @public
 */
export interface SourceLine {
  /** 1-based line number where the logical line starts */
  readonly line: number

  /** Indentation in columns (tabs expanded) */
  readonly indent: number

  /** Number of leading whitespace characters, for column hints */
  readonly offset: number

  /** Line content without indentation, comments or trailing whitespace */
  readonly text: string
}

/**
 * Split model text into logical lines.
 *
 * Comments are removed, blank lines dropped, and a line with an unclosed
 * `{` is joined with the following lines until the brace closes.
 *
 * @param source - Model text
 * @returns Logical lines in source order
 *
 * @public
 */
export function splitLines(source: string): SourceLine[] {
  const physical = stripComments(source).split(/\r?\n/)
  const lines: SourceLine[] = []

  let pending: { line: number; indent: number; offset: number; text: string; depth: number } | undefined

  for (let i = 0; i < physical.length; i++) {
    const raw = physical[i]
    const trimmed = raw.trim()

    if (pending) {
      if (trimmed.length > 0) {
        pending.text += ' ' + trimmed
        pending.depth += braceBalance(trimmed)
      }
      if (pending.depth <= 0) {
        lines.push({ line: pending.line, indent: pending.indent, offset: pending.offset, text: pending.text })
        pending = undefined
      }
      continue
    }

    if (trimmed.length === 0) continue

    const offset = raw.length - raw.trimStart().length
    const indent = measureIndent(raw.slice(0, offset))
    const depth = braceBalance(trimmed)

    if (depth > 0) {
      pending = { line: i + 1, indent, offset, text: trimmed, depth }
    } else {
      lines.push({ line: i + 1, indent, offset, text: trimmed })
    }
  }

  if (pending) {
    throw new MalformedModelError('UNEXPECTED_TOKEN', 'Unclosed "{"', pending.line, pending.offset + 1)
  }

  return lines
}

/**
 * Measure leading whitespace in columns.
 */
function measureIndent(whitespace: string): number {
  let columns = 0
  for (const char of whitespace) {
    columns = char === '\t' ? columns + TAB_WIDTH - (columns % TAB_WIDTH) : columns + 1
  }
  return columns
}

/**
 * Net count of `{` over `}` outside quoted strings.
 */
function braceBalance(text: string): number {
  let depth = 0
  let quote: string | undefined

  for (const char of text) {
    if (quote) {
      if (char === quote) quote = undefined
    } else if (char === '"' || char === "'") {
      quote = char
    } else if (char === '{') {
      depth++
    } else if (char === '}') {
      depth--
    }
  }

  return depth
}

/**
 * Remove `//` and `/* *\/` comments outside quoted strings.
 *
 * Newlines inside block comments are kept so line numbers stay intact.
 */
function stripComments(source: string): string {
  let result = ''
  let quote: string | undefined
  let i = 0

  while (i < source.length) {
    const char = source[i]
    const next = source[i + 1]

    if (quote) {
      result += char
      if (char === quote || char === '\n') quote = undefined
      i++
      continue
    }

    if (char === '"' || char === "'") {
      quote = char
      result += char
      i++
    } else if (char === '/' && next === '/') {
      while (i < source.length && source[i] !== '\n') i++
    } else if (char === '/' && next === '*') {
      i += 2
      while (i < source.length && !(source[i] === '*' && source[i + 1] === '/')) {
        if (source[i] === '\n') result += '\n'
        i++
      }
      i += 2
    } else {
      result += char
      i++
    }
  }

  return result
}
