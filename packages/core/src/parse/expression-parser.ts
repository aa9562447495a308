/**
 * Constraint expression parser - converts propositional constraint text to AST.
 *
 * Grammar, lowest precedence first:
 *
 * ```
 * iff     := implies ('<=>' implies)*
 * implies := or ('=>' implies)?
 * or      := and ('|' and)*
 * and     := unary ('&' unary)*
 * unary   := '!' unary | primary
 * primary := NAME | 'true' | 'false' | '(' iff ')'
 * ```
 *
 * @packageDocumentation
 */

import type { Expression, ExpressionToken } from '../types'
import { MalformedModelError } from '../types'

/**
 * Where an expression sits in the model, for error locations.
 * @public
 */
export interface ExpressionLocation {
  /** 1-based line of the expression */
  readonly line: number

  /** Characters preceding the expression on its line */
  readonly offset: number
}

const NAME_START = /[\p{L}_]/u
const NAME_PART = /[\p{L}\p{N}_.]/u
const ARITHMETIC = /[<>=+\-*/\d]/

/**
 * Split constraint text into tokens.
 *
 * @param text - Constraint text
 * @param location - Position of the text in the model
 * @returns Tokens with character positions relative to `text`
 * @throws MalformedModelError on characters outside the propositional language
 *
 * @public
 */
export function tokenizeExpression(text: string, location: ExpressionLocation = { line: 1, offset: 0 }): ExpressionToken[] {
  const tokens: ExpressionToken[] = []
  let i = 0

  const fail = (code: 'UNEXPECTED_TOKEN' | 'UNSUPPORTED_CONSTRUCT', message: string, position: number): never => {
    throw new MalformedModelError(code, message, location.line, location.offset + position + 1)
  }

  while (i < text.length) {
    const char = text[i]

    if (/\s/.test(char)) {
      i++
      continue
    }

    if (text.startsWith('<=>', i)) {
      tokens.push({ type: 'op', value: '<=>', position: i })
      i += 3
    } else if (text.startsWith('=>', i)) {
      tokens.push({ type: 'op', value: '=>', position: i })
      i += 2
    } else if (char === '!' || char === '&' || char === '|') {
      tokens.push({ type: 'op', value: char, position: i })
      i++
    } else if (char === '(') {
      tokens.push({ type: 'lparen', position: i })
      i++
    } else if (char === ')') {
      tokens.push({ type: 'rparen', position: i })
      i++
    } else if (char === '"') {
      const end = text.indexOf('"', i + 1)
      if (end === -1) fail('UNEXPECTED_TOKEN', 'Unterminated quoted feature name', i)
      tokens.push({ type: 'name', value: text.slice(i + 1, end), position: i })
      i = end + 1
    } else if (NAME_START.test(char)) {
      const start = i
      while (i < text.length && NAME_PART.test(text[i])) i++
      const word = text.slice(start, i)

      if (text[i] === '(') {
        fail('UNSUPPORTED_CONSTRUCT', `Function "${word}" is not supported in boolean constraints`, start)
      }

      if (word === 'true' || word === 'false') {
        tokens.push({ type: 'const', value: word === 'true', position: start })
      } else {
        tokens.push({ type: 'name', value: word, position: start })
      }
    } else if (ARITHMETIC.test(char) || char === "'") {
      fail('UNSUPPORTED_CONSTRUCT', `Arithmetic and string constraints are not supported ("${char}")`, i)
    } else {
      fail('UNEXPECTED_TOKEN', `Unexpected character "${char}"`, i)
    }
  }

  return tokens
}

/**
 * Parse constraint text into an expression AST.
 *
 * Conjunctions and disjunctions are flattened into one n-ary node.
 *
 * @param text - Constraint text
 * @param location - Position of the text in the model
 * @returns Parsed expression
 * @throws MalformedModelError on syntax errors
 *
 * @public
 */
export function parseExpression(text: string, location: ExpressionLocation = { line: 1, offset: 0 }): Expression {
  const tokens = tokenizeExpression(text, location)
  let index = 0

  const fail = (message: string, position: number): never => {
    throw new MalformedModelError('UNEXPECTED_TOKEN', message, location.line, location.offset + position + 1)
  }

  const peek = (): ExpressionToken | undefined => tokens[index]

  const isOp = (token: ExpressionToken | undefined, op: string): boolean =>
    token !== undefined && token.type === 'op' && token.value === op

  const parseIff = (): Expression => {
    let left = parseImplies()
    while (isOp(peek(), '<=>')) {
      index++
      const right = parseImplies()
      left = { type: 'iff', left, right }
    }
    return left
  }

  const parseImplies = (): Expression => {
    const left = parseOr()
    if (isOp(peek(), '=>')) {
      index++
      const right = parseImplies()
      return { type: 'implies', left, right }
    }
    return left
  }

  const parseOr = (): Expression => {
    const operands = [parseAnd()]
    while (isOp(peek(), '|')) {
      index++
      operands.push(parseAnd())
    }
    return operands.length === 1 ? operands[0] : { type: 'or', operands }
  }

  const parseAnd = (): Expression => {
    const operands = [parseUnary()]
    while (isOp(peek(), '&')) {
      index++
      operands.push(parseUnary())
    }
    return operands.length === 1 ? operands[0] : { type: 'and', operands }
  }

  const parseUnary = (): Expression => {
    if (isOp(peek(), '!')) {
      index++
      return { type: 'not', operand: parseUnary() }
    }
    return parsePrimary()
  }

  const parsePrimary = (): Expression => {
    const token = peek()
    if (token === undefined) {
      return fail('Unexpected end of constraint', text.length)
    }

    index++
    switch (token.type) {
      case 'name':
        return { type: 'var', name: token.value }
      case 'const':
        return { type: 'const', value: token.value }
      case 'lparen': {
        const inner = parseIff()
        const closing = peek()
        if (closing === undefined || closing.type !== 'rparen') {
          return fail('Missing ")"', closing?.position ?? text.length)
        }
        index++
        return inner
      }
      case 'rparen':
        return fail('Unexpected ")"', token.position)
      case 'op':
        return fail(`Unexpected operator "${token.value}"`, token.position)
    }
  }

  if (tokens.length === 0) {
    return fail('Empty constraint', 0)
  }

  const expression = parseIff()
  const trailing = peek()
  if (trailing !== undefined) {
    fail('Unexpected token after end of constraint', trailing.position)
  }

  return expression
}

/**
 * Collect every variable referenced by an expression, with duplicates removed.
 *
 * @public
 */
export function expressionVariables(expression: Expression): string[] {
  const names = new Set<string>()

  const visit = (node: Expression): void => {
    switch (node.type) {
      case 'var':
        names.add(node.name)
        return
      case 'const':
        return
      case 'not':
        visit(node.operand)
        return
      case 'and':
      case 'or':
        node.operands.forEach(visit)
        return
      case 'implies':
      case 'iff':
        visit(node.left)
        visit(node.right)
        return
    }
  }

  visit(expression)
  return [...names]
}

/**
 * Render an expression back to constraint syntax, fully parenthesized
 * below the top level.
 *
 * @public
 */
export function expressionToString(expression: Expression): string {
  const render = (node: Expression, nested: boolean): string => {
    const wrap = (text: string): string => (nested ? `(${text})` : text)
    switch (node.type) {
      case 'var':
        return /^[\p{L}_][\p{L}\p{N}_.]*$/u.test(node.name) ? node.name : `"${node.name}"`
      case 'const':
        return String(node.value)
      case 'not':
        return `!${render(node.operand, true)}`
      case 'and':
        return wrap(node.operands.map((op) => render(op, true)).join(' & '))
      case 'or':
        return wrap(node.operands.map((op) => render(op, true)).join(' | '))
      case 'implies':
        return wrap(`${render(node.left, true)} => ${render(node.right, true)}`)
      case 'iff':
        return wrap(`${render(node.left, true)} <=> ${render(node.right, true)}`)
    }
  }

  return render(expression, false)
}
