/**
 * Expression lowering - converts constraint expressions to clauses.
 *
 * Lowering goes through negation normal form and distributes disjunction
 * over conjunction, so the clauses use only feature variables.
 *
 * @packageDocumentation
 */

import type { Clause, Expression, Literal } from '../types'
import { EncodingLimitError, InvariantError } from '../types'

/**
 * Negation normal form: negation only on variables, no implications.
 */
type NnfNode =
  | { readonly type: 'lit'; readonly literal: Literal }
  | { readonly type: 'const'; readonly value: boolean }
  | { readonly type: 'and'; readonly operands: readonly NnfNode[] }
  | { readonly type: 'or'; readonly operands: readonly NnfNode[] }

/**
 * Options for expression lowering.
 * @public
 */
export interface LoweringOptions {
  /** Maximum number of clauses a single expression may produce */
  readonly maxClauses: number
}

/**
 * Lower an expression to clauses over the given variable numbering.
 *
 * A `true` expression yields no clauses; a `false` one yields the empty
 * clause.
 *
 * @param expression - Constraint expression
 * @param variableOf - Variable number of a feature name
 * @param options - Lowering limits
 * @returns Clauses equivalent to the expression
 * @throws EncodingLimitError if the clause count exceeds `options.maxClauses`
 * @throws InvariantError if the expression names a variable with no number
 *
 * @public
 */
export function expressionToClauses(
  expression: Expression,
  variableOf: (name: string) => number | undefined,
  options: LoweringOptions,
): Clause[] {
  const nnf = toNnf(expression, true, variableOf)
  return toClauses(nnf, options.maxClauses)
}

function toNnf(node: Expression, positive: boolean, variableOf: (name: string) => number | undefined): NnfNode {
  switch (node.type) {
    case 'var': {
      const variable = variableOf(node.name)
      if (variable === undefined) {
        throw new InvariantError(`Constraint references undeclared variable "${node.name}"`)
      }
      return { type: 'lit', literal: positive ? variable : -variable }
    }
    case 'const':
      return { type: 'const', value: positive ? node.value : !node.value }
    case 'not':
      return toNnf(node.operand, !positive, variableOf)
    case 'and':
    case 'or': {
      const operands = node.operands.map((operand) => toNnf(operand, positive, variableOf))
      const conjunctive = (node.type === 'and') === positive
      return { type: conjunctive ? 'and' : 'or', operands }
    }
    case 'implies': {
      // a => b  ==  !a | b
      const left = toNnf(node.left, !positive, variableOf)
      const right = toNnf(node.right, positive, variableOf)
      return { type: positive ? 'or' : 'and', operands: [left, right] }
    }
    case 'iff': {
      // a <=> b  ==  (!a | b) & (a | !b);  !(a <=> b)  ==  (a | b) & (!a | !b)
      const a = toNnf(node.left, true, variableOf)
      const notA = toNnf(node.left, false, variableOf)
      const b = toNnf(node.right, true, variableOf)
      const notB = toNnf(node.right, false, variableOf)
      return positive
        ? { type: 'and', operands: [{ type: 'or', operands: [notA, b] }, { type: 'or', operands: [a, notB] }] }
        : { type: 'and', operands: [{ type: 'or', operands: [a, b] }, { type: 'or', operands: [notA, notB] }] }
    }
  }
}

function toClauses(node: NnfNode, maxClauses: number): Clause[] {
  switch (node.type) {
    case 'lit':
      return [[node.literal]]
    case 'const':
      return node.value ? [] : [[]]
    case 'and': {
      const clauses: Clause[] = []
      for (const operand of node.operands) {
        clauses.push(...toClauses(operand, maxClauses))
        checkLimit(clauses.length, maxClauses)
      }
      return clauses
    }
    case 'or': {
      // Distribute: (A1 & A2) | (B1 & B2) == (A1|B1) & (A1|B2) & (A2|B1) & (A2|B2)
      let product: Clause[] = [[]]
      for (const operand of node.operands) {
        const clauses = toClauses(operand, maxClauses)
        const next: Clause[] = []
        for (const left of product) {
          for (const right of clauses) {
            const merged = mergeClauses(left, right)
            if (merged) next.push(merged)
          }
        }
        checkLimit(next.length, maxClauses)
        product = next
      }
      return product
    }
  }
}

/**
 * Disjoin two clauses. Returns undefined for a tautology.
 */
function mergeClauses(left: Clause, right: Clause): Clause | undefined {
  const literals = new Set<Literal>(left)
  for (const literal of right) {
    if (literals.has(-literal)) return undefined
    literals.add(literal)
  }
  return [...literals]
}

function checkLimit(actual: number, limit: number): void {
  if (actual > limit) {
    throw new EncodingLimitError(
      `Constraint lowering exceeded limit of ${limit} clauses. ` +
        `Consider rewriting the constraint or increasing the maxClauses limit.`,
      limit,
      actual,
    )
  }
}

/**
 * Normalize a clause: sort literals by variable, drop duplicates.
 * Returns undefined for a tautology.
 *
 * @public
 */
export function normalizeClause(clause: Clause): Clause | undefined {
  const literals = new Set<Literal>()
  for (const literal of clause) {
    if (literals.has(-literal)) return undefined
    literals.add(literal)
  }
  return [...literals].sort((a, b) => Math.abs(a) - Math.abs(b) || a - b)
}
