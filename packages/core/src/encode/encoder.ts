/**
 * Propositional encoder - compiles a feature model to CNF.
 * @packageDocumentation
 */

import type { Clause, EncodedFormula, Feature, FeatureModel, Group, Literal } from '../types'
import { EncodingLimitError, InvariantError } from '../types'
import { expressionToClauses, normalizeClause } from './cnf'

/**
 * Default maximum number of clauses in an encoded formula.
 *
 * @public
 */
export const DEFAULT_MAX_CLAUSES = 250_000

/**
 * Options for model encoding.
 *
 * @public
 */
export interface EncodeOptions {
  /**
   * Maximum number of clauses to produce before throwing an error.
   * @defaultValue 250000
   */
  maxClauses?: number
}

/**
 * Order the features of a model: parent before child, breadth first,
 * ascending by name within each depth.
 *
 * This order fixes the variable numbering and every search's decision order.
 *
 * @param model - Parsed model
 * @returns Features in variable order
 *
 * @public
 */
export function orderFeatures(model: FeatureModel): Feature[] {
  const ordered: Feature[] = []
  let level: Feature[] = [model.root]

  while (level.length > 0) {
    const sorted = [...level].sort((a, b) => compareNames(a.name, b.name))
    ordered.push(...sorted)
    level = sorted.flatMap((feature) => feature.groups.flatMap((group) => group.children))
  }

  return ordered
}

/**
 * Code-unit order, independent of locale.
 */
function compareNames(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0
}

/**
 * Encode a model as a CNF formula over one variable per feature.
 *
 * The formula is satisfied exactly by the valid configurations:
 * - the root is selected
 * - mandatory child: parent <=> child
 * - optional child: child => parent
 * - or group: parent <=> (c1 | ... | cn)
 * - alternative group: parent <=> (c1 | ... | cn), and no two children together
 * - cardinality group [a..b]: children imply parent, parent implies a..b children
 * - every cross-tree constraint
 *
 * @param model - Parsed model
 * @param options - Optional limits
 * @returns The encoded formula
 * @throws EncodingLimitError if the clause count exceeds the configured limit
 * @throws InvariantError if a clause references an undeclared variable
 *
 * @public
 */
export function encodeModel(model: FeatureModel, options: EncodeOptions = {}): EncodedFormula {
  const maxClauses = options.maxClauses ?? DEFAULT_MAX_CLAUSES
  const features = orderFeatures(model)
  const variables = features.map((feature) => feature.name)
  const variableIndex = new Map<string, number>(variables.map((name, i) => [name, i + 1]))

  const variableOf = (feature: Feature): number => {
    const variable = variableIndex.get(feature.name)
    if (variable === undefined) {
      throw new InvariantError(`Feature "${feature.name}" has no variable`)
    }
    return variable
  }

  const clauses: Clause[] = []
  const seen = new Set<string>()

  const add = (clause: Clause): void => {
    const normalized = normalizeClause(clause)
    if (!normalized) return
    const key = normalized.join(' ')
    if (seen.has(key)) return
    seen.add(key)
    clauses.push(normalized)
    if (clauses.length > maxClauses) {
      throw new EncodingLimitError(
        `Encoding exceeded limit of ${maxClauses} clauses. ` +
          `Consider simplifying the model or increasing the maxClauses limit.`,
        maxClauses,
        clauses.length,
      )
    }
  }

  add([variableOf(model.root)])

  for (const feature of features) {
    const parent = variableOf(feature)
    for (const group of feature.groups) {
      for (const clause of groupClauses(parent, group, variableOf, maxClauses)) {
        add(clause)
      }
    }
  }

  const treeClauses = clauses.length

  for (const constraint of model.constraints) {
    const lowered = expressionToClauses(constraint.expression, (name) => variableIndex.get(name), {
      maxClauses: maxClauses - clauses.length,
    })
    lowered.forEach(add)
  }

  checkVariables(clauses, variables.length)

  return {
    variables,
    variableIndex,
    clauses,
    stats: { treeClauses, constraintClauses: clauses.length - treeClauses },
  }
}

/**
 * Clauses for one group under a parent variable.
 */
function groupClauses(
  parent: number,
  group: Group,
  variableOf: (feature: Feature) => number,
  maxClauses: number,
): Clause[] {
  const children = group.children.map(variableOf)
  const childImpliesParent = children.map((child) => [-child, parent])

  switch (group.kind) {
    case 'mandatory':
      return children.flatMap((child) => [
        [-parent, child],
        [-child, parent],
      ])
    case 'optional':
      return childImpliesParent
    case 'or':
      return [[-parent, ...children], ...childImpliesParent]
    case 'alternative':
      return [[-parent, ...children], ...childImpliesParent, ...pairwiseExclusion(children)]
    case 'cardinality':
      return [...childImpliesParent, ...cardinalityClauses(parent, children, group.min, group.max, maxClauses)]
  }
}

function pairwiseExclusion(children: readonly number[]): Clause[] {
  const clauses: Clause[] = []
  for (let i = 0; i < children.length; i++) {
    for (let j = i + 1; j < children.length; j++) {
      clauses.push([-children[i], -children[j]])
    }
  }
  return clauses
}

/**
 * Bound the number of selected children without auxiliary variables.
 *
 * At least `min`: every subset of `k - min + 1` children holds a selected
 * one. At most `max`: no subset of `max + 1` children is fully selected.
 */
function cardinalityClauses(
  parent: number,
  children: readonly number[],
  min: number,
  max: number,
  maxClauses: number,
): Clause[] {
  const k = children.length
  const clauses: Clause[] = []

  if (min > k) {
    clauses.push([-parent])
  } else if (min > 0) {
    checkSubsetCount(k, k - min + 1, maxClauses)
    for (const subset of subsets(children, k - min + 1)) {
      clauses.push([-parent, ...subset])
    }
  }

  if (max < k) {
    checkSubsetCount(k, max + 1, maxClauses)
    for (const subset of subsets(children, max + 1)) {
      clauses.push(subset.map((child): Literal => -child))
    }
  }

  return clauses
}

function checkSubsetCount(n: number, r: number, limit: number): void {
  let count = 1
  for (let i = 1; i <= r; i++) {
    count = (count * (n - r + i)) / i
    if (count > limit) {
      throw new EncodingLimitError(
        `Group cardinality over ${n} features needs more than ${limit} clauses`,
        limit,
        Math.round(count),
      )
    }
  }
}

/**
 * All `size`-element subsets in lexicographic order.
 */
function* subsets(items: readonly number[], size: number): Generator<number[]> {
  if (size === 0) {
    yield []
    return
  }
  for (let i = 0; i <= items.length - size; i++) {
    for (const rest of subsets(items.slice(i + 1), size - 1)) {
      yield [items[i], ...rest]
    }
  }
}

/**
 * Every literal must name a declared variable.
 */
function checkVariables(clauses: readonly Clause[], variableCount: number): void {
  for (const clause of clauses) {
    for (const literal of clause) {
      const variable = Math.abs(literal)
      if (!Number.isInteger(variable) || variable < 1 || variable > variableCount) {
        throw new InvariantError(`Clause [${clause.join(', ')}] references undeclared variable ${variable}`)
      }
    }
  }
}
