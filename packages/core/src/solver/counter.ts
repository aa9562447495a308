/**
 * Exact model counting by component decomposition.
 *
 * The counter branches like DPLL but splits the residual formula into
 * variable-disjoint components, counts each independently and caches
 * component counts, so it never visits individual models.
 *
 * @packageDocumentation
 */

import type { Clause, Literal } from '../types'
import { Deadline } from './deadline'

/**
 * Default maximum number of cached component counts.
 * @public
 */
export const DEFAULT_COUNT_CACHE_SIZE = 100_000

/**
 * Options for model counting.
 * @public
 */
export interface CountOptions {
  /** Literals forced true */
  readonly assumptions?: readonly Literal[]

  readonly deadline?: Deadline

  /**
   * Cached component counts kept before the cache is cleared.
   * @defaultValue 100000
   */
  readonly cacheSize?: number
}

/**
 * Count the assignments of variables `1..variableCount` satisfying every clause.
 *
 * @param variableCount - Number of variables
 * @param clauses - Clauses over those variables
 * @param options - Assumptions, deadline and cache size
 * @returns The exact number of satisfying assignments
 * @throws AnalysisTimeoutError when the deadline passes
 *
 * @public
 */
export function countModels(variableCount: number, clauses: readonly Clause[], options: CountOptions = {}): bigint {
  const deadline = options.deadline ?? Deadline.none
  const cacheSize = options.cacheSize ?? DEFAULT_COUNT_CACHE_SIZE
  const cache = new Map<string, bigint>()

  const countFormula = (formula: readonly Clause[], variables: readonly number[]): bigint => {
    deadline.check()

    const reduced = propagateUnits(formula)
    if (!reduced) return 0n

    const occurring = new Set<number>()
    for (const clause of reduced.clauses) {
      for (const literal of clause) occurring.add(Math.abs(literal))
    }

    const free = variables.filter((v) => !reduced.assigned.has(v) && !occurring.has(v)).length
    let total = 1n << BigInt(free)

    for (const component of splitComponents(reduced.clauses)) {
      total *= countComponent(component)
      if (total === 0n) return 0n
    }

    return total
  }

  const countComponent = (component: Component): bigint => {
    const key = componentKey(component.clauses)
    const cached = cache.get(key)
    if (cached !== undefined) return cached

    const variable = pickBranchVariable(component.clauses)
    const rest = component.variables.filter((v) => v !== variable)
    const result =
      countFormula(condition(component.clauses, variable), rest) +
      countFormula(condition(component.clauses, -variable), rest)

    if (cache.size >= cacheSize) cache.clear()
    cache.set(key, result)
    return result
  }

  const variables = Array.from({ length: variableCount }, (_, i) => i + 1)
  const units = (options.assumptions ?? []).map((literal): Clause => [literal])
  return countFormula([...clauses, ...units], variables)
}

/**
 * A variable-disjoint part of a formula.
 */
interface Component {
  readonly clauses: readonly Clause[]
  readonly variables: readonly number[]
}

/**
 * Assign a literal true and simplify: satisfied clauses are dropped and the
 * opposite literal removed from the rest.
 */
function condition(clauses: readonly Clause[], literal: Literal): Clause[] {
  const result: Clause[] = []
  for (const clause of clauses) {
    if (clause.includes(literal)) continue
    result.push(clause.includes(-literal) ? clause.filter((l) => l !== -literal) : clause)
  }
  return result
}

/**
 * Apply unit clauses until none remain. Returns undefined on conflict.
 *
 * Each clause keeps a count of its literals not yet falsified, and each
 * literal the clauses it occurs in, so an assignment only visits the clauses
 * that mention it.
 */
function propagateUnits(clauses: readonly Clause[]): { clauses: readonly Clause[]; assigned: Set<number> } | undefined {
  const values = new Map<number, boolean>()
  const occurrences = new Map<Literal, number[]>()
  const live: number[] = []
  const satisfied: boolean[] = []
  const queue: Literal[] = []

  const valueOf = (literal: Literal): boolean | undefined => {
    const value = values.get(Math.abs(literal))
    return value === undefined ? undefined : value === literal > 0
  }

  const assign = (literal: Literal): boolean => {
    const current = valueOf(literal)
    if (current !== undefined) return current
    values.set(Math.abs(literal), literal > 0)
    queue.push(literal)
    return true
  }

  for (let index = 0; index < clauses.length; index++) {
    const literals = new Set(clauses[index])
    if (literals.size === 0) return undefined

    live.push(literals.size)
    satisfied.push(false)
    for (const literal of literals) {
      const list = occurrences.get(literal)
      if (list) list.push(index)
      else occurrences.set(literal, [index])
    }
    if (literals.size === 1 && !assign(clauses[index][0])) return undefined
  }

  for (let head = 0; head < queue.length; head++) {
    const literal = queue[head]
    for (const index of occurrences.get(literal) ?? []) {
      satisfied[index] = true
    }

    for (const index of occurrences.get(-literal) ?? []) {
      if (satisfied[index]) continue
      live[index]--
      if (live[index] > 1) continue

      const open = clauses[index].find((candidate) => valueOf(candidate) !== false)
      if (open === undefined) return undefined
      if (valueOf(open) === undefined) assign(open)
    }
  }

  if (queue.length === 0) return { clauses, assigned: new Set() }

  const reduced: Clause[] = []
  for (let index = 0; index < clauses.length; index++) {
    if (satisfied[index]) continue
    const clause = clauses[index]
    reduced.push(live[index] === clause.length ? clause : clause.filter((literal) => !values.has(Math.abs(literal))))
  }
  return { clauses: reduced, assigned: new Set(values.keys()) }
}

/**
 * Group clauses that share variables (union-find over variables).
 */
function splitComponents(clauses: readonly Clause[]): Component[] {
  const parent = new Map<number, number>()

  const find = (v: number): number => {
    let root = v
    while (true) {
      const next = parent.get(root)
      if (next === undefined || next === root) break
      root = next
    }
    parent.set(v, root)
    return root
  }

  for (const clause of clauses) {
    const first = Math.abs(clause[0])
    if (!parent.has(first)) parent.set(first, first)
    for (const literal of clause) {
      const v = Math.abs(literal)
      if (!parent.has(v)) parent.set(v, v)
      const a = find(first)
      const b = find(v)
      if (a !== b) parent.set(b, a)
    }
  }

  const groups = new Map<number, { clauses: Clause[]; variables: Set<number> }>()
  for (const clause of clauses) {
    const root = find(Math.abs(clause[0]))
    let group = groups.get(root)
    if (!group) {
      group = { clauses: [], variables: new Set() }
      groups.set(root, group)
    }
    group.clauses.push(clause)
    for (const literal of clause) group.variables.add(Math.abs(literal))
  }

  return [...groups.values()].map((group) => ({
    clauses: group.clauses,
    variables: [...group.variables].sort((a, b) => a - b),
  }))
}

/**
 * Most frequent variable; ties go to the lowest number.
 */
function pickBranchVariable(clauses: readonly Clause[]): number {
  const occurrences = new Map<number, number>()
  for (const clause of clauses) {
    for (const literal of clause) {
      const v = Math.abs(literal)
      occurrences.set(v, (occurrences.get(v) ?? 0) + 1)
    }
  }

  let best = 0
  let bestCount = -1
  for (const [v, count] of occurrences) {
    if (count > bestCount || (count === bestCount && v < best)) {
      best = v
      bestCount = count
    }
  }
  return best
}

function componentKey(clauses: readonly Clause[]): string {
  return clauses
    .map((clause) => [...clause].sort((a, b) => a - b).join(','))
    .sort()
    .join(' ')
}
