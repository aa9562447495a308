/**
 * Configuration statistics: commonality, homogeneity and variability.
 * @packageDocumentation
 */

import type { SearchOptions } from '../types'
import type { ConfigurationEngine } from '../solver'
import { Deadline } from '../solver'
import type { FeatureClassification } from './classification'

/**
 * Fraction of valid configurations that select a feature.
 *
 * @param engine - Engine of the formula
 * @param name - Feature name
 * @param total - Exact configuration count of the formula
 * @param options - Deadline
 * @returns A value in [0, 1]; 0 when there are no configurations
 * @throws UnknownFeatureError if `name` is not a feature
 *
 * @public
 */
export function commonality(
  engine: ConfigurationEngine,
  name: string,
  total: bigint,
  options: SearchOptions = {},
): number {
  engine.variableOf(name)
  if (total === 0n) return 0
  return ratio(engine.countConfigurations({ selected: [name] }, options), total)
}

/**
 * Commonality of every feature, in variable order.
 *
 * Core features are 1 and dead features 0 without a count.
 *
 * @returns Feature name to probability of being selected in a uniformly drawn valid configuration
 *
 * @public
 */
export function inclusionProbabilities(
  engine: ConfigurationEngine,
  classification: FeatureClassification,
  total: bigint,
  options: SearchOptions = {},
): Map<string, number> {
  const deadline = Deadline.from(options)
  const core = new Set(classification.core)
  const dead = new Set(classification.dead)
  const probabilities = new Map<string, number>()

  for (const name of engine.formula.variables) {
    if (total === 0n || dead.has(name)) probabilities.set(name, 0)
    else if (core.has(name)) probabilities.set(name, 1)
    else probabilities.set(name, ratio(engine.countConfigurations({ selected: [name] }, deadline.remaining()), total))
  }
  return probabilities
}

/**
 * Mean, over all unordered feature pairs, of the fraction of valid
 * configurations in which both features have the same selection status.
 *
 * Pairs inside one atomic set, and pairs with a core or dead member, are
 * settled from single-feature counts; other pairs need a joint count.
 *
 * @param engine - Engine of the formula
 * @param classification - Core/dead features of the formula
 * @param atomicSets - Atomic sets of the formula
 * @param total - Exact configuration count
 * @param options - Deadline for the whole computation
 * @returns A value in [0, 1]; 0 when unsatisfiable, 1 with fewer than two features
 * @throws AnalysisTimeoutError when the deadline passes
 *
 * @public
 */
export function homogeneity(
  engine: ConfigurationEngine,
  classification: FeatureClassification,
  atomicSets: readonly (readonly string[])[],
  total: bigint,
  options: SearchOptions = {},
): number {
  if (!classification.satisfiable || total === 0n) return 0

  const names = engine.formula.variables
  if (names.length < 2) return 1

  const deadline = Deadline.from(options)
  const core = new Set(classification.core)
  const dead = new Set(classification.dead)

  const setOf = new Map<string, number>()
  atomicSets.forEach((set, index) => set.forEach((name) => setOf.set(name, index)))

  const selectedCount = new Map<string, bigint>()
  for (const name of names) {
    deadline.check()
    const count = core.has(name)
      ? total
      : dead.has(name)
        ? 0n
        : engine.countConfigurations({ selected: [name] }, deadline.remaining())
    selectedCount.set(name, count)
  }

  const countOf = (name: string): bigint => selectedCount.get(name) ?? 0n

  // Configurations where f and g agree: N - Nf - Ng + 2 * Nfg
  let agreeing = 0n
  let pairs = 0n

  for (let i = 0; i < names.length; i++) {
    for (let j = i + 1; j < names.length; j++) {
      deadline.check()
      const f = names[i]
      const g = names[j]
      pairs++

      if (setOf.get(f) === setOf.get(g)) {
        agreeing += total
        continue
      }

      let both: bigint
      if (core.has(f)) both = countOf(g)
      else if (core.has(g)) both = countOf(f)
      else if (dead.has(f) || dead.has(g)) both = 0n
      else both = engine.countConfigurations({ selected: [f, g] }, deadline.remaining())

      agreeing += total - countOf(f) - countOf(g) + 2n * both
    }
  }

  return ratio(agreeing, pairs * total)
}

/**
 * Share of features that are variant.
 *
 * @param classification - Feature classification
 * @returns A value in [0, 1]; 0 for a model without features or configurations
 *
 * @public
 */
export function variability(classification: FeatureClassification): number {
  const all = classification.core.length + classification.dead.length + classification.variant.length
  return all === 0 ? 0 : classification.variant.length / all
}

/**
 * `a / b` as a float, precise even when both exceed 2^53.
 *
 * @public
 */
export function ratio(a: bigint, b: bigint): number {
  if (b === 0n) return 0
  const limit = BigInt(Number.MAX_SAFE_INTEGER)
  if (a <= limit && b <= limit) {
    return Number(a) / Number(b)
  }
  const scale = 10n ** 15n
  return Number((a * scale) / b) / 1e15
}
