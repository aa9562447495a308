/**
 * Configuration count estimate from group arities alone.
 * @packageDocumentation
 */

import type { Feature, FeatureModel, Group } from '../types'

/**
 * Estimate the number of configurations, ignoring cross-tree constraints.
 *
 * Counts the configurations of the bare feature tree: per group,
 * mandatory children multiply, optional children contribute `n + 1`,
 * or groups `∏(n + 1) - 1`, alternative groups `Σ n`, and `[a..b]` groups
 * the sum over every allowed number of selected children. Constraints can
 * only remove configurations, so the result is an upper bound of the exact
 * count, and equal to it for models without constraints.
 *
 * @param model - Parsed model
 * @returns Upper bound of the configuration count
 *
 * @public
 */
export function estimateConfigurationCount(model: FeatureModel): bigint {
  return subtreeCount(model.root)
}

/**
 * Configurations of a subtree given that its root is selected.
 */
function subtreeCount(feature: Feature): bigint {
  let total = 1n
  for (const group of feature.groups) {
    total *= groupCount(group)
  }
  return total
}

function groupCount(group: Group): bigint {
  const counts = group.children.map(subtreeCount)

  switch (group.kind) {
    case 'mandatory':
      return counts.reduce((product, n) => product * n, 1n)
    case 'optional':
      return counts.reduce((product, n) => product * (n + 1n), 1n)
    case 'or':
      return counts.reduce((product, n) => product * (n + 1n), 1n) - 1n
    case 'alternative':
      return counts.reduce((sum, n) => sum + n, 0n)
    case 'cardinality': {
      const sums = elementarySymmetricSums(counts)
      let total = 0n
      const upper = Math.min(group.max, counts.length)
      for (let k = group.min; k <= upper; k++) {
        total += sums[k]
      }
      return total
    }
  }
}

/**
 * `e[k]` = sum over all k-subsets of the product of their counts.
 */
function elementarySymmetricSums(counts: readonly bigint[]): bigint[] {
  const e: bigint[] = [1n, ...counts.map(() => 0n)]
  for (const n of counts) {
    for (let k = e.length - 1; k >= 1; k--) {
      e[k] += e[k - 1] * n
    }
  }
  return e
}
