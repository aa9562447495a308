/**
 * Tree-shape metrics. None of these need solving.
 * @packageDocumentation
 */

import type { Feature, FeatureModel } from '../types'
import { UnknownFeatureError } from '../types'

/**
 * Children of a feature across all of its groups, in declaration order.
 *
 * @public
 */
export function childrenOf(feature: Feature): Feature[] {
  return feature.groups.flatMap((group) => group.children)
}

/**
 * Features with no children, in declaration order.
 *
 * @public
 */
export function leafFeatures(model: FeatureModel): string[] {
  return [...model.features.values()].filter((feature) => feature.groups.length === 0).map((feature) => feature.name)
}

/**
 * Number of features with no children.
 *
 * @public
 */
export function countLeaves(model: FeatureModel): number {
  return leafFeatures(model).length
}

/**
 * Longest root-to-leaf path, in edges. A lone root has depth 0.
 *
 * @public
 */
export function maxDepth(model: FeatureModel): number {
  const depthBelow = (feature: Feature): number => {
    let deepest = 0
    for (const child of childrenOf(feature)) {
      deepest = Math.max(deepest, depthBelow(child) + 1)
    }
    return deepest
  }

  return depthBelow(model.root)
}

/**
 * Mean number of children over features that have children; 0 for a lone root.
 *
 * @public
 */
export function averageBranchingFactor(model: FeatureModel): number {
  let parents = 0
  let children = 0

  for (const feature of model.features.values()) {
    const count = childrenOf(feature).length
    if (count > 0) {
      parents++
      children += count
    }
  }

  return parents === 0 ? 0 : children / parents
}

/**
 * Ancestors of a feature, from its immediate parent up to the root.
 *
 * @param model - Parsed model
 * @param name - Feature name
 * @returns Ancestor names; empty for the root
 * @throws UnknownFeatureError if `name` is not a feature
 *
 * @public
 */
export function featureAncestors(model: FeatureModel, name: string): string[] {
  const feature = model.features.get(name)
  if (!feature) {
    throw new UnknownFeatureError(name)
  }

  const ancestors: string[] = []
  for (let current = feature.parent; current; current = current.parent) {
    ancestors.push(current.name)
  }
  return ancestors
}

/**
 * Features declared in an `optional` group, in declaration order.
 *
 * @public
 */
export function optionalFeatures(model: FeatureModel): string[] {
  const names: string[] = []
  for (const feature of model.features.values()) {
    for (const group of feature.groups) {
      if (group.kind === 'optional') {
        names.push(...group.children.map((child) => child.name))
      }
    }
  }
  return names
}

/**
 * Size figures of a model.
 * @public
 */
export interface ModelSize {
  readonly features: number
  readonly constraints: number
  readonly leaves: number
  readonly maxDepth: number
}

/**
 * Count features, constraints and leaves, and measure depth.
 *
 * @public
 */
export function modelSize(model: FeatureModel): ModelSize {
  return {
    features: model.features.size,
    constraints: model.constraints.length,
    leaves: countLeaves(model),
    maxDepth: maxDepth(model),
  }
}
