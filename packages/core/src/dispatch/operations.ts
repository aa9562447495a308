/**
 * The operation catalogue served by the dispatcher.
 * @packageDocumentation
 */

import type { FeatureModelSession } from '../session'
import {
  parseCriteriaParameter,
  parseFeatureParameter,
  parseSampleCountParameter,
  parseSelectionParameter,
} from './parameters'
import { roundTo, toCountValue, toRecords, type OperationResult } from './results'

/**
 * Names of all dispatchable operations.
 * @public
 */
export const OPERATION_NAMES = [
  'atomic_sets',
  'average_branching_factor',
  'commonality',
  'configurations',
  'configurations_number',
  'core_features',
  'count_leafs',
  'dead_features',
  'estimated_number_of_configurations',
  'false_optional_features',
  'feature_ancestors',
  'feature_inclusion_probability',
  'filter',
  'homogeneity',
  'leaf_features',
  'max_depth',
  'sampling',
  'satisfiability',
  'satisfiable_configuration',
  'unique_features',
  'variant_features',
  'variability',
] as const

/**
 * @public
 */
export type OperationName = (typeof OPERATION_NAMES)[number]

/**
 * What an operation reads from `config`.
 * @public
 */
export type ParameterKind = 'none' | 'feature' | 'selection' | 'criteria' | 'sample-count'

/**
 * Settings an operation reads besides its session and config.
 * @public
 */
export interface OperationContext {
  readonly precision: number
  readonly sampleSeed: number
}

/**
 * One entry of the catalogue.
 * @public
 */
export interface OperationDefinition {
  readonly description: string
  readonly parameter: ParameterKind
  /** Whether `config` must be given */
  readonly requiresConfig: boolean
  execute(session: FeatureModelSession, config: string | undefined, context: OperationContext): OperationResult
}

/**
 * Every operation, by name.
 * @public
 */
export const OPERATIONS: Readonly<Record<OperationName, OperationDefinition>> = {
  atomic_sets: {
    description: 'Groups of features that are always selected or deselected together.',
    parameter: 'none',
    requiresConfig: false,
    execute: (session) => session.atomicSets(),
  },
  average_branching_factor: {
    description: 'Average number of children of the features that have children.',
    parameter: 'none',
    requiresConfig: false,
    execute: (session, _config, { precision }) => roundTo(session.averageBranchingFactor(), precision),
  },
  commonality: {
    description: 'Fraction of valid configurations that select the feature named in config.',
    parameter: 'feature',
    requiresConfig: true,
    execute: (session, config, { precision }) => roundTo(session.commonality(parseFeatureParameter(config)), precision),
  },
  configurations: {
    description: 'Every valid configuration of the model.',
    parameter: 'none',
    requiresConfig: false,
    execute: (session) => toRecords(session.allConfigurations()),
  },
  configurations_number: {
    description: 'Exact number of valid configurations.',
    parameter: 'none',
    requiresConfig: false,
    execute: (session) => toCountValue(session.countConfigurations()),
  },
  core_features: {
    description: 'Features selected in every valid configuration.',
    parameter: 'none',
    requiresConfig: false,
    execute: (session) => session.coreFeatures(),
  },
  count_leafs: {
    description: 'Number of features without children.',
    parameter: 'none',
    requiresConfig: false,
    execute: (session) => session.countLeaves(),
  },
  dead_features: {
    description: 'Features selected in no valid configuration.',
    parameter: 'none',
    requiresConfig: false,
    execute: (session) => session.deadFeatures(),
  },
  estimated_number_of_configurations: {
    description: 'Upper bound on the number of configurations from the feature tree alone, ignoring constraints.',
    parameter: 'none',
    requiresConfig: false,
    execute: (session) => toCountValue(session.estimateConfigurationCount()),
  },
  false_optional_features: {
    description: 'Features declared optional that every valid configuration selects along with their parent.',
    parameter: 'none',
    requiresConfig: false,
    execute: (session) => session.falseOptionalFeatures(),
  },
  feature_ancestors: {
    description: 'Ancestors of the feature named in config, from its parent up to the root.',
    parameter: 'feature',
    requiresConfig: true,
    execute: (session, config) => session.featureAncestors(parseFeatureParameter(config)),
  },
  feature_inclusion_probability: {
    description: 'Probability of each feature being selected in a uniformly drawn valid configuration.',
    parameter: 'none',
    requiresConfig: false,
    execute: (session, _config, { precision }) => {
      const probabilities: Record<string, number> = {}
      for (const [name, probability] of session.inclusionProbabilities()) {
        probabilities[name] = roundTo(probability, precision)
      }
      return probabilities
    },
  },
  filter: {
    description: 'Valid configurations that select and deselect the features given in config.',
    parameter: 'criteria',
    requiresConfig: true,
    execute: (session, config) => toRecords(session.filterConfigurations(parseCriteriaParameter(config))),
  },
  homogeneity: {
    description: 'Mean agreement of feature pairs across valid configurations; closer to 1 means more similar configurations.',
    parameter: 'none',
    requiresConfig: false,
    execute: (session, _config, { precision }) => roundTo(session.homogeneity(), precision),
  },
  leaf_features: {
    description: 'Features without children.',
    parameter: 'none',
    requiresConfig: false,
    execute: (session) => session.leafFeatures(),
  },
  max_depth: {
    description: 'Length of the longest path from the root to a leaf.',
    parameter: 'none',
    requiresConfig: false,
    execute: (session) => session.maxDepth(),
  },
  sampling: {
    description: 'Distinct valid configurations drawn with a fixed seed; config is the sample size.',
    parameter: 'sample-count',
    requiresConfig: false,
    execute: (session, config, { sampleSeed }) =>
      toRecords(session.sampleConfigurations(parseSampleCountParameter(config), sampleSeed)),
  },
  satisfiability: {
    description: 'Whether the model has at least one valid configuration.',
    parameter: 'none',
    requiresConfig: false,
    execute: (session) => session.isSatisfiable(),
  },
  satisfiable_configuration: {
    description: 'Whether selecting exactly the features listed in config is a valid configuration.',
    parameter: 'selection',
    requiresConfig: true,
    execute: (session, config) => session.isConfigurationValid(parseSelectionParameter(config)),
  },
  unique_features: {
    description: 'Features whose atomic set holds only themselves.',
    parameter: 'none',
    requiresConfig: false,
    execute: (session) => session.uniqueFeatures(),
  },
  variant_features: {
    description: 'Features that are neither core nor dead.',
    parameter: 'none',
    requiresConfig: false,
    execute: (session) => session.variantFeatures(),
  },
  variability: {
    description: 'Share of features that are variant.',
    parameter: 'none',
    requiresConfig: false,
    execute: (session, _config, { precision }) => roundTo(session.variability(), precision),
  },
}

/**
 * Catalogue entry for listing.
 * @public
 */
export interface OperationDescription {
  readonly name: OperationName
  readonly description: string
  readonly parameter: ParameterKind
  readonly requiresConfig: boolean
}

/**
 * List every operation with its description and parameter.
 *
 * @public
 */
export function describeOperations(): OperationDescription[] {
  return OPERATION_NAMES.map((name) => {
    const { description, parameter, requiresConfig } = OPERATIONS[name]
    return { name, description, parameter, requiresConfig }
  })
}
