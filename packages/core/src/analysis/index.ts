/**
 * Structural and semantic analyses of feature models.
 * @packageDocumentation
 */

export {
  childrenOf,
  leafFeatures,
  countLeaves,
  maxDepth,
  averageBranchingFactor,
  featureAncestors,
  optionalFeatures,
  modelSize,
  type ModelSize,
} from './structure'
export { estimateConfigurationCount } from './estimate'
export {
  classifyFeatures,
  computeAtomicSets,
  uniqueFeatures,
  falseOptionalFeatures,
  type FeatureClassification,
} from './classification'
export { commonality, inclusionProbabilities, homogeneity, variability, ratio } from './statistics'
