/**
 * UVL Feature Model Analysis
 *
 * A library for parsing feature models written in the Universal Variability
 * Language, encoding them as propositional formulas and answering structural
 * and combinatorial questions about their valid configurations.
 *
 * @packageDocumentation
 */

/**
 * Library version.
 * @public
 */
export const version = '0.1.0'

// =============================================================================
// Types
// =============================================================================

export type {
  // Model types
  FeatureType,
  AttributeValue,
  Feature,
  CardinalityRange,
  Group,
  GroupKind,
  MandatoryGroup,
  OptionalGroup,
  OrGroup,
  AlternativeGroup,
  CardinalityGroup,
  Constraint,
  FeatureModel,
  // Expression types
  Expression,
  VariableExpression,
  ConstantExpression,
  NotExpression,
  AndExpression,
  OrExpression,
  ImpliesExpression,
  IffExpression,
  ExpressionToken,
  ExpressionOperator,
  // Formula types
  Literal,
  Clause,
  EncodedFormula,
  FormulaStats,
  Configuration,
  SelectionCriteria,
  SearchOptions,
  // Error types
  MalformedModelCode,
  AnalysisErrorCode,
  InputIssue,
} from './types'
export {
  AnalysisError,
  MalformedModelError,
  UnknownFeatureError,
  AnalysisTimeoutError,
  EncodingLimitError,
  InvalidInputError,
  InvariantError,
} from './types'

// =============================================================================
// Parsing
// =============================================================================

export { parseModel } from './parse'
export { tokenizeExpression, parseExpression, expressionVariables, expressionToString } from './parse'

// =============================================================================
// Encoding
// =============================================================================

export { encodeModel, orderFeatures, DEFAULT_MAX_CLAUSES, type EncodeOptions } from './encode'
export { expressionToClauses } from './encode'

// =============================================================================
// Solving
// =============================================================================

export { ConfigurationEngine, ConfigurationSequence, type ValidityOptions, type SampleOptions } from './solver'
export { DpllSolver, countModels, Deadline, FeatureConfiguration, SeededRandom, DEFAULT_SAMPLE_SEED } from './solver'

// =============================================================================
// Analysis
// =============================================================================

export {
  leafFeatures,
  countLeaves,
  maxDepth,
  averageBranchingFactor,
  featureAncestors,
  modelSize,
  estimateConfigurationCount,
  classifyFeatures,
  computeAtomicSets,
  uniqueFeatures,
  falseOptionalFeatures,
  commonality,
  inclusionProbabilities,
  homogeneity,
  variability,
  type ModelSize,
  type FeatureClassification,
} from './analysis'

// =============================================================================
// Sessions
// =============================================================================

export { FeatureModelSession, SessionCache, openModel } from './session'

// =============================================================================
// Dispatch
// =============================================================================

export {
  AnalysisDispatcher,
  analysisInputSchema,
  describeOperations,
  OPERATION_NAMES,
  DEFAULT_SAMPLE_COUNT,
  type AnalysisInput,
  type ResolvedAnalysisInput,
  type OperationName,
  type OperationDescription,
  type OperationResult,
  type ConfigurationRecord,
  type CountValue,
  type ParameterKind,
} from './dispatch'

// =============================================================================
// Configuration & Logging
// =============================================================================

export { DEFAULT_ENGINE_OPTIONS, resolveEngineOptions, engineOptionsFromEnv, type EngineOptions } from './config'
export { ConsoleLogger, SilentLogger, silentLogger, type Logger, type LogLevel } from './logging'
