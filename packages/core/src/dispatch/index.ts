/**
 * Operation dispatcher.
 * @packageDocumentation
 */

export { AnalysisDispatcher, analysisInputSchema, type AnalysisInput, type ResolvedAnalysisInput } from './dispatcher'
export {
  OPERATION_NAMES,
  OPERATIONS,
  describeOperations,
  type OperationName,
  type OperationDefinition,
  type OperationDescription,
  type OperationContext,
  type ParameterKind,
} from './operations'
export {
  DEFAULT_SAMPLE_COUNT,
  parseFeatureParameter,
  parseSelectionParameter,
  parseCriteriaParameter,
  parseSampleCountParameter,
} from './parameters'
export { toCountValue, roundTo, type ConfigurationRecord, type CountValue, type OperationResult } from './results'
