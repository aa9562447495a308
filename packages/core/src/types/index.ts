/**
 * Type definitions for feature models, formulas and errors.
 * @packageDocumentation
 */

// Model types
export type {
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
} from './model'

// Expression types
export type {
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
} from './expression'

// Formula types
export type {
  Literal,
  Clause,
  EncodedFormula,
  FormulaStats,
  Configuration,
  SelectionCriteria,
  SearchOptions,
} from './formula'

// Error types
export type { MalformedModelCode, AnalysisErrorCode, InputIssue } from './errors'
export {
  AnalysisError,
  MalformedModelError,
  UnknownFeatureError,
  AnalysisTimeoutError,
  EncodingLimitError,
  InvalidInputError,
  InvariantError,
} from './errors'
