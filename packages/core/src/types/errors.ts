/**
 * Error codes for model parsing failures.
 * @public
 */
export type MalformedModelCode =
  | 'EMPTY_MODEL' // Nothing but whitespace and comments
  | 'MISSING_FEATURES_SECTION' // No `features` keyword
  | 'MISSING_ROOT' // `features` section without a feature
  | 'MULTIPLE_ROOTS' // More than one feature at root indentation
  | 'INCONSISTENT_INDENTATION' // Dedent to a column never opened
  | 'UNEXPECTED_TOKEN' // Syntax error on a line
  | 'DUPLICATE_FEATURE' // Same name declared twice
  | 'UNDEFINED_FEATURE' // Constraint references an unknown feature
  | 'INVALID_GROUP' // Empty group, feature outside a group, bad cardinality
  | 'UNSUPPORTED_CONSTRUCT' // Arithmetic constraints and other non-boolean UVL

/**
 * Classification code shared by every error this library throws.
 * @public
 */
export type AnalysisErrorCode =
  | MalformedModelCode
  | 'UNKNOWN_FEATURE'
  | 'TIMEOUT'
  | 'CLAUSE_LIMIT'
  | 'INVALID_INPUT'
  | 'INVARIANT_VIOLATION'

/**
 * Base class of all errors thrown by the analysis engine.
 * @public
 */
export class AnalysisError extends Error {
  /** Error classification code */
  readonly code: AnalysisErrorCode

  constructor(code: AnalysisErrorCode, message: string) {
    super(message)
    this.name = 'AnalysisError'
    this.code = code
  }
}

/**
 * The model text could not be parsed.
 *
 * The message always carries a `line:column` location hint.
 *
 * @public
 */
export class MalformedModelError extends AnalysisError {
  declare readonly code: MalformedModelCode

  /** 1-based line of the offending text */
  readonly line: number

  /** 1-based column of the offending text */
  readonly column: number

  constructor(code: MalformedModelCode, message: string, line: number, column = 1) {
    super(code, `${message} (line ${line}, column ${column})`)
    this.name = 'MalformedModelError'
    this.line = line
    this.column = column
  }
}

/**
 * An operation parameter names a feature that is not in the model.
 * @public
 */
export class UnknownFeatureError extends AnalysisError {
  readonly feature: string

  constructor(feature: string) {
    super('UNKNOWN_FEATURE', `Unknown feature "${feature}"`)
    this.name = 'UnknownFeatureError'
    this.feature = feature
  }
}

/**
 * A search exceeded its deadline or was aborted.
 *
 * Thrown instead of returning a partial result.
 *
 * @public
 */
export class AnalysisTimeoutError extends AnalysisError {
  /** Allotted time, undefined when the search was aborted by a signal */
  readonly timeoutMs?: number

  constructor(message: string, timeoutMs?: number) {
    super('TIMEOUT', message)
    this.name = 'AnalysisTimeoutError'
    this.timeoutMs = timeoutMs
  }
}

/**
 * Error thrown when encoding a model exceeds the configured clause limit.
 *
 * This typically occurs with wide cardinality groups or constraints whose
 * conjunctive normal form grows exponentially.
 *
 * @public
 */
export class EncodingLimitError extends AnalysisError {
  /** The limit that was exceeded */
  readonly limit: number

  /** The actual value that exceeded the limit */
  readonly actual: number

  constructor(message: string, limit: number, actual: number) {
    super('CLAUSE_LIMIT', message)
    this.name = 'EncodingLimitError'
    this.limit = limit
    this.actual = actual
  }
}

/**
 * One problem found while validating operation input.
 * @public
 */
export interface InputIssue {
  /** Dotted path of the offending field, empty for the whole input */
  readonly path: string
  readonly message: string
}

/**
 * Operation input or configuration failed validation.
 * @public
 */
export class InvalidInputError extends AnalysisError {
  readonly issues: readonly InputIssue[]

  constructor(message: string, issues: readonly InputIssue[] = []) {
    super('INVALID_INPUT', message)
    this.name = 'InvalidInputError'
    this.issues = issues
  }
}

/**
 * A broken internal invariant, e.g. a clause over an undeclared variable.
 *
 * Indicates a bug, never bad input; callers should not recover from it.
 *
 * @public
 */
export class InvariantError extends AnalysisError {
  constructor(message: string) {
    super('INVARIANT_VIOLATION', message)
    this.name = 'InvariantError'
  }
}
