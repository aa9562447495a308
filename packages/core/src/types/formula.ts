// =============================================================================
// PROPOSITIONAL FORMULA (CNF)
// =============================================================================

/**
 * A literal: positive variable number for "selected", negated for
 * "unselected". Variables are 1-based.
 * @public
 */
export type Literal = number

/**
 * A disjunction of literals.
 * @public
 */
export type Clause = readonly Literal[]

/**
 * The conjunctive normal form of "configuration validity" for one model.
 *
 * There is exactly one variable per feature; variable `i` names
 * `variables[i - 1]`. Variables are numbered parent-before-child, breadth
 * first, ascending by name within one depth.
 *
 * @public
 */
export interface EncodedFormula {
  /** Feature names in variable order */
  readonly variables: readonly string[]

  /** Feature name to variable number */
  readonly variableIndex: ReadonlyMap<string, number>

  readonly clauses: readonly Clause[]

  /** Number of clauses contributed by the tree and by cross-tree constraints */
  readonly stats: FormulaStats
}

/** @public */
export interface FormulaStats {
  readonly treeClauses: number
  readonly constraintClauses: number
}

// =============================================================================
// CONFIGURATIONS
// =============================================================================

/**
 * A total assignment of every feature to selected/unselected.
 *
 * Instances are immutable values.
 *
 * @public
 */
export interface Configuration {
  /** Selected feature names, in variable order */
  readonly selected: readonly string[]

  /** Whether `name` is selected */
  has(name: string): boolean

  /** Every feature mapped to its selection status, in variable order */
  toRecord(): Record<string, boolean>
}

/**
 * A partial selection: features forced selected and forced unselected.
 * @public
 */
export interface SelectionCriteria {
  readonly selected?: readonly string[]
  readonly deselected?: readonly string[]
}

/**
 * Limits for a search. The search throws `AnalysisTimeoutError` when either
 * the time budget is spent or the signal is aborted.
 * @public
 */
export interface SearchOptions {
  /** Wall-clock budget for the whole operation, in milliseconds */
  readonly timeoutMs?: number

  readonly signal?: AbortSignal
}
