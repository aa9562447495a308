/**
 * Configuration engine - satisfiability, enumeration, counting, sampling
 * and filtering over one encoded formula.
 * @packageDocumentation
 */

import type { Configuration, EncodedFormula, Literal, SearchOptions, SelectionCriteria } from '../types'
import { UnknownFeatureError } from '../types'
import { FeatureConfiguration } from './configuration'
import { countModels } from './counter'
import { Deadline } from './deadline'
import { DpllSolver, preferUnselected, satisfiesAll } from './dpll'
import { DEFAULT_SAMPLE_SEED, SeededRandom } from './random'

/**
 * Options for configuration validity checks.
 * @public
 */
export interface ValidityOptions extends SearchOptions {
  /**
   * Treat unmentioned features as undecided instead of unselected: the
   * selection is valid if some valid configuration extends it.
   * @defaultValue false
   */
  readonly partial?: boolean
}

/**
 * Options for sampling.
 * @public
 */
export interface SampleOptions extends SearchOptions {
  /** Seed of the decision polarity generator; equal seeds give equal samples */
  readonly seed?: number
}

/**
 * A lazy, finite, restartable sequence of valid configurations.
 *
 * Every iteration starts a fresh search and yields configurations in the
 * same order; consumers needing a prefix pay only for that prefix.
 *
 * @public
 */
export class ConfigurationSequence implements Iterable<Configuration> {
  private readonly formula: EncodedFormula
  private readonly assumptions: readonly Literal[]
  private readonly options: SearchOptions

  constructor(formula: EncodedFormula, assumptions: readonly Literal[] = [], options: SearchOptions = {}) {
    this.formula = formula
    this.assumptions = assumptions
    this.options = options
  }

  *[Symbol.iterator](): Generator<Configuration, void, undefined> {
    const solver = new DpllSolver(this.formula.variables.length, this.formula.clauses)
    const deadline = Deadline.from(this.options)
    for (const values of solver.search(this.assumptions, preferUnselected, deadline)) {
      yield new FeatureConfiguration(this.formula.variables, values)
    }
  }

  /** The first `count` configurations */
  take(count: number): Configuration[] {
    const taken: Configuration[] = []
    if (count <= 0) return taken
    for (const configuration of this) {
      taken.push(configuration)
      if (taken.length >= count) break
    }
    return taken
  }

  /** Every configuration; exponential in the worst case */
  toArray(): Configuration[] {
    return [...this]
  }
}

/**
 * Answers satisfiability and configuration-space questions for one formula.
 *
 * The engine is read-only with respect to its formula; searches that add
 * clauses run on private solver instances.
 *
 * @public
 */
export class ConfigurationEngine {
  readonly formula: EncodedFormula

  private solver?: DpllSolver

  constructor(formula: EncodedFormula) {
    this.formula = formula
  }

  /** Number of features (variables) */
  get variableCount(): number {
    return this.formula.variables.length
  }

  /**
   * Decide whether any valid configuration exists.
   *
   * @throws AnalysisTimeoutError when the deadline passes
   */
  isSatisfiable(options: SearchOptions = {}): boolean {
    return this.solve([], Deadline.from(options)) !== undefined
  }

  /**
   * Find one valid configuration satisfying the criteria, preferring
   * unselected features.
   *
   * @throws UnknownFeatureError if the criteria name an unknown feature
   */
  findConfiguration(criteria: SelectionCriteria = {}, options: SearchOptions = {}): Configuration | undefined {
    const values = this.solve(this.literalsFor(criteria), Deadline.from(options))
    return values ? new FeatureConfiguration(this.formula.variables, values) : undefined
  }

  /**
   * Check a selection of feature names.
   *
   * By default every unmentioned feature is unselected and the resulting
   * total configuration is evaluated. With `partial`, unmentioned features
   * are free.
   *
   * @throws UnknownFeatureError if the selection names an unknown feature
   */
  isConfigurationValid(selection: Iterable<string>, options: ValidityOptions = {}): boolean {
    const names = [...selection]
    const literals = this.literalsFor({ selected: names })

    if (options.partial) {
      return this.solve(literals, Deadline.from(options)) !== undefined
    }

    const values = new Int8Array(this.variableCount + 1).fill(-1)
    for (const literal of literals) values[literal] = 1
    return satisfiesAll(this.formula.clauses, values)
  }

  /**
   * Every valid configuration consistent with the criteria, as a lazy
   * restartable sequence.
   *
   * @throws UnknownFeatureError if the criteria name an unknown feature
   */
  configurations(criteria: SelectionCriteria = {}, options: SearchOptions = {}): ConfigurationSequence {
    return new ConfigurationSequence(this.formula, this.literalsFor(criteria), options)
  }

  /**
   * Exact number of valid configurations consistent with the criteria,
   * computed without enumerating them.
   *
   * @throws UnknownFeatureError if the criteria name an unknown feature
   * @throws AnalysisTimeoutError when the deadline passes
   */
  countConfigurations(criteria: SelectionCriteria = {}, options: SearchOptions = {}): bigint {
    return countModels(this.variableCount, this.formula.clauses, {
      assumptions: this.literalsFor(criteria),
      deadline: Deadline.from(options),
    })
  }

  /**
   * Up to `count` distinct valid configurations.
   *
   * Decision values are drawn from a seeded generator and every sample found
   * is blocked, so the same seed always returns the same samples and the
   * search stops as soon as the space is exhausted.
   *
   * @throws RangeError if `count` is not a positive integer
   * @throws AnalysisTimeoutError when the deadline passes
   */
  sampleConfigurations(count: number, options: SampleOptions = {}): Configuration[] {
    if (!Number.isInteger(count) || count < 1) {
      throw new RangeError(`Sample size must be a positive integer, got ${count}`)
    }

    const solver = new DpllSolver(this.variableCount, this.formula.clauses)
    const random = new SeededRandom(options.seed ?? DEFAULT_SAMPLE_SEED)
    const deadline = Deadline.from(options)
    const samples: Configuration[] = []

    while (samples.length < count) {
      const values = solver.solve([], () => random.nextBoolean(), deadline)
      if (!values) break

      samples.push(new FeatureConfiguration(this.formula.variables, values))

      const blocking: Literal[] = []
      for (let variable = 1; variable <= this.variableCount; variable++) {
        blocking.push(values[variable] > 0 ? -variable : variable)
      }
      solver.addClause(blocking)
    }

    return samples
  }

  /**
   * Every valid configuration that selects `criteria.selected` and leaves
   * out `criteria.deselected`.
   *
   * @throws UnknownFeatureError if the criteria name an unknown feature
   * @throws AnalysisTimeoutError when the deadline passes
   */
  filterConfigurations(criteria: SelectionCriteria, options: SearchOptions = {}): Configuration[] {
    return this.configurations(criteria, options).toArray()
  }

  /**
   * Run one search on the shared solver.
   *
   * @returns Truth values indexed by variable, or undefined if unsatisfiable
   */
  solve(assumptions: readonly Literal[], deadline: Deadline = Deadline.none): Int8Array | undefined {
    this.solver ??= new DpllSolver(this.variableCount, this.formula.clauses)
    return this.solver.solve(assumptions, preferUnselected, deadline)
  }

  /**
   * Translate criteria to assumption literals.
   *
   * @throws UnknownFeatureError if a name is not a feature
   */
  literalsFor(criteria: SelectionCriteria): Literal[] {
    const literals: Literal[] = []
    for (const name of criteria.selected ?? []) {
      literals.push(this.variableOf(name))
    }
    for (const name of criteria.deselected ?? []) {
      literals.push(-this.variableOf(name))
    }
    return literals
  }

  /**
   * Variable number of a feature.
   *
   * @throws UnknownFeatureError if `name` is not a feature
   */
  variableOf(name: string): number {
    const variable = this.formula.variableIndex.get(name)
    if (variable === undefined) {
      throw new UnknownFeatureError(name)
    }
    return variable
  }
}
