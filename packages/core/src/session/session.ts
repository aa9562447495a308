/**
 * Model sessions - an explicit handle over one parsed model.
 * @packageDocumentation
 */

import type { Configuration, EncodedFormula, FeatureModel, SearchOptions, SelectionCriteria } from '../types'
import { resolveEngineOptions, type EngineOptions } from '../config'
import { encodeModel } from '../encode'
import { parseModel } from '../parse'
import { ConfigurationEngine, Deadline, type ConfigurationSequence, type ValidityOptions } from '../solver'
import {
  averageBranchingFactor,
  classifyFeatures,
  commonality,
  computeAtomicSets,
  countLeaves,
  estimateConfigurationCount,
  falseOptionalFeatures,
  featureAncestors,
  homogeneity,
  inclusionProbabilities,
  leafFeatures,
  maxDepth,
  modelSize,
  optionalFeatures,
  uniqueFeatures,
  variability,
  type FeatureClassification,
  type ModelSize,
} from '../analysis'

/**
 * Results kept after their first computation.
 */
interface SessionMemo {
  satisfiable?: boolean
  count?: bigint
  classification?: FeatureClassification
  atomicSets?: string[][]
}

/**
 * Every analysis of one parsed model.
 *
 * The model is immutable; the encoded formula is built on first use and
 * reused by every later analysis, as are satisfiability, the configuration
 * count, the core/dead classification and the atomic sets. Searches use the
 * session's timeout and signal unless a call passes its own; a call that runs
 * several searches spends one budget across all of them.
 *
 * @example
 * ```ts
 * const session = openModel(text)
 * session.countConfigurations() // 4n
 * session.coreFeatures() // ['Root', 'Engine']
 * ```
 *
 * @public
 */
export class FeatureModelSession {
  readonly model: FeatureModel
  readonly options: EngineOptions

  private cachedFormula?: EncodedFormula
  private cachedEngine?: ConfigurationEngine
  private readonly memo: SessionMemo = {}

  constructor(model: FeatureModel, options: Partial<EngineOptions> = {}) {
    this.model = model
    this.options = resolveEngineOptions(options)
  }

  /**
   * Parse model text and open a session on it.
   *
   * @throws MalformedModelError when the text is not a well-formed model
   */
  static open(text: string, options: Partial<EngineOptions> = {}): FeatureModelSession {
    const started = Date.now()
    const model = parseModel(text)
    const session = new FeatureModelSession(model, options)
    session.options.logger.debug('Parsed model', {
      features: model.features.size,
      constraints: model.constraints.length,
      ms: Date.now() - started,
    })
    return session
  }

  /**
   * The encoded formula, built once on first access.
   *
   * @throws EncodingLimitError if the formula exceeds `options.maxClauses`
   */
  get formula(): EncodedFormula {
    if (!this.cachedFormula) {
      const started = Date.now()
      this.cachedFormula = encodeModel(this.model, { maxClauses: this.options.maxClauses })
      this.options.logger.debug('Encoded model', {
        variables: this.cachedFormula.variables.length,
        clauses: this.cachedFormula.clauses.length,
        ...this.cachedFormula.stats,
        ms: Date.now() - started,
      })
    }
    return this.cachedFormula
  }

  get engine(): ConfigurationEngine {
    this.cachedEngine ??= new ConfigurationEngine(this.formula)
    return this.cachedEngine
  }

  /** Every feature name, in variable order */
  get featureNames(): readonly string[] {
    return this.formula.variables
  }

  // ===========================================================================
  // Tree metrics
  // ===========================================================================

  leafFeatures(): string[] {
    return leafFeatures(this.model)
  }

  countLeaves(): number {
    return countLeaves(this.model)
  }

  maxDepth(): number {
    return maxDepth(this.model)
  }

  averageBranchingFactor(): number {
    return averageBranchingFactor(this.model)
  }

  /** @throws UnknownFeatureError if `name` is not a feature */
  featureAncestors(name: string): string[] {
    return featureAncestors(this.model, name)
  }

  size(): ModelSize {
    return modelSize(this.model)
  }

  // ===========================================================================
  // Configuration space
  // ===========================================================================

  isSatisfiable(options?: SearchOptions): boolean {
    this.memo.satisfiable ??= this.engine.isSatisfiable(this.search(options))
    return this.memo.satisfiable
  }

  /** @throws UnknownFeatureError if the selection names an unknown feature */
  isConfigurationValid(selection: Iterable<string>, options: Omit<ValidityOptions, keyof SearchOptions> = {}): boolean {
    return this.engine.isConfigurationValid(selection, { ...this.search(), ...options })
  }

  /**
   * Lazy, restartable sequence of the valid configurations matching the criteria.
   */
  configurations(criteria: SelectionCriteria = {}, options?: SearchOptions): ConfigurationSequence {
    return this.engine.configurations(criteria, this.search(options))
  }

  /** Every valid configuration; exponential in the worst case */
  allConfigurations(options?: SearchOptions): Configuration[] {
    return this.configurations({}, options).toArray()
  }

  countConfigurations(options?: SearchOptions): bigint {
    if (this.memo.count === undefined) {
      this.memo.count = this.engine.countConfigurations({}, this.search(options))
      this.memo.satisfiable ??= this.memo.count > 0n
    }
    return this.memo.count
  }

  estimateConfigurationCount(): bigint {
    return estimateConfigurationCount(this.model)
  }

  /** @throws RangeError if `count` is not a positive integer */
  sampleConfigurations(count: number, seed: number = this.options.sampleSeed, options?: SearchOptions): Configuration[] {
    return this.engine.sampleConfigurations(count, { ...this.search(options), seed })
  }

  /** @throws UnknownFeatureError if the criteria name an unknown feature */
  filterConfigurations(criteria: SelectionCriteria, options?: SearchOptions): Configuration[] {
    return this.engine.filterConfigurations(criteria, this.search(options))
  }

  // ===========================================================================
  // Feature classification
  // ===========================================================================

  classification(options?: SearchOptions): FeatureClassification {
    if (!this.memo.classification) {
      const started = Date.now()
      this.memo.classification = classifyFeatures(this.engine, this.search(options))
      this.memo.satisfiable = this.memo.classification.satisfiable
      this.options.logger.debug('Classified features', {
        core: this.memo.classification.core.length,
        dead: this.memo.classification.dead.length,
        variant: this.memo.classification.variant.length,
        ms: Date.now() - started,
      })
    }
    return this.memo.classification
  }

  coreFeatures(options?: SearchOptions): string[] {
    return [...this.classification(options).core]
  }

  deadFeatures(options?: SearchOptions): string[] {
    return [...this.classification(options).dead]
  }

  variantFeatures(options?: SearchOptions): string[] {
    return [...this.classification(options).variant]
  }

  falseOptionalFeatures(options?: SearchOptions): string[] {
    return falseOptionalFeatures(this.classification(options), optionalFeatures(this.model))
  }

  atomicSets(options?: SearchOptions): string[][] {
    if (!this.memo.atomicSets) {
      const deadline = this.deadline(options)
      const classification = this.classification(deadline.remaining())
      this.memo.atomicSets = computeAtomicSets(this.engine, classification, deadline.remaining())
    }
    return this.memo.atomicSets.map((set) => [...set])
  }

  uniqueFeatures(options?: SearchOptions): string[] {
    return uniqueFeatures(this.atomicSets(options))
  }

  /** @throws UnknownFeatureError if `name` is not a feature */
  commonality(name: string, options?: SearchOptions): number {
    this.engine.variableOf(name)
    const deadline = this.deadline(options)
    const total = this.countConfigurations(deadline.remaining())
    return commonality(this.engine, name, total, deadline.remaining())
  }

  /** Commonality of every feature, in variable order */
  inclusionProbabilities(options?: SearchOptions): Map<string, number> {
    const deadline = this.deadline(options)
    const classification = this.classification(deadline.remaining())
    const total = this.countConfigurations(deadline.remaining())
    return inclusionProbabilities(this.engine, classification, total, deadline.remaining())
  }

  homogeneity(options?: SearchOptions): number {
    const deadline = this.deadline(options)
    const classification = this.classification(deadline.remaining())
    const atomicSets = this.atomicSets(deadline.remaining())
    const total = this.countConfigurations(deadline.remaining())
    return homogeneity(this.engine, classification, atomicSets, total, deadline.remaining())
  }

  variability(options?: SearchOptions): number {
    return variability(this.classification(options))
  }

  /**
   * Search limits for one call: the call's own, else the session's.
   */
  private search(options?: SearchOptions): SearchOptions {
    return {
      timeoutMs: options?.timeoutMs ?? this.options.timeoutMs,
      signal: options?.signal ?? this.options.signal,
    }
  }

  /**
   * One deadline for a call made of several searches; each step gets what is
   * left of it through `remaining()`.
   */
  private deadline(options?: SearchOptions): Deadline {
    return Deadline.from(this.search(options))
  }
}

/**
 * Parse model text and open a session on it.
 *
 * @throws MalformedModelError when the text is not a well-formed model
 *
 * @public
 */
export function openModel(text: string, options: Partial<EngineOptions> = {}): FeatureModelSession {
  return FeatureModelSession.open(text, options)
}
