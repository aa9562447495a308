/**
 * Constraint-driven feature classification: core, dead and variant
 * features, and atomic sets.
 *
 * Every satisfying assignment found along the way is kept as a witness.
 * A feature that a witness selects cannot be dead, one it leaves out cannot
 * be core, and two features a witness tells apart cannot share an atomic
 * set, so most candidates are settled without a dedicated search.
 *
 * @packageDocumentation
 */

import type { Literal, SearchOptions } from '../types'
import type { ConfigurationEngine } from '../solver'
import { Deadline } from '../solver'

/**
 * Core, dead and variant features of a formula, in variable order.
 * @public
 */
export interface FeatureClassification {
  readonly satisfiable: boolean

  /** Selected in every valid configuration */
  readonly core: readonly string[]

  /** Selected in no valid configuration */
  readonly dead: readonly string[]

  /** Neither core nor dead */
  readonly variant: readonly string[]

  /** Satisfying assignments found during classification */
  readonly witnesses: readonly Int8Array[]
}

/**
 * Classify every feature as core, dead or variant.
 *
 * On an unsatisfiable formula no feature is core and every feature is dead.
 *
 * @param engine - Engine of the formula
 * @param options - Deadline for the whole classification
 * @throws AnalysisTimeoutError when the deadline passes
 *
 * @public
 */
export function classifyFeatures(engine: ConfigurationEngine, options: SearchOptions = {}): FeatureClassification {
  const deadline = Deadline.from(options)
  const names = engine.formula.variables
  const n = engine.variableCount

  const first = engine.solve([], deadline)
  if (!first) {
    return { satisfiable: false, core: [], dead: [...names], variant: [], witnesses: [] }
  }

  const witnesses: Int8Array[] = [first]
  const seenSelected = new Uint8Array(n + 1)
  const seenUnselected = new Uint8Array(n + 1)

  const record = (values: Int8Array): void => {
    for (let v = 1; v <= n; v++) {
      if (values[v] > 0) seenSelected[v] = 1
      else seenUnselected[v] = 1
    }
  }
  record(first)

  const core: string[] = []
  const dead: string[] = []
  const variant: string[] = []

  const refutes = (literal: Literal): boolean => {
    const witness = engine.solve([literal], deadline)
    if (!witness) return true
    witnesses.push(witness)
    record(witness)
    return false
  }

  for (let v = 1; v <= n; v++) {
    const name = names[v - 1]
    if (!seenUnselected[v] && refutes(-v)) {
      core.push(name)
    } else if (!seenSelected[v] && refutes(v)) {
      dead.push(name)
    } else {
      variant.push(name)
    }
  }

  return { satisfiable: true, core, dead, variant, witnesses }
}

/**
 * Partition the features into atomic sets: maximal groups whose members
 * are selected together or left out together in every valid configuration.
 *
 * Core features form one set (with the root), dead features another.
 * Sets are ordered by their first member, members by variable order. On an
 * unsatisfiable formula all features form a single set.
 *
 * @param engine - Engine of the formula
 * @param classification - Result of {@link classifyFeatures} for the same engine
 * @param options - Deadline for the whole computation
 * @throws AnalysisTimeoutError when the deadline passes
 *
 * @public
 */
export function computeAtomicSets(
  engine: ConfigurationEngine,
  classification: FeatureClassification,
  options: SearchOptions = {},
): string[][] {
  const names = engine.formula.variables
  if (!classification.satisfiable) {
    return names.length > 0 ? [[...names]] : []
  }

  const deadline = Deadline.from(options)
  const witnesses = [...classification.witnesses]
  const core = new Set(classification.core)
  const dead = new Set(classification.dead)

  const sets: AtomicSetDraft[] = []
  let coreSet: AtomicSetDraft | undefined
  let deadSet: AtomicSetDraft | undefined

  const agreeOnWitnesses = (a: number, b: number): boolean =>
    witnesses.every((values) => values[a] === values[b])

  const implies = (a: number, b: number): boolean => {
    const witness = engine.solve([a, -b], deadline)
    if (!witness) return true
    witnesses.push(witness)
    return false
  }

  for (let v = 1; v <= names.length; v++) {
    const name = names[v - 1]

    if (core.has(name)) {
      coreSet ??= addSet(sets, v)
      coreSet.members.push(name)
      continue
    }
    if (dead.has(name)) {
      deadSet ??= addSet(sets, v)
      deadSet.members.push(name)
      continue
    }

    deadline.check()
    let joined = false
    for (const set of sets) {
      if (set === coreSet || set === deadSet) continue
      const r = set.representative
      if (agreeOnWitnesses(v, r) && implies(v, r) && implies(r, v)) {
        set.members.push(name)
        joined = true
        break
      }
    }
    if (!joined) {
      addSet(sets, v).members.push(name)
    }
  }

  return sets.map((set) => set.members)
}

/**
 * An atomic set under construction, identified by its first variable.
 */
interface AtomicSetDraft {
  readonly representative: number
  readonly members: string[]
}

function addSet(sets: AtomicSetDraft[], representative: number): AtomicSetDraft {
  const set: AtomicSetDraft = { representative, members: [] }
  sets.push(set)
  return set
}

/**
 * Members of atomic sets of size one.
 *
 * @public
 */
export function uniqueFeatures(atomicSets: readonly (readonly string[])[]): string[] {
  return atomicSets.filter((set) => set.length === 1).map((set) => set[0])
}

/**
 * Features declared optional that are nonetheless core.
 *
 * @param classification - Core features of the model
 * @param declaredOptional - Names of features in optional groups
 * @returns Matching names, in variable order
 *
 * @public
 */
export function falseOptionalFeatures(
  classification: FeatureClassification,
  declaredOptional: readonly string[],
): string[] {
  const optional = new Set(declaredOptional)
  return classification.core.filter((name) => optional.has(name))
}
