import type { Expression } from './expression'

// =============================================================================
// FEATURE TREE
// =============================================================================

/**
 * Value type a feature is declared with. Only `Boolean` features carry
 * selection semantics; typed features are still selectable nodes.
 * @public
 */
export type FeatureType = 'Boolean' | 'Integer' | 'Real' | 'String'

/**
 * A scalar attribute value attached to a feature in `{ ... }`.
 * @public
 */
export type AttributeValue = string | number | boolean

/**
 * A named node of the feature tree.
 *
 * Features are owned by their model; `parent` is undefined only for the root.
 *
 * @public
 */
export interface Feature {
  /** Unique, case-sensitive name used as the lookup key everywhere */
  readonly name: string

  /** Owning feature, undefined for the root */
  readonly parent?: Feature

  /** Groups partitioning the children, in declaration order */
  readonly groups: readonly Group[]

  readonly featureType: FeatureType

  /** Whether the feature was declared `{abstract}` */
  readonly abstract: boolean

  readonly attributes: Readonly<Record<string, AttributeValue>>

  /** Feature cardinality (`cardinality [n..m]`), recorded but not encoded */
  readonly cardinality?: CardinalityRange

  /** 1-based source line of the declaration */
  readonly line: number
}

/**
 * An inclusive range; `max` is `Infinity` for `*`.
 * @public
 */
export interface CardinalityRange {
  readonly min: number
  readonly max: number
}

/**
 * A group of children under one parent. Tagged by how many of the children
 * may be selected together with the parent.
 * @public
 */
export type Group = MandatoryGroup | OptionalGroup | OrGroup | AlternativeGroup | CardinalityGroup

/** @public */
export type GroupKind = Group['kind']

/**
 * Each child is selected iff the parent is.
 * @public
 */
export interface MandatoryGroup {
  readonly kind: 'mandatory'
  readonly children: readonly Feature[]
}

/**
 * Each child may be selected only if the parent is.
 * @public
 */
export interface OptionalGroup {
  readonly kind: 'optional'
  readonly children: readonly Feature[]
}

/**
 * At least one child is selected iff the parent is.
 * @public
 */
export interface OrGroup {
  readonly kind: 'or'
  readonly children: readonly Feature[]
}

/**
 * Exactly one child is selected iff the parent is.
 * @public
 */
export interface AlternativeGroup {
  readonly kind: 'alternative'
  readonly children: readonly Feature[]
}

/**
 * Between `min` and `max` children are selected when the parent is
 * (`[n]`, `[n..m]`, `[n..*]`).
 * @public
 */
export interface CardinalityGroup {
  readonly kind: 'cardinality'
  readonly min: number
  readonly max: number
  readonly children: readonly Feature[]
}

// =============================================================================
// MODEL
// =============================================================================

/**
 * A cross-tree constraint read from the `constraints` section.
 * @public
 */
export interface Constraint {
  /** Constraint text as written */
  readonly source: string

  /** Parsed propositional expression */
  readonly expression: Expression

  /** 1-based source line */
  readonly line: number
}

/**
 * A parsed UVL model. Immutable once returned by the parser.
 * @public
 */
export interface FeatureModel {
  /** Original model text */
  readonly source: string

  /** `namespace` declaration, if any */
  readonly namespace?: string

  /** Entries of the `imports` block; recorded, never resolved */
  readonly imports: readonly string[]

  /** Entries of the `include` block (language levels) */
  readonly includes: readonly string[]

  readonly root: Feature

  /** Every feature by name, in declaration order */
  readonly features: ReadonlyMap<string, Feature>

  /** Cross-tree constraints in source order */
  readonly constraints: readonly Constraint[]
}
