/**
 * Immutable configuration values.
 * @packageDocumentation
 */

import type { Configuration } from '../types'

/**
 * A total assignment of the features of one formula.
 *
 * @public
 */
export class FeatureConfiguration implements Configuration {
  readonly selected: readonly string[]

  private readonly variables: readonly string[]
  private readonly lookup: ReadonlySet<string>

  /**
   * @param variables - Feature names in variable order
   * @param values - Truth value per variable, indexed by variable number (index 0 unused)
   */
  constructor(variables: readonly string[], values: ArrayLike<number>) {
    this.variables = variables
    this.selected = Object.freeze(variables.filter((_, i) => values[i + 1] > 0))
    this.lookup = new Set(this.selected)
  }

  /**
   * Build a configuration from the names it selects.
   */
  static fromSelection(variables: readonly string[], selected: Iterable<string>): FeatureConfiguration {
    const names = new Set(selected)
    const values = [0, ...variables.map((name) => (names.has(name) ? 1 : -1))]
    return new FeatureConfiguration(variables, values)
  }

  has(name: string): boolean {
    return this.lookup.has(name)
  }

  toRecord(): Record<string, boolean> {
    const record: Record<string, boolean> = {}
    for (const name of this.variables) {
      record[name] = this.lookup.has(name)
    }
    return record
  }

  /** Selected names joined by commas, for logs and keys */
  toString(): string {
    return this.selected.join(',')
  }
}
