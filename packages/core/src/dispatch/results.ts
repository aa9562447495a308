/**
 * Shaping of analysis results into plain JSON values.
 * @packageDocumentation
 */

import type { Configuration } from '../types'

/**
 * A configuration as a map from every feature name to its selection.
 * @public
 */
export type ConfigurationRecord = Record<string, boolean>

/**
 * A count: a number when it is a safe integer, else its decimal string.
 * @public
 */
export type CountValue = number | string

/**
 * Any value an operation returns.
 * @public
 */
export type OperationResult =
  | boolean
  | number
  | string
  | string[]
  | string[][]
  | ConfigurationRecord[]
  | Record<string, number>

/**
 * @public
 */
export function toCountValue(count: bigint): CountValue {
  return count <= BigInt(Number.MAX_SAFE_INTEGER) ? Number(count) : count.toString()
}

/**
 * Round half away from zero to `precision` decimal places.
 *
 * @public
 */
export function roundTo(value: number, precision: number): number {
  const factor = 10 ** precision
  return Math.sign(value) * (Math.round(Math.abs(value) * factor + Number.EPSILON) / factor)
}

/**
 * Map configurations to their {@link ConfigurationRecord}s, keeping their order.
 *
 * @public
 */
export function toRecords(configurations: readonly Configuration[]): ConfigurationRecord[] {
  return configurations.map((configuration) => configuration.toRecord())
}
