/**
 * Search deadlines - time budgets and abort signals for long searches.
 * @packageDocumentation
 */

import type { SearchOptions } from '../types'
import { AnalysisTimeoutError } from '../types'

/**
 * Number of `check()` calls between clock reads.
 */
const CLOCK_STRIDE = 64

/**
 * A deadline shared by every step of one operation.
 *
 * Searches call `check()` at each decision; it throws
 * `AnalysisTimeoutError` once the budget is spent or the signal aborts.
 *
 * @public
 */
export class Deadline {
  /** A deadline that never expires */
  static readonly none = new Deadline({})

  private readonly expiresAt: number
  private readonly timeoutMs?: number
  private readonly signal?: AbortSignal
  private calls = 0

  constructor(options: SearchOptions, now: number = Date.now()) {
    this.timeoutMs = options.timeoutMs
    this.signal = options.signal
    this.expiresAt = options.timeoutMs === undefined ? Infinity : now + options.timeoutMs
  }

  /**
   * Build a deadline from options, reusing `Deadline.none` when unlimited.
   */
  static from(options: SearchOptions = {}): Deadline {
    if (options.timeoutMs === undefined && options.signal === undefined) {
      return Deadline.none
    }
    return new Deadline(options)
  }

  /**
   * Options carrying what is left of this deadline, for handing a share of
   * the budget to a nested operation.
   */
  remaining(): SearchOptions {
    if (this.expiresAt === Infinity) {
      return { signal: this.signal }
    }
    return { timeoutMs: Math.max(0, this.expiresAt - Date.now()), signal: this.signal }
  }

  /** Whether the deadline has passed, without throwing */
  get expired(): boolean {
    return this.signal?.aborted === true || Date.now() >= this.expiresAt
  }

  /**
   * Throw if the deadline has passed.
   *
   * @throws AnalysisTimeoutError
   */
  check(): void {
    if (this.signal?.aborted) {
      throw new AnalysisTimeoutError('Analysis was aborted')
    }
    if (this.expiresAt === Infinity) return

    this.calls++
    if (this.calls % CLOCK_STRIDE !== 0 && this.calls > 1) return

    if (Date.now() >= this.expiresAt) {
      throw new AnalysisTimeoutError(`Analysis exceeded its deadline of ${this.timeoutMs} ms`, this.timeoutMs)
    }
  }
}
