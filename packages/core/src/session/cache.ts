/**
 * Bounded cache of sessions keyed by model text.
 * @packageDocumentation
 */

import type { EngineOptions } from '../config'
import { FeatureModelSession } from './session'

/**
 * Least-recently-used cache of sessions.
 *
 * Identical model text maps to the same session, so its formula and
 * memoized results are shared; changed text is a different key. A failed
 * parse is not cached.
 *
 * @public
 */
export class SessionCache {
  readonly capacity: number

  private readonly options: Partial<EngineOptions>
  private readonly entries = new Map<string, FeatureModelSession>()

  constructor(capacity: number, options: Partial<EngineOptions> = {}) {
    this.capacity = Math.max(1, capacity)
    this.options = options
  }

  get size(): number {
    return this.entries.size
  }

  /**
   * The session for `text`, opening it on a miss.
   *
   * @throws MalformedModelError when the text is not a well-formed model
   */
  get(text: string): FeatureModelSession {
    const cached = this.entries.get(text)
    if (cached) {
      // Re-insert to mark as most recently used.
      this.entries.delete(text)
      this.entries.set(text, cached)
      return cached
    }

    const session = FeatureModelSession.open(text, this.options)
    this.entries.set(text, session)

    while (this.entries.size > this.capacity) {
      const oldest = this.entries.keys().next()
      if (oldest.done) break
      this.entries.delete(oldest.value)
    }

    return session
  }

  has(text: string): boolean {
    return this.entries.has(text)
  }

  clear(): void {
    this.entries.clear()
  }
}
