/**
 * Hand-written models shared by the test suites.
 * @packageDocumentation
 */

import { encodeModel } from '../encode'
import type { Logger } from '../logging'
import { parseModel } from '../parse'
import { ConfigurationEngine } from '../solver'

/** Root with one optional child: 2 configurations */
export const OPTIONAL_MODEL = `features
    Root
        optional
            A
`

/** Root with an alternative of X and Y: 2 configurations */
export const ALTERNATIVE_MODEL = `features
    Root
        alternative
            X
            Y
`

/** A required and forbidden at once: no configurations */
export const CONTRADICTION_MODEL = `features
    Root
        optional
            A
constraints
    A
    !A
`

/** A implies both B and !B, so A is dead: 2 configurations */
export const DEAD_FEATURE_MODEL = `features
    R
        optional
            A
            B
constraints
    A => B
    A => !B
`

/** A is declared optional but implied by the mandatory B */
export const FALSE_OPTIONAL_MODEL = `features
    Root
        mandatory
            B
        optional
            A
constraints
    B => A
`

/**
 * 14 configurations, 24 without constraints.
 *
 * Variable order: Phone, Calls, GPS, Media, Screen, Basic, Camera, Color, HighRes, MP3
 */
export const PHONE_MODEL = `namespace Devices

features
    Phone {abstract}
        mandatory
            Calls
            Screen
                alternative
                    Basic
                    Color
                    HighRes
        optional
            GPS
            Media
                or
                    Camera
                    MP3

constraints
    Camera => HighRes
    !(GPS & Basic)
`

/** A [1..2] group of three and an implication: 4 configurations, 6 without it */
export const CARDINALITY_MODEL = `features
    Pizza
        [1..2]
            Cheese
            Ham
            Olives
constraints
    Ham => Cheese
`

export function engineFor(source: string): ConfigurationEngine {
  return new ConfigurationEngine(encodeModel(parseModel(source)))
}

/**
 * A logger that keeps every entry for assertions.
 */
export class RecordingLogger implements Logger {
  readonly entries: { level: string; message: string; context?: Record<string, unknown> }[] = []

  debug(message: string, context?: Record<string, unknown>): void {
    this.entries.push({ level: 'debug', message, context })
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.entries.push({ level: 'info', message, context })
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.entries.push({ level: 'warn', message, context })
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.entries.push({ level: 'error', message, context })
  }

  messages(level: string): string[] {
    return this.entries.filter((entry) => entry.level === level).map((entry) => entry.message)
  }
}
