/**
 * Engine configuration: defaults, merging and environment overrides.
 * @packageDocumentation
 */

import { z } from 'zod'

import { DEFAULT_MAX_CLAUSES } from '../encode'
import { ConsoleLogger, LOG_LEVELS, silentLogger, type Logger } from '../logging'
import { DEFAULT_SAMPLE_SEED } from '../solver'
import { InvalidInputError, type InputIssue } from '../types'

/**
 * Settings shared by sessions and the dispatcher.
 * @public
 */
export interface EngineOptions {
  /**
   * Budget for each solving operation, in milliseconds. Unlimited when undefined.
   */
  readonly timeoutMs?: number

  /** Aborts every running search when fired */
  readonly signal?: AbortSignal

  /**
   * Maximum clauses in an encoded formula.
   * @defaultValue 250000
   */
  readonly maxClauses: number

  /**
   * Parsed models kept by the session cache.
   * @defaultValue 32
   */
  readonly cacheSize: number

  /**
   * Decimal places of float results returned by the dispatcher.
   * @defaultValue 2
   */
  readonly precision: number

  /** Seed for sampling when the caller gives none */
  readonly sampleSeed: number

  readonly logger: Logger
}

/**
 * Defaults for every engine setting.
 * @public
 */
export const DEFAULT_ENGINE_OPTIONS: EngineOptions = {
  maxClauses: DEFAULT_MAX_CLAUSES,
  cacheSize: 32,
  precision: 2,
  sampleSeed: DEFAULT_SAMPLE_SEED,
  logger: silentLogger,
}

/**
 * Fill unset settings from the defaults.
 *
 * @public
 */
export function resolveEngineOptions(options: Partial<EngineOptions> = {}): EngineOptions {
  const resolved: EngineOptions = { ...DEFAULT_ENGINE_OPTIONS }
  for (const [key, value] of Object.entries(options)) {
    if (value !== undefined) Object.assign(resolved, { [key]: value })
  }
  return resolved
}

/**
 * Environment variables read by {@link engineOptionsFromEnv}.
 * @public
 */
export const engineEnvSchema = z.object({
  UVL_ANALYSIS_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  UVL_ANALYSIS_MAX_CLAUSES: z.coerce.number().int().positive().optional(),
  UVL_ANALYSIS_CACHE_SIZE: z.coerce.number().int().min(1).optional(),
  UVL_ANALYSIS_PRECISION: z.coerce.number().int().min(0).max(15).optional(),
  UVL_ANALYSIS_SAMPLE_SEED: z.coerce.number().int().optional(),
  UVL_ANALYSIS_LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
})

/**
 * Read engine settings from environment variables.
 *
 * Unset and empty variables are ignored.
 *
 * @param env - Variables to read, `process.env` by default
 * @returns Settings found; merge with {@link resolveEngineOptions}
 * @throws InvalidInputError if a variable has an invalid value
 *
 * @public
 */
export function engineOptionsFromEnv(env: Record<string, string | undefined> = process.env): Partial<EngineOptions> {
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''))
  const parsed = engineEnvSchema.safeParse(present)
  if (!parsed.success) {
    throw new InvalidInputError('Invalid engine environment', toInputIssues(parsed.error))
  }

  const vars = parsed.data
  const options: { -readonly [K in keyof EngineOptions]?: EngineOptions[K] } = {}
  if (vars.UVL_ANALYSIS_TIMEOUT_MS !== undefined) options.timeoutMs = vars.UVL_ANALYSIS_TIMEOUT_MS
  if (vars.UVL_ANALYSIS_MAX_CLAUSES !== undefined) options.maxClauses = vars.UVL_ANALYSIS_MAX_CLAUSES
  if (vars.UVL_ANALYSIS_CACHE_SIZE !== undefined) options.cacheSize = vars.UVL_ANALYSIS_CACHE_SIZE
  if (vars.UVL_ANALYSIS_PRECISION !== undefined) options.precision = vars.UVL_ANALYSIS_PRECISION
  if (vars.UVL_ANALYSIS_SAMPLE_SEED !== undefined) options.sampleSeed = vars.UVL_ANALYSIS_SAMPLE_SEED
  if (vars.UVL_ANALYSIS_LOG_LEVEL !== undefined) options.logger = new ConsoleLogger(vars.UVL_ANALYSIS_LOG_LEVEL)
  return options
}

/**
 * Flatten zod issues into `{ path, message }` pairs.
 *
 * @public
 */
export function toInputIssues(error: z.ZodError): InputIssue[] {
  return error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }))
}
