/**
 * Validated entry point running catalogue operations on model text.
 * @packageDocumentation
 */

import { z } from 'zod'

import { resolveEngineOptions, toInputIssues, type EngineOptions } from '../config'
import { SessionCache, type FeatureModelSession } from '../session'
import { AnalysisError, InvalidInputError, InvariantError } from '../types'
import { OPERATION_NAMES, OPERATIONS, type OperationName } from './operations'
import type { OperationResult } from './results'

/**
 * Input accepted by every operation.
 *
 * `config_file` and `selected_features` are accepted in place of `config`;
 * the first one given of `config`, `config_file` and `selected_features`
 * (as a JSON array) becomes the operation parameter.
 *
 * @public
 */
export const analysisInputSchema = z
  .object({
    content: z.string().describe('UVL feature model text'),
    config: z.string().optional().describe('Operation parameter: a feature name, selection, criteria or sample size'),
    config_file: z.string().optional().describe('Same as config'),
    selected_features: z.array(z.string()).optional().describe('Selected feature names, for satisfiable_configuration'),
  })
  .transform(({ content, config, config_file: configFile, selected_features: selectedFeatures }) => ({
    content,
    config: config ?? configFile ?? (selectedFeatures && JSON.stringify(selectedFeatures)),
  }))

/**
 * Input as callers send it.
 * @public
 */
export type AnalysisInput = z.input<typeof analysisInputSchema>

/**
 * Input once validated, with the parameter resolved to `config`.
 * @public
 */
export type ResolvedAnalysisInput = z.output<typeof analysisInputSchema>

const operationNameSchema = z.enum(OPERATION_NAMES)

/**
 * Runs named operations against model text.
 *
 * Sessions are cached by model text, so repeated calls on one model parse
 * and encode it once. Errors are logged and rethrown unchanged.
 *
 * @example
 * ```ts
 * const dispatcher = new AnalysisDispatcher({ timeoutMs: 5_000 })
 * dispatcher.run('configurations_number', { content: text }) // 4
 * dispatcher.run('commonality', { content: text, config: 'Engine' }) // 0.5
 * ```
 *
 * @public
 */
export class AnalysisDispatcher {
  readonly options: EngineOptions

  private readonly sessions: SessionCache

  constructor(options: Partial<EngineOptions> = {}) {
    this.options = resolveEngineOptions(options)
    this.sessions = new SessionCache(this.options.cacheSize, this.options)
  }

  /**
   * Run one operation.
   *
   * @param operation - Operation name, see {@link OPERATION_NAMES}
   * @param input - `{ content, config? }`
   * @throws InvalidInputError for an unknown operation or malformed input
   * @throws MalformedModelError, UnknownFeatureError, AnalysisTimeoutError or EncodingLimitError from the analysis
   */
  run(operation: string, input: unknown): OperationResult {
    const started = Date.now()
    const { logger } = this.options

    try {
      const name = parseOperationName(operation)
      const { content, config } = parseInput(name, input)
      const definition = OPERATIONS[name]

      if (definition.requiresConfig && config === undefined) {
        throw new InvalidInputError(`Operation "${name}" requires config`, [
          { path: 'config', message: 'Required' },
        ])
      }

      const session = this.sessions.get(content)
      const result = definition.execute(session, config, this.options)
      logger.info(`Ran ${name}`, { ms: Date.now() - started })
      return result
    } catch (error) {
      const context = { operation, ms: Date.now() - started }
      if (error instanceof AnalysisError && !(error instanceof InvariantError)) {
        logger.warn(`Operation failed: ${error.message}`, { ...context, code: error.code })
      } else {
        logger.error(`Operation failed: ${error instanceof Error ? error.message : String(error)}`, context)
      }
      throw error
    }
  }

  /**
   * The cached session for model text, opening it if needed.
   *
   * @throws MalformedModelError when the text is not a well-formed model
   */
  session(content: string): FeatureModelSession {
    return this.sessions.get(content)
  }

  /** Drop every cached session */
  clear(): void {
    this.sessions.clear()
  }
}

function parseOperationName(operation: string): OperationName {
  const parsed = operationNameSchema.safeParse(operation)
  if (!parsed.success) {
    throw new InvalidInputError(`Unknown operation "${operation}"`, [
      { path: 'operation', message: `Expected one of ${OPERATION_NAMES.join(', ')}` },
    ])
  }
  return parsed.data
}

function parseInput(operation: OperationName, input: unknown): ResolvedAnalysisInput {
  const parsed = analysisInputSchema.safeParse(input)
  if (!parsed.success) {
    throw new InvalidInputError(`Invalid input for "${operation}"`, toInputIssues(parsed.error))
  }
  return parsed.data
}
