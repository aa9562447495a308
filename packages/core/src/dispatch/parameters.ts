/**
 * Parsers for the `config` text of dispatched operations.
 * @packageDocumentation
 */

import { z } from 'zod'

import { toInputIssues } from '../config'
import { InvalidInputError, type SelectionCriteria } from '../types'

/**
 * Samples drawn by `sampling` when no count is given.
 * @public
 */
export const DEFAULT_SAMPLE_COUNT = 10

// `Name,True` (csv configuration line) or `Name=false`
const ASSIGNMENT = /^([^,=]+?)\s*[,=]\s*(true|false)$/i

const nameListSchema = z.array(z.string().min(1))
const criteriaObjectSchema = z.record(z.boolean())
const sampleCountSchema = z.coerce.number().int().positive()

/**
 * A single feature name.
 *
 * Surrounding whitespace and double quotes are removed.
 *
 * @throws InvalidInputError if the text is missing or blank
 * @public
 */
export function parseFeatureParameter(config: string | undefined): string {
  const name = unquote(config?.trim() ?? '')
  if (name === '') {
    throw new InvalidInputError('Operation requires a feature name', [
      { path: 'config', message: 'Expected a feature name' },
    ])
  }
  return name
}

/**
 * A list of selected features: a JSON array of names, or names separated by
 * commas or newlines. Lines of the form `Name,true|false` keep the name when
 * the value is true.
 *
 * @throws InvalidInputError if the text is missing or malformed
 * @public
 */
export function parseSelectionParameter(config: string | undefined): string[] {
  if (config === undefined) {
    throw new InvalidInputError('Operation requires a list of selected features', [
      { path: 'config', message: 'Expected a list of feature names' },
    ])
  }

  const text = config.trim()
  if (text.startsWith('[')) {
    const parsed = nameListSchema.safeParse(parseJson(text))
    if (!parsed.success) {
      throw new InvalidInputError('Selection must be an array of feature names', prefixed(parsed.error))
    }
    return parsed.data.map((name) => name.trim())
  }

  const selected: string[] = []
  for (const item of assignmentItems(text)) {
    if (item.value) selected.push(item.name)
  }
  return selected
}

/**
 * Filter criteria: a JSON object of booleans, or items `Name` (selected),
 * `!Name` (deselected) and `Name=true|false` separated by commas or newlines.
 *
 * @throws InvalidInputError if the text is missing or malformed
 * @public
 */
export function parseCriteriaParameter(config: string | undefined): SelectionCriteria {
  if (config === undefined) {
    throw new InvalidInputError('Operation requires filter criteria', [
      { path: 'config', message: 'Expected selected and deselected features' },
    ])
  }

  const text = config.trim()
  let items: { name: string; value: boolean }[]
  if (text.startsWith('{')) {
    const parsed = criteriaObjectSchema.safeParse(parseJson(text))
    if (!parsed.success) {
      throw new InvalidInputError('Criteria must map feature names to booleans', prefixed(parsed.error))
    }
    items = Object.entries(parsed.data).map(([name, value]) => ({ name: name.trim(), value }))
  } else {
    items = assignmentItems(text)
  }

  return {
    selected: items.filter((item) => item.value).map((item) => item.name),
    deselected: items.filter((item) => !item.value).map((item) => item.name),
  }
}

/**
 * Number of samples; {@link DEFAULT_SAMPLE_COUNT} when missing or blank.
 *
 * @throws InvalidInputError unless the text is a positive integer
 * @public
 */
export function parseSampleCountParameter(config: string | undefined): number {
  const text = config?.trim() ?? ''
  if (text === '') return DEFAULT_SAMPLE_COUNT

  const parsed = sampleCountSchema.safeParse(text)
  if (!parsed.success) {
    throw new InvalidInputError(`Sample count must be a positive integer, got "${text}"`, prefixed(parsed.error))
  }
  return parsed.data
}

// =============================================================================
// Helpers
// =============================================================================

function assignmentItems(text: string): { name: string; value: boolean }[] {
  const items: { name: string; value: boolean }[] = []

  for (const line of text.split(/\r?\n/)) {
    const assignment = ASSIGNMENT.exec(line.trim())
    if (assignment) {
      items.push({ name: unquote(assignment[1].trim()), value: assignment[2].toLowerCase() === 'true' })
      continue
    }

    for (const raw of line.split(',')) {
      const item = raw.trim()
      if (item === '') continue
      const itemAssignment = ASSIGNMENT.exec(item)
      if (itemAssignment) {
        items.push({ name: unquote(itemAssignment[1].trim()), value: itemAssignment[2].toLowerCase() === 'true' })
      } else if (item.startsWith('!')) {
        items.push({ name: unquote(item.slice(1).trim()), value: false })
      } else {
        items.push({ name: unquote(item), value: true })
      }
    }
  }

  return items.filter((item) => item.name !== '')
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text)
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new InvalidInputError(`Config is not valid JSON: ${reason}`, [{ path: 'config', message: reason }])
  }
}

function prefixed(error: z.ZodError): { path: string; message: string }[] {
  return toInputIssues(error).map((issue) => ({
    path: issue.path === '' ? 'config' : `config.${issue.path}`,
    message: issue.message,
  }))
}

function unquote(text: string): string {
  return text.length >= 2 && text.startsWith('"') && text.endsWith('"') ? text.slice(1, -1) : text
}
