/**
 * UVL parser - converts model text to a feature tree and constraint set.
 * @packageDocumentation
 */

import type {
  AttributeValue,
  CardinalityRange,
  Constraint,
  Feature,
  FeatureModel,
  FeatureType,
  Group,
} from '../types'
import { MalformedModelError } from '../types'
import { splitLines, type SourceLine } from './lines'
import { expressionVariables, parseExpression } from './expression-parser'

/**
 * Mutable view of a feature while its subtree is being read.
 */
interface FeatureDraft extends Feature {
  readonly groups: Group[]
}

/**
 * Position within a run of lines.
 */
interface Cursor {
  readonly lines: readonly SourceLine[]
  position: number
}

/**
 * Group keyword as written, before children are attached.
 */
type GroupHeader =
  | { readonly kind: KeywordGroupKind }
  | { readonly kind: 'cardinality'; readonly min: number; readonly max: number }

/**
 * Everything on a feature line except its position in the tree.
 */
interface FeatureHeader {
  readonly name: string
  readonly featureType: FeatureType
  readonly abstract: boolean
  readonly attributes: Readonly<Record<string, AttributeValue>>
  readonly cardinality?: CardinalityRange
}

type KeywordGroupKind = 'mandatory' | 'optional' | 'or' | 'alternative'

const FEATURE_TYPES: readonly FeatureType[] = ['Boolean', 'Integer', 'Real', 'String']
const GROUP_KEYWORDS: readonly KeywordGroupKind[] = ['mandatory', 'optional', 'or', 'alternative']
// Keywords opening a top-level section
const SECTION_KEYWORDS = new Set(['namespace', 'imports', 'include', 'features', 'constraints'])

const IDENTIFIER = /^[\p{L}_][\p{L}\p{N}_.]*/u
const RANGE = /^\[\s*(\d+)\s*(?:\.\.\s*(\d+|\*)\s*)?\]$/

/**
 * Parse UVL model text.
 *
 * @param source - Model text
 * @returns The parsed, immutable model
 * @throws MalformedModelError when the text is not a well-formed boolean UVL model
 *
 * @public
 */
export function parseModel(source: string): FeatureModel {
  const lines = splitLines(source)
  if (lines.length === 0) {
    throw new MalformedModelError('EMPTY_MODEL', 'Model is empty', 1)
  }

  const cursor: Cursor = { lines, position: 0 }
  const features = new Map<string, Feature>()
  const topIndent = lines[0].indent

  let namespace: string | undefined
  const imports: string[] = []
  const includes: string[] = []
  let root: Feature | undefined
  const constraintLines: SourceLine[] = []

  while (cursor.position < lines.length) {
    const line = lines[cursor.position]
    if (line.indent !== topIndent) {
      throw new MalformedModelError(
        'INCONSISTENT_INDENTATION',
        `Expected a section keyword at column ${topIndent + 1}`,
        line.line,
        line.offset + 1,
      )
    }

    const [keyword, ...rest] = line.text.split(/\s+/)
    if (keyword !== 'namespace' && SECTION_KEYWORDS.has(keyword) && rest.length > 0) {
      throw new MalformedModelError(
        'UNEXPECTED_TOKEN',
        `Unexpected "${rest[0]}" after "${keyword}"`,
        line.line,
        line.offset + 1 + line.text.indexOf(rest[0], keyword.length),
      )
    }
    cursor.position++
    const block = takeBlock(cursor, topIndent)

    switch (keyword) {
      case 'namespace':
        if (rest.length !== 1 || block.length > 0) {
          throw new MalformedModelError('UNEXPECTED_TOKEN', 'Expected "namespace <Name>"', line.line, line.offset + 1)
        }
        namespace = unquote(rest[0])
        break
      case 'imports':
        imports.push(...block.map((entry) => entry.text))
        break
      case 'include':
        includes.push(...block.map((entry) => entry.text))
        break
      case 'features':
        if (root) {
          throw new MalformedModelError('UNEXPECTED_TOKEN', 'Duplicate "features" section', line.line, line.offset + 1)
        }
        root = parseFeatureSection(block, line, features)
        break
      case 'constraints':
        constraintLines.push(...block)
        break
      default:
        throw new MalformedModelError(
          'UNEXPECTED_TOKEN',
          `Unexpected "${keyword}", expected namespace, imports, include, features or constraints`,
          line.line,
          line.offset + 1,
        )
    }
  }

  if (!root) {
    throw new MalformedModelError('MISSING_FEATURES_SECTION', 'Model has no "features" section', lines[0].line)
  }

  const constraints = constraintLines.map((line) => parseConstraint(line, features))

  return {
    source,
    namespace,
    imports,
    includes,
    root,
    features,
    constraints,
  }
}

/**
 * Take the lines after the cursor that are indented deeper than `indent`.
 */
function takeBlock(cursor: Cursor, indent: number): SourceLine[] {
  const start = cursor.position
  while (cursor.position < cursor.lines.length && cursor.lines[cursor.position].indent > indent) {
    cursor.position++
  }
  return cursor.lines.slice(start, cursor.position)
}

/**
 * Read the single root feature and its subtree.
 */
function parseFeatureSection(block: readonly SourceLine[], header: SourceLine, features: Map<string, Feature>): Feature {
  if (block.length === 0) {
    throw new MalformedModelError('MISSING_ROOT', 'The "features" section declares no root feature', header.line)
  }

  const rootIndent = block[0].indent
  const tops = block.filter((line) => line.indent <= rootIndent)

  for (const line of tops) {
    if (line.indent < rootIndent) {
      throw new MalformedModelError(
        'INCONSISTENT_INDENTATION',
        'Line is indented less than the root feature',
        line.line,
        line.offset + 1,
      )
    }
  }

  if (tops.length > 1) {
    const second = tops[1]
    throw new MalformedModelError(
      'MULTIPLE_ROOTS',
      `Second root feature "${second.text}"; a model has exactly one root`,
      second.line,
      second.offset + 1,
    )
  }

  return parseFeature({ lines: block, position: 0 }, undefined, features)
}

/**
 * Read the feature at the cursor and everything nested under it.
 */
function parseFeature(cursor: Cursor, parent: Feature | undefined, features: Map<string, Feature>): Feature {
  const line = cursor.lines[cursor.position]
  cursor.position++

  const header = parseFeatureHeader(line)
  const existing = features.get(header.name)
  if (existing) {
    throw new MalformedModelError(
      'DUPLICATE_FEATURE',
      `Feature "${header.name}" is already declared on line ${existing.line}`,
      line.line,
      line.offset + 1,
    )
  }

  const draft: FeatureDraft = { ...header, parent, groups: [], line: line.line }
  features.set(draft.name, draft)

  const body = takeBlock(cursor, line.indent)
  if (body.length > 0) {
    readGroups(body, draft, features)
  }

  return draft
}

/**
 * Read the group keywords under a feature and their children.
 */
function readGroups(body: readonly SourceLine[], owner: FeatureDraft, features: Map<string, Feature>): void {
  const cursor: Cursor = { lines: body, position: 0 }
  const groupIndent = body[0].indent

  while (cursor.position < body.length) {
    const line = body[cursor.position]
    if (line.indent !== groupIndent) {
      throw new MalformedModelError(
        'INCONSISTENT_INDENTATION',
        `Expected a group keyword at column ${groupIndent + 1} under "${owner.name}"`,
        line.line,
        line.offset + 1,
      )
    }

    const header = parseGroupHeader(line, owner)
    cursor.position++

    const childLines = takeBlock(cursor, groupIndent)
    if (childLines.length === 0) {
      throw new MalformedModelError('INVALID_GROUP', `Group "${line.text}" has no features`, line.line, line.offset + 1)
    }

    const childCursor: Cursor = { lines: childLines, position: 0 }
    const childIndent = childLines[0].indent
    const children: Feature[] = []

    while (childCursor.position < childLines.length) {
      const childLine = childLines[childCursor.position]
      if (childLine.indent !== childIndent) {
        throw new MalformedModelError(
          'INCONSISTENT_INDENTATION',
          `Expected a feature at column ${childIndent + 1} in group "${line.text}"`,
          childLine.line,
          childLine.offset + 1,
        )
      }
      children.push(parseFeature(childCursor, owner, features))
    }

    owner.groups.push(
      header.kind === 'cardinality'
        ? { kind: 'cardinality', min: header.min, max: header.max, children }
        : { kind: header.kind, children },
    )
  }
}

/**
 * Parse a group keyword line (`mandatory`, `or`, `[1..2]`, ...).
 */
function parseGroupHeader(line: SourceLine, owner: Feature): GroupHeader {
  const text = line.text

  const keyword = GROUP_KEYWORDS.find((kind) => kind === text)
  if (keyword) {
    return { kind: keyword }
  }

  const range = RANGE.exec(text.replace(/^cardinality\s+/, ''))
  if (range) {
    const min = Number(range[1])
    const max = range[2] === undefined ? min : range[2] === '*' ? Infinity : Number(range[2])
    if (min > max) {
      throw new MalformedModelError(
        'INVALID_GROUP',
        `Group cardinality ${text} has a lower bound above its upper bound`,
        line.line,
        line.offset + 1,
      )
    }
    return { kind: 'cardinality', min, max }
  }

  throw new MalformedModelError(
    'INVALID_GROUP',
    `"${text}" under "${owner.name}" must be placed in a mandatory, optional, or, alternative or [n..m] group`,
    line.line,
    line.offset + 1,
  )
}

/**
 * Parse a feature line: `[Type] name [cardinality [n..m]] [{attributes}]`.
 */
function parseFeatureHeader(line: SourceLine): FeatureHeader {
  let rest = line.text
  let column = line.offset + 1

  const advance = (count: number): void => {
    const consumed = rest.slice(0, count)
    const remaining = rest.slice(count)
    const trimmed = remaining.trimStart()
    column += consumed.length + (remaining.length - trimmed.length)
    rest = trimmed
  }

  const fail = (message: string): never => {
    throw new MalformedModelError('UNEXPECTED_TOKEN', message, line.line, column)
  }

  let featureType: FeatureType = 'Boolean'
  const typeMatch = /^(\w+)\s+(?=["\p{L}_])/u.exec(rest)
  const declaredType = typeMatch ? FEATURE_TYPES.find((type) => type === typeMatch[1]) : undefined
  if (typeMatch && declaredType) {
    featureType = declaredType
    advance(typeMatch[1].length)
  }

  let name: string
  if (rest.startsWith('"')) {
    const end = rest.indexOf('"', 1)
    if (end === -1) {
      return fail('Unterminated quoted feature name')
    }
    name = rest.slice(1, end)
    if (name.length === 0) {
      return fail('Empty feature name')
    }
    advance(end + 1)
  } else {
    const match = IDENTIFIER.exec(rest)
    if (!match) {
      return fail(`Expected a feature name, found "${rest}"`)
    }
    name = match[0]
    advance(name.length)
  }

  let cardinality: CardinalityRange | undefined
  const cardinalityMatch = /^cardinality\s*(\[[^\]]*\])/.exec(rest)
  if (cardinalityMatch) {
    const range = RANGE.exec(cardinalityMatch[1])
    if (!range) {
      return fail(`Invalid feature cardinality ${cardinalityMatch[1]}`)
    }
    const min = Number(range[1])
    const max = range[2] === undefined ? min : range[2] === '*' ? Infinity : Number(range[2])
    cardinality = { min, max }
    advance(cardinalityMatch[0].length)
  }

  let attributes: Record<string, AttributeValue> = {}
  if (rest.startsWith('{')) {
    if (!rest.endsWith('}')) {
      return fail('Expected attributes to end with "}"')
    }
    attributes = parseAttributes(rest.slice(1, -1))
    rest = ''
  }

  if (rest.length > 0) {
    return fail(`Unexpected "${rest}" after feature "${name}"`)
  }

  return {
    name,
    featureType,
    abstract: attributes.abstract === true,
    attributes,
    cardinality,
  }
}

/**
 * Parse the body of `{ ... }`: comma separated `key [value]` entries.
 *
 * Nested attribute blocks are kept as their raw text.
 */
function parseAttributes(body: string): Record<string, AttributeValue> {
  const attributes: Record<string, AttributeValue> = {}

  for (const entry of splitTopLevel(body)) {
    const match = /^("[^"]*"|[^\s]+)\s*(.*)$/s.exec(entry)
    if (!match) continue

    const key = unquote(match[1])
    attributes[key] = parseAttributeValue(match[2].trim())
  }

  return attributes
}

function parseAttributeValue(raw: string): AttributeValue {
  if (raw.length === 0 || raw === 'true') return true
  if (raw === 'false') return false
  if (/^-?\d+(\.\d+)?$/.test(raw)) return Number(raw)
  return unquote(raw)
}

/**
 * Split on commas that are not nested in braces, brackets or quotes.
 */
function splitTopLevel(body: string): string[] {
  const parts: string[] = []
  let depth = 0
  let quote: string | undefined
  let current = ''

  for (const char of body) {
    if (quote) {
      if (char === quote) quote = undefined
    } else if (char === '"' || char === "'") {
      quote = char
    } else if (char === '{' || char === '[') {
      depth++
    } else if (char === '}' || char === ']') {
      depth--
    } else if (char === ',' && depth === 0) {
      if (current.trim().length > 0) parts.push(current.trim())
      current = ''
      continue
    }
    current += char
  }

  if (current.trim().length > 0) parts.push(current.trim())
  return parts
}

function unquote(text: string): string {
  if (text.length >= 2 && (text[0] === '"' || text[0] === "'") && text[text.length - 1] === text[0]) {
    return text.slice(1, -1)
  }
  return text
}

/**
 * Parse one constraint line and check that every name it uses is declared.
 */
function parseConstraint(line: SourceLine, features: ReadonlyMap<string, Feature>): Constraint {
  const location = { line: line.line, offset: line.offset }
  const expression = parseExpression(line.text, location)

  for (const name of expressionVariables(expression)) {
    if (!features.has(name)) {
      const position = Math.max(line.text.indexOf(name), 0)
      throw new MalformedModelError(
        'UNDEFINED_FEATURE',
        `Constraint references undefined feature "${name}"`,
        line.line,
        line.offset + position + 1,
      )
    }
  }

  return { source: line.text, expression, line: line.line }
}
