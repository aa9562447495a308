/**
 * Model parsing utilities.
 * @packageDocumentation
 */

export { parseModel } from './parser'
export { splitLines, TAB_WIDTH, type SourceLine } from './lines'
export {
  tokenizeExpression,
  parseExpression,
  expressionVariables,
  expressionToString,
  type ExpressionLocation,
} from './expression-parser'
