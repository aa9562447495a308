/**
 * Model encoding utilities.
 * @packageDocumentation
 */

export { encodeModel, orderFeatures, DEFAULT_MAX_CLAUSES, type EncodeOptions } from './encoder'
export { expressionToClauses, normalizeClause, type LoweringOptions } from './cnf'
