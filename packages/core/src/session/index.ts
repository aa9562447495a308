/**
 * Model sessions.
 * @packageDocumentation
 */

export { FeatureModelSession, openModel } from './session'
export { SessionCache } from './cache'
