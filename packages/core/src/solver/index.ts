/**
 * Satisfiability, enumeration and counting.
 * @packageDocumentation
 */

export { ConfigurationEngine, ConfigurationSequence, type ValidityOptions, type SampleOptions } from './engine'
export { DpllSolver, preferUnselected, satisfiesAll, type PolarityPolicy, type SolverStats } from './dpll'
export { countModels, DEFAULT_COUNT_CACHE_SIZE, type CountOptions } from './counter'
export { Deadline } from './deadline'
export { FeatureConfiguration } from './configuration'
export { SeededRandom, DEFAULT_SAMPLE_SEED } from './random'
