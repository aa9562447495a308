/**
 * Engine configuration.
 * @packageDocumentation
 */

export {
  DEFAULT_ENGINE_OPTIONS,
  resolveEngineOptions,
  engineOptionsFromEnv,
  engineEnvSchema,
  toInputIssues,
  type EngineOptions,
} from './options'
