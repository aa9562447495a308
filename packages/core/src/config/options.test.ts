import { describe, it, expect } from 'vitest'
import { DEFAULT_ENGINE_OPTIONS, engineOptionsFromEnv, resolveEngineOptions } from './options'
import { ConsoleLogger, silentLogger } from '../logging'
import { InvalidInputError } from '../types'

describe('resolveEngineOptions', () => {
  it('uses the defaults', () => {
    const options = resolveEngineOptions()

    expect(options).toEqual(DEFAULT_ENGINE_OPTIONS)
    expect(options.maxClauses).toBe(250_000)
    expect(options.cacheSize).toBe(32)
    expect(options.precision).toBe(2)
    expect(options.logger).toBe(silentLogger)
  })

  it('overrides set values only', () => {
    const options = resolveEngineOptions({ precision: 4, timeoutMs: undefined, cacheSize: 8 })

    expect(options.precision).toBe(4)
    expect(options.cacheSize).toBe(8)
    expect(options.timeoutMs).toBeUndefined()
    expect(options.maxClauses).toBe(250_000)
  })

  it('does not modify the defaults', () => {
    resolveEngineOptions({ precision: 6 })

    expect(DEFAULT_ENGINE_OPTIONS.precision).toBe(2)
  })
})

describe('engineOptionsFromEnv', () => {
  it('reads every variable', () => {
    const options = engineOptionsFromEnv({
      UVL_ANALYSIS_TIMEOUT_MS: '1500',
      UVL_ANALYSIS_MAX_CLAUSES: '1000',
      UVL_ANALYSIS_CACHE_SIZE: '4',
      UVL_ANALYSIS_PRECISION: '3',
      UVL_ANALYSIS_SAMPLE_SEED: '99',
      UVL_ANALYSIS_LOG_LEVEL: 'debug',
    })

    expect(options).toMatchObject({ timeoutMs: 1500, maxClauses: 1000, cacheSize: 4, precision: 3, sampleSeed: 99 })
    expect(options.logger).toBeInstanceOf(ConsoleLogger)
  })

  it('ignores unset, empty and unrelated variables', () => {
    expect(engineOptionsFromEnv({ UVL_ANALYSIS_TIMEOUT_MS: '', HOME: '/home/test' })).toEqual({})
  })

  it('rejects invalid values', () => {
    expect(() => engineOptionsFromEnv({ UVL_ANALYSIS_TIMEOUT_MS: 'soon' })).toThrow(InvalidInputError)
  })

  it('lists each problem', () => {
    try {
      engineOptionsFromEnv({ UVL_ANALYSIS_PRECISION: '-1', UVL_ANALYSIS_LOG_LEVEL: 'loud' })
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidInputError)
      if (error instanceof InvalidInputError) {
        expect(error.issues.map((issue) => issue.path).sort()).toEqual([
          'UVL_ANALYSIS_LOG_LEVEL',
          'UVL_ANALYSIS_PRECISION',
        ])
      }
    }
  })
})
