import { describe, it, expect } from 'vitest'
import { ConsoleLogger, SilentLogger, type LogWriter } from './logger'

function recorder(): LogWriter & { out: string[]; err: string[] } {
  const out: string[] = []
  const err: string[] = []
  return {
    out,
    err,
    stdout: (line) => out.push(line),
    stderr: (line) => err.push(line),
  }
}

describe('ConsoleLogger', () => {
  it('writes a timestamped line with the prefix and level', () => {
    const writer = recorder()
    new ConsoleLogger('info', 'test', writer).info('Parsed model', { features: 2 })

    expect(writer.out).toHaveLength(1)
    expect(writer.out[0]).toMatch(/^\d{2}:\d{2}:\d{2}\.\d{3} /)
    expect(writer.out[0].slice(13)).toBe('[test] [INFO ] Parsed model  {"features":2}')
  })

  it('omits the context when none is given', () => {
    const writer = recorder()
    new ConsoleLogger('debug', 'test', writer).debug('Encoding')

    expect(writer.out[0].slice(13)).toBe('[test] [DEBUG] Encoding')
  })

  it('filters messages below its level', () => {
    const writer = recorder()
    const logger = new ConsoleLogger('warn', 'test', writer)
    logger.debug('hidden')
    logger.info('hidden')
    logger.warn('shown')

    expect(writer.out.map((line) => line.slice(13))).toEqual(['[test] [WARN ] shown'])
  })

  it('sends errors to stderr', () => {
    const writer = recorder()
    new ConsoleLogger('info', 'test', writer).error('Broken')

    expect(writer.out).toEqual([])
    expect(writer.err.map((line) => line.slice(13))).toEqual(['[test] [ERROR] Broken'])
  })

  it('writes bigints as strings', () => {
    const writer = recorder()
    new ConsoleLogger('info', 'test', writer).info('Counted', { count: 2n ** 64n })

    expect(writer.out[0].slice(13)).toBe('[test] [INFO ] Counted  {"count":"18446744073709551616"}')
  })

  it('writes nothing when silent', () => {
    const writer = recorder()
    new ConsoleLogger('silent', 'test', writer).error('Broken')

    expect(writer.err).toEqual([])
  })
})

describe('SilentLogger', () => {
  it('accepts every level', () => {
    const logger = new SilentLogger()

    expect(() => {
      logger.debug()
      logger.info()
      logger.warn()
      logger.error()
    }).not.toThrow()
  })
})
