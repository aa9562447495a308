import { describe, it, expect } from 'vitest'
import { Deadline } from './deadline'
import { AnalysisTimeoutError } from '../types'

describe('Deadline', () => {
  it('reuses the unlimited deadline when nothing is set', () => {
    expect(Deadline.from({})).toBe(Deadline.none)
    expect(Deadline.from()).toBe(Deadline.none)
  })

  it('never expires without a timeout or signal', () => {
    const deadline = Deadline.none

    expect(deadline.expired).toBe(false)
    expect(() => deadline.check()).not.toThrow()
    expect(deadline.remaining()).toEqual({ signal: undefined })
  })

  it('throws once the budget is spent', () => {
    const deadline = new Deadline({ timeoutMs: 10 }, Date.now() - 50)

    expect(deadline.expired).toBe(true)
    expect(() => deadline.check()).toThrow('Analysis exceeded its deadline of 10 ms')
  })

  it('carries the budget on the error', () => {
    const deadline = new Deadline({ timeoutMs: 10 }, Date.now() - 50)

    try {
      deadline.check()
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(AnalysisTimeoutError)
      expect(error).toMatchObject({ code: 'TIMEOUT', timeoutMs: 10 })
    }
  })

  it('passes while time is left', () => {
    const deadline = new Deadline({ timeoutMs: 60_000 })

    expect(deadline.expired).toBe(false)
    expect(() => deadline.check()).not.toThrow()
  })

  it('hands what is left to nested operations', () => {
    const deadline = new Deadline({ timeoutMs: 60_000 })
    const remaining = deadline.remaining()

    expect(remaining.timeoutMs).toBeGreaterThan(0)
    expect(remaining.timeoutMs).toBeLessThanOrEqual(60_000)
  })

  it('throws when its signal aborts', () => {
    const controller = new AbortController()
    const deadline = Deadline.from({ signal: controller.signal })

    expect(() => deadline.check()).not.toThrow()
    controller.abort()
    expect(deadline.expired).toBe(true)
    expect(() => deadline.check()).toThrow('Analysis was aborted')
  })
})
