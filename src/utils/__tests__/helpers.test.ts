/**
 * Unit tests for src/utils/helpers.ts
 */

import { describe, it, expect, afterEach, vi } from 'vitest'
import {
  sleep,
  isAbortError,
  errorMessage,
  formatDuration,
  isPlainObject,
  mapWithConcurrency,
} from '../helpers.js'

afterEach(() => {
  vi.useRealTimers()
})

describe('sleep', () => {
  it('resolves after the delay', async () => {
    vi.useFakeTimers()
    let done = false
    const pending = sleep(100).then(() => {
      done = true
    })
    await vi.advanceTimersByTimeAsync(99)
    expect(done).toBe(false)
    await vi.advanceTimersByTimeAsync(1)
    await pending
    expect(done).toBe(true)
  })

  it('rejects with an AbortError when the signal aborts', async () => {
    const controller = new AbortController()
    const pending = sleep(60_000, controller.signal)
    controller.abort()
    const error: unknown = await pending.catch((err: unknown) => err)
    expect(isAbortError(error)).toBe(true)
  })

  it('rejects immediately for an already-aborted signal', async () => {
    await expect(sleep(10, AbortSignal.abort())).rejects.toThrow()
  })
})

describe('errorMessage', () => {
  it('reads Error messages and stringifies anything else', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom')
    expect(errorMessage(42)).toBe('42')
  })
})

describe('isPlainObject', () => {
  it('accepts object literals only', () => {
    expect(isPlainObject({ a: 1 })).toBe(true)
    expect(isPlainObject(Object.create(null))).toBe(true)
    expect(isPlainObject([])).toBe(false)
    expect(isPlainObject(new Date())).toBe(false)
    expect(isPlainObject(null)).toBe(false)
  })
})

describe('mapWithConcurrency', () => {
  it('keeps input order whatever order calls settle in', async () => {
    const delays = [30, 10, 20]
    const results = await mapWithConcurrency(delays, 2, async (ms, index) => {
      await sleep(ms)
      return index
    })
    expect(results).toEqual([0, 1, 2])
  })

  it('never exceeds the concurrency limit', async () => {
    let inFlight = 0
    let peak = 0
    await mapWithConcurrency([1, 2, 3, 4, 5], 2, async () => {
      inFlight += 1
      peak = Math.max(peak, inFlight)
      await sleep(5)
      inFlight -= 1
    })
    expect(peak).toBe(2)
  })

  it('runs everything at once for a limit of 0', async () => {
    let inFlight = 0
    let peak = 0
    await mapWithConcurrency([1, 2, 3], 0, async () => {
      inFlight += 1
      peak = Math.max(peak, inFlight)
      await sleep(5)
      inFlight -= 1
    })
    expect(peak).toBe(3)
  })
})

describe('formatDuration', () => {
  it('picks a unit by magnitude', () => {
    expect(formatDuration(250)).toBe('250ms')
    expect(formatDuration(1500)).toBe('1.5s')
    expect(formatDuration(125_000)).toBe('2m 5s')
  })
})
