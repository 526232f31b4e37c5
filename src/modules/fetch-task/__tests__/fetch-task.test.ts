/**
 * Unit tests for fetch-task.ts
 *
 * Tests:
 *  - Factory validation (address scheme, timeout)
 *  - Network success, text fallback, HTTP errors, request errors, timeouts
 *  - Secret masking in error messages
 *  - Optional payload schemas for both task kinds
 */

import { describe, it, expect, vi } from 'vitest'
import { z } from 'zod'
import {
  DEFAULT_TASK_TIMEOUT_MS,
  createNetworkTask,
  createStaticTask,
  runFetchTask,
} from '../fetch-task.js'
import type { FetchFn } from '../types.js'
import { TaskConfigError } from '../../../core/errors.js'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function respondWith(body: string, status = 200): FetchFn {
  return async () => new Response(body, { status })
}

/** A fetch that never settles until its signal aborts */
const hangingFetch: FetchFn = (_url, init) =>
  new Promise<Response>((_resolve, reject) => {
    init?.signal?.addEventListener('abort', () => {
      reject(new Error('The operation was aborted'))
    })
  })

// ---------------------------------------------------------------------------
// Factories
// ---------------------------------------------------------------------------

describe('createNetworkTask', () => {
  it('rejects addresses that are not http or https', () => {
    expect(() => createNetworkTask('ftp://files.example.test/data')).toThrow(TaskConfigError)
    expect(() => createNetworkTask('api.example.test/data')).toThrow(
      'Invalid URL provided. Must start with http:// or https://'
    )
  })

  it('rejects a non-positive timeout', () => {
    expect(() => createNetworkTask('https://api.example.test/a', { timeoutMs: 0 })).toThrow(
      'Task timeout must be a positive number, got 0'
    )
  })

  it('applies the default timeout', () => {
    const task = createNetworkTask('http://api.example.test/a')
    expect(task).toMatchObject({ kind: 'network', url: 'http://api.example.test/a', timeoutMs: DEFAULT_TASK_TIMEOUT_MS })
  })
})

// ---------------------------------------------------------------------------
// Network execution
// ---------------------------------------------------------------------------

describe('runFetchTask (network)', () => {
  it('returns the decoded JSON body on success', async () => {
    const task = createNetworkTask('https://api.example.test/weather')
    const outcome = await runFetchTask(task, { fetchFn: respondWith('{"temp":21}') })
    expect(outcome).toEqual({ ok: true, payload: { temp: 21 } })
  })

  it('keeps a non-JSON body as text', async () => {
    const task = createNetworkTask('https://api.example.test/quote')
    const outcome = await runFetchTask(task, { fetchFn: respondWith('Practice daily.') })
    expect(outcome).toEqual({ ok: true, payload: 'Practice daily.' })
  })

  it('forwards headers and an abort signal to fetch', async () => {
    const fetchFn = vi.fn<FetchFn>(async () => new Response('{}'))
    const task = createNetworkTask('https://api.example.test/a', {
      headers: { Authorization: 'Bearer test-token' },
    })
    await runFetchTask(task, { fetchFn })
    expect(fetchFn).toHaveBeenCalledTimes(1)
    const [url, init] = fetchFn.mock.calls[0] ?? []
    expect(url).toBe('https://api.example.test/a')
    expect(init?.headers).toEqual({ Authorization: 'Bearer test-token' })
    expect(init?.signal).toBeInstanceOf(AbortSignal)
  })

  it('reports a non-OK status with the credential masked', async () => {
    const task = createNetworkTask('https://api.example.test/weather?city=Oslo&apikey=test-key')
    const outcome = await runFetchTask(task, { fetchFn: respondWith('unavailable', 503) })
    expect(outcome).toEqual({
      ok: false,
      error: 'HTTP error 503 when fetching https://api.example.test/weather?city=Oslo&apikey=***',
    })
  })

  it('reports a thrown request error', async () => {
    const task = createNetworkTask('https://api.example.test/a')
    const fetchFn: FetchFn = async () => {
      throw new Error('connect ECONNREFUSED')
    }
    const outcome = await runFetchTask(task, { fetchFn })
    expect(outcome).toEqual({
      ok: false,
      error: 'Request error when fetching https://api.example.test/a: connect ECONNREFUSED',
    })
  })

  it('reports a timeout when the request outlives timeoutMs', async () => {
    const task = createNetworkTask('https://api.example.test/slow', { timeoutMs: 20 })
    const outcome = await runFetchTask(task, { fetchFn: hangingFetch })
    expect(outcome).toEqual({
      ok: false,
      error: 'Timeout error when fetching https://api.example.test/slow after 20ms.',
    })
  })

  it('aborts the request when the caller signal aborts', async () => {
    const controller = new AbortController()
    const task = createNetworkTask('https://api.example.test/slow', { timeoutMs: 60_000 })
    const pending = runFetchTask(task, { fetchFn: hangingFetch, signal: controller.signal })
    controller.abort()
    const outcome = await pending
    expect(outcome).toEqual({
      ok: false,
      error: 'Request error when fetching https://api.example.test/slow: The operation was aborted',
    })
  })

  it('hands fetch an aborted signal when the caller signal is already aborted', async () => {
    const fetchFn = vi.fn<FetchFn>(async (_url, init) => {
      if (init?.signal?.aborted === true) throw new Error('The operation was aborted')
      return new Response('"fresh"')
    })
    const task = createNetworkTask('https://api.example.test/slow', { timeoutMs: 60_000 })
    const outcome = await runFetchTask(task, { fetchFn, signal: AbortSignal.abort() })
    expect(fetchFn.mock.calls[0]?.[1]?.signal?.aborted).toBe(true)
    expect(outcome).toEqual({
      ok: false,
      error: 'Request error when fetching https://api.example.test/slow: The operation was aborted',
    })
  })

  it('fails when the payload does not match the schema', async () => {
    const task = createNetworkTask('https://api.example.test/w', {
      schema: z.object({ temp: z.number() }),
    })
    const outcome = await runFetchTask(task, { fetchFn: respondWith('{"temp":"warm"}') })
    expect(outcome).toEqual({
      ok: false,
      error: 'Payload from https://api.example.test/w failed validation: temp: Expected number, received string',
    })
  })
})

// ---------------------------------------------------------------------------
// Static execution
// ---------------------------------------------------------------------------

describe('runFetchTask (static)', () => {
  it('always yields its value', async () => {
    const outcome = await runFetchTask(createStaticTask({ motto: 'slow is smooth' }))
    expect(outcome).toEqual({ ok: true, payload: { motto: 'slow is smooth' } })
  })

  it('validates its value against a schema', async () => {
    const outcome = await runFetchTask(createStaticTask(5, { schema: z.string() }))
    expect(outcome).toEqual({
      ok: false,
      error: 'Payload from static value failed validation: (root): Expected string, received number',
    })
  })
})
