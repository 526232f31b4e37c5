/**
 * Fetch task construction and execution.
 *
 * Exactly two task shapes exist, so execution dispatches on `kind` with a
 * switch instead of an open class hierarchy. Neither variant throws for an
 * expected failure: both report it as `{ ok: false, error }`.
 */

import type { ZodType } from 'zod'
import { TaskConfigError } from '../../core/errors.js'
import { maskSecrets } from '../../cli/utils/masking.js'
import { errorMessage } from '../../utils/helpers.js'
import type {
  FetchFn,
  FetchTask,
  FetchTaskDeps,
  NetworkFetchTask,
  StaticFetchTask,
  TaskOutcome,
} from './types.js'

/** Default per-request timeout for network tasks */
export const DEFAULT_TASK_TIMEOUT_MS = 10_000

// ---------------------------------------------------------------------------
// Factories
// ---------------------------------------------------------------------------

export interface NetworkTaskOptions {
  timeoutMs?: number
  headers?: Record<string, string>
  schema?: ZodType<unknown>
}

/**
 * Create a network task.
 *
 * @throws {TaskConfigError} when the address is not http(s) or the timeout is not positive
 */
export function createNetworkTask(url: string, options: NetworkTaskOptions = {}): NetworkFetchTask {
  if (!/^https?:\/\//.test(url)) {
    throw new TaskConfigError('Invalid URL provided. Must start with http:// or https://', {
      url: maskSecrets(url),
    })
  }
  const timeoutMs = options.timeoutMs ?? DEFAULT_TASK_TIMEOUT_MS
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    throw new TaskConfigError(`Task timeout must be a positive number, got ${String(timeoutMs)}`, {
      url: maskSecrets(url),
    })
  }
  return {
    kind: 'network',
    url,
    timeoutMs,
    headers: options.headers,
    schema: options.schema,
  }
}

/** Create a task that always yields `value` (subject to `schema`, if given). */
export function createStaticTask(value: unknown, options: { schema?: ZodType<unknown> } = {}): StaticFetchTask {
  return { kind: 'static', value, schema: options.schema }
}

// ---------------------------------------------------------------------------
// Execution
// ---------------------------------------------------------------------------

/**
 * Execute a single task.
 */
export async function runFetchTask(task: FetchTask, deps: FetchTaskDeps = {}): Promise<TaskOutcome> {
  switch (task.kind) {
    case 'network':
      return runNetworkTask(task, deps)
    case 'static':
      return validatePayload(task.schema, task.value, 'static value')
  }
}

async function runNetworkTask(task: NetworkFetchTask, deps: FetchTaskDeps): Promise<TaskOutcome> {
  const fetchFn: FetchFn = deps.fetchFn ?? fetch
  const displayUrl = maskSecrets(task.url)

  const controller = new AbortController()
  let timedOut = false
  const timer = setTimeout(() => {
    timedOut = true
    controller.abort()
  }, task.timeoutMs)
  const onAbort = (): void => {
    controller.abort()
  }
  // An already-aborted signal never fires 'abort'
  if (deps.signal?.aborted === true) controller.abort()
  deps.signal?.addEventListener('abort', onAbort, { once: true })

  try {
    const response = await fetchFn(task.url, {
      signal: controller.signal,
      headers: task.headers !== undefined ? { ...task.headers } : undefined,
    })
    if (!response.ok) {
      return { ok: false, error: `HTTP error ${String(response.status)} when fetching ${displayUrl}` }
    }
    const body = await response.text()
    return validatePayload(task.schema, parseBody(body), displayUrl)
  } catch (error) {
    if (timedOut) {
      return {
        ok: false,
        error: `Timeout error when fetching ${displayUrl} after ${String(task.timeoutMs)}ms.`,
      }
    }
    return {
      ok: false,
      error: `Request error when fetching ${displayUrl}: ${maskSecrets(errorMessage(error))}`,
    }
  } finally {
    clearTimeout(timer)
    deps.signal?.removeEventListener('abort', onAbort)
  }
}

/** JSON bodies are parsed; anything else is kept as text. */
function parseBody(body: string): unknown {
  try {
    const parsed: unknown = JSON.parse(body)
    return parsed
  } catch {
    return body
  }
}

function validatePayload(
  schema: ZodType<unknown> | undefined,
  payload: unknown,
  source: string
): TaskOutcome {
  if (schema === undefined) return { ok: true, payload }
  const result = schema.safeParse(payload)
  if (result.success) return { ok: true, payload: result.data }
  const issues = result.error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ')
  return { ok: false, error: `Payload from ${source} failed validation: ${issues}` }
}
