/**
 * Shared types for the fetch-task module.
 */

import type { ZodType } from 'zod'

// ---------------------------------------------------------------------------
// Transport
// ---------------------------------------------------------------------------

/** Request options a network task passes to its fetch function */
export interface FetchInit {
  signal?: AbortSignal
  headers?: Record<string, string>
}

/**
 * Minimal fetch signature. The global `fetch` satisfies it; tests pass a
 * `vi.fn()` returning `Response` objects.
 */
export type FetchFn = (url: string, init?: FetchInit) => Promise<Response>

// ---------------------------------------------------------------------------
// Task variants
// ---------------------------------------------------------------------------

/** Retrieves a payload from an http(s) address */
export interface NetworkFetchTask {
  readonly kind: 'network'
  readonly url: string
  readonly timeoutMs: number
  readonly headers?: Readonly<Record<string, string>>
  /** Payload is rejected (task fails) when it does not satisfy this schema */
  readonly schema?: ZodType<unknown>
}

/** Returns a fixed, pre-supplied value */
export interface StaticFetchTask {
  readonly kind: 'static'
  readonly value: unknown
  readonly schema?: ZodType<unknown>
}

export type FetchTask = NetworkFetchTask | StaticFetchTask

/** A task registered under a name that is unique within its section */
export interface NamedTask {
  readonly name: string
  readonly task: FetchTask
}

// ---------------------------------------------------------------------------
// Outcome
// ---------------------------------------------------------------------------

export type TaskOutcome =
  | { readonly ok: true; readonly payload: unknown }
  | { readonly ok: false; readonly error: string }

/** Collaborators injected into task execution */
export interface FetchTaskDeps {
  fetchFn?: FetchFn
  /** Aborts in-flight network tasks */
  signal?: AbortSignal
}
