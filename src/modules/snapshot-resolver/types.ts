/**
 * Shared types for the snapshot-resolver module.
 */

import type { FetchFn } from '../fetch-task/types.js'
import type { Snapshot } from '../snapshot/schemas.js'

/**
 * Options for resolve(). Every field is optional.
 */
export interface ResolveOptions {
  /** Prefix of date-derived tags (default: "data-") */
  tagPrefix?: string
  /** Number of calendar days to search, today included (default: 7) */
  daysToTry?: number
  /** Retries per day after a transient failure (default: 2) */
  maxRetries?: number
  /** Fixed delay between attempts for the same day (default: 1000) */
  retryDelayMs?: number
  /** Aborts the in-flight request and any pending retry delay */
  signal?: AbortSignal
  fetchFn?: FetchFn
  /** Instant treated as "today" (default: now) */
  now?: Date
  /** Host serving release downloads (default: https://github.com) */
  baseUrl?: string
  /**
   * Fetch one snapshot from this fixed address instead of searching dated
   * releases. Used for local previews and end-to-end tests.
   */
  overrideUrl?: string
}

export type ResolveStatus = 'success' | 'not_found' | 'error'

export type ResolveResult =
  | {
      status: 'success'
      data: Snapshot
      /** Tag actually used for the successful fetch */
      version_tag: string
      message: string
    }
  | {
      status: 'not_found' | 'error'
      data: null
      version_tag: null
      message: string
    }
