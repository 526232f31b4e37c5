/**
 * Shared types for the section-runner module.
 */

import type { FetchFn } from '../fetch-task/types.js'

/** Section-level outcome classification */
export type SectionStatus = 'OK' | 'PARTIAL_SUCCESS' | 'FAILED' | 'NO_OP'

/**
 * Result of running every task registered for one section.
 *
 * `actions_log` is a causal trace: one line per task in registration order,
 * followed by section-level lines. It is published verbatim.
 */
export interface SectionResult {
  status: SectionStatus
  /** Task name → payload; `null` for a failed task. `null` when no task ran. */
  data: Record<string, unknown> | null
  actions_log: string[]
}

/**
 * Options for runSection().
 */
export interface RunSectionOptions {
  /** Maximum tasks in flight at once (default: all) */
  concurrency?: number
  fetchFn?: FetchFn
  signal?: AbortSignal
  /** Section identifier, used only for log bindings */
  sectionId?: string
}
