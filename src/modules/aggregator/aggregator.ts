/**
 * Aggregator: runs every registered section and merges the results into one
 * snapshot document.
 *
 * A section that fails entirely (or whose task list cannot be obtained) is
 * recorded as FAILED; it never stops the other sections. Sections run
 * concurrently and the snapshot keys follow registration order.
 */

import { createLogger } from '../../utils/logger.js'
import { errorMessage } from '../../utils/helpers.js'
import { maskSecrets } from '../../cli/utils/masking.js'
import { runSection, assertUniqueTaskNames } from '../section-runner/section-runner.js'
import type { SectionResult } from '../section-runner/types.js'
import type { NamedTask, FetchFn } from '../fetch-task/types.js'
import type { Snapshot } from '../snapshot/schemas.js'
import { SectionRegistry } from './section-registry.js'
import type { SectionEntry } from './section-registry.js'

const logger = createLogger('aggregator')

/**
 * Options for runAll().
 */
export interface RunAllOptions {
  /** Maximum tasks in flight per section (default: all) */
  taskConcurrency?: number
  fetchFn?: FetchFn
  signal?: AbortSignal
}

export type SectionSource = SectionRegistry | Readonly<Record<string, readonly NamedTask[]>>

function toEntries(source: SectionSource): readonly SectionEntry[] {
  if (source instanceof SectionRegistry) return source.list()
  // Registering checks each id the same way a registry would
  const registry = new SectionRegistry()
  for (const [id, tasks] of Object.entries(source)) registry.registerTasks(id, tasks)
  return registry.list()
}

async function runEntry(entry: SectionEntry, options: RunAllOptions): Promise<SectionResult> {
  let tasks: readonly NamedTask[]
  try {
    tasks = await entry.provider()
    assertUniqueTaskNames(tasks)
  } catch (error) {
    const message = maskSecrets(errorMessage(error))
    logger.error({ section: entry.id, error: message }, 'Could not get daily resources')
    return {
      status: 'FAILED',
      data: null,
      actions_log: [`Failed to retrieve resource list: ${message}`],
    }
  }

  return runSection(tasks, {
    sectionId: entry.id,
    concurrency: options.taskConcurrency,
    fetchFn: options.fetchFn,
    signal: options.signal,
  })
}

/**
 * Run every section and assemble the snapshot.
 *
 * @throws {TaskConfigError} when a plain-record source uses an empty or reserved section id
 */
export async function runAll(source: SectionSource, options: RunAllOptions = {}): Promise<Snapshot> {
  const entries = toEntries(source)
  if (entries.length === 0) {
    logger.warn('No sections registered. Nothing to do for daily tasks.')
    return {}
  }

  logger.info({ sections: entries.length }, 'Executing daily tasks')
  const results = await Promise.all(
    entries.map(async (entry): Promise<[string, SectionResult]> => [entry.id, await runEntry(entry, options)])
  )
  for (const [id, result] of results) {
    logger.info({ section: id, status: result.status }, 'Finished processing section')
  }

  const snapshot: Snapshot = Object.fromEntries(results)
  return snapshot
}
