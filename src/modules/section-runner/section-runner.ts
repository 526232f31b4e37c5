/**
 * SectionRunner: executes the fetch tasks of one section and folds their
 * outcomes into a single SectionResult.
 *
 * Tasks run concurrently and never short-circuit each other. Each task's
 * classification and log line are collected into a slot indexed by its
 * registration position, so the final log is identical across runs whatever
 * order the tasks complete in.
 */

import { TaskConfigError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import { errorMessage, mapWithConcurrency } from '../../utils/helpers.js'
import { maskSecrets } from '../../cli/utils/masking.js'
import { runFetchTask } from '../fetch-task/fetch-task.js'
import type { NamedTask } from '../fetch-task/types.js'
import { RESERVED_DOCUMENT_KEY } from '../snapshot/schemas.js'
import type { RunSectionOptions, SectionResult, SectionStatus } from './types.js'

const logger = createLogger('section-runner')

/** Log line recorded for a section that registered no tasks */
export const NO_RESOURCES_MESSAGE = 'No daily resources defined for this section.'

interface TaskSlot {
  name: string
  succeeded: boolean
  payload: unknown
  line: string
}

/**
 * Classify a section from its per-task tallies.
 *
 * @param succeeded - Number of tasks that succeeded
 * @param total - Number of tasks registered
 */
export function computeSectionStatus(succeeded: number, total: number): SectionStatus {
  if (total === 0) return 'NO_OP'
  if (succeeded === total) return 'OK'
  if (succeeded === 0) return 'FAILED'
  return 'PARTIAL_SUCCESS'
}

/**
 * Throw if a task name is empty or reserved, or two tasks in a section share a name.
 */
export function assertUniqueTaskNames(tasks: readonly NamedTask[]): void {
  const seen = new Set<string>()
  for (const { name } of tasks) {
    if (name.length === 0) {
      throw new TaskConfigError('Task name must be a non-empty string')
    }
    if (name === RESERVED_DOCUMENT_KEY) {
      throw new TaskConfigError(`Task name "${name}" is reserved`, { name })
    }
    if (seen.has(name)) {
      throw new TaskConfigError(`Duplicate task name in section: ${name}`, { name })
    }
    seen.add(name)
  }
}

/**
 * Run every task of a section and build its result.
 *
 * @throws {TaskConfigError} when task names are empty, reserved or duplicated
 */
export async function runSection(
  tasks: readonly NamedTask[],
  options: RunSectionOptions = {}
): Promise<SectionResult> {
  assertUniqueTaskNames(tasks)
  const log = options.sectionId !== undefined ? logger.child({ section: options.sectionId }) : logger

  if (tasks.length === 0) {
    log.info('No daily resources to fetch')
    return { status: 'NO_OP', data: null, actions_log: [NO_RESOURCES_MESSAGE] }
  }

  const slots = await mapWithConcurrency(
    tasks,
    options.concurrency ?? Infinity,
    async ({ name, task }): Promise<TaskSlot> => {
      log.debug({ task: name, kind: task.kind }, 'Fetching resource')
      try {
        const outcome = await runFetchTask(task, { fetchFn: options.fetchFn, signal: options.signal })
        if (outcome.ok) {
          return {
            name,
            succeeded: true,
            payload: outcome.payload,
            line: `Successfully fetched resource '${name}'.`,
          }
        }
        log.warn({ task: name, error: outcome.error }, 'Resource fetch failed')
        return {
          name,
          succeeded: false,
          payload: null,
          line: `Failed to fetch resource '${name}': ${outcome.error}`,
        }
      } catch (error) {
        const message = maskSecrets(errorMessage(error))
        log.error({ task: name, error: message }, 'Unexpected error during fetch')
        return {
          name,
          succeeded: false,
          payload: null,
          line: `Unexpected error fetching resource '${name}': ${message}`,
        }
      }
    }
  )

  // undefined has no JSON form; null keeps every task listed in the document
  const data: Record<string, unknown> = Object.fromEntries(
    slots.map((slot) => [slot.name, slot.payload === undefined ? null : slot.payload])
  )
  const actionsLog = slots.map((slot) => slot.line)
  const succeeded = slots.filter((slot) => slot.succeeded).length

  const status = computeSectionStatus(succeeded, tasks.length)
  actionsLog.push(`${String(succeeded)}/${String(tasks.length)} resources fetched; status ${status}.`)
  log.info({ status, succeeded, total: tasks.length }, 'Section finished')

  return { status, data, actions_log: actionsLog }
}
