/**
 * Turns the `sections` block of a loaded config into a frozen SectionRegistry.
 *
 * Each section's task list is built lazily, when the aggregator asks for it,
 * so a malformed task (say, a non-http address) fails only its own section.
 */

import { SectionRegistry } from '../aggregator/section-registry.js'
import { createNetworkTask, createStaticTask } from '../fetch-task/fetch-task.js'
import type { NamedTask } from '../fetch-task/types.js'
import type { EtudeConfig, TaskConfig } from './config-schema.js'

export function toNamedTask(config: TaskConfig, defaultTimeoutMs: number): NamedTask {
  switch (config.type) {
    case 'network':
      return {
        name: config.name,
        task: createNetworkTask(config.url, {
          timeoutMs: config.timeout_ms ?? defaultTimeoutMs,
          headers: config.headers,
        }),
      }
    case 'static':
      return { name: config.name, task: createStaticTask(config.value) }
  }
}

/**
 * Register every configured section, in file order, and freeze the registry.
 */
export function buildRegistryFromConfig(config: EtudeConfig): SectionRegistry {
  const registry = new SectionRegistry()
  const timeoutMs = config.aggregator.default_timeout_ms
  for (const [id, section] of Object.entries(config.sections)) {
    registry.register(id, () => section.tasks.map((task) => toNamedTask(task, timeoutMs)))
  }
  return registry.freeze()
}
