/**
 * fetch-task module: the leaf data producers aggregated into sections.
 */

export type {
  FetchFn,
  FetchInit,
  FetchTask,
  FetchTaskDeps,
  NamedTask,
  NetworkFetchTask,
  StaticFetchTask,
  TaskOutcome,
} from './types.js'
export {
  DEFAULT_TASK_TIMEOUT_MS,
  createNetworkTask,
  createStaticTask,
  runFetchTask,
} from './fetch-task.js'
export type { NetworkTaskOptions } from './fetch-task.js'
