/**
 * Built-in default values for the etude-daily configuration.
 *
 * These are the lowest-priority defaults; they are overridden by:
 *   project config → environment variables → CLI flags
 */

import { DEFAULT_TASK_TIMEOUT_MS } from '../fetch-task/fetch-task.js'
import { DEFAULT_TAG_PREFIX } from '../snapshot/snapshot-address.js'
import {
  DEFAULT_DAYS_TO_TRY,
  DEFAULT_MAX_RETRIES,
  DEFAULT_RETRY_DELAY_MS,
} from '../snapshot-resolver/snapshot-resolver.js'
import type { AggregatorSettings, EtudeConfig, ResolverSettings } from './config-schema.js'

export const DEFAULT_RESOLVER_SETTINGS: ResolverSettings = {
  tag_prefix: DEFAULT_TAG_PREFIX,
  days_to_try: DEFAULT_DAYS_TO_TRY,
  max_retries: DEFAULT_MAX_RETRIES,
  retry_delay_ms: DEFAULT_RETRY_DELAY_MS,
}

export const DEFAULT_AGGREGATOR_SETTINGS: AggregatorSettings = {
  concurrency: 0,
  default_timeout_ms: DEFAULT_TASK_TIMEOUT_MS,
}

export const DEFAULT_CONFIG: EtudeConfig = {
  log_level: 'warn',
  repository: {},
  resolver: DEFAULT_RESOLVER_SETTINGS,
  aggregator: DEFAULT_AGGREGATOR_SETTINGS,
  sections: {},
}
