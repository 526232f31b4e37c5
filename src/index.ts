/**
 * etude-daily - Main module exports
 * Public API surface: snapshot aggregation, snapshot resolution and theme matching
 */

// Core errors
export * from './core/errors.js'
// Utilities
export { createLogger, childLogger, logger } from './utils/logger.js'
export { sleep, mapWithConcurrency, isAbortError, errorMessage } from './utils/helpers.js'
export { maskSecrets, deepMask } from './cli/utils/masking.js'

// Fetch tasks and sections
export * from './modules/fetch-task/index.js'
export * from './modules/section-runner/index.js'

// Aggregation (build side)
export * from './modules/aggregator/index.js'
export * from './modules/snapshot/index.js'

// Resolution (page side)
export * from './modules/snapshot-resolver/index.js'

// Themes
export * from './modules/theme/index.js'

// Configuration
export * from './modules/config/index.js'
