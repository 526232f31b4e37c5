/**
 * snapshot-resolver module: run-time retrieval of the newest daily snapshot.
 */

export type { ResolveOptions, ResolveResult, ResolveStatus } from './types.js'
export {
  resolve,
  DEFAULT_DAYS_TO_TRY,
  DEFAULT_MAX_RETRIES,
  DEFAULT_RETRY_DELAY_MS,
  OVERRIDE_VERSION_TAG,
  ABORTED_MESSAGE,
} from './snapshot-resolver.js'
export { ResolutionMachine } from './resolution-machine.js'
export type { ResolutionState, AttemptOutcome, ResolutionLimits } from './resolution-machine.js'
export { describeResolution } from './page-status.js'
export type { PageStatus, StatusLevel } from './page-status.js'
