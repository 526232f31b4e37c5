/**
 * Snapshot resolver: finds the newest retrievable daily snapshot.
 *
 * Starting today (UTC) and moving one calendar day back at a time, each
 * day's dated asset is requested up to `maxRetries + 1` times:
 *   - 404 means the snapshot was never published: move on at once
 *   - any other failure (network error, non-OK status, malformed body) is
 *     transient: wait `retryDelayMs` and retry while attempts remain
 *   - a valid body ends the search with `success`
 * A window with no success ends in `not_found`, whether the days were absent
 * or unreachable. `error` is reserved for bad arguments, cancellation and the
 * fixed-address mode.
 */

import { createLogger } from '../../utils/logger.js'
import { errorMessage, isAbortError, sleep } from '../../utils/helpers.js'
import type { FetchFn } from '../fetch-task/types.js'
import { safeParseSnapshot } from '../snapshot/schemas.js'
import {
  DEFAULT_RELEASE_BASE_URL,
  DEFAULT_TAG_PREFIX,
  snapshotAssetUrl,
  snapshotTag,
  subtractUtcDays,
} from '../snapshot/snapshot-address.js'
import { ResolutionMachine } from './resolution-machine.js'
import type { AttemptOutcome } from './resolution-machine.js'
import type { ResolveOptions, ResolveResult } from './types.js'

const logger = createLogger('snapshot-resolver')

export const DEFAULT_DAYS_TO_TRY = 7
export const DEFAULT_MAX_RETRIES = 2
export const DEFAULT_RETRY_DELAY_MS = 1000

/** version_tag reported for snapshots loaded through `overrideUrl` */
export const OVERRIDE_VERSION_TAG = 'mock_data'

export const ABORTED_MESSAGE = 'Snapshot resolution was aborted.'

function failure(status: 'not_found' | 'error', message: string): ResolveResult {
  return { status, data: null, version_tag: null, message }
}

/**
 * Request one address and classify the response.
 * Rethrows only when the caller's signal aborted the request.
 */
async function attemptFetch(fetchFn: FetchFn, url: string, signal?: AbortSignal): Promise<AttemptOutcome> {
  try {
    const response = await fetchFn(url, { signal })
    if (response.status === 404) {
      return { kind: 'absent' }
    }
    if (!response.ok) {
      return { kind: 'transient', reason: `HTTP ${String(response.status)}` }
    }
    const body = await response.text()
    let decoded: unknown
    try {
      decoded = JSON.parse(body)
    } catch {
      return { kind: 'transient', reason: 'response body is not valid JSON' }
    }
    const data = safeParseSnapshot(decoded)
    if (data === null) {
      return { kind: 'transient', reason: 'response body does not match the snapshot structure' }
    }
    return { kind: 'found', data }
  } catch (error) {
    if (signal?.aborted === true) throw error
    return { kind: 'transient', reason: `network error: ${errorMessage(error)}` }
  }
}

function validateOptions(daysToTry: number, maxRetries: number, retryDelayMs: number): string | null {
  if (!Number.isInteger(daysToTry) || daysToTry < 1) {
    return `daysToTry must be a positive integer, got ${String(daysToTry)}.`
  }
  if (!Number.isInteger(maxRetries) || maxRetries < 0) {
    return `maxRetries must be a non-negative integer, got ${String(maxRetries)}.`
  }
  if (!Number.isFinite(retryDelayMs) || retryDelayMs < 0) {
    return `retryDelayMs must be a non-negative number, got ${String(retryDelayMs)}.`
  }
  return null
}

async function resolveFromOverride(
  url: string,
  fetchFn: FetchFn,
  signal: AbortSignal | undefined
): Promise<ResolveResult> {
  logger.info({ url }, 'Using snapshot from fixed address')
  try {
    const outcome = await attemptFetch(fetchFn, url, signal)
    switch (outcome.kind) {
      case 'found':
        return {
          status: 'success',
          data: outcome.data,
          version_tag: OVERRIDE_VERSION_TAG,
          message: `Successfully loaded data from ${url}.`,
        }
      case 'absent':
        return failure('error', `Failed to fetch snapshot from ${url}: HTTP 404`)
      case 'transient':
        return failure('error', `Failed to fetch snapshot from ${url}: ${outcome.reason}`)
    }
  } catch (error) {
    if (isAbortError(error) || signal?.aborted === true) return failure('error', ABORTED_MESSAGE)
    throw error
  }
}

/**
 * Locate and retrieve the newest usable snapshot.
 *
 * @param repoOwner - Owner of the repository publishing the releases
 * @param repoName - Name of that repository
 * @param options - Search window, retry policy and collaborators
 */
export async function resolve(
  repoOwner: string,
  repoName: string,
  options: ResolveOptions = {}
): Promise<ResolveResult> {
  const {
    tagPrefix = DEFAULT_TAG_PREFIX,
    daysToTry = DEFAULT_DAYS_TO_TRY,
    maxRetries = DEFAULT_MAX_RETRIES,
    retryDelayMs = DEFAULT_RETRY_DELAY_MS,
    baseUrl = DEFAULT_RELEASE_BASE_URL,
    signal,
  } = options
  const fetchFn: FetchFn = options.fetchFn ?? fetch

  if (options.overrideUrl !== undefined) {
    return resolveFromOverride(options.overrideUrl, fetchFn, signal)
  }

  if (!repoOwner || !repoName) {
    return failure('error', 'Repository owner and name must be provided.')
  }
  const invalid = validateOptions(daysToTry, maxRetries, retryDelayMs)
  if (invalid !== null) {
    return failure('error', invalid)
  }

  const today = options.now ?? new Date()
  const machine = new ResolutionMachine({ daysToTry, maxRetries })
  const log = logger.child({ repo: `${repoOwner}/${repoName}` })

  try {
    while (!machine.isTerminal) {
      signal?.throwIfAborted()

      if (machine.state === 'retrying') {
        await sleep(retryDelayMs, signal)
        machine.next()
        continue
      }
      if (machine.state === 'advancing') {
        machine.next()
        continue
      }

      // trying_day
      const tag = snapshotTag(subtractUtcDays(today, machine.dayOffset), tagPrefix)
      const url = snapshotAssetUrl(repoOwner, repoName, tag, baseUrl)
      log.debug({ tag, attempt: machine.attempt + 1, of: maxRetries + 1 }, 'Requesting snapshot')

      const outcome = await attemptFetch(fetchFn, url, signal)
      const state = machine.record(outcome)

      if (state === 'success' && machine.data !== null) {
        log.info({ tag, attempts: machine.attemptsMade }, 'Snapshot resolved')
        return {
          status: 'success',
          data: machine.data,
          version_tag: tag,
          message: `Successfully loaded data from release ${tag}.`,
        }
      }
      if (outcome.kind === 'absent') {
        log.debug({ tag }, 'Snapshot not published; trying previous day')
      } else if (outcome.kind === 'transient') {
        log.warn({ tag, reason: outcome.reason, willRetry: state === 'retrying' }, 'Transient snapshot fetch failure')
      }
    }
  } catch (error) {
    if (isAbortError(error) || signal?.aborted === true) {
      log.info('Snapshot resolution aborted')
      return failure('error', ABORTED_MESSAGE)
    }
    throw error
  }

  log.info({ daysToTry, attempts: machine.attemptsMade }, 'No snapshot found in window')
  return failure(
    'not_found',
    `Could not find a valid data release after checking the last ${String(daysToTry)} days.`
  )
}
