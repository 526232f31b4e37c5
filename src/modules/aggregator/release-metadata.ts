/**
 * Release metadata for the publishing step: today's tag and a
 * human-readable release title.
 */

import { TaskConfigError } from '../../core/errors.js'
import { DEFAULT_TAG_PREFIX, VALID_TAG_PATTERN, snapshotTag } from '../snapshot/snapshot-address.js'

export interface ReleaseInfo {
  tag_name: string
  release_name: string
}

export function isValidTag(tag: string): boolean {
  return tag.length > 0 && VALID_TAG_PATTERN.test(tag)
}

function assertValidPrefix(prefix: string): void {
  if (!isValidTag(prefix)) {
    throw new TaskConfigError(
      `Invalid prefix '${prefix}'. Prefix must be simple and contain no invalid tag characters.`,
      { prefix }
    )
  }
}

/**
 * Tag for the snapshot of `date`'s UTC calendar day, e.g. `data-2024-07-14`.
 *
 * @throws {TaskConfigError} if the prefix contains characters not allowed in a tag
 */
export function getReleaseTag(date: Date, prefix: string = DEFAULT_TAG_PREFIX): string {
  assertValidPrefix(prefix)
  return snapshotTag(date, prefix)
}

/**
 * Tag plus release title for `date`.
 */
export function getReleaseInfo(date: Date, prefix: string = DEFAULT_TAG_PREFIX): ReleaseInfo {
  const tag = getReleaseTag(date, prefix)
  return {
    tag_name: tag,
    release_name: `Daily Etude Data - ${tag}`,
  }
}
