/**
 * Date-derived snapshot addressing.
 *
 * A snapshot published for calendar date YYYY-MM-DD (UTC) carries the tag
 * `<prefix>YYYY-MM-DD` and is downloaded from the release asset
 * `daily_etude_data.json` under that tag.
 */

/** File name of the published snapshot asset */
export const SNAPSHOT_ASSET_NAME = 'daily_etude_data.json'

/** Conventional tag prefix */
export const DEFAULT_TAG_PREFIX = 'data-'

/** Default host serving release downloads */
export const DEFAULT_RELEASE_BASE_URL = 'https://github.com'

/** Characters allowed in prefixes and tags */
export const VALID_TAG_PATTERN = /^[a-zA-Z0-9_./-]+$/

const MS_PER_DAY = 86_400_000

/**
 * Format the UTC calendar date of an instant as YYYY-MM-DD.
 */
export function formatUtcDate(date: Date): string {
  const year = String(date.getUTCFullYear())
  const month = String(date.getUTCMonth() + 1).padStart(2, '0')
  const day = String(date.getUTCDate()).padStart(2, '0')
  return `${year}-${month}-${day}`
}

/**
 * The instant `days` calendar days before `date` (UTC), same time of day.
 */
export function subtractUtcDays(date: Date, days: number): Date {
  return new Date(date.getTime() - days * MS_PER_DAY)
}

/** Tag identifying the snapshot for the UTC date of `date`. */
export function snapshotTag(date: Date, prefix: string = DEFAULT_TAG_PREFIX): string {
  return `${prefix}${formatUtcDate(date)}`
}

/**
 * Download address of the snapshot asset for a tag.
 */
export function snapshotAssetUrl(
  repoOwner: string,
  repoName: string,
  tag: string,
  baseUrl: string = DEFAULT_RELEASE_BASE_URL
): string {
  const base = baseUrl.replace(/\/+$/, '')
  return `${base}/${repoOwner}/${repoName}/releases/download/${tag}/${SNAPSHOT_ASSET_NAME}`
}
