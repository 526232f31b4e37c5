/**
 * snapshot module: document shape and date-derived addressing.
 */

export {
  SectionStatusSchema,
  SectionResultSchema,
  SnapshotSchema,
  safeParseSnapshot,
  parseSnapshot,
  serializeSnapshot,
  RESERVED_DOCUMENT_KEY,
} from './schemas.js'
export type { Snapshot } from './schemas.js'
export {
  SNAPSHOT_ASSET_NAME,
  DEFAULT_TAG_PREFIX,
  DEFAULT_RELEASE_BASE_URL,
  VALID_TAG_PATTERN,
  formatUtcDate,
  subtractUtcDays,
  snapshotTag,
  snapshotAssetUrl,
} from './snapshot-address.js'
