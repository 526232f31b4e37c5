/**
 * Zod schemas for the published snapshot document.
 *
 * The document is one JSON object keyed by section identifier; every value
 * has the SectionResult shape.
 */

import { z } from 'zod'
import { SnapshotFormatError } from '../../core/errors.js'
import type { SectionResult } from '../section-runner/types.js'

/**
 * Key no section id or task name may use: plain objects treat it as the
 * prototype and document validation drops it.
 */
export const RESERVED_DOCUMENT_KEY = '__proto__'

export const SectionStatusSchema = z.enum(['OK', 'PARTIAL_SUCCESS', 'FAILED', 'NO_OP'])

export const SectionResultSchema = z.object({
  status: SectionStatusSchema,
  data: z.record(z.string(), z.unknown()).nullable(),
  actions_log: z.array(z.string()),
})

export const SnapshotSchema = z.record(z.string(), SectionResultSchema)

/** One dated aggregation of every section's result */
export type Snapshot = Record<string, SectionResult>

/**
 * Validate an already-decoded value as a snapshot.
 * Returns null instead of throwing, for callers that treat a bad body as retryable.
 */
export function safeParseSnapshot(value: unknown): Snapshot | null {
  const result = SnapshotSchema.safeParse(value)
  return result.success ? result.data : null
}

/**
 * Parse a snapshot document from its JSON text.
 *
 * @throws {SnapshotFormatError} if the text is not JSON or not snapshot-shaped
 */
export function parseSnapshot(text: string): Snapshot {
  let decoded: unknown
  try {
    decoded = JSON.parse(text)
  } catch (error) {
    throw new SnapshotFormatError('Snapshot body is not valid JSON', {
      cause: error instanceof Error ? error.message : String(error),
    })
  }
  const result = SnapshotSchema.safeParse(decoded)
  if (!result.success) {
    throw new SnapshotFormatError('Snapshot body does not match the expected structure', {
      issues: result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    })
  }
  return result.data
}

/** Serialize a snapshot for publication (2-space indented JSON). */
export function serializeSnapshot(snapshot: Snapshot): string {
  return JSON.stringify(snapshot, null, 2)
}
