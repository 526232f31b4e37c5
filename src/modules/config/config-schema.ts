/**
 * Zod validation schemas for the etude-daily configuration file.
 *
 * Defines schemas for all config sections:
 *  - repository coordinates (where daily snapshots are published)
 *  - resolver search window and retry policy
 *  - aggregator concurrency and timeouts
 *  - content sections and their fetch tasks
 *  - full config document
 */

import { z } from 'zod'
import { VALID_TAG_PATTERN } from '../snapshot/snapshot-address.js'
import { RESERVED_DOCUMENT_KEY } from '../snapshot/schemas.js'
import { isPlainObject } from '../../utils/helpers.js'

// ---------------------------------------------------------------------------
// Scalar settings
// ---------------------------------------------------------------------------

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal'])
export type LogLevelValue = z.infer<typeof LogLevelSchema>

/** Owner and name of the repository whose releases carry the snapshots */
export const RepositorySchema = z
  .object({
    owner: z.string().min(1).optional(),
    name: z.string().min(1).optional(),
  })
  .strict()

export type RepositoryConfig = z.infer<typeof RepositorySchema>

export const ResolverSettingsSchema = z
  .object({
    tag_prefix: z.string().regex(VALID_TAG_PATTERN, 'Tag prefix may only contain letters, digits, _ . / -'),
    days_to_try: z.number().int().min(1).max(366),
    max_retries: z.number().int().min(0).max(10),
    retry_delay_ms: z.number().int().min(0),
    /** Fetch the snapshot from this exact address instead of searching releases */
    override_url: z.string().url().optional(),
  })
  .strict()

export type ResolverSettings = z.infer<typeof ResolverSettingsSchema>

export const AggregatorSettingsSchema = z
  .object({
    /** Maximum tasks in flight per section (0 = unbounded) */
    concurrency: z.number().int().min(0),
    default_timeout_ms: z.number().int().positive(),
  })
  .strict()

export type AggregatorSettings = z.infer<typeof AggregatorSettingsSchema>

// ---------------------------------------------------------------------------
// Sections and tasks
// ---------------------------------------------------------------------------

export const NetworkTaskConfigSchema = z
  .object({
    name: z.string().min(1),
    type: z.literal('network'),
    url: z.string().min(1),
    timeout_ms: z.number().int().positive().optional(),
    headers: z.record(z.string(), z.string()).optional(),
  })
  .strict()

export const StaticTaskConfigSchema = z
  .object({
    name: z.string().min(1),
    type: z.literal('static'),
    value: z.unknown().refine((value) => value !== undefined, { message: 'Required' }),
  })
  .strict()

export const TaskConfigSchema = z.discriminatedUnion('type', [
  NetworkTaskConfigSchema,
  StaticTaskConfigSchema,
])

export type TaskConfig = z.infer<typeof TaskConfigSchema>

export const SectionConfigSchema = z
  .object({
    tasks: z.array(TaskConfigSchema),
  })
  .strict()

export type SectionConfig = z.infer<typeof SectionConfigSchema>

/**
 * Sections keyed by identifier, in file order. The reserved key is checked
 * before the record parser runs, since that parser skips it.
 */
export const SectionsSchema = z.preprocess((value, ctx) => {
  if (isPlainObject(value) && Object.prototype.hasOwnProperty.call(value, RESERVED_DOCUMENT_KEY)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Section identifier "${RESERVED_DOCUMENT_KEY}" is reserved`,
    })
  }
  return value
}, z.record(z.string().min(1), SectionConfigSchema))

// ---------------------------------------------------------------------------
// Full config document
// ---------------------------------------------------------------------------

export const EtudeConfigSchema = z
  .object({
    log_level: LogLevelSchema,
    repository: RepositorySchema,
    resolver: ResolverSettingsSchema,
    aggregator: AggregatorSettingsSchema,
    sections: SectionsSchema,
  })
  .strict()

export type EtudeConfig = z.infer<typeof EtudeConfigSchema>

/** Shape accepted from a config file, env overlay or CLI overlay */
export const PartialEtudeConfigSchema = z
  .object({
    log_level: LogLevelSchema.optional(),
    repository: RepositorySchema.optional(),
    resolver: ResolverSettingsSchema.partial().optional(),
    aggregator: AggregatorSettingsSchema.partial().optional(),
    sections: SectionsSchema.optional(),
  })
  .strict()

export type PartialEtudeConfig = z.infer<typeof PartialEtudeConfigSchema>
