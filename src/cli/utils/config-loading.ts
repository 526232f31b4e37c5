/**
 * Config loading shared by every command, plus commander option parsers.
 */

import { InvalidArgumentError } from 'commander'
import { createConfigSystem } from '../../modules/config/config-system-impl.js'
import type { ConfigSystem } from '../../modules/config/config-system.js'
import type { PartialEtudeConfig } from '../../modules/config/config-schema.js'
import { ConfigError } from '../../core/errors.js'
import { errorMessage } from '../../utils/helpers.js'
import { createLogger, setLogLevel } from '../../utils/logger.js'

const logger = createLogger('cli-config')

// ---------------------------------------------------------------------------
// Exit codes shared by all commands
// ---------------------------------------------------------------------------

export const EXIT_SUCCESS = 0
export const EXIT_ERROR = 1
export const EXIT_INVALID = 2

// ---------------------------------------------------------------------------
// Config loading
// ---------------------------------------------------------------------------

export type LoadedConfig =
  | { ok: true; system: ConfigSystem }
  | { ok: false; exitCode: number }

/**
 * Load the merged config, reporting failures on stderr.
 * A ConfigError maps to EXIT_INVALID, anything else to EXIT_ERROR.
 * On success `log_level` is applied to every module logger, unless the
 * process-wide LOG_LEVEL variable is set.
 */
export async function loadCliConfig(
  configDir: string | undefined,
  cliOverrides: PartialEtudeConfig = {}
): Promise<LoadedConfig> {
  const system = createConfigSystem({
    ...(configDir !== undefined && { configDir }),
    cliOverrides,
  })
  try {
    await system.load()
    if (process.env.LOG_LEVEL === undefined || process.env.LOG_LEVEL === '') {
      setLogLevel(system.getConfig().log_level)
    }
    return { ok: true, system }
  } catch (err) {
    if (err instanceof ConfigError) {
      process.stderr.write(`  Configuration error: ${err.message}\n`)
      return { ok: false, exitCode: EXIT_INVALID }
    }
    logger.error({ err }, 'Failed to load configuration')
    process.stderr.write(`  Error loading configuration: ${errorMessage(err)}\n`)
    return { ok: false, exitCode: EXIT_ERROR }
  }
}

// ---------------------------------------------------------------------------
// Option parsers
// ---------------------------------------------------------------------------

/** Commander parser for a non-negative integer option */
export function parseIntegerOption(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError('Expected a non-negative integer.')
  }
  return parseInt(value, 10)
}

/**
 * Parse a `YYYY-MM-DD` calendar day as midnight UTC.
 * Returns null for anything else, including impossible days like 2024-02-30.
 */
export function parseUtcDay(value: string): Date | null {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) return null
  const date = new Date(`${value}T00:00:00.000Z`)
  if (Number.isNaN(date.getTime())) return null
  return date.toISOString().startsWith(value) ? date : null
}

/** Parse any Date-parsable instant; null when invalid */
export function parseInstant(value: string): Date | null {
  const date = new Date(value)
  return Number.isNaN(date.getTime()) ? null : date
}
