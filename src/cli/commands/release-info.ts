/**
 * `etude-daily release-info` command
 *
 * Prints `{ tag_name, release_name }` for the snapshot of a UTC day, for the
 * publishing step of the daily workflow.
 */

import type { Command } from 'commander'
import { getReleaseInfo } from '../../modules/aggregator/release-metadata.js'
import { TaskConfigError } from '../../core/errors.js'
import { EXIT_INVALID, EXIT_SUCCESS, loadCliConfig, parseUtcDay } from '../utils/config-loading.js'

export interface ReleaseInfoActionOptions {
  configDir?: string
  /** `YYYY-MM-DD`; default: today (UTC) */
  date?: string
  /** Overrides resolver.tag_prefix from config */
  prefix?: string
  now?: Date
}

export async function runReleaseInfoAction(opts: ReleaseInfoActionOptions = {}): Promise<number> {
  let date = opts.now ?? new Date()
  if (opts.date !== undefined) {
    const parsed = parseUtcDay(opts.date)
    if (parsed === null) {
      process.stderr.write(`  Error: invalid date '${opts.date}'. Expected YYYY-MM-DD.\n`)
      return EXIT_INVALID
    }
    date = parsed
  }

  let prefix = opts.prefix
  if (prefix === undefined) {
    const loaded = await loadCliConfig(opts.configDir)
    if (!loaded.ok) return loaded.exitCode
    prefix = loaded.system.getConfig().resolver.tag_prefix
  }

  try {
    const info = getReleaseInfo(date, prefix)
    process.stdout.write(JSON.stringify(info, null, 2) + '\n')
    return EXIT_SUCCESS
  } catch (err) {
    if (err instanceof TaskConfigError) {
      process.stderr.write(`  Error: ${err.message}\n`)
      return EXIT_INVALID
    }
    throw err
  }
}

export function registerReleaseInfoCommand(program: Command): void {
  program
    .command('release-info')
    .description('Print the release tag and title for a day\'s snapshot')
    .option('--config-dir <dir>', 'Path to the .etude/ directory')
    .option('-d, --date <YYYY-MM-DD>', 'UTC calendar day (default: today)')
    .option('-p, --prefix <prefix>', 'Tag prefix (default: resolver.tag_prefix)')
    .action(async (opts: { configDir?: string; date?: string; prefix?: string }) => {
      process.exitCode = await runReleaseInfoAction(opts)
    })
}
