/**
 * `etude-daily daily` command
 *
 * Runs every configured section and prints (or writes) the snapshot document.
 * Sections that fail are recorded in the document; they never change the
 * exit code.
 */

import type { Command } from 'commander'
import { writeFile } from 'fs/promises'
import { buildRegistryFromConfig } from '../../modules/config/registry-builder.js'
import { runAll } from '../../modules/aggregator/aggregator.js'
import { serializeSnapshot } from '../../modules/snapshot/schemas.js'
import type { FetchFn } from '../../modules/fetch-task/types.js'
import { errorMessage, formatDuration } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import { formatSnapshotTable } from '../utils/formatting.js'
import { EXIT_ERROR, EXIT_SUCCESS, loadCliConfig, parseIntegerOption } from '../utils/config-loading.js'

const logger = createLogger('daily-cmd')

export interface DailyActionOptions {
  configDir?: string
  /** Maximum tasks in flight per section (0 = unbounded) */
  concurrency?: number
  /** Write the document here instead of stdout */
  output?: string
  format?: 'json' | 'table'
  fetchFn?: FetchFn
  signal?: AbortSignal
}

export async function runDailyAction(opts: DailyActionOptions = {}): Promise<number> {
  const loaded = await loadCliConfig(
    opts.configDir,
    opts.concurrency !== undefined ? { aggregator: { concurrency: opts.concurrency } } : {}
  )
  if (!loaded.ok) return loaded.exitCode
  const config = loaded.system.getConfig()

  const registry = buildRegistryFromConfig(config)
  const startedAt = Date.now()
  const snapshot = await runAll(registry, {
    taskConcurrency: config.aggregator.concurrency,
    fetchFn: opts.fetchFn,
    signal: opts.signal,
  })
  logger.info({ sections: registry.size, elapsed: formatDuration(Date.now() - startedAt) }, 'Daily run finished')
  const document = serializeSnapshot(snapshot)

  if (opts.output !== undefined) {
    try {
      await writeFile(opts.output, document + '\n', 'utf-8')
    } catch (err) {
      logger.error({ err, output: opts.output }, 'Failed to write snapshot')
      process.stderr.write(`  Error writing ${opts.output}: ${errorMessage(err)}\n`)
      return EXIT_ERROR
    }
    process.stderr.write(`Snapshot written to ${opts.output}\n`)
  }

  if (opts.format === 'table') {
    process.stdout.write(formatSnapshotTable(snapshot) + '\n')
  } else if (opts.output === undefined) {
    process.stdout.write(document + '\n')
  }
  return EXIT_SUCCESS
}

export function registerDailyCommand(program: Command): void {
  program
    .command('daily')
    .description('Fetch every configured section and emit the daily snapshot document')
    .option('--config-dir <dir>', 'Path to the .etude/ directory')
    .option('-c, --concurrency <n>', 'Maximum tasks in flight per section (0 = unbounded)', parseIntegerOption)
    .option('-o, --output <file>', 'Write the snapshot to a file instead of stdout')
    .option('--format <format>', 'Output format: json (default) or table', 'json')
    .action(
      async (opts: { configDir?: string; concurrency?: number; output?: string; format: string }) => {
        const exitCode = await runDailyAction({
          configDir: opts.configDir,
          concurrency: opts.concurrency,
          output: opts.output,
          format: opts.format === 'table' ? 'table' : 'json',
        })
        process.exitCode = exitCode
      }
    )
}
