/**
 * `etude-daily resolve` command
 *
 * Looks up the newest published snapshot the way a page does at load time and
 * prints the ResolveResult. The page-status line goes to stderr.
 *
 * Exit codes: 0 success, 1 error, 2 invalid configuration, 3 not found.
 */

import type { Command } from 'commander'
import { resolve } from '../../modules/snapshot-resolver/snapshot-resolver.js'
import { describeResolution } from '../../modules/snapshot-resolver/page-status.js'
import type { ResolveResult } from '../../modules/snapshot-resolver/types.js'
import type { FetchFn } from '../../modules/fetch-task/types.js'
import type { PartialEtudeConfig } from '../../modules/config/config-schema.js'
import { EXIT_ERROR, EXIT_SUCCESS, loadCliConfig, parseIntegerOption } from '../utils/config-loading.js'

export const RESOLVE_EXIT_NOT_FOUND = 3

export interface ResolveActionOptions {
  owner?: string
  repo?: string
  configDir?: string
  days?: number
  retries?: number
  delay?: number
  prefix?: string
  overrideUrl?: string
  baseUrl?: string
  /** Print only the page status line, not the document */
  quiet?: boolean
  fetchFn?: FetchFn
  signal?: AbortSignal
  now?: Date
}

function toCliOverrides(opts: ResolveActionOptions): PartialEtudeConfig {
  return {
    repository: {
      ...(opts.owner !== undefined && { owner: opts.owner }),
      ...(opts.repo !== undefined && { name: opts.repo }),
    },
    resolver: {
      ...(opts.days !== undefined && { days_to_try: opts.days }),
      ...(opts.retries !== undefined && { max_retries: opts.retries }),
      ...(opts.delay !== undefined && { retry_delay_ms: opts.delay }),
      ...(opts.prefix !== undefined && { tag_prefix: opts.prefix }),
      ...(opts.overrideUrl !== undefined && { override_url: opts.overrideUrl }),
    },
  }
}

function exitCodeFor(result: ResolveResult): number {
  switch (result.status) {
    case 'success':
      return EXIT_SUCCESS
    case 'not_found':
      return RESOLVE_EXIT_NOT_FOUND
    case 'error':
      return EXIT_ERROR
  }
}

export async function runResolveAction(opts: ResolveActionOptions = {}): Promise<number> {
  const loaded = await loadCliConfig(opts.configDir, toCliOverrides(opts))
  if (!loaded.ok) return loaded.exitCode
  const config = loaded.system.getConfig()

  const result = await resolve(config.repository.owner ?? '', config.repository.name ?? '', {
    tagPrefix: config.resolver.tag_prefix,
    daysToTry: config.resolver.days_to_try,
    maxRetries: config.resolver.max_retries,
    retryDelayMs: config.resolver.retry_delay_ms,
    overrideUrl: config.resolver.override_url,
    baseUrl: opts.baseUrl,
    fetchFn: opts.fetchFn,
    signal: opts.signal,
    now: opts.now,
  })

  const status = describeResolution(result)
  process.stderr.write(`[${status.level}] ${status.message}\n`)
  if (opts.quiet !== true) {
    process.stdout.write(JSON.stringify(result, null, 2) + '\n')
  }
  return exitCodeFor(result)
}

export function registerResolveCommand(program: Command): void {
  program
    .command('resolve [owner] [repo]')
    .description('Find the newest published daily snapshot within the search window')
    .option('--config-dir <dir>', 'Path to the .etude/ directory')
    .option('--days <n>', 'Calendar days to search, today included', parseIntegerOption)
    .option('--retries <n>', 'Retries per day after a transient failure', parseIntegerOption)
    .option('--delay <ms>', 'Delay between retries of the same day', parseIntegerOption)
    .option('--prefix <prefix>', 'Release tag prefix')
    .option('--override-url <url>', 'Fetch the snapshot from this address instead of searching releases')
    .option('--base-url <url>', 'Host serving release downloads')
    .option('-q, --quiet', 'Print only the status line')
    .action(
      async (
        owner: string | undefined,
        repo: string | undefined,
        opts: Omit<ResolveActionOptions, 'owner' | 'repo' | 'fetchFn' | 'signal' | 'now'>
      ) => {
        const controller = new AbortController()
        const onSigint = (): void => controller.abort()
        process.once('SIGINT', onSigint)
        try {
          process.exitCode = await runResolveAction({ ...opts, owner, repo, signal: controller.signal })
        } finally {
          process.off('SIGINT', onSigint)
        }
      }
    )
}
