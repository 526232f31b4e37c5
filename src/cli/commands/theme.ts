/**
 * `etude-daily theme` command
 *
 * Shows which built-in theme a page would pick for the given tags at the
 * given instant (default: now, local time).
 */

import type { Command } from 'commander'
import { createBuiltinThemeRegistry } from '../../modules/theme/builtin-themes.js'
import { ThemeConfigError } from '../../core/errors.js'
import { formatThemeClassesTable } from '../utils/formatting.js'
import { EXIT_ERROR, EXIT_INVALID, EXIT_SUCCESS, parseInstant } from '../utils/config-loading.js'

export interface ThemeActionOptions {
  /** Call-site tags, e.g. `section:one` */
  tags?: string[]
  /** Any Date-parsable instant */
  at?: string
  format?: 'json' | 'table'
}

export function runThemeAction(opts: ThemeActionOptions = {}): number {
  let now = new Date()
  if (opts.at !== undefined) {
    const parsed = parseInstant(opts.at)
    if (parsed === null) {
      process.stderr.write(`  Error: invalid instant '${opts.at}'.\n`)
      return EXIT_INVALID
    }
    now = parsed
  }

  const registry = createBuiltinThemeRegistry()
  const context = registry.buildContext(opts.tags ?? [], now)
  try {
    const theme = registry.select(opts.tags ?? [], now)
    if (opts.format === 'table') {
      process.stdout.write(`Theme: ${theme.name}\nContext: ${[...context].join(', ')}\n\n`)
      process.stdout.write(formatThemeClassesTable(theme) + '\n')
    } else {
      const output = {
        theme: theme.name,
        stylesheet: theme.stylesheet,
        tags: [...theme.tags],
        context: [...context],
        classes: theme.getClasses(),
      }
      process.stdout.write(JSON.stringify(output, null, 2) + '\n')
    }
    return EXIT_SUCCESS
  } catch (err) {
    if (err instanceof ThemeConfigError) {
      process.stderr.write(`  Error: ${err.message}\n`)
      return EXIT_ERROR
    }
    throw err
  }
}

function collectTag(value: string, previous: string[]): string[] {
  return [...previous, value]
}

export function registerThemeCommand(program: Command): void {
  program
    .command('theme')
    .description('Show the theme selected for a context')
    .option('-t, --tag <tag>', 'Extra context tag (repeatable)', collectTag, [])
    .option('--at <instant>', 'Instant to evaluate time-based tags at (default: now)')
    .option('--format <format>', 'Output format: json (default) or table', 'json')
    .action((opts: { tag: string[]; at?: string; format: string }) => {
      process.exitCode = runThemeAction({
        tags: opts.tag,
        at: opts.at,
        format: opts.format === 'table' ? 'table' : 'json',
      })
    })
}
