#!/usr/bin/env node
/**
 * etude-daily CLI - Main entry point
 * Provides the `etude-daily` command-line interface
 */

import { Command } from 'commander'
import { fileURLToPath } from 'url'
import { dirname, resolve } from 'path'
import { readFile } from 'fs/promises'
import { createLogger } from '../utils/logger.js'
import { isPlainObject } from '../utils/helpers.js'
import { registerDailyCommand } from './commands/daily.js'
import { registerReleaseInfoCommand } from './commands/release-info.js'
import { registerResolveCommand } from './commands/resolve.js'
import { registerThemeCommand } from './commands/theme.js'
import { registerConfigCommand } from './commands/config.js'

const logger = createLogger('cli')

/** Resolve the package.json path relative to this file */
async function getPackageVersion(): Promise<string> {
  const __dirname = dirname(fileURLToPath(import.meta.url))
  // Run from dist/cli or src/cli
  const paths = [resolve(__dirname, '../../package.json'), resolve(__dirname, '../package.json')]

  for (const pkgPath of paths) {
    try {
      const pkg: unknown = JSON.parse(await readFile(pkgPath, 'utf-8'))
      if (isPlainObject(pkg) && typeof pkg.version === 'string') {
        return pkg.version
      }
    } catch (err) {
      logger.trace({ err, pkgPath }, 'package.json not found here')
    }
  }
  return '0.0.0'
}

/** Create and configure the CLI program */
export async function createProgram(): Promise<Command> {
  const version = await getPackageVersion()

  const program = new Command()

  program
    .name('etude-daily')
    .description('Daily content aggregation, snapshot lookup and theme selection')
    .version(version, '-v, --version', 'Output the current version')

  registerDailyCommand(program)
  registerReleaseInfoCommand(program)
  registerResolveCommand(program)
  registerThemeCommand(program)
  registerConfigCommand(program)

  return program
}

/** Main entry point */
async function main(): Promise<void> {
  try {
    const program = await createProgram()
    await program.parseAsync(process.argv)
  } catch (error) {
    logger.error({ error }, 'CLI error')
    process.exit(1)
  }
}

// Errors are handled internally by main() which calls process.exit(1)
void main()
