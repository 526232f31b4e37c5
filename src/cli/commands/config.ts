/**
 * `etude-daily config` command
 *
 * Displays the merged configuration (defaults, file, ETUDE_* env vars) with
 * credentials masked.
 */

import type { Command } from 'commander'
import yaml from 'js-yaml'
import { EXIT_SUCCESS, loadCliConfig } from '../utils/config-loading.js'

export interface ConfigShowOptions {
  configDir?: string
  format?: 'yaml' | 'json'
}

export async function runConfigShow(opts: ConfigShowOptions = {}): Promise<number> {
  const loaded = await loadCliConfig(opts.configDir)
  if (!loaded.ok) return loaded.exitCode

  const masked = loaded.system.getMasked()
  if (opts.format === 'json') {
    process.stdout.write(JSON.stringify(masked, null, 2) + '\n')
  } else {
    process.stdout.write('# etude-daily configuration (credentials masked)\n\n')
    process.stdout.write(yaml.dump(masked))
  }
  return EXIT_SUCCESS
}

export function registerConfigCommand(program: Command): void {
  program
    .command('config')
    .description('Display the merged configuration with credentials masked')
    .option('--config-dir <dir>', 'Path to the .etude/ directory')
    .option('--format <format>', 'Output format: yaml (default) or json', 'yaml')
    .action(async (opts: { configDir?: string; format: string }) => {
      process.exitCode = await runConfigShow({
        configDir: opts.configDir,
        format: opts.format === 'json' ? 'json' : 'yaml',
      })
    })
}
