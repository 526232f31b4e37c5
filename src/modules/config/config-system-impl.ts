/**
 * ConfigSystem implementation: loads configuration in hierarchy order and
 * exposes get/getMasked operations.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults
 *     → project config      (./.etude/config.yaml)
 *     → environment vars    (ETUDE_* prefixed)
 *     → CLI flag overrides  (passed via ConfigSystemOptions.cliOverrides)
 */

import { readFile, access } from 'fs/promises'
import { join, resolve } from 'path'
import yaml from 'js-yaml'
import { createLogger } from '../../utils/logger.js'
import { errorMessage, isPlainObject } from '../../utils/helpers.js'
import { ConfigError } from '../../core/errors.js'
import { deepMask } from '../../cli/utils/masking.js'
import {
  EtudeConfigSchema,
  PartialEtudeConfigSchema,
  type EtudeConfig,
  type PartialEtudeConfig,
} from './config-schema.js'
import { DEFAULT_CONFIG } from './defaults.js'
import type { ConfigSystem, ConfigSystemOptions } from './config-system.js'

const logger = createLogger('config')

/** File name looked up inside the config directory */
export const CONFIG_FILE_NAME = 'config.yaml'

// ---------------------------------------------------------------------------
// Deep merge utility
// ---------------------------------------------------------------------------

/**
 * Merge `override` into a copy of `base`. Nested plain objects merge key by
 * key; arrays and scalars replace. `undefined` never overrides.
 */
export function deepMerge(
  base: Record<string, unknown>,
  override: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base }
  for (const [key, val] of Object.entries(override)) {
    if (val === undefined) continue
    const current = result[key]
    result[key] = isPlainObject(val) && isPlainObject(current) ? deepMerge(current, val) : val
  }
  return result
}

// ---------------------------------------------------------------------------
// Dot-notation key accessor / setter
// ---------------------------------------------------------------------------

function getByPath(obj: unknown, path: string): unknown {
  let cursor: unknown = obj
  for (const part of path.split('.')) {
    if (!isPlainObject(cursor)) return undefined
    cursor = cursor[part]
  }
  return cursor
}

function setByPath(target: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split('.')
  const lastKey = parts.pop()
  if (lastKey === undefined) return

  let cursor = target
  for (const part of parts) {
    const existing = cursor[part]
    if (isPlainObject(existing)) {
      cursor = existing
    } else {
      const next: Record<string, unknown> = {}
      cursor[part] = next
      cursor = next
    }
  }
  cursor[lastKey] = value
}

// ---------------------------------------------------------------------------
// Environment variable resolution
// ---------------------------------------------------------------------------

interface EnvBinding {
  path: string
  kind: 'string' | 'int'
}

/**
 * Map of ETUDE_ environment variable names to config paths.
 * Only overrides scalar values; sections cannot be declared via env.
 */
export const ENV_VAR_MAP: Readonly<Record<string, EnvBinding>> = {
  ETUDE_LOG_LEVEL: { path: 'log_level', kind: 'string' },
  ETUDE_REPO_OWNER: { path: 'repository.owner', kind: 'string' },
  ETUDE_REPO_NAME: { path: 'repository.name', kind: 'string' },
  ETUDE_TAG_PREFIX: { path: 'resolver.tag_prefix', kind: 'string' },
  ETUDE_DAYS_TO_TRY: { path: 'resolver.days_to_try', kind: 'int' },
  ETUDE_MAX_RETRIES: { path: 'resolver.max_retries', kind: 'int' },
  ETUDE_RETRY_DELAY_MS: { path: 'resolver.retry_delay_ms', kind: 'int' },
  ETUDE_MOCK_DATA_URL: { path: 'resolver.override_url', kind: 'string' },
  ETUDE_CONCURRENCY: { path: 'aggregator.concurrency', kind: 'int' },
  ETUDE_TIMEOUT_MS: { path: 'aggregator.default_timeout_ms', kind: 'int' },
}

/**
 * Read relevant environment variables and return a partial config overlay.
 * Invalid values are logged and ignored.
 */
function readEnvOverrides(env: NodeJS.ProcessEnv = process.env): PartialEtudeConfig {
  let overrides: Record<string, unknown> = {}

  for (const [envKey, binding] of Object.entries(ENV_VAR_MAP)) {
    const rawValue = env[envKey]
    if (rawValue === undefined || rawValue === '') continue
    const value = binding.kind === 'int' && /^\d+$/.test(rawValue) ? parseInt(rawValue, 10) : rawValue
    const overlay: Record<string, unknown> = {}
    setByPath(overlay, binding.path, value)

    // Each variable is checked alone so one bad value does not drop the others
    const parsed = PartialEtudeConfigSchema.safeParse(overlay)
    if (!parsed.success) {
      logger.warn({ envKey, errors: parsed.error.issues }, 'Invalid environment variable override ignored')
      continue
    }
    overrides = deepMerge(overrides, overlay)
  }

  return PartialEtudeConfigSchema.parse(overrides)
}

function formatIssues(issues: readonly { path: (string | number)[]; message: string }[]): string {
  return issues.map((issue) => `  • ${issue.path.join('.')}: ${issue.message}`).join('\n')
}

// ---------------------------------------------------------------------------
// ConfigSystemImpl
// ---------------------------------------------------------------------------

export class ConfigSystemImpl implements ConfigSystem {
  private _config: EtudeConfig | null = null
  private readonly _configDir: string
  private readonly _cliOverrides: PartialEtudeConfig

  constructor(options: ConfigSystemOptions = {}) {
    this._configDir = options.configDir
      ? resolve(options.configDir)
      : resolve(process.cwd(), '.etude')
    this._cliOverrides = options.cliOverrides ?? {}
  }

  get isLoaded(): boolean {
    return this._config !== null
  }

  get configPath(): string {
    return join(this._configDir, CONFIG_FILE_NAME)
  }

  async load(): Promise<void> {
    // 1. Start with built-in defaults
    let merged: Record<string, unknown> = structuredClone(DEFAULT_CONFIG)

    // 2. Apply project config if present
    const projectConfig = await this._loadYamlFile(this.configPath)
    if (projectConfig !== null) {
      merged = deepMerge(merged, projectConfig)
    }

    // 3. Apply environment variable overrides
    const envOverrides = readEnvOverrides()
    if (Object.keys(envOverrides).length > 0) {
      merged = deepMerge(merged, envOverrides)
    }

    // 4. Apply CLI flag overrides
    if (Object.keys(this._cliOverrides).length > 0) {
      merged = deepMerge(merged, this._cliOverrides)
    }

    // 5. Validate the merged config
    const result = EtudeConfigSchema.safeParse(merged)
    if (!result.success) {
      throw new ConfigError(
        `Configuration validation failed:\n${formatIssues(result.error.issues)}`,
        { issues: result.error.issues }
      )
    }

    this._config = result.data
    logger.debug({ sections: Object.keys(result.data.sections).length }, 'Configuration loaded successfully')
  }

  getConfig(): EtudeConfig {
    if (this._config === null) {
      throw new ConfigError('Configuration has not been loaded. Call load() before getConfig().')
    }
    return this._config
  }

  get(key: string): unknown {
    return getByPath(this.getConfig(), key)
  }

  getMasked(): unknown {
    return deepMask(this.getConfig())
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private async _fileExists(filePath: string): Promise<boolean> {
    try {
      await access(filePath)
      return true
    } catch {
      return false
    }
  }

  private async _loadYamlFile(filePath: string): Promise<PartialEtudeConfig | null> {
    if (!(await this._fileExists(filePath))) {
      logger.debug({ filePath }, 'No config file; using defaults')
      return null
    }

    let parsed: unknown
    try {
      const raw = await readFile(filePath, 'utf-8')
      parsed = yaml.load(raw)
    } catch (err) {
      throw new ConfigError(`Failed to read config file at ${filePath}: ${errorMessage(err)}`, { filePath })
    }

    // An empty file loads as undefined
    if (parsed === undefined || parsed === null) return {}

    const result = PartialEtudeConfigSchema.safeParse(parsed)
    if (!result.success) {
      throw new ConfigError(
        `Invalid config file at ${filePath}:\n${formatIssues(result.error.issues)}`,
        { filePath, issues: result.error.issues }
      )
    }
    return result.data
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

/**
 * Create a new ConfigSystem instance.
 *
 * @example
 * const config = createConfigSystem()
 * await config.load()
 * const cfg = config.getConfig()
 */
export function createConfigSystem(options: ConfigSystemOptions = {}): ConfigSystem {
  return new ConfigSystemImpl(options)
}
