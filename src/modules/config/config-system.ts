/**
 * ConfigSystem interface: public contract for the configuration subsystem.
 *
 * All callers should depend on this interface, not the concrete implementation.
 * Create an instance via `createConfigSystem()` from config-system-impl.ts.
 */

import type { EtudeConfig, PartialEtudeConfig } from './config-schema.js'

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface ConfigSystemOptions {
  /** Path to the project-level .etude/ directory (default: <cwd>/.etude) */
  configDir?: string
  /**
   * Values that override everything else.
   * Typically populated from CLI flags.
   */
  cliOverrides?: PartialEtudeConfig
}

// ---------------------------------------------------------------------------
// ConfigSystem interface
// ---------------------------------------------------------------------------

/**
 * Provides access to fully-merged, validated configuration.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults < project config < env vars < CLI flags
 */
export interface ConfigSystem {
  /**
   * Load and validate configuration from all sources in hierarchy order.
   * Must be called before `getConfig()`.
   */
  load(): Promise<void>

  /**
   * @throws {ConfigError} if `load()` has not been called
   */
  getConfig(): EtudeConfig

  /**
   * Return a single value by dot-notation key (e.g. "resolver.days_to_try").
   */
  get(key: string): unknown

  /**
   * The merged config with credential fields and secret query parameters masked.
   * Safe to print.
   */
  getMasked(): unknown

  readonly isLoaded: boolean
}
