/**
 * Barrel exports for the config module.
 */

export { createConfigSystem, ConfigSystemImpl, CONFIG_FILE_NAME, ENV_VAR_MAP, deepMerge } from './config-system-impl.js'
export type { ConfigSystem, ConfigSystemOptions } from './config-system.js'
export {
  EtudeConfigSchema,
  PartialEtudeConfigSchema,
  TaskConfigSchema,
  SectionConfigSchema,
  LogLevelSchema,
} from './config-schema.js'
export type {
  EtudeConfig,
  PartialEtudeConfig,
  TaskConfig,
  SectionConfig,
  ResolverSettings,
  AggregatorSettings,
  RepositoryConfig,
} from './config-schema.js'
export { DEFAULT_CONFIG, DEFAULT_RESOLVER_SETTINGS, DEFAULT_AGGREGATOR_SETTINGS } from './defaults.js'
export { buildRegistryFromConfig, toNamedTask } from './registry-builder.js'
