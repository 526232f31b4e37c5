/**
 * theme module: presentation context matching.
 */

export type { Theme, ThemeDefinition, WidgetRole, WidgetClasses, Tagger } from './types.js'
export { defineTheme, isDefaultTheme, DEFAULT_WIDGET_CLASSES } from './theme.js'
export { ContextFactory, timeOfDayTagger, seasonTagger } from './context-factory.js'
export { matchTheme, selectTheme, selectThemeForContext, assertSingleDefault } from './theme-matcher.js'
export type { SelectThemeOptions } from './theme-matcher.js'
export { ThemeRegistry } from './theme-registry.js'
export { BUILTIN_THEMES, createBuiltinThemeRegistry } from './builtin-themes.js'
