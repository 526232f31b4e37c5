/**
 * Built-in themes: a tagless default, four time-of-day "sun" variants and
 * two day/night "shade" variants.
 */

import { ContextFactory } from './context-factory.js'
import { ThemeRegistry } from './theme-registry.js'
import type { ThemeDefinition } from './types.js'

export const BUILTIN_THEMES: readonly ThemeDefinition[] = [
  {
    name: 'default',
    tags: [],
    stylesheet: '/assets/skins/css/default.css',
    widgetClasses: { title: 'default-title', body: 'default-body' },
  },
  {
    name: 'sun_morning',
    tags: ['time_of_day:morning'],
    stylesheet: '/assets/skins/css/sun.css',
    widgetClasses: { title: 'sun-title-morning', body: 'sun-body-morning' },
  },
  {
    name: 'sun_afternoon',
    tags: ['time_of_day:afternoon'],
    stylesheet: '/assets/skins/css/sun.css',
    widgetClasses: { title: 'sun-title-afternoon', body: 'sun-body-afternoon' },
  },
  {
    name: 'sun_evening',
    tags: ['time_of_day:evening'],
    stylesheet: '/assets/skins/css/sun.css',
    widgetClasses: { title: 'sun-title-evening', body: 'sun-body-evening' },
  },
  {
    name: 'sun_night',
    tags: ['time_of_day:night'],
    stylesheet: '/assets/skins/css/sun.css',
    widgetClasses: { title: 'sun-title-night', body: 'sun-body-night' },
  },
  {
    name: 'shade_day',
    tags: ['day_period:day'],
    stylesheet: '/assets/skins/css/shade.css',
    widgetClasses: { title: 'shade-title-day', body: 'shade-body-day' },
  },
  {
    name: 'shade_night',
    tags: ['day_period:night'],
    stylesheet: '/assets/skins/css/shade.css',
    widgetClasses: { title: 'shade-title-night', body: 'shade-body-night' },
  },
]

/**
 * A registry pre-populated with BUILTIN_THEMES.
 */
export function createBuiltinThemeRegistry(contextFactory?: ContextFactory): ThemeRegistry {
  const registry = new ThemeRegistry(contextFactory)
  for (const definition of BUILTIN_THEMES) {
    registry.register(definition)
  }
  return registry
}
