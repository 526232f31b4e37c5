/**
 * Theme construction.
 */

import { ThemeConfigError } from '../../core/errors.js'
import type { Theme, ThemeDefinition, WidgetClasses } from './types.js'

/** Classes used for any role a theme does not override */
export const DEFAULT_WIDGET_CLASSES: Readonly<WidgetClasses> = {
  title: 'widget-title',
  body: 'widget-body',
  citation: 'widget-citation',
  code_block: 'widget-code-block',
  status_table: 'widget-status-table',
  status_ok: 'status-ok',
  status_fail: 'status-fail',
  status_warn: 'status-warn',
}

/**
 * Build an immutable theme.
 *
 * @throws {ThemeConfigError} if the name is empty
 */
export function defineTheme(definition: ThemeDefinition): Theme {
  const name = definition.name.trim()
  if (name.length === 0) {
    throw new ThemeConfigError('A theme must have a name.')
  }
  const widgetClasses = Object.freeze({ ...definition.widgetClasses })

  return Object.freeze({
    name,
    tags: new Set(definition.tags ?? []),
    stylesheet: definition.stylesheet ?? '',
    widgetClasses,
    getClasses(): WidgetClasses {
      return { ...DEFAULT_WIDGET_CLASSES, ...widgetClasses }
    },
  })
}

/** Whether this is the fallback theme (no tags). */
export function isDefaultTheme(theme: Theme): boolean {
  return theme.tags.size === 0
}
