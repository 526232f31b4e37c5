/**
 * ThemeRegistry: the fixed set of themes available to a page.
 *
 * Populated once at startup and read-only afterwards. Registration rejects
 * duplicate names and a second default theme so that selection is always
 * well defined.
 */

import { ThemeConfigError } from '../../core/errors.js'
import { ContextFactory } from './context-factory.js'
import { defineTheme, isDefaultTheme } from './theme.js'
import { selectThemeForContext } from './theme-matcher.js'
import type { Theme, ThemeDefinition } from './types.js'

export class ThemeRegistry {
  private readonly _themes = new Map<string, Theme>()
  private readonly _contextFactory: ContextFactory

  constructor(contextFactory: ContextFactory = new ContextFactory()) {
    this._contextFactory = contextFactory
  }

  /**
   * @throws {ThemeConfigError} on a duplicate name or a second default theme
   */
  register(theme: Theme | ThemeDefinition): this {
    const resolved = 'getClasses' in theme ? theme : defineTheme(theme)
    if (this._themes.has(resolved.name)) {
      throw new ThemeConfigError(`Theme "${resolved.name}" is already registered`, { name: resolved.name })
    }
    const existingDefault = this.getDefault()
    if (isDefaultTheme(resolved) && existingDefault !== undefined) {
      throw new ThemeConfigError(
        `Theme "${resolved.name}" has no tags but "${existingDefault.name}" is already the default theme`,
        { name: resolved.name, default: existingDefault.name }
      )
    }
    this._themes.set(resolved.name, resolved)
    return this
  }

  get(name: string): Theme | undefined {
    return this._themes.get(name)
  }

  /** The theme with an empty tag set, if registered */
  getDefault(): Theme | undefined {
    for (const theme of this._themes.values()) {
      if (isDefaultTheme(theme)) return theme
    }
    return undefined
  }

  /** Themes in registration order */
  list(): Theme[] {
    return [...this._themes.values()]
  }

  get size(): number {
    return this._themes.size
  }

  /**
   * Context tags for a selection call: `extraTags` plus ambient tags.
   */
  buildContext(extraTags: Iterable<string> = [], now: Date = new Date()): Set<string> {
    return this._contextFactory.buildContext(extraTags, now)
  }

  /**
   * Select the best theme for the current ambient context plus `extraTags`.
   *
   * @throws {ThemeConfigError} if no default theme is registered
   */
  select(extraTags: Iterable<string> = [], now: Date = new Date()): Theme {
    return selectThemeForContext(this._themes.values(), this.buildContext(extraTags, now))
  }
}
