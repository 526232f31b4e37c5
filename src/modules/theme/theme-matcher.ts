/**
 * Best-match theme selection.
 *
 * A theme is a candidate when every tag it declares is in the context; its
 * score is the number of tags it declares. The highest score wins and ties go
 * to the lexicographically smallest name (code-unit order). The default theme
 * (no tags) is a candidate for any context and wins only when nothing more
 * specific matches.
 */

import { ThemeConfigError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import { ContextFactory } from './context-factory.js'
import { isDefaultTheme } from './theme.js'
import type { Theme } from './types.js'

const logger = createLogger('theme-matcher')

function isSubsetOf(tags: ReadonlySet<string>, context: ReadonlySet<string>): boolean {
  for (const tag of tags) {
    if (!context.has(tag)) return false
  }
  return true
}

function byName(a: Theme, b: Theme): number {
  if (a.name < b.name) return -1
  if (a.name > b.name) return 1
  return 0
}

/**
 * Pure matching core. Returns null only when no theme is a candidate, which
 * can happen only if no default theme is among `themes`.
 */
export function matchTheme(themes: Iterable<Theme>, context: ReadonlySet<string>): Theme | null {
  let best: Theme[] = []
  let maxScore = -1

  for (const theme of themes) {
    if (!isSubsetOf(theme.tags, context)) continue
    const score = theme.tags.size
    if (score > maxScore) {
      maxScore = score
      best = [theme]
    } else if (score === maxScore) {
      best.push(theme)
    }
  }

  if (best.length > 1) {
    logger.debug(
      { score: maxScore, tied: best.map((t) => t.name) },
      'Multiple themes share the best score; choosing by name'
    )
    best.sort(byName)
  }
  return best[0] ?? null
}

/**
 * A usable theme set holds exactly one default theme.
 *
 * @throws {ThemeConfigError} when the set has no default theme or several
 */
export function assertSingleDefault(themes: readonly Theme[]): void {
  const defaults = themes.filter(isDefaultTheme)
  if (defaults.length === 0) {
    throw new ThemeConfigError('No default theme (empty tag set) is registered', {
      themes: themes.map((t) => t.name),
    })
  }
  if (defaults.length > 1) {
    const names = defaults.map((t) => t.name)
    throw new ThemeConfigError(
      `Exactly one default theme (empty tag set) may be registered; found ${names.map((n) => `"${n}"`).join(', ')}`,
      { defaults: names }
    )
  }
}

/**
 * Select the best theme for an explicit context.
 *
 * @throws {ThemeConfigError} unless `themes` holds exactly one default theme
 */
export function selectThemeForContext(themes: Iterable<Theme>, context: ReadonlySet<string>): Theme {
  const registered = [...themes]
  assertSingleDefault(registered)
  const theme = matchTheme(registered, context)
  if (theme === null) {
    throw new ThemeConfigError('No default theme (empty tag set) is registered', { context: [...context] })
  }
  logger.debug({ theme: theme.name, context: [...context] }, 'Theme selected')
  return theme
}

export interface SelectThemeOptions {
  /** Instant the ambient taggers evaluate (default: now) */
  now?: Date
  /** Factory producing ambient tags (default: time of day + season) */
  contextFactory?: ContextFactory
}

/**
 * Build the context from ambient signals plus `extraTags` and select the
 * best-matching theme.
 *
 * @throws {ThemeConfigError} unless `themes` holds exactly one default theme
 */
export function selectTheme(
  themes: Iterable<Theme>,
  extraTags: Iterable<string> = [],
  options: SelectThemeOptions = {}
): Theme {
  const factory = options.contextFactory ?? new ContextFactory()
  return selectThemeForContext(themes, factory.buildContext(extraTags, options.now))
}
