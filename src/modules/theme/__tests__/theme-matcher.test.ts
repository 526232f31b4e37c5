/**
 * Unit tests for theme matching
 *
 * Tests:
 *  - Subset candidacy and cardinality scoring
 *  - Lexicographic tie-break
 *  - Default fallback and missing-default failure
 */

import { describe, it, expect } from 'vitest'
import { defineTheme } from '../theme.js'
import { assertSingleDefault, matchTheme, selectTheme, selectThemeForContext } from '../theme-matcher.js'
import { ContextFactory } from '../context-factory.js'
import { ThemeConfigError } from '../../../core/errors.js'

const A = defineTheme({ name: 'A', tags: ['x'] })
const B = defineTheme({ name: 'B', tags: ['x', 'y'] })
const DEFAULT = defineTheme({ name: 'Default' })

describe('matchTheme', () => {
  it('picks the candidate with the most tags', () => {
    expect(matchTheme([A, B, DEFAULT], new Set(['x', 'y', 'z']))?.name).toBe('B')
  })

  it('falls back to the default when no tagged theme is a subset of the context', () => {
    expect(matchTheme([A, B, DEFAULT], new Set(['z']))?.name).toBe('Default')
  })

  it('ignores themes declaring a tag missing from the context', () => {
    expect(matchTheme([A, B, DEFAULT], new Set(['x']))?.name).toBe('A')
  })

  it('breaks ties by the smallest name, whatever the registration order', () => {
    const onlyY = defineTheme({ name: 'B', tags: ['y'] })
    const context = new Set(['x', 'y'])
    expect(matchTheme([onlyY, A], context)?.name).toBe('A')
    expect(matchTheme([A, onlyY], context)?.name).toBe('A')
  })

  it('compares names by code unit, so uppercase sorts before lowercase', () => {
    const lower = defineTheme({ name: 'alpha', tags: ['x'] })
    const upper = defineTheme({ name: 'Zeta', tags: ['x'] })
    expect(matchTheme([lower, upper], new Set(['x']))?.name).toBe('Zeta')
  })

  it('returns null when nothing matches and there is no default', () => {
    expect(matchTheme([A, B], new Set(['z']))).toBeNull()
  })
})

describe('selectThemeForContext', () => {
  it('fails loudly without a default, even when a tagged theme matches', () => {
    expect(() => selectThemeForContext([A, B], new Set(['x', 'y']))).toThrow(
      'No default theme (empty tag set) is registered'
    )
  })

  it('fails loudly when nothing matches and no default exists', () => {
    expect(() => selectThemeForContext([A, B], new Set(['z']))).toThrow(ThemeConfigError)
  })

  it('rejects a theme set with two defaults instead of picking one by name', () => {
    const other = defineTheme({ name: 'Other' })
    expect(() => selectThemeForContext([other, DEFAULT, A], new Set(['x']))).toThrow(
      'Exactly one default theme (empty tag set) may be registered; found "Other", "Default"'
    )
  })

  it('selects normally with exactly one default', () => {
    expect(selectThemeForContext([A, B, DEFAULT], new Set(['x'])).name).toBe('A')
  })
})

describe('assertSingleDefault', () => {
  it('accepts a set with one default', () => {
    expect(() => assertSingleDefault([A, DEFAULT])).not.toThrow()
  })

  it('rejects an empty set', () => {
    expect(() => assertSingleDefault([])).toThrow(ThemeConfigError)
  })
})

describe('selectTheme', () => {
  it('adds ambient tags to the caller tags', () => {
    const morning = defineTheme({ name: 'morning', tags: ['time_of_day:morning'] })
    const morningHome = defineTheme({ name: 'morning_home', tags: ['time_of_day:morning', 'page:home'] })
    const themes = [DEFAULT, morning, morningHome]
    const at = new Date(2024, 6, 14, 9, 0)

    expect(selectTheme(themes, ['page:home'], { now: at }).name).toBe('morning_home')
    expect(selectTheme(themes, ['page:about'], { now: at }).name).toBe('morning')
    expect(selectTheme(themes, ['page:home'], { now: new Date(2024, 6, 14, 23, 0) }).name).toBe('Default')
  })

  it('fails loudly without a default whatever the time of day', () => {
    const morning = defineTheme({ name: 'morning', tags: ['time_of_day:morning'] })
    expect(() => selectTheme([morning], [], { now: new Date(2024, 6, 14, 9, 0) })).toThrow(ThemeConfigError)
    expect(() => selectTheme([morning], [], { now: new Date(2024, 6, 14, 23, 0) })).toThrow(ThemeConfigError)
  })

  it('uses only caller tags with a factory that has no taggers', () => {
    const factory = new ContextFactory({ defaultTaggers: false })
    expect(selectTheme([A, B, DEFAULT], ['x', 'y'], { contextFactory: factory }).name).toBe('B')
  })
})
