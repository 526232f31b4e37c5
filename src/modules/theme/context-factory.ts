/**
 * ContextFactory: builds the tag set used for theme selection.
 *
 * The context is the union of caller-supplied tags (e.g. `section:one`) and
 * the tags produced by every registered tagger for the current instant.
 * Default taggers read the instant's local calendar fields, so a page
 * follows the visitor's clock.
 */

import type { Tagger } from './types.js'

/**
 * Time-of-day bucket plus day/night period.
 *
 *   05–11 → morning / day
 *   12–17 → afternoon / day
 *   18–21 → evening / night
 *   22–04 → night / night
 */
export const timeOfDayTagger: Tagger = (now) => {
  const hour = now.getHours()
  if (hour >= 5 && hour < 12) return ['time_of_day:morning', 'day_period:day']
  if (hour >= 12 && hour < 18) return ['time_of_day:afternoon', 'day_period:day']
  if (hour >= 18 && hour < 22) return ['time_of_day:evening', 'day_period:night']
  return ['time_of_day:night', 'day_period:night']
}

/** Northern-hemisphere meteorological season. */
export const seasonTagger: Tagger = (now) => {
  const month = now.getMonth()
  if (month >= 2 && month <= 4) return ['season:spring']
  if (month >= 5 && month <= 7) return ['season:summer']
  if (month >= 8 && month <= 10) return ['season:fall']
  return ['season:winter']
}

export class ContextFactory {
  private readonly _taggers: Tagger[] = []

  constructor(options: { defaultTaggers?: boolean } = {}) {
    if (options.defaultTaggers !== false) {
      this.registerTagger(timeOfDayTagger)
      this.registerTagger(seasonTagger)
    }
  }

  registerTagger(tagger: Tagger): this {
    this._taggers.push(tagger)
    return this
  }

  /**
   * Build the context for one selection call.
   *
   * @param additionalTags - Call-site tags, e.g. the page identity
   * @param now - Instant the ambient taggers evaluate
   */
  buildContext(additionalTags: Iterable<string> = [], now: Date = new Date()): Set<string> {
    const context = new Set(additionalTags)
    for (const tagger of this._taggers) {
      for (const tag of tagger(now)) context.add(tag)
    }
    return context
  }
}
