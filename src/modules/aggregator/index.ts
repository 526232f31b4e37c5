/**
 * aggregator module: build-side snapshot production.
 */

export { SectionRegistry } from './section-registry.js'
export type { SectionProvider, SectionEntry } from './section-registry.js'
export { runAll } from './aggregator.js'
export type { RunAllOptions, SectionSource } from './aggregator.js'
export { getReleaseTag, getReleaseInfo, isValidTag } from './release-metadata.js'
export type { ReleaseInfo } from './release-metadata.js'
