/**
 * section-runner module: runs one section's fetch tasks into a SectionResult.
 */

export type { SectionStatus, SectionResult, RunSectionOptions } from './types.js'
export {
  runSection,
  computeSectionStatus,
  assertUniqueTaskNames,
  NO_RESOURCES_MESSAGE,
} from './section-runner.js'
