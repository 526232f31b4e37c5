/**
 * Status-footer messaging for the three resolver outcomes.
 *
 * Pages render distinct text for each outcome and never present a
 * not_found or error result as fresh data.
 */

import type { ResolveResult } from './types.js'

export type StatusLevel = 'success' | 'warning' | 'error'

export interface PageStatus {
  level: StatusLevel
  message: string
  /** Style class for the footer element */
  className: string
}

const STATUS_CLASSES: Record<StatusLevel, string> = {
  success: 'status-success',
  warning: 'status-warning',
  error: 'status-error',
}

export function describeResolution(result: ResolveResult): PageStatus {
  switch (result.status) {
    case 'success':
      return {
        level: 'success',
        message: `Data loaded from release ${result.version_tag}.`,
        className: STATUS_CLASSES.success,
      }
    case 'not_found':
      return {
        level: 'warning',
        message: 'No recent data release is available yet. Showing the page without daily data.',
        className: STATUS_CLASSES.warning,
      }
    case 'error':
      return {
        level: 'error',
        message: `Daily data could not be loaded: ${result.message}`,
        className: STATUS_CLASSES.error,
      }
  }
}
