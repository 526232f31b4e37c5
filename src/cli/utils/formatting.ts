/**
 * CLI output formatting utilities
 *
 * Provides human-readable table formatting for snapshot summaries and theme
 * class listings.
 */

import type { Snapshot } from '../../modules/snapshot/schemas.js'
import type { Theme } from '../../modules/theme/types.js'

/**
 * A row in the snapshot summary table.
 */
export interface SectionSummaryRow {
  section: string
  status: string
  fetched: string
}

/**
 * Build summary rows from a snapshot, one per section in document order.
 * `fetched` counts the tasks whose data value is not null.
 */
export function buildSectionSummaryRows(snapshot: Snapshot): SectionSummaryRow[] {
  return Object.entries(snapshot).map(([section, result]) => {
    const values = result.data === null ? [] : Object.values(result.data)
    const fetched = values.filter((value) => value !== null).length
    return {
      section,
      status: result.status,
      fetched: result.data === null ? '-' : `${String(fetched)}/${String(values.length)}`,
    }
  })
}

/**
 * Format a table from an array of row objects.
 *
 * Computes column widths from headers + data, then renders aligned columns
 * separated by ` | ` with a header separator row.
 *
 * @param headers - Column header names (in order)
 * @param rows    - Array of row objects (values indexed by key)
 * @param keys    - Object keys to read from each row (in column order)
 * @returns Formatted string ready for console output
 */
export function formatTable(
  headers: string[],
  rows: Record<string, string>[],
  keys: string[]
): string {
  const widths = headers.map((header, i) => {
    const key = keys[i] ?? header
    const dataMax = rows.reduce((max, row) => {
      const val = row[key] ?? ''
      return Math.max(max, val.length)
    }, 0)
    return Math.max(header.length, dataMax)
  })

  const separator = widths.map((w) => '-'.repeat(w)).join('-+-')
  const headerRow = headers.map((h, i) => h.padEnd(widths[i] ?? h.length)).join(' | ')

  const dataRows = rows.map((row) =>
    keys.map((key, i) => {
      const val = row[key] ?? ''
      return val.padEnd(widths[i] ?? val.length)
    }).join(' | ')
  )

  return [headerRow, separator, ...dataRows].join('\n')
}

/**
 * Format a snapshot as a per-section status table.
 */
export function formatSnapshotTable(snapshot: Snapshot): string {
  const rows: Record<string, string>[] = buildSectionSummaryRows(snapshot).map((r) => ({
    section: r.section,
    status: r.status,
    fetched: r.fetched,
  }))
  return formatTable(['Section', 'Status', 'Fetched'], rows, ['section', 'status', 'fetched'])
}

/**
 * Format a theme's full role → class mapping as a table.
 */
export function formatThemeClassesTable(theme: Theme): string {
  const rows = Object.entries(theme.getClasses()).map(([role, className]) => ({ role, className }))
  return formatTable(['Role', 'Class'], rows, ['role', 'className'])
}
