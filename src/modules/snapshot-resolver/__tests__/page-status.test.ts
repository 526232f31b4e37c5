/**
 * Unit tests for describeResolution
 */

import { describe, it, expect } from 'vitest'
import { describeResolution } from '../page-status.js'

describe('describeResolution', () => {
  it('names the release on success', () => {
    const status = describeResolution({
      status: 'success',
      data: {},
      version_tag: 'data-2024-07-14',
      message: 'Successfully loaded data from release data-2024-07-14.',
    })
    expect(status).toEqual({
      level: 'success',
      message: 'Data loaded from release data-2024-07-14.',
      className: 'status-success',
    })
  })

  it('shows a warning, not stale data, when nothing was found', () => {
    const status = describeResolution({
      status: 'not_found',
      data: null,
      version_tag: null,
      message: 'Could not find a valid data release after checking the last 7 days.',
    })
    expect(status.level).toBe('warning')
    expect(status.className).toBe('status-warning')
    expect(status.message).toBe('No recent data release is available yet. Showing the page without daily data.')
  })

  it('includes the resolver message on error', () => {
    const status = describeResolution({
      status: 'error',
      data: null,
      version_tag: null,
      message: 'Repository owner and name must be provided.',
    })
    expect(status).toEqual({
      level: 'error',
      message: 'Daily data could not be loaded: Repository owner and name must be provided.',
      className: 'status-error',
    })
  })
})
