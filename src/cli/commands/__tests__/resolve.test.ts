/**
 * Unit tests for `src/cli/commands/resolve.ts`
 *
 * Tests:
 *  - Exit codes for success, not found, error and invalid configuration
 *  - Repository coordinates from arguments or config
 *  - --quiet and --override-url
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { mkdir, writeFile, rm } from 'fs/promises'
import { join } from 'path'
import { tmpdir } from 'os'
import { runResolveAction, RESOLVE_EXIT_NOT_FOUND } from '../resolve.js'
import { EXIT_ERROR, EXIT_INVALID, EXIT_SUCCESS } from '../../utils/config-loading.js'
import type { FetchFn } from '../../../modules/fetch-task/types.js'
import type { Snapshot } from '../../../modules/snapshot/schemas.js'

// ---------------------------------------------------------------------------
// Test setup
// ---------------------------------------------------------------------------

const NOW = new Date('2024-07-14T08:00:00Z')
const TODAY_URL = 'https://github.com/octo/etude/releases/download/data-2024-07-14/daily_etude_data.json'
const SNAPSHOT: Snapshot = { one: { status: 'OK', data: { motto: 'Steady.' }, actions_log: [] } }

let testDir: string
let configDir: string

beforeEach(async () => {
  testDir = join(tmpdir(), `etude-resolve-cmd-test-${String(Date.now())}-${Math.random().toString(36).slice(2)}`)
  configDir = join(testDir, '.etude')
  await mkdir(configDir, { recursive: true })
})

afterEach(async () => {
  await rm(testDir, { recursive: true, force: true })
  vi.restoreAllMocks()
})

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function captureOutput(): { getStdout: () => string; getStderr: () => string; restore: () => void } {
  let stdout = ''
  let stderr = ''
  const stdoutSpy = vi.spyOn(process.stdout, 'write').mockImplementation((data: string | Uint8Array) => {
    stdout += typeof data === 'string' ? data : data.toString()
    return true
  })
  const stderrSpy = vi.spyOn(process.stderr, 'write').mockImplementation((data: string | Uint8Array) => {
    stderr += typeof data === 'string' ? data : data.toString()
    return true
  })
  return {
    getStdout: () => stdout,
    getStderr: () => stderr,
    restore: (): void => {
      stdoutSpy.mockRestore()
      stderrSpy.mockRestore()
    },
  }
}

/** Serves SNAPSHOT at the listed addresses and 404 everywhere else. */
function servingAt(...urls: string[]): { fetchFn: FetchFn; calls: string[] } {
  const calls: string[] = []
  const fetchFn: FetchFn = async (url) => {
    calls.push(url)
    return urls.includes(url)
      ? new Response(JSON.stringify(SNAPSHOT), { status: 200 })
      : new Response('', { status: 404 })
  }
  return { fetchFn, calls }
}

// ---------------------------------------------------------------------------
// runResolveAction
// ---------------------------------------------------------------------------

describe('runResolveAction', () => {
  it("prints today's snapshot and exits 0", async () => {
    const { fetchFn } = servingAt(TODAY_URL)
    const { getStdout, getStderr, restore } = captureOutput()
    try {
      const exitCode = await runResolveAction({ owner: 'octo', repo: 'etude', configDir, fetchFn, now: NOW })
      expect(exitCode).toBe(EXIT_SUCCESS)
      expect(getStderr()).toBe('[success] Data loaded from release data-2024-07-14.\n')
      expect(JSON.parse(getStdout())).toEqual({
        status: 'success',
        data: SNAPSHOT,
        version_tag: 'data-2024-07-14',
        message: 'Successfully loaded data from release data-2024-07-14.',
      })
    } finally {
      restore()
    }
  })

  it('exits 3 when no release exists in the window', async () => {
    const { fetchFn, calls } = servingAt()
    const { getStderr, restore } = captureOutput()
    try {
      const exitCode = await runResolveAction({
        owner: 'octo',
        repo: 'etude',
        configDir,
        days: 2,
        delay: 0,
        fetchFn,
        now: NOW,
      })
      expect(exitCode).toBe(RESOLVE_EXIT_NOT_FOUND)
      expect(calls).toHaveLength(2)
      expect(getStderr()).toBe(
        '[warning] No recent data release is available yet. Showing the page without daily data.\n'
      )
    } finally {
      restore()
    }
  })

  it('exits 1 without repository coordinates', async () => {
    const { fetchFn, calls } = servingAt(TODAY_URL)
    const { getStderr, restore } = captureOutput()
    try {
      const exitCode = await runResolveAction({ configDir, fetchFn, now: NOW })
      expect(exitCode).toBe(EXIT_ERROR)
      expect(calls).toHaveLength(0)
      expect(getStderr()).toBe(
        '[error] Daily data could not be loaded: Repository owner and name must be provided.\n'
      )
    } finally {
      restore()
    }
  })

  it('reads the repository and search window from config', async () => {
    await writeFile(
      join(configDir, 'config.yaml'),
      'repository:\n  owner: octo\n  name: etude\nresolver:\n  days_to_try: 1\n',
      'utf-8'
    )
    const { fetchFn, calls } = servingAt()
    const { restore } = captureOutput()
    try {
      const exitCode = await runResolveAction({ configDir, fetchFn, now: NOW })
      expect(exitCode).toBe(RESOLVE_EXIT_NOT_FOUND)
      expect(calls).toEqual([TODAY_URL])
    } finally {
      restore()
    }
  })

  it('prints only the status line with quiet', async () => {
    const { fetchFn } = servingAt(TODAY_URL)
    const { getStdout, restore } = captureOutput()
    try {
      await runResolveAction({ owner: 'octo', repo: 'etude', configDir, quiet: true, fetchFn, now: NOW })
      expect(getStdout()).toBe('')
    } finally {
      restore()
    }
  })

  it('loads from a fixed address with --override-url', async () => {
    const mockUrl = 'http://localhost:8000/daily_etude_data.json'
    const { fetchFn, calls } = servingAt(mockUrl)
    const { getStdout, restore } = captureOutput()
    try {
      const exitCode = await runResolveAction({ configDir, overrideUrl: mockUrl, fetchFn })
      expect(exitCode).toBe(EXIT_SUCCESS)
      expect(calls).toEqual([mockUrl])
      expect(JSON.parse(getStdout()).data).toEqual(SNAPSHOT)
    } finally {
      restore()
    }
  })

  it('exits 2 when an override fails validation', async () => {
    const { fetchFn, calls } = servingAt()
    const { getStderr, restore } = captureOutput()
    try {
      const exitCode = await runResolveAction({ owner: 'octo', repo: 'etude', configDir, days: 0, fetchFn })
      expect(exitCode).toBe(EXIT_INVALID)
      expect(calls).toHaveLength(0)
      expect(getStderr()).toContain('Configuration error: Configuration validation failed:')
    } finally {
      restore()
    }
  })
})
