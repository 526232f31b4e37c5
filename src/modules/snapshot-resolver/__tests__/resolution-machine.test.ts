/**
 * Unit tests for ResolutionMachine
 */

import { describe, it, expect } from 'vitest'
import { ResolutionMachine } from '../resolution-machine.js'
import type { Snapshot } from '../../snapshot/schemas.js'

const FOUND: Snapshot = { one: { status: 'NO_OP', data: null, actions_log: [] } }

describe('ResolutionMachine', () => {
  it('starts trying today', () => {
    const machine = new ResolutionMachine({ daysToTry: 3, maxRetries: 1 })
    expect(machine.state).toBe('trying_day')
    expect(machine.dayOffset).toBe(0)
    expect(machine.attempt).toBe(0)
    expect(machine.isTerminal).toBe(false)
  })

  it('walks retry, advance and exhaustion in order', () => {
    const machine = new ResolutionMachine({ daysToTry: 2, maxRetries: 1 })

    expect(machine.record({ kind: 'transient', reason: 'HTTP 500' })).toBe('retrying')
    expect(machine.next()).toBe('trying_day')
    expect(machine.attempt).toBe(1)

    expect(machine.record({ kind: 'transient', reason: 'HTTP 500' })).toBe('advancing')
    expect(machine.next()).toBe('trying_day')
    expect(machine.dayOffset).toBe(1)
    expect(machine.attempt).toBe(0)

    expect(machine.record({ kind: 'absent' })).toBe('advancing')
    expect(machine.next()).toBe('exhausted')
    expect(machine.isTerminal).toBe(true)
    expect(machine.attemptsMade).toBe(3)
  })

  it('keeps the snapshot on success', () => {
    const machine = new ResolutionMachine({ daysToTry: 1, maxRetries: 0 })
    expect(machine.record({ kind: 'found', data: FOUND })).toBe('success')
    expect(machine.data).toBe(FOUND)
    expect(machine.isTerminal).toBe(true)
  })

  it('advances immediately on a transient failure when maxRetries is 0', () => {
    const machine = new ResolutionMachine({ daysToTry: 2, maxRetries: 0 })
    expect(machine.record({ kind: 'transient', reason: 'network error' })).toBe('advancing')
  })

  it('rejects record() outside trying_day', () => {
    const machine = new ResolutionMachine({ daysToTry: 2, maxRetries: 0 })
    machine.record({ kind: 'absent' })
    expect(() => machine.record({ kind: 'absent' })).toThrow(
      'Expected state trying_day; current state is advancing'
    )
  })

  it('rejects next() while trying a day', () => {
    const machine = new ResolutionMachine({ daysToTry: 2, maxRetries: 0 })
    expect(() => machine.next()).toThrow(
      'next() requires retrying or advancing state; current state is trying_day'
    )
  })
})
