/**
 * ResolutionMachine: state machine driving the backward day search.
 *
 * State transitions:
 *   trying_day → success    (attempt returned a valid snapshot)
 *   trying_day → advancing  (snapshot absent, or transient failure with no attempts left)
 *   trying_day → retrying   (transient failure, attempts remain for this day)
 *   retrying   → trying_day (same day, next attempt)
 *   advancing  → trying_day (next older day)
 *   advancing  → exhausted  (day window used up)
 *
 * The machine performs no I/O; the resolver feeds it attempt outcomes and
 * acts on the resulting state (fetch, wait, or stop).
 */

import type { Snapshot } from '../snapshot/schemas.js'

export type ResolutionState = 'trying_day' | 'retrying' | 'advancing' | 'success' | 'exhausted'

/** Valid state transitions map */
const VALID_TRANSITIONS: Record<ResolutionState, readonly ResolutionState[]> = {
  trying_day: ['success', 'advancing', 'retrying'],
  retrying: ['trying_day'],
  advancing: ['trying_day', 'exhausted'],
  success: [],
  exhausted: [],
}

/** Classification of a single retrieval attempt */
export type AttemptOutcome =
  | { kind: 'found'; data: Snapshot }
  | { kind: 'absent' }
  | { kind: 'transient'; reason: string }

export interface ResolutionLimits {
  daysToTry: number
  maxRetries: number
}

export class ResolutionMachine {
  private _state: ResolutionState = 'trying_day'
  private _dayOffset = 0
  private _attempt = 0
  private _attemptsMade = 0
  private _data: Snapshot | null = null

  constructor(private readonly _limits: ResolutionLimits) {}

  get state(): ResolutionState {
    return this._state
  }

  /** Days before today of the day being tried (0 = today) */
  get dayOffset(): number {
    return this._dayOffset
  }

  /** Zero-based attempt index within the current day */
  get attempt(): number {
    return this._attempt
  }

  /** Retrieval attempts made so far across all days */
  get attemptsMade(): number {
    return this._attemptsMade
  }

  /** Snapshot found, once in `success` */
  get data(): Snapshot | null {
    return this._data
  }

  get isTerminal(): boolean {
    return this._state === 'success' || this._state === 'exhausted'
  }

  /**
   * Feed the outcome of the attempt just made for the current day.
   * Valid only in `trying_day`.
   */
  record(outcome: AttemptOutcome): ResolutionState {
    this._assertState('trying_day')
    this._attemptsMade += 1

    switch (outcome.kind) {
      case 'found':
        this._data = outcome.data
        this._transition('success')
        break
      case 'absent':
        this._transition('advancing')
        break
      case 'transient':
        this._transition(this._attempt < this._limits.maxRetries ? 'retrying' : 'advancing')
        break
    }
    return this._state
  }

  /**
   * Leave `retrying` or `advancing` for the next attempt, or for `exhausted`
   * when the day window is used up.
   */
  next(): ResolutionState {
    if (this._state === 'retrying') {
      this._attempt += 1
      this._transition('trying_day')
    } else if (this._state === 'advancing') {
      if (this._dayOffset + 1 < this._limits.daysToTry) {
        this._dayOffset += 1
        this._attempt = 0
        this._transition('trying_day')
      } else {
        this._transition('exhausted')
      }
    } else {
      throw new Error(`next() requires retrying or advancing state; current state is ${this._state}`)
    }
    return this._state
  }

  private _assertState(expected: ResolutionState): void {
    if (this._state !== expected) {
      throw new Error(`Expected state ${expected}; current state is ${this._state}`)
    }
  }

  private _transition(newState: ResolutionState): void {
    const allowed = VALID_TRANSITIONS[this._state]
    if (!allowed.includes(newState)) {
      throw new Error(
        `Invalid state transition: ${this._state} → ${newState}. ` +
          `Allowed from ${this._state}: [${allowed.join(', ')}]`
      )
    }
    this._state = newState
  }
}
