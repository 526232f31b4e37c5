/**
 * SectionRegistry: explicit, append-only list of content sections.
 *
 * Sections are registered by explicit calls at startup (see
 * `buildRegistryFromConfig()`), never by import side effects. Once frozen
 * the registry is read-only.
 */

import { TaskConfigError } from '../../core/errors.js'
import type { NamedTask } from '../fetch-task/types.js'
import { RESERVED_DOCUMENT_KEY } from '../snapshot/schemas.js'

/** Supplies the tasks of one section; invoked once per aggregation run */
export type SectionProvider = () => readonly NamedTask[] | Promise<readonly NamedTask[]>

export interface SectionEntry {
  readonly id: string
  readonly provider: SectionProvider
}

export class SectionRegistry {
  private readonly _entries: SectionEntry[] = []
  private _frozen = false

  /**
   * Append a section.
   *
   * @throws {TaskConfigError} if the id is empty, reserved or already registered, or the registry is frozen
   */
  register(id: string, provider: SectionProvider): this {
    if (this._frozen) {
      throw new TaskConfigError(`Cannot register section "${id}": registry is frozen`, { id })
    }
    if (id.trim().length === 0) {
      throw new TaskConfigError('Section identifier must be a non-empty string')
    }
    if (id === RESERVED_DOCUMENT_KEY) {
      throw new TaskConfigError(`Section identifier "${id}" is reserved`, { id })
    }
    if (this.has(id)) {
      throw new TaskConfigError(`Section "${id}" is already registered`, { id })
    }
    this._entries.push({ id, provider })
    return this
  }

  /** Convenience: register a section with a fixed task list. */
  registerTasks(id: string, tasks: readonly NamedTask[]): this {
    return this.register(id, () => tasks)
  }

  has(id: string): boolean {
    return this._entries.some((entry) => entry.id === id)
  }

  /** Entries in registration order. */
  list(): readonly SectionEntry[] {
    return [...this._entries]
  }

  get size(): number {
    return this._entries.length
  }

  get isFrozen(): boolean {
    return this._frozen
  }

  /** Make the registry read-only. */
  freeze(): this {
    this._frozen = true
    return this
  }
}
