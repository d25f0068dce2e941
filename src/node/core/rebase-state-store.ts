/**
 * Rebase State Store
 *
 * Durable home of the RebaseState between invocations. The executor saves
 * after every entry transition, so a crash loses at most the entry that was
 * being rebased.
 *
 * This module provides:
 * - An abstract interface for state persistence
 * - An in-memory implementation keeping the canonical form (tests, dry runs)
 * - A file implementation writing the legacy positional format atomically
 */

import { log } from '@shared/logger'
import type { RebaseState } from '@shared/types'
import fs from 'fs'
import path from 'path'
import { LegacyStateCodec } from '../domain/LegacyStateCodec'
import type { SkipTokenTable } from '../domain/SkipTokens'
import { STATE_FILE } from '../shared/constants'
import { AbortError } from '../shared/errors'

/**
 * Abstract interface for rebase state storage.
 */
export interface IRebaseStateStore {
  /** Human-readable location, used in messages. */
  readonly location: string

  /**
   * Load the persisted state.
   * @returns State or null if no rebase is in progress
   * @throws AbortError (or its StateFormatError subclass) when the state exists but cannot be read
   */
  load(): Promise<RebaseState | null>

  /** Replace the persisted state. */
  save(state: RebaseState): Promise<void>

  /** Delete the persisted state. Succeeds when there is none. */
  clear(): Promise<void>

  exists(): Promise<boolean>
}

/**
 * In-memory implementation of IRebaseStateStore.
 * Stores a deep copy so callers cannot mutate what was saved.
 */
export class InMemoryRebaseStateStore implements IRebaseStateStore {
  readonly location = 'memory'

  private state: RebaseState | null = null

  async load(): Promise<RebaseState | null> {
    return this.state ? structuredClone(this.state) : null
  }

  async save(state: RebaseState): Promise<void> {
    this.state = structuredClone(state)
  }

  async clear(): Promise<void> {
    this.state = null
  }

  async exists(): Promise<boolean> {
    return this.state !== null
  }
}

export type FileRebaseStateStoreOptions = {
  skipTokens?: SkipTokenTable
}

/**
 * File implementation of IRebaseStateStore, readable by older clients.
 *
 * Writes go to a temporary file that is fsynced and renamed over the state
 * file, so a reader sees either the previous state or the new one.
 */
export class FileRebaseStateStore implements IRebaseStateStore {
  readonly location: string

  constructor(
    private readonly stateDir: string,
    private readonly options: FileRebaseStateStoreOptions = {}
  ) {
    this.location = path.join(stateDir, STATE_FILE)
  }

  async load(): Promise<RebaseState | null> {
    let text: string
    try {
      text = await fs.promises.readFile(this.location, 'utf-8')
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === 'ENOENT') return null
      throw new AbortError(`Unable to read rebase state at ${this.location}`, err)
    }

    return LegacyStateCodec.parse(text, this.options)
  }

  async save(state: RebaseState): Promise<void> {
    const text = LegacyStateCodec.serialize(state, this.options)
    const tmpPath = `${this.location}.tmp-${process.pid}`

    await fs.promises.mkdir(this.stateDir, { recursive: true })
    const handle = await fs.promises.open(tmpPath, 'w')
    try {
      await handle.writeFile(text, 'utf-8')
      await handle.sync()
    } finally {
      await handle.close()
    }
    await fs.promises.rename(tmpPath, this.location)

    log.debug('[FileRebaseStateStore] Saved state', {
      location: this.location,
      entries: state.entries.length
    })
  }

  async clear(): Promise<void> {
    await fs.promises.rm(this.location, { force: true })
  }

  async exists(): Promise<boolean> {
    try {
      await fs.promises.access(this.location)
      return true
    } catch {
      return false
    }
  }
}
