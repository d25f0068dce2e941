/**
 * Rebase State Machine
 *
 * Pure transitions over the durable RebaseState. Every entry starts pending
 * and moves exactly once, to rebased or skipped; terminal entries never
 * change again. Nothing here performs I/O, so the executor persists the
 * returned state after each call.
 */

import type {
  CommitId,
  CommitRewrite,
  RebaseEntry,
  RebaseFlags,
  RebaseMapping,
  RebaseProgress,
  RebaseState,
  SkippedEntry,
  SkipReason
} from '@shared/types'
import { StateTransitionError } from '../shared/errors'

export type CreateStateParams = {
  originalWorkingParent: CommitId | null
  destination: CommitId
  externalParent?: CommitId | null
  activeBookmark?: string | null
  flags?: Partial<RebaseFlags>
  /** Entries in processing order; omitted statuses default to pending. */
  entries: Array<{ original: CommitId; skip?: SkipReason }>
}

export type PendingEntry = {
  index: number
  entry: RebaseEntry
}

export const DEFAULT_FLAGS: RebaseFlags = {
  collapse: false,
  keepOriginals: false,
  keepBranchNames: false
}

export class RebaseStateMachine {
  private constructor() {
    // Static-only class
  }

  static createState({
    originalWorkingParent,
    destination,
    externalParent = null,
    activeBookmark = null,
    flags = {},
    entries
  }: CreateStateParams): RebaseState {
    return {
      ...DEFAULT_FLAGS,
      ...flags,
      originalWorkingParent,
      destination,
      externalParent,
      activeBookmark,
      entries: entries.map(({ original, skip }) => ({
        original,
        status: skip === undefined ? { kind: 'pending' } : { kind: 'skipped', reason: skip }
      }))
    }
  }

  /**
   * First pending entry in processing order, or null when the state is done.
   */
  static nextPending(state: RebaseState): PendingEntry | null {
    const index = state.entries.findIndex((entry) => entry.status.kind === 'pending')
    const entry = state.entries[index]
    return entry ? { index, entry } : null
  }

  static entryFor(state: RebaseState, original: CommitId): RebaseEntry | undefined {
    return state.entries.find((entry) => entry.original === original)
  }

  static markRebased(state: RebaseState, original: CommitId, newId: CommitId): RebaseState {
    return updatePending(state, original, { original, status: { kind: 'rebased', newId } })
  }

  static isComplete(state: RebaseState): boolean {
    return state.entries.every((entry) => entry.status.kind !== 'pending')
  }

  static progress(state: RebaseState): RebaseProgress {
    const progress: RebaseProgress = { total: state.entries.length, pending: 0, rebased: 0, skipped: 0 }
    for (const { status } of state.entries) {
      progress[status.kind]++
    }
    return progress
  }

  static mappings(state: RebaseState): RebaseMapping[] {
    const result: RebaseMapping[] = []
    for (const { original, status } of state.entries) {
      if (status.kind === 'rebased') result.push({ original, newId: status.newId })
    }
    return result
  }

  static skipped(state: RebaseState): SkippedEntry[] {
    const result: SkippedEntry[] = []
    for (const { original, status } of state.entries) {
      if (status.kind === 'skipped') result.push({ original, reason: status.reason })
    }
    return result
  }

  static rewrites(mappings: RebaseMapping[]): CommitRewrite[] {
    return mappings.map(({ original, newId }) => ({ oldId: original, newId }))
  }

  /** Commits created so far, in creation order. */
  static newCommits(state: RebaseState): CommitId[] {
    return RebaseStateMachine.mappings(state).map((mapping) => mapping.newId)
  }

  /** New id of the last rebased entry, or null when nothing was rebased. */
  static lastRebased(state: RebaseState): CommitId | null {
    return RebaseStateMachine.newCommits(state).at(-1) ?? null
  }
}

function updatePending(state: RebaseState, original: CommitId, next: RebaseEntry): RebaseState {
  const index = state.entries.findIndex((entry) => entry.original === original)
  const current = state.entries[index]
  if (!current) {
    throw new StateTransitionError(`Commit ${original.slice(0, 12)} is not part of this rebase`, original)
  }
  if (current.status.kind !== 'pending') {
    throw new StateTransitionError(
      `Entry ${original.slice(0, 12)} is already ${current.status.kind}`,
      original
    )
  }

  const entries = [...state.entries]
  entries[index] = next
  return { ...state, entries }
}
