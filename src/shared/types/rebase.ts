/**
 * Rebase Types
 *
 * Pure type definitions for a rebase operation: the durable state record,
 * its entries, and the summaries handed back to callers.
 */

import type { CommitId } from './repo'

// ============================================================================
// Entry Types
// ============================================================================

/**
 * Why an entry was skipped. The built-in reasons below have fixed legacy
 * tokens; further reasons can be registered with `SkipTokenTable.with`.
 */
export type SkipReason = 'already-in-destination' | 'obsolete' | 'ignored' | 'pruned' | (string & {})

export type RebaseEntryStatus =
  | { kind: 'pending' }
  | { kind: 'rebased'; newId: CommitId }
  | { kind: 'skipped'; reason: SkipReason }

export type RebaseEntry = {
  original: CommitId
  status: RebaseEntryStatus
}

// ============================================================================
// State Types
// ============================================================================

export type RebaseFlags = {
  /** Fold every rebased commit into a single commit on the destination. */
  collapse: boolean
  /** Leave the original commits visible instead of marking them superseded. */
  keepOriginals: boolean
  /** Keep each commit's branch name instead of adopting the destination's. */
  keepBranchNames: boolean
}

export type RebaseState = RebaseFlags & {
  /** Working-copy parent before the rebase started; restored on abort. */
  originalWorkingParent: CommitId | null
  /** Fixed for the whole operation. */
  destination: CommitId
  /** Second parent for collapsed or merge commits pulling from outside the set. */
  externalParent: CommitId | null
  /** Bookmark that was active when the rebase started, if any. */
  activeBookmark: string | null
  /** Topologically sorted: ancestors before descendants. */
  entries: RebaseEntry[]
}

// ============================================================================
// Request and Result Types
// ============================================================================

export type RebaseRequest = {
  /** Commits to move, in the order the caller resolved them. */
  revset: CommitId[]
  destination: CommitId
  options?: Partial<RebaseFlags>
  /** Bookmark active at start, restored by older clients on completion. */
  activeBookmark?: string | null
}

export type RebaseMapping = {
  original: CommitId
  newId: CommitId
}

export type SkippedEntry = {
  original: CommitId
  reason: SkipReason
}

export type RebaseSummary = {
  /** In processing order. */
  mappings: RebaseMapping[]
  skipped: SkippedEntry[]
  /** Working-copy parent after completion. */
  workingParent: CommitId | null
}

export type RebaseProgress = {
  total: number
  pending: number
  rebased: number
  skipped: number
}

// ============================================================================
// Operation Response Types
// ============================================================================

export type RebaseOperationResponse = {
  /** 0 success, 1 paused on a conflict, 255 fatal. */
  exitCode: number
  /** User-facing lines, newline separated. */
  message: string
  summary?: RebaseSummary
  conflicts?: string[]
}

export type RebaseStatusResponse = {
  /** A persisted rebase exists. */
  inProgress: boolean
  /** Another process holds the repository lock. */
  running: boolean
  destination?: CommitId
  progress?: RebaseProgress
  conflicts: string[]
}
