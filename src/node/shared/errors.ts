/**
 * Custom error classes for the rebase engine.
 * Provides typed errors for different failure scenarios.
 */

import type { CommitId } from '@shared/types'

/**
 * Base error class for all application errors.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown
  ) {
    super(message)
    this.name = 'AppError'
  }
}

export type PlanErrorReason =
  | 'empty'
  | 'unknown-commit'
  | 'destination-in-set'
  | 'cycle'
  | 'divergence'
  | 'external-parents'
  | 'destination-changed'
  | 'in-progress'

/**
 * Error thrown when a rebase request cannot be turned into a valid plan.
 */
export class PlanError extends AppError {
  constructor(
    message: string,
    public readonly reason: PlanErrorReason,
    public readonly commitId?: CommitId
  ) {
    super(message)
    this.name = 'PlanError'
  }
}

/**
 * Fatal error: the persisted state cannot be used, so nothing is resumed.
 */
export class AbortError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, cause)
    this.name = 'AbortError'
  }
}

/**
 * Error thrown when a persisted state file cannot be parsed.
 */
export class StateFormatError extends AbortError {
  constructor(
    message: string,
    /** 1-based line number in the state file, when known. */
    public readonly line?: number
  ) {
    super(line === undefined ? message : `${message} (line ${line})`)
    this.name = 'StateFormatError'
  }
}

/**
 * Error thrown when a parsed state is structurally valid but does not agree
 * with the repository it is resumed against.
 */
export class StateCorruptError extends AbortError {
  constructor(
    message: string,
    public readonly commitId?: CommitId
  ) {
    super(message)
    this.name = 'StateCorruptError'
  }
}

/**
 * Expected suspension on a merge conflict. Returned to callers, never thrown
 * past the executor.
 */
export class ConflictPause extends AppError {
  constructor(
    public readonly original: CommitId,
    public readonly paths: string[]
  ) {
    super(`Conflict while rebasing ${original.slice(0, 12)}: ${paths.join(', ') || 'unknown files'}`)
    this.name = 'ConflictPause'
  }
}

/**
 * Error thrown when the merge engine fails on one entry. The entry stays
 * pending; earlier rebased entries are kept.
 */
export class MergeEngineError extends AppError {
  constructor(
    message: string,
    public readonly original: CommitId,
    cause?: unknown
  ) {
    super(message, cause)
    this.name = 'MergeEngineError'
  }
}

/**
 * Error thrown when another operation holds the repository lock.
 */
export class LockContentionError extends AppError {
  constructor(
    message: string,
    public readonly lockPath: string,
    public readonly ownerPid?: number
  ) {
    super(message)
    this.name = 'LockContentionError'
  }
}

/**
 * Error thrown when a commit is not known to the repository.
 */
export class NotFoundError extends AppError {
  constructor(
    message: string,
    public readonly commitId: CommitId
  ) {
    super(message)
    this.name = 'NotFoundError'
  }
}

/**
 * Error thrown when an entry is moved out of a terminal status.
 */
export class StateTransitionError extends AppError {
  constructor(
    message: string,
    public readonly original: CommitId
  ) {
    super(message)
    this.name = 'StateTransitionError'
  }
}

/**
 * Error thrown when a repository backend call fails.
 */
export class RepoError extends AppError {
  constructor(
    message: string,
    public readonly operation: string,
    cause?: unknown
  ) {
    super(message, cause)
    this.name = 'RepoError'
  }
}
