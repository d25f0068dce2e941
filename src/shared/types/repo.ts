/** 40-character hex commit identifier. Content-derived, never mutated. */
export type CommitId = string

/** Identifier of a commit's content snapshot (a tree id for git-backed repos). */
export type ContentId = string

export type CommitMetadata = {
  message: string
  author: string
  timestampMs: number
  /** Named branch the commit belongs to, when the backend tracks one. */
  branch?: string
  /** Free-form key/value annotations carried along with the commit. */
  extra: Record<string, string>
}

export type CommitRecord = {
  id: CommitId
  /** Primary parent first. Empty for root commits. */
  parents: CommitId[]
  content: ContentId
  metadata: CommitMetadata
}

/** Recorded when a commit is rewritten: `oldId` is superseded by `newId`. */
export type CommitRewrite = {
  oldId: CommitId
  newId: CommitId
}

// ============================================================================
// Merge Types
// ============================================================================

export type ConflictMarker = {
  path: string
  /** Merged text with conflict markers, when the engine produced any. */
  content?: string
}

export type MergeConflict = {
  status: 'conflicted'
  markers: ConflictMarker[]
  /** Merged snapshot with conflict markers written into it, when the engine produces one. */
  content?: ContentId
}

export type MergeResult = { status: 'clean'; content: ContentId } | MergeConflict

/**
 * What the working copy holds for a paused entry after the user had a chance
 * to resolve conflicts by hand.
 */
export type ConflictResolution =
  | { status: 'resolved'; content: ContentId }
  | { status: 'unresolved'; paths: string[] }

// ============================================================================
// Configuration
// ============================================================================

export type RepoBackend = 'git' | 'memory'

export type Configuration = {
  repoPath: string
  /** Directory holding the rebase state file and the repository lock. */
  stateDir: string
  backend: RepoBackend
}
