/**
 * Repository Adapter Interface
 *
 * The rebase engine never touches a repository directly. It talks to four
 * collaborators, each of which can be backed by git (simple-git) or by the
 * in-memory commit arena:
 *
 * - CommitGraph: commit identity, parents, ancestry and supersession
 * - MergeEngine: three-way content merge
 * - CommitWriter: creating new commits and recording rewrites
 * - WorkingCopy: the checked-out parent and conflict hand-off to the user
 */

import type {
  CommitId,
  CommitMetadata,
  CommitRecord,
  CommitRewrite,
  ConflictResolution,
  ContentId,
  MergeConflict,
  MergeResult
} from '@shared/types'

export interface CommitGraph {
  /**
   * Resolve a commit by id.
   * Throws NotFoundError when the id is unknown.
   */
  resolve(id: CommitId): Promise<CommitRecord>

  exists(id: CommitId): Promise<boolean>

  /**
   * True when `ancestor` is reachable from `descendant` through parent
   * edges. A commit is its own ancestor.
   */
  isAncestor(ancestor: CommitId, descendant: CommitId): Promise<boolean>

  /**
   * Commits that replaced `id` in earlier rewrites. Empty when the commit is
   * live. A superseded commit with no resolvable successor is obsolete.
   */
  successors(id: CommitId): Promise<CommitId[]>

  isObsolete(id: CommitId): Promise<boolean>
}

export interface MergeEngine {
  /**
   * Three-way merge of `theirs` into `ours` against their common `base`.
   * Throws on engine failure; conflicts are reported in the result.
   */
  merge(base: ContentId, ours: ContentId, theirs: ContentId): Promise<MergeResult>

  /** Content of an empty snapshot, used as the merge base for root commits. */
  emptyContent(): Promise<ContentId>
}

export interface CommitWriter {
  create(parents: CommitId[], content: ContentId, metadata: CommitMetadata): Promise<CommitId>

  /** Marks every `oldId` as superseded by its `newId`. */
  markSuperseded(rewrites: CommitRewrite[]): Promise<void>

  /** Hides commits created by an operation that was rolled back. */
  discard(ids: CommitId[]): Promise<void>
}

export interface WorkingCopy {
  /** Current working-copy parent, or null for an empty checkout. */
  parent(): Promise<CommitId | null>

  setParent(id: CommitId): Promise<void>

  /** Leaves the working copy on `parent` with conflict markers for the user. */
  recordConflict(parent: CommitId, conflict: MergeConflict): Promise<void>

  /**
   * The user's resolution of the recorded conflict, or null when no
   * conflict is recorded.
   */
  resolution(): Promise<ConflictResolution | null>

  clearConflict(): Promise<void>
}

/**
 * Everything the rebase executor needs from a repository.
 */
export interface RepoAdapter extends CommitGraph, MergeEngine, CommitWriter, WorkingCopy {
  /**
   * Get the adapter name for logging/debugging
   */
  readonly name: string
}
