/**
 * Memory Repo Adapter
 *
 * In-process repository backend. Commits live in an arena of immutable
 * records addressed by id; rewrites never touch a record, they only add an
 * entry to the separate supersession map. Content snapshots are flat
 * path → text maps, merged file by file.
 *
 * Used for dry runs and as the stand-in repository in tests.
 */

import type {
  CommitId,
  CommitMetadata,
  CommitRecord,
  CommitRewrite,
  ConflictMarker,
  ConflictResolution,
  ContentId,
  MergeConflict,
  MergeResult
} from '@shared/types'
import crypto from 'crypto'
import { NotFoundError, RepoError } from '../../shared/errors'
import type { RepoAdapter } from './interface'

export type FileMap = Readonly<Record<string, string>>

type RecordedConflict = {
  parent: CommitId
  markers: ConflictMarker[]
  unresolved: Set<string>
  resolvedContent?: ContentId
}

export class MemoryRepoAdapter implements RepoAdapter {
  readonly name = 'memory'

  private commits: Map<CommitId, CommitRecord> = new Map()
  private contents: Map<ContentId, FileMap> = new Map()
  /** old id → successor ids. An empty list marks a pruned commit. */
  private supersession: Map<CommitId, CommitId[]> = new Map()
  private discarded: Set<CommitId> = new Set()
  private workingParent: CommitId | null = null
  private conflict: RecordedConflict | null = null

  // ============================================================================
  // Seeding and inspection
  // ============================================================================

  storeContent(files: FileMap): ContentId {
    const normalized = Object.fromEntries(
      Object.entries(files).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    )
    const id = hash(['content', normalized])
    this.contents.set(id, normalized)
    return id
  }

  readContent(id: ContentId): FileMap {
    const files = this.contents.get(id)
    if (!files) {
      throw new RepoError(`Unknown content ${id.slice(0, 12)}`, 'readContent')
    }
    return files
  }

  /**
   * Adds a commit with the given files. Metadata defaults to a fixed author
   * and timestamp so seeded histories hash the same way on every run.
   */
  commit(
    parents: CommitId[],
    files: FileMap,
    metadata: Partial<CommitMetadata> & { message: string }
  ): CommitId {
    const record = this.buildRecord(parents, this.storeContent(files), {
      author: 'test <test@example.com>',
      timestampMs: 0,
      extra: {},
      ...metadata
    })
    this.commits.set(record.id, record)
    return record.id
  }

  /** Marks commits as rewritten into nothing. */
  prune(ids: CommitId[]): void {
    for (const id of ids) {
      this.supersession.set(id, [])
    }
  }

  /** Stores the user's resolution of the recorded conflict. */
  resolveConflict(files: FileMap): void {
    if (!this.conflict) {
      throw new RepoError('No conflict recorded in the working copy', 'resolveConflict')
    }
    this.conflict.resolvedContent = this.storeContent(files)
    this.conflict.unresolved.clear()
  }

  get(id: CommitId): CommitRecord {
    const record = this.commits.get(id)
    if (!record) {
      throw new NotFoundError(`Unknown commit ${id.slice(0, 12)}`, id)
    }
    return record
  }

  filesOf(id: CommitId): FileMap {
    return this.readContent(this.get(id).content)
  }

  /** Commits that are neither superseded nor discarded. */
  visibleCommits(): CommitId[] {
    return [...this.commits.keys()].filter(
      (id) => !this.supersession.has(id) && !this.discarded.has(id)
    )
  }

  conflictMarkers(): ConflictMarker[] {
    return this.conflict?.markers ?? []
  }

  commitCount(): number {
    return this.commits.size
  }

  // ============================================================================
  // CommitGraph
  // ============================================================================

  async resolve(id: CommitId): Promise<CommitRecord> {
    return this.get(id)
  }

  async exists(id: CommitId): Promise<boolean> {
    return this.commits.has(id)
  }

  async isAncestor(ancestor: CommitId, descendant: CommitId): Promise<boolean> {
    const seen = new Set<CommitId>()
    const queue: CommitId[] = [descendant]

    while (queue.length) {
      const current = queue.shift()
      if (current === undefined || seen.has(current)) continue
      if (current === ancestor) return true
      seen.add(current)
      const record = this.commits.get(current)
      if (record) queue.push(...record.parents)
    }

    return false
  }

  async successors(id: CommitId): Promise<CommitId[]> {
    const next = this.supersession.get(id) ?? []
    return next.filter((successor) => this.commits.has(successor) && !this.discarded.has(successor))
  }

  async isObsolete(id: CommitId): Promise<boolean> {
    return this.supersession.has(id) || this.discarded.has(id)
  }

  // ============================================================================
  // MergeEngine
  // ============================================================================

  async merge(base: ContentId, ours: ContentId, theirs: ContentId): Promise<MergeResult> {
    const baseFiles = this.readContent(base)
    const ourFiles = this.readContent(ours)
    const theirFiles = this.readContent(theirs)

    const paths = new Set([
      ...Object.keys(baseFiles),
      ...Object.keys(ourFiles),
      ...Object.keys(theirFiles)
    ])
    const merged: Record<string, string> = {}
    const markers: ConflictMarker[] = []

    for (const path of [...paths].sort()) {
      const b = baseFiles[path]
      const o = ourFiles[path]
      const t = theirFiles[path]

      let result: string | undefined
      if (o === t || t === b) {
        result = o
      } else if (o === b) {
        result = t
      } else {
        markers.push({
          path,
          content: `<<<<<<< ours\n${o ?? ''}\n=======\n${t ?? ''}\n>>>>>>> theirs\n`
        })
        continue
      }

      if (result !== undefined) merged[path] = result
    }

    if (markers.length) {
      return { status: 'conflicted', markers }
    }
    return { status: 'clean', content: this.storeContent(merged) }
  }

  async emptyContent(): Promise<ContentId> {
    return this.storeContent({})
  }

  // ============================================================================
  // CommitWriter
  // ============================================================================

  async create(parents: CommitId[], content: ContentId, metadata: CommitMetadata): Promise<CommitId> {
    for (const parent of parents) {
      this.get(parent)
    }
    this.readContent(content)

    const record = this.buildRecord(parents, content, metadata)
    if (!this.commits.has(record.id)) {
      this.commits.set(record.id, record)
    }
    this.discarded.delete(record.id)
    return record.id
  }

  async markSuperseded(rewrites: CommitRewrite[]): Promise<void> {
    for (const { oldId, newId } of rewrites) {
      const existing = this.supersession.get(oldId) ?? []
      if (!existing.includes(newId)) {
        this.supersession.set(oldId, [...existing, newId])
      }
    }
  }

  async discard(ids: CommitId[]): Promise<void> {
    for (const id of ids) {
      this.discarded.add(id)
    }
  }

  // ============================================================================
  // WorkingCopy
  // ============================================================================

  async parent(): Promise<CommitId | null> {
    return this.workingParent
  }

  async setParent(id: CommitId): Promise<void> {
    this.get(id)
    this.workingParent = id
  }

  async recordConflict(parent: CommitId, conflict: MergeConflict): Promise<void> {
    this.get(parent)
    this.workingParent = parent
    this.conflict = {
      parent,
      markers: conflict.markers,
      unresolved: new Set(conflict.markers.map((marker) => marker.path))
    }
  }

  async resolution(): Promise<ConflictResolution | null> {
    if (!this.conflict) return null
    if (this.conflict.resolvedContent !== undefined && !this.conflict.unresolved.size) {
      return { status: 'resolved', content: this.conflict.resolvedContent }
    }
    return { status: 'unresolved', paths: [...this.conflict.unresolved] }
  }

  async clearConflict(): Promise<void> {
    this.conflict = null
  }

  private buildRecord(parents: CommitId[], content: ContentId, metadata: CommitMetadata): CommitRecord {
    const id = hash(['commit', parents, content, metadata])
    return { id, parents: [...parents], content, metadata: { ...metadata, extra: { ...metadata.extra } } }
  }
}

function hash(value: unknown): string {
  return crypto.createHash('sha1').update(JSON.stringify(value)).digest('hex')
}
