/**
 * Simple-Git Adapter
 *
 * Repository backend on the native git CLI through simple-git. Commit content
 * is a tree id; merges run through `git merge-tree --write-tree` and new
 * commits are written with `git commit-tree`, so nothing here touches a
 * branch ref. Git has no notion of obsolete commits, so supersession is kept
 * as notes under a dedicated notes ref. Metadata extras and branch names
 * have no place in a git commit object and are not written.
 *
 * Requires git 2.42 or newer (`merge-tree --merge-base` with tree-ish args).
 */

import { log } from '@shared/logger'
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
import { execFile } from 'child_process'
import fs from 'fs'
import path from 'path'
import simpleGit, { type SimpleGit } from 'simple-git'
import { promisify } from 'util'
import { SUPERSESSION_NOTES_REF } from '../../shared/constants'
import { NotFoundError, RepoError } from '../../shared/errors'
import type { RepoAdapter } from './interface'
import {
  DISCARDED_NOTE,
  formatGitDate,
  formatSupersededBy,
  parseAuthor,
  parseCommitObject,
  parseMergeTreeOutput,
  parseSupersessionNote,
  type SupersessionNote
} from './utils'

const execFileAsync = promisify(execFile)

/** Working-copy conflict record, kept beside the rebase state. */
const CONFLICT_FILE = 'conflict.json'

type PersistedConflict = {
  parent: CommitId
  paths: string[]
}

export type SimpleGitAdapterOptions = {
  repoPath: string
  stateDir: string
}

export class SimpleGitAdapter implements RepoAdapter {
  readonly name = 'simple-git'

  private readonly git: SimpleGit

  constructor(private readonly options: SimpleGitAdapterOptions) {
    this.git = simpleGit(options.repoPath)
  }

  // ============================================================================
  // CommitGraph
  // ============================================================================

  async resolve(id: CommitId): Promise<CommitRecord> {
    let raw: string
    try {
      raw = await this.git.raw(['cat-file', 'commit', id])
    } catch (error) {
      log.debug(`[SimpleGitAdapter] cat-file failed for ${id}:`, error)
      throw new NotFoundError(`Unknown commit ${id.slice(0, 12)}`, id)
    }
    return parseCommitObject(id, raw)
  }

  async exists(id: CommitId): Promise<boolean> {
    try {
      await execFileAsync('git', ['cat-file', '-e', `${id}^{commit}`], { cwd: this.options.repoPath })
      return true
    } catch {
      return false
    }
  }

  /**
   * Uses `git merge-base --is-ancestor`, which answers through its exit code
   * (1 = not an ancestor). simple-git's raw() does not surface exit codes, so
   * this goes through execFile directly.
   */
  async isAncestor(ancestor: CommitId, descendant: CommitId): Promise<boolean> {
    try {
      await execFileAsync('git', ['merge-base', '--is-ancestor', ancestor, descendant], {
        cwd: this.options.repoPath
      })
      return true
    } catch (error) {
      if (exitCode(error) === 1) return false
      throw this.createError('isAncestor', error)
    }
  }

  async successors(id: CommitId): Promise<CommitId[]> {
    const note = await this.readNote(id)
    const live: CommitId[] = []
    for (const successor of note.successors) {
      if (!(await this.exists(successor))) continue
      if ((await this.readNote(successor)).discarded) continue
      live.push(successor)
    }
    return live
  }

  async isObsolete(id: CommitId): Promise<boolean> {
    const note = await this.readNote(id)
    return note.successors.length > 0 || note.pruned || note.discarded
  }

  // ============================================================================
  // MergeEngine
  // ============================================================================

  async merge(base: ContentId, ours: ContentId, theirs: ContentId): Promise<MergeResult> {
    const args = [
      'merge-tree',
      '--write-tree',
      '--name-only',
      '--no-messages',
      `--merge-base=${base}`,
      ours,
      theirs
    ]

    try {
      const { stdout } = await execFileAsync('git', args, { cwd: this.options.repoPath })
      return { status: 'clean', content: parseMergeTreeOutput(stdout).tree }
    } catch (error) {
      // Exit status 1 means the merge completed with conflicts.
      if (exitCode(error) === 1) {
        const { tree, markers } = parseMergeTreeOutput(stdoutOf(error))
        return { status: 'conflicted', markers, content: tree || undefined }
      }
      throw this.createError('merge', error)
    }
  }

  async emptyContent(): Promise<ContentId> {
    try {
      const tree = await this.git.raw(['hash-object', '-t', 'tree', '-w', '/dev/null'])
      return tree.trim()
    } catch (error) {
      throw this.createError('emptyContent', error)
    }
  }

  // ============================================================================
  // CommitWriter
  // ============================================================================

  async create(parents: CommitId[], content: ContentId, metadata: CommitMetadata): Promise<CommitId> {
    const identity = parseAuthor(metadata.author)
    const date = formatGitDate(metadata.timestampMs, metadata.extra.tz)
    const args = ['commit-tree', content]
    for (const parent of parents) {
      args.push('-p', parent)
    }
    args.push('-m', metadata.message)

    try {
      const result = await simpleGit(this.options.repoPath)
        .env({
          ...process.env,
          GIT_AUTHOR_NAME: identity.name,
          GIT_AUTHOR_EMAIL: identity.email,
          GIT_AUTHOR_DATE: date,
          // Committer mirrors the author
          GIT_COMMITTER_NAME: identity.name,
          GIT_COMMITTER_EMAIL: identity.email,
          GIT_COMMITTER_DATE: date
        })
        .raw(args)
      return result.trim()
    } catch (error) {
      throw this.createError('create', error)
    }
  }

  async markSuperseded(rewrites: CommitRewrite[]): Promise<void> {
    for (const { oldId, newId } of rewrites) {
      await this.appendNote(oldId, formatSupersededBy(newId))
    }
  }

  async discard(ids: CommitId[]): Promise<void> {
    for (const id of ids) {
      await this.appendNote(id, DISCARDED_NOTE)
    }
  }

  // ============================================================================
  // WorkingCopy
  // ============================================================================

  async parent(): Promise<CommitId | null> {
    try {
      const head = await this.git.revparse(['--verify', '--quiet', 'HEAD'])
      return head.trim() || null
    } catch {
      return null
    }
  }

  async setParent(id: CommitId): Promise<void> {
    try {
      await this.git.checkout(['--detach', id])
    } catch (error) {
      throw this.createError('setParent', error)
    }
  }

  /**
   * Checks out `parent` and lays the merged tree, conflict markers included,
   * over the working copy so the user can edit the conflicted files.
   */
  async recordConflict(parent: CommitId, conflict: MergeConflict): Promise<void> {
    try {
      await this.git.checkout(['--detach', parent])
      if (conflict.content) {
        await this.git.raw(['checkout', conflict.content, '--', '.'])
      }
    } catch (error) {
      throw this.createError('recordConflict', error)
    }

    const record: PersistedConflict = {
      parent,
      paths: conflict.markers.map((marker) => marker.path)
    }
    await fs.promises.mkdir(this.options.stateDir, { recursive: true })
    await fs.promises.writeFile(this.conflictPath(), JSON.stringify(record, null, 2))
  }

  async resolution(): Promise<ConflictResolution | null> {
    const record = await this.readConflict()
    if (!record) return null

    const unresolved: string[] = []
    for (const file of record.paths) {
      const text = await fs.promises
        .readFile(path.join(this.options.repoPath, file), 'utf-8')
        .catch((error: NodeJS.ErrnoException) => {
          if (error.code === 'ENOENT') return ''
          throw error
        })
      if (/^(<{7}|>{7}) /m.test(text)) unresolved.push(file)
    }

    if (unresolved.length) {
      return { status: 'unresolved', paths: unresolved }
    }

    try {
      await this.git.raw(['add', '-A', '--', ...record.paths])
      const tree = await this.git.raw(['write-tree'])
      return { status: 'resolved', content: tree.trim() }
    } catch (error) {
      throw this.createError('resolution', error)
    }
  }

  async clearConflict(): Promise<void> {
    await fs.promises.rm(this.conflictPath(), { force: true })
  }

  // ============================================================================
  // Helpers
  // ============================================================================

  private conflictPath(): string {
    return path.join(this.options.stateDir, CONFLICT_FILE)
  }

  private async readConflict(): Promise<PersistedConflict | null> {
    let content: string
    try {
      content = await fs.promises.readFile(this.conflictPath(), 'utf-8')
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') return null
      throw error
    }

    const parsed: unknown = JSON.parse(content)
    if (!isPersistedConflict(parsed)) {
      throw new RepoError(`Malformed conflict record at ${this.conflictPath()}`, 'readConflict')
    }
    return parsed
  }

  private async readNote(id: CommitId): Promise<SupersessionNote> {
    try {
      const { stdout } = await execFileAsync(
        'git',
        ['notes', `--ref=${SUPERSESSION_NOTES_REF}`, 'show', id],
        { cwd: this.options.repoPath }
      )
      return parseSupersessionNote(stdout)
    } catch {
      // No note attached
      return parseSupersessionNote('')
    }
  }

  private async appendNote(id: CommitId, line: string): Promise<void> {
    try {
      await this.git.raw(['notes', `--ref=${SUPERSESSION_NOTES_REF}`, 'append', '-m', line, id])
    } catch (error) {
      throw this.createError('appendNote', error)
    }
  }

  private createError(operation: string, originalError: unknown): RepoError {
    const message = originalError instanceof Error ? originalError.message : String(originalError)
    return new RepoError(`[SimpleGitAdapter] ${operation} failed: ${message}`, operation, originalError)
  }
}

function exitCode(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const code = error.code
    return typeof code === 'number' ? code : undefined
  }
  return undefined
}

function stdoutOf(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'stdout' in error) {
    const stdout = error.stdout
    return typeof stdout === 'string' ? stdout : ''
  }
  return ''
}

function isPersistedConflict(value: unknown): value is PersistedConflict {
  if (typeof value !== 'object' || value === null) return false
  if (!('parent' in value) || typeof value.parent !== 'string') return false
  if (!('paths' in value) || !Array.isArray(value.paths)) return false
  return value.paths.every((entry: unknown) => typeof entry === 'string')
}
