/**
 * Git Output Parsers
 *
 * Pure helpers that turn raw git plumbing output into repository records.
 * Kept separate from SimpleGitAdapter so they can be tested without a repo.
 */

import type { CommitId, CommitMetadata, CommitRecord, ConflictMarker } from '@shared/types'

export type AuthorIdentity = {
  name: string
  email: string
}

/**
 * Parses `git cat-file commit <id>` output.
 *
 * ```
 * tree <tree>
 * parent <p1>
 * parent <p2>
 * author Name <email> 1700000000 +0100
 * committer Name <email> 1700000000 +0100
 *
 * message
 * ```
 */
export function parseCommitObject(id: CommitId, raw: string): CommitRecord {
  const separator = raw.indexOf('\n\n')
  const header = separator === -1 ? raw : raw.slice(0, separator)
  const message = separator === -1 ? '' : raw.slice(separator + 2).replace(/\n$/, '')

  let tree = ''
  const parents: CommitId[] = []
  let author = ''
  let timestampMs = 0
  const extra: Record<string, string> = {}

  for (const line of header.split('\n')) {
    const space = line.indexOf(' ')
    if (space === -1) continue
    const key = line.slice(0, space)
    const value = line.slice(space + 1)

    if (key === 'tree') {
      tree = value
    } else if (key === 'parent') {
      parents.push(value)
    } else if (key === 'author') {
      const parsed = parseSignature(value)
      author = parsed.author
      timestampMs = parsed.timestampMs
      extra.tz = parsed.tz
    }
  }

  if (!tree) {
    throw new Error(`Commit ${id.slice(0, 12)} has no tree`)
  }

  const metadata: CommitMetadata = { message, author, timestampMs, extra }
  return { id, parents, content: tree, metadata }
}

/**
 * Splits `Name <email> <seconds> <tz>` into its author and date parts.
 */
export function parseSignature(value: string): { author: string; timestampMs: number; tz: string } {
  const match = /^(.*>)\s+(\d+)\s+([+-]\d{4})$/.exec(value)
  if (!match) {
    return { author: value, timestampMs: 0, tz: '+0000' }
  }
  const [, author = value, seconds = '0', tz = '+0000'] = match
  return { author, timestampMs: parseInt(seconds, 10) * 1000, tz }
}

export function parseAuthor(author: string): AuthorIdentity {
  const match = /^(.*?)\s*<([^>]*)>$/.exec(author)
  if (!match) {
    return { name: author.trim(), email: '' }
  }
  return { name: match[1] ?? '', email: match[2] ?? '' }
}

/**
 * Formats a timestamp the way git accepts it in GIT_AUTHOR_DATE.
 */
export function formatGitDate(timestampMs: number, tz = '+0000'): string {
  return `@${Math.floor(timestampMs / 1000)} ${tz}`
}

/**
 * Parses `git merge-tree --write-tree --name-only --no-messages` output: the
 * merged tree on the first line, then one conflicted path per line.
 */
export function parseMergeTreeOutput(output: string): { tree: string; markers: ConflictMarker[] } {
  const lines = output.split('\n').filter((line) => line.length > 0)
  const [tree = '', ...paths] = lines
  const markers = [...new Set(paths)].map((path) => ({ path }))
  return { tree, markers }
}

// ============================================================================
// Supersession notes
// ============================================================================

const SUPERSEDED_BY = 'superseded-by'
const PRUNED = 'pruned'
const DISCARDED = 'discarded'

export type SupersessionNote = {
  successors: CommitId[]
  pruned: boolean
  discarded: boolean
}

/**
 * Parses the note attached to a commit under the supersession notes ref.
 * Each line is `superseded-by <id>`, `pruned` or `discarded`.
 */
export function parseSupersessionNote(note: string): SupersessionNote {
  const result: SupersessionNote = { successors: [], pruned: false, discarded: false }
  for (const line of note.split('\n')) {
    const trimmed = line.trim()
    if (trimmed.startsWith(`${SUPERSEDED_BY} `)) {
      const id = trimmed.slice(SUPERSEDED_BY.length + 1).trim()
      if (id && !result.successors.includes(id)) result.successors.push(id)
    } else if (trimmed === PRUNED) {
      result.pruned = true
    } else if (trimmed === DISCARDED) {
      result.discarded = true
    }
  }
  return result
}

export function formatSupersededBy(newId: CommitId): string {
  return `${SUPERSEDED_BY} ${newId}`
}

export const DISCARDED_NOTE = DISCARDED
