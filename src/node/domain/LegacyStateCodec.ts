/**
 * Legacy State Codec
 *
 * Reads and writes the positional, untagged state file that older clients
 * left behind for an interrupted rebase. Nothing in the file names its
 * fields, so every header value is read from a fixed line with its own
 * parser and the header length is checked before anything else. Adding a
 * field means adding a row to LEGACY_HEADER, never shifting lines around.
 *
 * Layout:
 * ```
 * line 1  originalWorkingParent   commit id, all-zero = none
 * line 2  destination             commit id
 * line 3  externalParent          commit id, all-zero = none
 * line 4  collapse                "0" | "1"
 * line 5  keepOriginals           "0" | "1"
 * line 6  keepBranchNames         "0" | "1"
 * line 7  separator               blank, or the active bookmark name
 * line 8+ <original>:<token>      one entry per line, in processing order
 * ```
 *
 * A token is a commit id (rebased to that commit), the all-zero id or `-1`
 * (pending), or a negative skip token from the SkipTokenTable. Newer clients
 * append `:<destination>` to each entry; it is accepted when it names the
 * state's destination.
 */

import type { CommitId, RebaseEntry, RebaseEntryStatus, RebaseState } from '@shared/types'
import { isCommitId, NULL_COMMIT_ID } from '../shared/constants'
import { StateFormatError } from '../shared/errors'
import { defaultSkipTokens, LEGACY_PENDING_TOKEN, type SkipTokenTable } from './SkipTokens'

/**
 * Offset table of the header: 0-based line index of every positional field.
 */
export const LEGACY_HEADER = {
  originalWorkingParent: 0,
  destination: 1,
  externalParent: 2,
  collapse: 3,
  keepOriginals: 4,
  keepBranchNames: 5
} as const

export const LEGACY_HEADER_LENGTH = 6

type HeaderField = keyof typeof LEGACY_HEADER

export type LegacyCodecOptions = {
  skipTokens?: SkipTokenTable
}

export class LegacyStateCodec {
  private constructor() {
    // Static-only class
  }

  /**
   * Parses legacy state text into the canonical state.
   * Throws StateFormatError on anything it cannot read unambiguously.
   */
  static parse(text: string, options: LegacyCodecOptions = {}): RebaseState {
    const skipTokens = options.skipTokens ?? defaultSkipTokens
    const lines = splitLines(text)

    if (lines.length < LEGACY_HEADER_LENGTH) {
      throw new StateFormatError(
        `State file is truncated: expected ${LEGACY_HEADER_LENGTH} header lines, found ${lines.length}`,
        lines.length + 1
      )
    }

    const destination = readId(lines, 'destination')
    if (destination === null) {
      throw new StateFormatError('Destination must not be the null id', LEGACY_HEADER.destination + 1)
    }

    const state: RebaseState = {
      originalWorkingParent: readId(lines, 'originalWorkingParent'),
      destination,
      externalParent: readId(lines, 'externalParent'),
      collapse: readFlag(lines, 'collapse'),
      keepOriginals: readFlag(lines, 'keepOriginals'),
      keepBranchNames: readFlag(lines, 'keepBranchNames'),
      activeBookmark: null,
      entries: []
    }

    let index = LEGACY_HEADER_LENGTH
    const separator = lines[index]
    if (separator !== undefined && separator.trim() !== '' && !separator.includes(':')) {
      state.activeBookmark = separator.trim()
      index++
    }

    // Blank separators may be missing or repeated.
    while (index < lines.length && lines[index]?.trim() === '') {
      index++
    }

    for (; index < lines.length; index++) {
      state.entries.push(parseEntry(lines[index] ?? '', index + 1, destination, skipTokens))
    }

    return state
  }

  /**
   * Serializes the canonical state into legacy text.
   * Throws StateFormatError for a skip reason the token table does not know.
   */
  static serialize(state: RebaseState, options: LegacyCodecOptions = {}): string {
    const skipTokens = options.skipTokens ?? defaultSkipTokens

    const header: string[] = new Array<string>(LEGACY_HEADER_LENGTH)
    header[LEGACY_HEADER.originalWorkingParent] = state.originalWorkingParent ?? NULL_COMMIT_ID
    header[LEGACY_HEADER.destination] = state.destination
    header[LEGACY_HEADER.externalParent] = state.externalParent ?? NULL_COMMIT_ID
    header[LEGACY_HEADER.collapse] = formatFlag(state.collapse)
    header[LEGACY_HEADER.keepOriginals] = formatFlag(state.keepOriginals)
    header[LEGACY_HEADER.keepBranchNames] = formatFlag(state.keepBranchNames)

    const entries = state.entries.map(
      (entry) => `${entry.original}:${formatToken(entry.status, skipTokens)}`
    )

    return [...header, state.activeBookmark ?? '', ...entries].join('\n') + '\n'
  }
}

// ============================================================================
// Helpers
// ============================================================================

function splitLines(text: string): string[] {
  const lines = text.replace(/\r\n/g, '\n').split('\n')
  while (lines.length && lines[lines.length - 1]?.trim() === '') {
    lines.pop()
  }
  return lines
}

function readId(lines: string[], field: HeaderField): CommitId | null {
  const lineIndex = LEGACY_HEADER[field]
  const value = (lines[lineIndex] ?? '').trim()
  if (!isCommitId(value)) {
    throw new StateFormatError(`Invalid ${field}: '${value}' is not a commit id`, lineIndex + 1)
  }
  return value === NULL_COMMIT_ID ? null : value
}

function readFlag(lines: string[], field: HeaderField): boolean {
  const lineIndex = LEGACY_HEADER[field]
  const value = (lines[lineIndex] ?? '').trim()
  if (value === '0') return false
  if (value === '1') return true
  throw new StateFormatError(`Invalid ${field} flag: '${value}' (expected 0 or 1)`, lineIndex + 1)
}

function formatFlag(value: boolean): string {
  return value ? '1' : '0'
}

function parseEntry(
  line: string,
  lineNumber: number,
  destination: CommitId,
  skipTokens: SkipTokenTable
): RebaseEntry {
  const fields = line.trim().split(':')
  if (fields.length < 2 || fields.length > 3) {
    throw new StateFormatError(`Malformed entry '${line}'`, lineNumber)
  }

  const [original = '', token = '', entryDestination] = fields
  if (!isCommitId(original) || original === NULL_COMMIT_ID) {
    throw new StateFormatError(`Invalid commit id '${original}' in entry`, lineNumber)
  }
  if (entryDestination !== undefined && entryDestination !== destination) {
    throw new StateFormatError(
      `Entry destination ${entryDestination.slice(0, 12)} differs from the state destination`,
      lineNumber
    )
  }

  return { original, status: parseToken(token, lineNumber, skipTokens) }
}

function parseToken(token: string, lineNumber: number, skipTokens: SkipTokenTable): RebaseEntryStatus {
  if (isCommitId(token)) {
    return token === NULL_COMMIT_ID ? { kind: 'pending' } : { kind: 'rebased', newId: token }
  }

  if (/^-\d+$/.test(token)) {
    const value = parseInt(token, 10)
    if (value === LEGACY_PENDING_TOKEN) {
      return { kind: 'pending' }
    }
    const reason = skipTokens.reasonFor(value)
    if (reason === undefined) {
      throw new StateFormatError(`Unrecognized state token ${token}`, lineNumber)
    }
    return { kind: 'skipped', reason }
  }

  throw new StateFormatError(`Invalid state token '${token}'`, lineNumber)
}

function formatToken(status: RebaseEntryStatus, skipTokens: SkipTokenTable): string {
  switch (status.kind) {
    case 'pending':
      return NULL_COMMIT_ID
    case 'rebased':
      return status.newId
    case 'skipped': {
      const token = skipTokens.tokenFor(status.reason)
      if (token === undefined) {
        throw new StateFormatError(`No legacy token registered for skip reason '${status.reason}'`)
      }
      return String(token)
    }
  }
}
