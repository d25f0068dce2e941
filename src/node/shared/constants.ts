/**
 * Node-specific constants for the rebase engine.
 */

/** All-zero commit id; stands for "none" in headers and "pending" in entries. */
export const NULL_COMMIT_ID = '0000000000000000000000000000000000000000'

/** Length of a full hex commit id. */
export const COMMIT_ID_LENGTH = 40

/** Name of the persisted state file inside the state directory. */
export const STATE_FILE = 'rebasestate'

/** Name of the repository lock file inside the state directory. */
export const LOCK_FILE = 'rebase.lock'

/** Metadata key recording which commit a rebased commit was copied from. */
export const REBASE_SOURCE_KEY = 'rebase_source'

/** Notes ref used by the git backend to record commit supersession. */
export const SUPERSESSION_NOTES_REF = 'refs/notes/rebasekit'

/** Upper bound on ancestor walks when looking for a rebased ancestor. */
export const MAX_ANCESTOR_WALK = 10000

/** Process exit statuses for the user-facing operations. */
export const EXIT_SUCCESS = 0
export const EXIT_CONFLICT = 1
export const EXIT_FATAL = 255

export function isCommitId(value: string): boolean {
  return value.length === COMMIT_ID_LENGTH && /^[0-9a-f]+$/.test(value)
}
