/**
 * Rebase Validator
 *
 * Pure validation logic for rebase operations.
 * Contains only synchronous validation functions that operate on data.
 *
 * Checks that need the repository (does a commit exist, what are its
 * parents) are gathered by the executor and handed in as plain data.
 */

import type { CommitId, RebaseRequest, RebaseState } from '@shared/types'

// ============================================================================
// Validation Result Types
// ============================================================================

/**
 * Result of a validation check
 */
export type ValidationResult =
  | { valid: true }
  | { valid: false; code: ValidationErrorCode; message: string; commitId?: CommitId }

/**
 * Validation error codes for programmatic handling
 */
export type ValidationErrorCode =
  | 'EMPTY_REQUEST'
  | 'REBASE_IN_PROGRESS'
  | 'DUPLICATE_ENTRY'
  | 'DESTINATION_IN_ENTRIES'
  | 'UNKNOWN_COMMIT'
  | 'ORDER_VIOLATION'

// ============================================================================
// RebaseValidator Class
// ============================================================================

/**
 * Pure validator for rebase operations.
 * All methods are static and synchronous - they only examine data.
 */
export class RebaseValidator {
  private constructor() {
    // Static-only class
  }

  static validateRequest(request: RebaseRequest): ValidationResult {
    if (!request.revset.length) {
      return {
        valid: false,
        code: 'EMPTY_REQUEST',
        message: 'Nothing to rebase: the revision set is empty'
      }
    }
    return { valid: true }
  }

  /**
   * Validates that no persisted state exists before starting a new rebase.
   */
  static validateNoRebaseInProgress(hasState: boolean): ValidationResult {
    if (hasState) {
      return {
        valid: false,
        code: 'REBASE_IN_PROGRESS',
        message: 'A rebase is already in progress. Continue or abort it before starting a new one.'
      }
    }
    return { valid: true }
  }

  /**
   * Validates entry uniqueness and that the destination is not itself an entry.
   */
  static validateStructure(state: RebaseState): ValidationResult {
    const seen = new Set<CommitId>()
    for (const { original } of state.entries) {
      if (seen.has(original)) {
        return {
          valid: false,
          code: 'DUPLICATE_ENTRY',
          message: `Commit ${original.slice(0, 12)} appears more than once in the rebase state`,
          commitId: original
        }
      }
      if (original === state.destination) {
        return {
          valid: false,
          code: 'DESTINATION_IN_ENTRIES',
          message: `Destination ${original.slice(0, 12)} is listed as a commit to rebase`,
          commitId: original
        }
      }
      seen.add(original)
    }
    return { valid: true }
  }

  /**
   * Validates that every commit the state refers to is known to the repository.
   * `missing` holds the ids the repository could not resolve.
   */
  static validateReferences(state: RebaseState, missing: ReadonlySet<CommitId>): ValidationResult {
    for (const id of referencedIds(state)) {
      if (missing.has(id)) {
        return {
          valid: false,
          code: 'UNKNOWN_COMMIT',
          message: `Rebase state refers to unknown commit ${id.slice(0, 12)}`,
          commitId: id
        }
      }
    }
    return { valid: true }
  }

  /**
   * Validates that every entry comes after the entries it descends from.
   * `parentsOf` maps each entry's original commit to its parents.
   */
  static validateOrder(
    state: RebaseState,
    parentsOf: ReadonlyMap<CommitId, readonly CommitId[]>
  ): ValidationResult {
    const position = new Map(state.entries.map((entry, index) => [entry.original, index]))

    for (const [index, { original }] of state.entries.entries()) {
      for (const parent of parentsOf.get(original) ?? []) {
        const parentIndex = position.get(parent)
        if (parentIndex !== undefined && parentIndex > index) {
          return {
            valid: false,
            code: 'ORDER_VIOLATION',
            message: `Commit ${original.slice(0, 12)} is listed before its parent ${parent.slice(0, 12)}`,
            commitId: original
          }
        }
      }
    }
    return { valid: true }
  }
}

/**
 * Every commit id a state refers to: header commits, originals, and the new
 * ids of rebased entries.
 */
export function referencedIds(state: RebaseState): CommitId[] {
  const ids: CommitId[] = [state.destination]
  if (state.originalWorkingParent) ids.push(state.originalWorkingParent)
  if (state.externalParent) ids.push(state.externalParent)
  for (const { original, status } of state.entries) {
    ids.push(original)
    if (status.kind === 'rebased') ids.push(status.newId)
  }
  return [...new Set(ids)]
}
