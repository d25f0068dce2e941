/**
 * RebaseOperation - rebase capability facade
 *
 * User-facing orchestration for the full rebase flow:
 * - start a rebase of a revision set onto a destination
 * - continue after conflicts are resolved
 * - abort and restore the working copy
 * - status snapshots
 *
 * Every call returns an exit code (0 success, 1 paused on a conflict,
 * 255 fatal) and the lines to show the user. Execution is delegated to
 * `RebaseExecutor`.
 */

import { log } from '@shared/logger'
import type {
  RebaseOperationResponse,
  RebaseRequest,
  RebaseStatusResponse,
  RebaseSummary,
  SkippedEntry
} from '@shared/types'
import { RebaseStateMachine } from '../domain/RebaseStateMachine'
import { EXIT_CONFLICT, EXIT_FATAL, EXIT_SUCCESS } from '../shared/constants'
import { AppError } from '../shared/errors'
import {
  RebaseExecutor,
  type ExecutorOptions,
  type RebaseContext,
  type RebaseExecutionResult,
  type ResumeOptions
} from './RebaseExecutor'

export const CONFLICT_HINT = 'resolve conflicts, then run continue'

export class RebaseOperation {
  private constructor() {
    // Static-only class
  }

  static async start(
    ctx: RebaseContext,
    request: RebaseRequest,
    options: ExecutorOptions = {}
  ): Promise<RebaseOperationResponse> {
    return respond(() => RebaseExecutor.begin(ctx, request, options))
  }

  static async continue(
    ctx: RebaseContext,
    options: ResumeOptions = {}
  ): Promise<RebaseOperationResponse> {
    return respond(() => RebaseExecutor.resume(ctx, options))
  }

  static async abort(ctx: RebaseContext): Promise<RebaseOperationResponse> {
    try {
      const result = await RebaseExecutor.abort(ctx)
      if (result.status === 'nothing-to-abort') {
        return { exitCode: EXIT_FATAL, message: 'no rebase in progress' }
      }
      return {
        exitCode: EXIT_SUCCESS,
        message: result.restoredParent
          ? `rebase aborted; working copy restored to ${result.restoredParent.slice(0, 12)}`
          : 'rebase aborted'
      }
    } catch (error) {
      return fatal(error)
    }
  }

  /**
   * Snapshot of the persisted rebase. Does not throw; an unreadable state
   * is reported as in progress without details.
   */
  static async status(ctx: RebaseContext): Promise<RebaseStatusResponse> {
    const running = await ctx.lock.isHeld()
    try {
      const [state, resolution] = await Promise.all([ctx.store.load(), ctx.repo.resolution()])
      if (!state) {
        return { inProgress: false, running, conflicts: [] }
      }
      return {
        inProgress: true,
        running,
        destination: state.destination,
        progress: RebaseStateMachine.progress(state),
        conflicts: resolution?.status === 'unresolved' ? resolution.paths : []
      }
    } catch (error) {
      log.warn('[RebaseOperation] Unable to read rebase status:', error)
      return { inProgress: await ctx.store.exists(), running, conflicts: [] }
    }
  }
}

// ============================================================================
// Helpers
// ============================================================================

async function respond(
  execute: () => Promise<RebaseExecutionResult>
): Promise<RebaseOperationResponse> {
  let result: RebaseExecutionResult
  try {
    result = await execute()
  } catch (error) {
    return fatal(error)
  }

  switch (result.status) {
    case 'nothing-to-rebase':
      return { exitCode: EXIT_SUCCESS, message: 'nothing to rebase' }
    case 'conflict':
      return {
        exitCode: EXIT_CONFLICT,
        message: `${result.pause.message}\n${CONFLICT_HINT}`,
        conflicts: result.pause.paths
      }
    case 'completed':
      return {
        exitCode: EXIT_SUCCESS,
        message: formatSummary(result.summary),
        summary: result.summary
      }
  }
}

function fatal(error: unknown): RebaseOperationResponse {
  if (!(error instanceof AppError)) throw error
  log.error(`[RebaseOperation] ${error.name}: ${error.message}`)
  return { exitCode: EXIT_FATAL, message: `abort: ${error.message}` }
}

export function formatSummary(summary: RebaseSummary): string {
  const lines = summary.skipped.map(formatSkipped)
  const count = summary.mappings.length
  const distinct = new Set(summary.mappings.map((mapping) => mapping.newId)).size
  if (!count) {
    lines.push('nothing rebased')
  } else if (distinct < count) {
    lines.push(`rebased ${count} commit(s) into ${distinct}`)
  } else {
    lines.push(`rebased ${count} commit(s)`)
  }
  return lines.join('\n')
}

function formatSkipped({ original, reason }: SkippedEntry): string {
  const id = original.slice(0, 12)
  switch (reason) {
    case 'already-in-destination':
      return `note: not rebasing ${id}, already in destination`
    case 'obsolete':
      return `note: not rebasing ${id}, its successor is rebased instead`
    case 'pruned':
      return `note: not rebasing ${id}, it has no successor`
    default:
      return `note: not rebasing ${id} (${reason})`
  }
}
