/**
 * RebasePhase - Lifecycle of one rebase invocation
 *
 * The persisted RebaseState says which entries are done; the phase says what
 * the executor is doing with it right now. Transitions are pure and throw
 * InvalidTransitionError for anything not listed below.
 *
 * Valid Transitions:
 *   idle -> running (begin or resume)
 *   running -> running (entry rebased or skipped)
 *   running -> paused (conflict)
 *   running -> completed (no pending entries left)
 *   running -> failed (merge engine or repository failure)
 *   idle -> aborted (abort of a persisted state)
 *   paused -> aborted
 *   failed -> aborted
 */

import type { CommitId, RebaseProgress, RebaseSummary } from '@shared/types'

interface PhaseBase {
  enteredAtMs: number
  /** ID for correlation across logs */
  correlationId: string
}

export interface IdlePhase extends PhaseBase {
  kind: 'idle'
}

export interface RunningPhase extends PhaseBase {
  kind: 'running'
  startedAtMs: number
  progress: RebaseProgress
  /** Entry currently being rebased, null between entries */
  current: CommitId | null
}

export interface PausedPhase extends PhaseBase {
  kind: 'paused'
  startedAtMs: number
  progress: RebaseProgress
  /** Entry that hit the conflict */
  conflicted: CommitId
  conflictPaths: string[]
}

export interface CompletedPhase extends PhaseBase {
  kind: 'completed'
  summary: RebaseSummary
  durationMs: number
}

export interface FailedPhase extends PhaseBase {
  kind: 'failed'
  error: {
    code: string
    message: string
  }
  /** Entry that was being rebased, when the failure belongs to one */
  original: CommitId | null
}

export interface AbortedPhase extends PhaseBase {
  kind: 'aborted'
  restoredParent: CommitId | null
}

export type RebasePhase =
  | IdlePhase
  | RunningPhase
  | PausedPhase
  | CompletedPhase
  | FailedPhase
  | AbortedPhase

export type RebaseEvent =
  | { type: 'START'; progress: RebaseProgress }
  | { type: 'ENTRY_STARTED'; original: CommitId }
  | { type: 'ENTRY_FINISHED'; progress: RebaseProgress }
  | { type: 'CONFLICT_DETECTED'; original: CommitId; paths: string[] }
  | { type: 'ALL_ENTRIES_DONE'; summary: RebaseSummary }
  | { type: 'FAIL'; code: string; message: string; original: CommitId | null }
  | { type: 'ABORT'; restoredParent: CommitId | null }

export function createIdlePhase(correlationId?: string): IdlePhase {
  return {
    kind: 'idle',
    enteredAtMs: Date.now(),
    correlationId: correlationId ?? generateCorrelationId()
  }
}

/**
 * Pure state transition function.
 * Throws InvalidTransitionError if the event is not valid in `phase`.
 */
export function transition(phase: RebasePhase, event: RebaseEvent): RebasePhase {
  const now = Date.now()

  switch (event.type) {
    case 'START': {
      if (phase.kind !== 'idle') {
        throw new InvalidTransitionError(phase.kind, event.type, 'Can only start from idle')
      }
      return {
        kind: 'running',
        enteredAtMs: now,
        correlationId: phase.correlationId,
        startedAtMs: now,
        progress: event.progress,
        current: null
      }
    }

    case 'ENTRY_STARTED':
    case 'ENTRY_FINISHED': {
      if (phase.kind !== 'running') {
        throw new InvalidTransitionError(phase.kind, event.type, 'No rebase is running')
      }
      return event.type === 'ENTRY_STARTED'
        ? { ...phase, enteredAtMs: now, current: event.original }
        : { ...phase, enteredAtMs: now, current: null, progress: event.progress }
    }

    case 'CONFLICT_DETECTED': {
      if (phase.kind !== 'running') {
        throw new InvalidTransitionError(phase.kind, event.type, 'Can only pause a running rebase')
      }
      return {
        kind: 'paused',
        enteredAtMs: now,
        correlationId: phase.correlationId,
        startedAtMs: phase.startedAtMs,
        progress: phase.progress,
        conflicted: event.original,
        conflictPaths: event.paths
      }
    }

    case 'ALL_ENTRIES_DONE': {
      if (phase.kind !== 'running') {
        throw new InvalidTransitionError(phase.kind, event.type, 'Can only complete a running rebase')
      }
      return {
        kind: 'completed',
        enteredAtMs: now,
        correlationId: phase.correlationId,
        summary: event.summary,
        durationMs: now - phase.startedAtMs
      }
    }

    case 'FAIL': {
      if (phase.kind !== 'running' && phase.kind !== 'idle') {
        throw new InvalidTransitionError(phase.kind, event.type, 'Cannot fail from this phase')
      }
      return {
        kind: 'failed',
        enteredAtMs: now,
        correlationId: phase.correlationId,
        error: { code: event.code, message: event.message },
        original: event.original
      }
    }

    case 'ABORT': {
      if (phase.kind !== 'idle' && phase.kind !== 'paused' && phase.kind !== 'failed') {
        throw new InvalidTransitionError(
          phase.kind,
          event.type,
          'Can only abort from idle, paused, or failed'
        )
      }
      return {
        kind: 'aborted',
        enteredAtMs: now,
        correlationId: phase.correlationId,
        restoredParent: event.restoredParent
      }
    }

    default: {
      const _exhaustive: never = event
      throw new Error(`Unknown event: ${JSON.stringify(_exhaustive)}`)
    }
  }
}

export function getPhaseDescription(phase: RebasePhase): string {
  switch (phase.kind) {
    case 'idle':
      return 'No rebase in progress'
    case 'running':
      return phase.current
        ? `Rebasing ${phase.current.slice(0, 12)} (${phase.progress.total - phase.progress.pending}/${phase.progress.total})`
        : `Rebasing (${phase.progress.total - phase.progress.pending}/${phase.progress.total})`
    case 'paused':
      return `Conflict in ${phase.conflicted.slice(0, 12)} (${phase.conflictPaths.length} files)`
    case 'completed':
      return `Rebased ${phase.summary.mappings.length} commit(s), skipped ${phase.summary.skipped.length}`
    case 'failed':
      return `Error: ${phase.error.message}`
    case 'aborted':
      return phase.restoredParent
        ? `Rebase aborted, working copy restored to ${phase.restoredParent.slice(0, 12)}`
        : 'Rebase aborted'
  }
}

/**
 * Error thrown when an invalid phase transition is attempted.
 */
export class InvalidTransitionError extends Error {
  constructor(
    public readonly fromPhase: RebasePhase['kind'],
    public readonly eventType: RebaseEvent['type'],
    public readonly reason: string
  ) {
    super(`Invalid transition from '${fromPhase}' on '${eventType}': ${reason}`)
    this.name = 'InvalidTransitionError'
  }
}

// ===========================================================================
// Helpers
// ===========================================================================

function generateCorrelationId(): string {
  return `rebase-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`
}
