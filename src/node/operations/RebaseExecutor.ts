/**
 * RebaseExecutor - Rebase execution orchestration
 *
 * Drives a RebaseState to completion against a repository. This module
 * bridges the pure state machine (RebaseStateMachine) and the repository
 * collaborators (RepoAdapter).
 *
 * Responsibilities:
 * - Rebase each pending entry in stored order (merge, then create a commit)
 * - Persist the state after every entry transition
 * - Pause on conflicts and pick up the user's resolution on resume
 * - Collapse, record supersession and move the working copy on completion
 * - Roll everything back on abort
 *
 * Every call runs under the repository lock.
 */

import { log } from '@shared/logger'
import type {
  CommitId,
  CommitMetadata,
  CommitRecord,
  ContentId,
  MergeConflict,
  MergeResult,
  RebaseMapping,
  RebaseRequest,
  RebaseState,
  RebaseSummary
} from '@shared/types'
import type { CommitGraph, RepoAdapter } from '../adapters/repo/interface'
import type { RepoLock } from '../core/repo-lock'
import type { IRebaseStateStore } from '../core/rebase-state-store'
import { buildRebasePlan } from '../core/utils/build-rebase-plan'
import {
  createIdlePhase,
  getPhaseDescription,
  transition,
  type RebasePhase
} from '../domain/RebasePhase'
import { RebaseStateMachine } from '../domain/RebaseStateMachine'
import { RebaseValidator, referencedIds, type ValidationResult } from '../domain/RebaseValidator'
import { MAX_ANCESTOR_WALK, REBASE_SOURCE_KEY } from '../shared/constants'
import {
  AppError,
  ConflictPause,
  MergeEngineError,
  PlanError,
  StateCorruptError,
  StateFormatError
} from '../shared/errors'

export type RebaseContext = {
  repo: RepoAdapter
  store: IRebaseStateStore
  lock: RepoLock
}

export type RebaseExecutionResult =
  | { status: 'completed'; summary: RebaseSummary }
  | { status: 'conflict'; pause: ConflictPause; state: RebaseState }
  | { status: 'nothing-to-rebase' }

export type AbortResult =
  | { status: 'aborted'; restoredParent: CommitId | null; discarded: CommitId[] }
  | { status: 'nothing-to-abort' }

export type ExecutorOptions = {
  onEntryStart?: (original: CommitId) => void
  onEntryRebased?: (original: CommitId, newId: CommitId) => void
  onConflict?: (pause: ConflictPause) => void
  onPhaseChange?: (phase: RebasePhase) => void
}

export type ResumeOptions = ExecutorOptions & {
  /** Refuse to resume when the persisted destination differs. */
  expectedDestination?: CommitId
}

type EntryOutcome =
  | { kind: 'rebased'; newId: CommitId; resolvedConflict: boolean }
  | { kind: 'conflict'; paths: string[]; conflict?: { parent: CommitId; result: MergeConflict } }

type NewParents = [CommitId, ...CommitId[]]

type Resolver = (id: CommitId) => Promise<CommitRecord>

export class RebaseExecutor {
  private constructor() {
    // Static-only class
  }

  /**
   * Plan a rebase of `request`, persist it and run it.
   */
  static async begin(
    ctx: RebaseContext,
    request: RebaseRequest,
    options: ExecutorOptions = {}
  ): Promise<RebaseExecutionResult> {
    return ctx.lock.withLock(async () => {
      assertValid(
        RebaseValidator.validateNoRebaseInProgress(await ctx.store.exists()),
        (message) => new PlanError(message, 'in-progress')
      )

      const state = await buildRebasePlan(ctx.repo, ctx.repo, request)
      await ctx.store.save(state)

      log.info(
        `[RebaseExecutor] Rebasing ${state.entries.length} commit(s) onto ${state.destination.slice(0, 12)}`
      )
      return this.run(ctx, state, options)
    })
  }

  /**
   * Continue a persisted rebase from its first pending entry.
   */
  static async resume(
    ctx: RebaseContext,
    options: ResumeOptions = {}
  ): Promise<RebaseExecutionResult> {
    return ctx.lock.withLock(async () => {
      const state = await ctx.store.load()
      if (!state) {
        log.info('[RebaseExecutor] No rebase in progress')
        return { status: 'nothing-to-rebase' }
      }

      if (options.expectedDestination && options.expectedDestination !== state.destination) {
        throw new PlanError(
          `Rebase in progress targets ${state.destination.slice(0, 12)}, not ${options.expectedDestination.slice(0, 12)}`,
          'destination-changed',
          options.expectedDestination
        )
      }

      await this.verifyState(ctx.repo, state)

      // Nothing pending means the rebase already completed. A file with no
      // entries at all still runs completion below.
      if (state.entries.length && RebaseStateMachine.isComplete(state)) {
        log.info('[RebaseExecutor] Rebase already complete, clearing leftover state')
        await ctx.store.clear()
        return { status: 'nothing-to-rebase' }
      }

      const progress = RebaseStateMachine.progress(state)
      log.info(
        `[RebaseExecutor] Resuming rebase: ${progress.pending} of ${progress.total} commit(s) left`
      )
      return this.run(ctx, state, options)
    })
  }

  /**
   * Discard everything the persisted rebase created and restore the
   * working copy. Fails with LockContentionError while a rebase is running.
   */
  static async abort(ctx: RebaseContext): Promise<AbortResult> {
    return ctx.lock.withLock(async () => {
      let state: RebaseState | null
      try {
        state = await ctx.store.load()
      } catch (error) {
        if (!(error instanceof StateFormatError)) throw error
        log.warn('[RebaseExecutor] Clearing unreadable rebase state', { message: error.message })
        await ctx.repo.clearConflict()
        await ctx.store.clear()
        return { status: 'aborted', restoredParent: null, discarded: [] }
      }

      if (!state) {
        return { status: 'nothing-to-abort' }
      }

      const discarded = RebaseStateMachine.newCommits(state)
      if (discarded.length) {
        await ctx.repo.discard(discarded)
      }
      await ctx.repo.clearConflict()

      let restoredParent: CommitId | null = null
      if (state.originalWorkingParent && (await ctx.repo.exists(state.originalWorkingParent))) {
        await ctx.repo.setParent(state.originalWorkingParent)
        restoredParent = state.originalWorkingParent
      }

      await ctx.store.clear()

      const phase = transition(createIdlePhase(), { type: 'ABORT', restoredParent })
      log.info(`[RebaseExecutor] ${getPhaseDescription(phase)}`, {
        discarded: discarded.length,
        restoredParent: restoredParent?.slice(0, 12)
      })
      return { status: 'aborted', restoredParent, discarded }
    })
  }

  /**
   * Checks a loaded state against the repository before anything is changed.
   * @throws StateCorruptError
   */
  static async verifyState(graph: CommitGraph, state: RebaseState): Promise<void> {
    assertValid(RebaseValidator.validateStructure(state))

    const missing = new Set<CommitId>()
    for (const id of referencedIds(state)) {
      if (!(await graph.exists(id))) missing.add(id)
    }
    assertValid(RebaseValidator.validateReferences(state, missing))

    const parentsOf = new Map<CommitId, readonly CommitId[]>()
    for (const { original } of state.entries) {
      parentsOf.set(original, (await graph.resolve(original)).parents)
    }
    assertValid(RebaseValidator.validateOrder(state, parentsOf))
  }

  // ===========================================================================
  // Execution loop
  // ===========================================================================

  private static async run(
    ctx: RebaseContext,
    initial: RebaseState,
    options: ExecutorOptions
  ): Promise<RebaseExecutionResult> {
    let state = initial
    const resolve = createResolver(ctx.repo)

    const enter = (next: RebasePhase): RebasePhase => {
      options.onPhaseChange?.(next)
      return next
    }

    let phase = enter(
      transition(createIdlePhase(), { type: 'START', progress: RebaseStateMachine.progress(state) })
    )

    try {
      for (
        let next = RebaseStateMachine.nextPending(state);
        next;
        next = RebaseStateMachine.nextPending(state)
      ) {
        const { original } = next.entry
        phase = enter(transition(phase, { type: 'ENTRY_STARTED', original }))
        options.onEntryStart?.(original)

        const outcome = await this.rebaseEntry(ctx.repo, state, next.index, resolve)

        if (outcome.kind === 'conflict') {
          if (outcome.conflict) {
            await ctx.repo.recordConflict(outcome.conflict.parent, outcome.conflict.result)
          }
          const pause = new ConflictPause(original, outcome.paths)
          phase = enter(
            transition(phase, { type: 'CONFLICT_DETECTED', original, paths: outcome.paths })
          )
          log.info(`[RebaseExecutor] ${pause.message}`)
          options.onConflict?.(pause)
          return { status: 'conflict', pause, state }
        }

        // Drop the resolution before persisting, so a crash in between
        // re-merges this entry instead of applying the resolution to the next.
        if (outcome.resolvedConflict) {
          await ctx.repo.clearConflict()
        }
        state = RebaseStateMachine.markRebased(state, original, outcome.newId)
        await ctx.store.save(state)

        log.debug('[RebaseExecutor] Rebased entry', {
          original: original.slice(0, 12),
          newId: outcome.newId.slice(0, 12)
        })
        phase = enter(
          transition(phase, { type: 'ENTRY_FINISHED', progress: RebaseStateMachine.progress(state) })
        )
        options.onEntryRebased?.(original, outcome.newId)
      }

      const summary = await this.complete(ctx, state, resolve)
      phase = enter(transition(phase, { type: 'ALL_ENTRIES_DONE', summary }))
      log.info(
        `[RebaseExecutor] Rebase completed: ${summary.mappings.length} rebased, ${summary.skipped.length} skipped`
      )
      return { status: 'completed', summary }
    } catch (error) {
      const current = phase.kind === 'running' ? phase.current : null
      enter(
        transition(phase, {
          type: 'FAIL',
          code: error instanceof AppError ? error.name : 'UNKNOWN',
          message: error instanceof Error ? error.message : String(error),
          original: current
        })
      )
      log.error('[RebaseExecutor] Rebase stopped:', error)
      throw error
    }
  }

  private static async rebaseEntry(
    repo: RepoAdapter,
    state: RebaseState,
    index: number,
    resolve: Resolver
  ): Promise<EntryOutcome> {
    const entry = state.entries[index]
    if (!entry) {
      throw new StateCorruptError(`No entry at position ${index}`)
    }

    const record = await resolve(entry.original)
    const parents = await this.computeParents(repo, state, index, record, resolve)
    const resolution = await repo.resolution()

    let content: ContentId
    if (resolution?.status === 'unresolved') {
      return { kind: 'conflict', paths: resolution.paths }
    } else if (resolution?.status === 'resolved') {
      content = resolution.content
    } else {
      const originalParent = record.parents[0]
      const base =
        originalParent === undefined
          ? await repo.emptyContent()
          : (await resolve(originalParent)).content
      const ours = (await resolve(parents[0])).content

      let result: MergeResult
      try {
        result = await repo.merge(base, ours, record.content)
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error)
        throw new MergeEngineError(
          `Merge failed while rebasing ${entry.original.slice(0, 12)}: ${message}`,
          entry.original,
          error
        )
      }

      if (result.status === 'conflicted') {
        return {
          kind: 'conflict',
          paths: result.markers.map((marker) => marker.path),
          conflict: { parent: parents[0], result }
        }
      }
      content = result.content
    }

    const metadata = await this.rewriteMetadata(state, record, resolve)
    const newId = await repo.create(parents, content, metadata)
    return { kind: 'rebased', newId, resolvedConflict: resolution !== null }
  }

  // ===========================================================================
  // Parent mapping
  // ===========================================================================

  private static async computeParents(
    graph: CommitGraph,
    state: RebaseState,
    index: number,
    record: CommitRecord,
    resolve: Resolver
  ): Promise<NewParents> {
    if (state.collapse) {
      const previous = RebaseStateMachine.lastRebased({
        ...state,
        entries: state.entries.slice(0, index)
      })
      return [previous ?? state.destination]
    }

    const [first, second] = record.parents
    if (first === undefined) {
      return [state.destination]
    }

    const primary = await this.mapParent(graph, state, first, resolve)
    if (second === undefined) {
      return [primary]
    }

    const status = RebaseStateMachine.entryFor(state, second)?.status
    let secondary: CommitId
    if (status?.kind === 'rebased') {
      secondary = status.newId
    } else if (status) {
      secondary = await this.mapParent(graph, state, second, resolve)
    } else {
      secondary = state.externalParent ?? second
    }

    return secondary === primary ? [primary] : [primary, secondary]
  }

  /**
   * New commit standing in for `parent`: its rebased counterpart, else the
   * nearest rebased first-parent ancestor, else the destination.
   */
  private static async mapParent(
    graph: CommitGraph,
    state: RebaseState,
    parent: CommitId,
    resolve: Resolver
  ): Promise<CommitId> {
    let current = parent

    for (let steps = 0; steps < MAX_ANCESTOR_WALK; steps++) {
      const status = RebaseStateMachine.entryFor(state, current)?.status

      if (status?.kind === 'rebased') {
        return status.newId
      }
      if (status?.kind === 'pending') {
        throw new StateCorruptError(
          `Parent ${current.slice(0, 12)} is still pending; entries are out of order`,
          current
        )
      }
      if (status?.kind === 'skipped' && status.reason === 'already-in-destination') {
        for (const successor of await graph.successors(current)) {
          if (await graph.isAncestor(successor, state.destination)) return successor
        }
        return state.destination
      }
      if (!status && (await graph.isAncestor(current, state.destination))) {
        return state.destination
      }

      const next = (await resolve(current)).parents[0]
      if (next === undefined) {
        return state.destination
      }
      current = next
    }

    log.warn('[RebaseExecutor] Ancestor walk limit reached, using destination', {
      parent: parent.slice(0, 12)
    })
    return state.destination
  }

  private static async rewriteMetadata(
    state: RebaseState,
    record: CommitRecord,
    resolve: Resolver
  ): Promise<CommitMetadata> {
    const { branch: originalBranch, ...rest } = record.metadata
    const branch = state.keepBranchNames
      ? originalBranch
      : (await resolve(state.destination)).metadata.branch

    const metadata: CommitMetadata = {
      ...rest,
      extra: { ...record.metadata.extra, [REBASE_SOURCE_KEY]: record.id }
    }
    if (branch !== undefined) {
      metadata.branch = branch
    }
    return metadata
  }

  // ===========================================================================
  // Completion
  // ===========================================================================

  private static async complete(
    ctx: RebaseContext,
    state: RebaseState,
    resolve: Resolver
  ): Promise<RebaseSummary> {
    let mappings = RebaseStateMachine.mappings(state)

    if (state.collapse && mappings.length) {
      mappings = await this.collapse(ctx.repo, state, mappings, resolve)
    }

    if (!state.keepOriginals && mappings.length) {
      await ctx.repo.markSuperseded(RebaseStateMachine.rewrites(mappings))
    }

    const workingParent = pickWorkingParent(state.originalWorkingParent, mappings)
    if (workingParent && workingParent !== (await ctx.repo.parent())) {
      await ctx.repo.setParent(workingParent)
    }

    await ctx.store.clear()

    return {
      mappings,
      skipped: RebaseStateMachine.skipped(state),
      workingParent
    }
  }

  /**
   * Folds the rebased chain into one commit on the destination (plus the
   * external parent) and discards the intermediate commits.
   */
  private static async collapse(
    repo: RepoAdapter,
    state: RebaseState,
    mappings: RebaseMapping[],
    resolve: Resolver
  ): Promise<RebaseMapping[]> {
    const chain = mappings.map((mapping) => mapping.newId)
    const tip = chain[chain.length - 1]
    const last = mappings[mappings.length - 1]
    if (tip === undefined || last === undefined) {
      return mappings
    }

    const originals = await Promise.all(mappings.map((mapping) => resolve(mapping.original)))
    const lastRecord = await resolve(last.original)
    const metadata = await this.rewriteMetadata(state, lastRecord, resolve)
    metadata.message = collapsedMessage(originals.map((record) => record.metadata.message))

    const parents = state.externalParent
      ? [state.destination, state.externalParent]
      : [state.destination]
    const collapsed = await repo.create(parents, (await resolve(tip)).content, metadata)
    await repo.discard(chain.filter((id) => id !== collapsed))

    log.debug('[RebaseExecutor] Collapsed chain', {
      commits: chain.length,
      collapsed: collapsed.slice(0, 12)
    })
    return mappings.map(({ original }) => ({ original, newId: collapsed }))
  }
}

// ============================================================================
// Helpers
// ============================================================================

function createResolver(graph: CommitGraph): Resolver {
  const cache = new Map<CommitId, CommitRecord>()
  return async (id) => {
    const cached = cache.get(id)
    if (cached) return cached
    const record = await graph.resolve(id)
    cache.set(id, record)
    return record
  }
}

function assertValid(
  result: ValidationResult,
  toError: (message: string, commitId?: CommitId) => Error = (message, commitId) =>
    new StateCorruptError(message, commitId)
): void {
  if (!result.valid) {
    throw toError(result.message, result.commitId)
  }
}

/**
 * The rewrite of the original working parent when it was rebased, else the
 * last new commit, else the original working parent unchanged.
 */
export function pickWorkingParent(
  originalWorkingParent: CommitId | null,
  mappings: RebaseMapping[]
): CommitId | null {
  const rewritten = mappings.find((mapping) => mapping.original === originalWorkingParent)
  if (rewritten) return rewritten.newId
  return mappings[mappings.length - 1]?.newId ?? originalWorkingParent
}

export function collapsedMessage(messages: string[]): string {
  return ['Collapsed revision', ...messages.map((message) => `* ${message}`)].join('\n')
}
