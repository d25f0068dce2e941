/**
 * Rebase Plan Builder
 *
 * Pure part of planning: orders the classified revision set so ancestors
 * come before descendants and turns it into the initial RebaseState.
 * Repository lookups (ancestry, obsolescence) happen in buildRebasePlan,
 * which feeds the results in here.
 */

import type { CommitId, RebaseFlags, RebaseState, SkipReason } from '@shared/types'
import { PlanError } from '../shared/errors'
import { RebaseStateMachine } from './RebaseStateMachine'

export type PlanCandidate = {
  id: CommitId
  parents: readonly CommitId[]
  /** Set when the commit is recorded but not rebased. */
  skip?: SkipReason
}

export type BuildPlanParams = {
  /** In the order the caller resolved them; ties in the ordering keep it. */
  candidates: PlanCandidate[]
  destination: CommitId
  originalWorkingParent: CommitId | null
  externalParent?: CommitId | null
  activeBookmark?: string | null
  flags: RebaseFlags
}

export class RebasePlanBuilder {
  private constructor() {
    // Static-only class
  }

  static build({
    candidates,
    destination,
    originalWorkingParent,
    externalParent = null,
    activeBookmark = null,
    flags
  }: BuildPlanParams): RebaseState {
    if (!candidates.length) {
      throw new PlanError('Nothing to rebase: the revision set is empty', 'empty')
    }

    const ordered = RebasePlanBuilder.topologicalOrder(candidates)

    return RebaseStateMachine.createState({
      originalWorkingParent,
      destination,
      externalParent,
      activeBookmark,
      flags,
      entries: ordered.map((candidate) =>
        candidate.skip === undefined
          ? { original: candidate.id }
          : { original: candidate.id, skip: candidate.skip }
      )
    })
  }

  /**
   * Orders candidates so every commit follows its parents inside the set.
   * Among commits that are ready at the same time, the earlier one in the
   * input wins, so the result is deterministic for a given input order.
   * Throws PlanError('cycle') when the parent edges loop.
   */
  static topologicalOrder<T extends { id: CommitId; parents: readonly CommitId[] }>(
    candidates: T[]
  ): T[] {
    const members = new Set(candidates.map((candidate) => candidate.id))
    const waitingOn = new Map<CommitId, number>()
    const children = new Map<CommitId, CommitId[]>()

    for (const candidate of candidates) {
      const inside = [...new Set(candidate.parents)].filter((parent) => members.has(parent))
      waitingOn.set(candidate.id, inside.length)
      for (const parent of inside) {
        const list = children.get(parent) ?? []
        list.push(candidate.id)
        children.set(parent, list)
      }
    }

    const ordered: T[] = []
    const placed = new Set<CommitId>()

    while (ordered.length < candidates.length) {
      const next = candidates.find(
        (candidate) => !placed.has(candidate.id) && waitingOn.get(candidate.id) === 0
      )
      if (!next) {
        const stuck = candidates.find((candidate) => !placed.has(candidate.id))
        throw new PlanError('Revision set contains a cycle', 'cycle', stuck?.id)
      }

      ordered.push(next)
      placed.add(next.id)
      for (const child of children.get(next.id) ?? []) {
        waitingOn.set(child, (waitingOn.get(child) ?? 0) - 1)
      }
    }

    return ordered
  }

  /**
   * Parents that a collapsed commit would pull in from outside the set:
   * parents of members other than the first in processing order that are
   * neither members nor part of the destination's history. The first
   * member's parent is the base the set is moved away from.
   */
  static externalParents(ordered: PlanCandidate[], inDestination: ReadonlySet<CommitId>): CommitId[] {
    const members = new Set(ordered.map((candidate) => candidate.id))
    const result: CommitId[] = []
    for (const candidate of ordered.slice(1)) {
      for (const parent of candidate.parents) {
        if (members.has(parent) || inDestination.has(parent) || result.includes(parent)) continue
        result.push(parent)
      }
    }
    return result
  }
}
