/**
 * Rebase Plan
 *
 * Builds the initial RebaseState for moving a revision set onto a
 * destination. Each member is resolved and classified against the commit
 * graph, then RebasePlanBuilder orders the result.
 */

import { log } from '@shared/logger'
import type { CommitId, CommitRecord, RebaseRequest, RebaseState } from '@shared/types'
import type { CommitGraph, WorkingCopy } from '../../adapters/repo/interface'
import { RebasePlanBuilder, type PlanCandidate } from '../../domain/RebasePlanBuilder'
import { DEFAULT_FLAGS } from '../../domain/RebaseStateMachine'
import { RebaseValidator } from '../../domain/RebaseValidator'
import { NotFoundError, PlanError } from '../../shared/errors'

/**
 * Builds the rebase plan for `request`.
 *
 * Members whose content already landed in the destination through a
 * rewrite are recorded as skipped, as are obsolete members whose successor
 * is rebased with them and members that were pruned.
 *
 * @throws PlanError when the request cannot be planned
 */
export async function buildRebasePlan(
  graph: CommitGraph,
  workingCopy: WorkingCopy,
  request: RebaseRequest
): Promise<RebaseState> {
  const requestCheck = RebaseValidator.validateRequest(request)
  if (!requestCheck.valid) {
    throw new PlanError(requestCheck.message, 'empty')
  }

  const revset = [...new Set(request.revset)]

  const flags = { ...DEFAULT_FLAGS, ...request.options }
  const destination = (await resolveOrFail(graph, request.destination)).id
  const members = new Set(revset)

  if (members.has(destination)) {
    throw new PlanError(
      `Destination ${destination.slice(0, 12)} is part of the revision set`,
      'destination-in-set',
      destination
    )
  }

  const records: CommitRecord[] = []
  for (const id of revset) {
    const record = await resolveOrFail(graph, id)
    if (await graph.isAncestor(record.id, destination)) {
      throw new PlanError(
        `Cannot rebase ${id.slice(0, 12)} onto its own descendant ${destination.slice(0, 12)}`,
        'cycle',
        id
      )
    }
    records.push(record)
  }

  const candidates: PlanCandidate[] = []
  for (const record of records) {
    candidates.push(await classify(graph, record, destination, members))
  }

  const ordered = RebasePlanBuilder.topologicalOrder(candidates)

  let externalParent: CommitId | null = null
  if (flags.collapse) {
    const inDestination = new Set<CommitId>()
    for (const { parents } of ordered) {
      for (const parent of parents) {
        if (!members.has(parent) && (await graph.isAncestor(parent, destination))) {
          inDestination.add(parent)
        }
      }
    }

    const external = RebasePlanBuilder.externalParents(ordered, inDestination)
    if (external.length > 1) {
      throw new PlanError(
        `Unable to collapse: ${external.length} external parents (${external.map((id) => id.slice(0, 12)).join(', ')})`,
        'external-parents'
      )
    }
    externalParent = external[0] ?? null
  }

  const state = RebasePlanBuilder.build({
    candidates: ordered,
    destination,
    originalWorkingParent: await workingCopy.parent(),
    externalParent,
    activeBookmark: request.activeBookmark ?? null,
    flags
  })

  log.debug('[buildRebasePlan] Planned rebase', {
    destination: destination.slice(0, 12),
    entries: state.entries.length,
    skipped: state.entries.filter((entry) => entry.status.kind === 'skipped').length,
    collapse: flags.collapse
  })

  return state
}

async function resolveOrFail(graph: CommitGraph, id: CommitId): Promise<CommitRecord> {
  try {
    return await graph.resolve(id)
  } catch (error) {
    if (error instanceof NotFoundError) {
      throw new PlanError(`Unknown commit ${id.slice(0, 12)}`, 'unknown-commit', id)
    }
    throw error
  }
}

async function classify(
  graph: CommitGraph,
  record: CommitRecord,
  destination: CommitId,
  members: ReadonlySet<CommitId>
): Promise<PlanCandidate> {
  const base = { id: record.id, parents: record.parents }
  const successors = await graph.successors(record.id)

  for (const successor of successors) {
    if (await graph.isAncestor(successor, destination)) {
      return { ...base, skip: 'already-in-destination' }
    }
  }

  if (!(await graph.isObsolete(record.id))) {
    return base
  }

  if (!successors.length) {
    return { ...base, skip: 'pruned' }
  }

  if (successors.some((successor) => members.has(successor))) {
    return { ...base, skip: 'obsolete' }
  }

  throw new PlanError(
    `Commit ${record.id.slice(0, 12)} is obsolete and its successor ${successors[0]?.slice(0, 12)} is not in the destination; rebasing it would create divergence`,
    'divergence',
    record.id
  )
}
