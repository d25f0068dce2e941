import type { CommitId, RebaseState } from '@shared/types'
import fs from 'fs'
import os from 'os'
import path from 'path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { MemoryRepoAdapter } from '../../adapters/repo/MemoryRepoAdapter'
import { FileRebaseStateStore, InMemoryRebaseStateStore } from '../../core/rebase-state-store'
import { RepoLock } from '../../core/repo-lock'
import type { RebasePhase } from '../../domain/RebasePhase'
import { RebaseStateMachine } from '../../domain/RebaseStateMachine'
import { NULL_COMMIT_ID, REBASE_SOURCE_KEY } from '../../shared/constants'
import {
  LockContentionError,
  MergeEngineError,
  PlanError,
  StateCorruptError
} from '../../shared/errors'
import {
  collapsedMessage,
  pickWorkingParent,
  RebaseExecutor,
  type RebaseContext
} from '../RebaseExecutor'

describe('RebaseExecutor', () => {
  let dir: string

  beforeEach(async () => {
    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'rebasekit-executor-'))
  })

  afterEach(async () => {
    await fs.promises.rm(dir, { recursive: true, force: true })
  })

  function createContext(
    repo: MemoryRepoAdapter,
    store: RebaseContext['store'] = new InMemoryRebaseStateStore()
  ): RebaseContext {
    return { repo, store, lock: new RepoLock(path.join(dir, 'rebase.lock')) }
  }

  /** R - Z (destination), R - A - B, each commit adding its own file. */
  function linearHistory(repo: MemoryRepoAdapter) {
    const root = repo.commit([], { 'r.txt': 'r' }, { message: 'R' })
    const dest = repo.commit([root], { 'r.txt': 'r', 'z.txt': 'z' }, { message: 'Z' })
    const a = repo.commit([root], { 'r.txt': 'r', 'a.txt': 'a' }, { message: 'A' })
    const b = repo.commit([a], { 'r.txt': 'r', 'a.txt': 'a', 'b.txt': 'b' }, { message: 'B' })
    return { root, dest, a, b }
  }

  /** A rebases cleanly onto Z; B then conflicts with Z on f.txt. */
  function conflictingHistory(repo: MemoryRepoAdapter) {
    const root = repo.commit([], { 'f.txt': 'base' }, { message: 'R' })
    const dest = repo.commit([root], { 'f.txt': 'dest' }, { message: 'Z' })
    const a = repo.commit([root], { 'f.txt': 'base', 'a.txt': 'a' }, { message: 'A' })
    const b = repo.commit([a], { 'f.txt': 'mine', 'a.txt': 'a' }, { message: 'B' })
    return { root, dest, a, b }
  }

  function newIdOf(state: RebaseState, original: CommitId): CommitId {
    const status = RebaseStateMachine.entryFor(state, original)?.status
    if (status?.kind !== 'rebased') throw new Error(`${original.slice(0, 12)} was not rebased`)
    return status.newId
  }

  describe('resuming a state left by an older client', () => {
    /**
     * R - A - B - C - D and R - E - F - G - H, with Z on R as destination.
     * Each commit adds its own file.
     */
    function olderClientHistory(repo: MemoryRepoAdapter) {
      const root = repo.commit([], { 'r.txt': 'r' }, { message: 'R' })
      const a = repo.commit([root], { 'r.txt': 'r', 'a.txt': 'a' }, { message: 'A' })
      const z = repo.commit([root], { 'r.txt': 'r', 'z.txt': 'z' }, { message: 'Z' })
      const e = repo.commit([root], { 'r.txt': 'r', 'e.txt': 'e' }, { message: 'E' })
      const b = repo.commit([a], { 'r.txt': 'r', 'a.txt': 'a', 'b.txt': 'b' }, { message: 'B' })
      const c = repo.commit([b], { 'r.txt': 'r', 'a.txt': 'a', 'b.txt': 'b', 'c.txt': 'c' }, { message: 'C' })
      const d = repo.commit(
        [c],
        { 'r.txt': 'r', 'a.txt': 'a', 'b.txt': 'b', 'c.txt': 'c', 'd.txt': 'd' },
        { message: 'D' }
      )
      const f = repo.commit([e], { 'r.txt': 'r', 'e.txt': 'e', 'f.txt': 'f' }, { message: 'F' })
      const g = repo.commit([f], { 'r.txt': 'r', 'e.txt': 'e', 'f.txt': 'f', 'g.txt': 'g' }, { message: 'G' })
      const h = repo.commit(
        [g],
        { 'r.txt': 'r', 'e.txt': 'e', 'f.txt': 'f', 'g.txt': 'g', 'h.txt': 'h' },
        { message: 'H' }
      )
      return { a, z, e, b, c, d, f, g, h }
    }

    const pending = (id: CommitId) => `${id}:${NULL_COMMIT_ID}`

    /** Writes a positional state file with no flags and the given entry lines. */
    async function writeOlderClientState(
      store: FileRebaseStateStore,
      workingParent: CommitId,
      destination: CommitId,
      entries: string[]
    ): Promise<void> {
      await fs.promises.mkdir(path.dirname(store.location), { recursive: true })
      await fs.promises.writeFile(
        store.location,
        [workingParent, destination, NULL_COMMIT_ID, '0', '0', '0', '', ...entries].join('\n') + '\n'
      )
    }

    /** Entries with D before G: A in destination, F and C ignored. */
    function storedEntries({ a, e, b, f, c, d, g, h }: ReturnType<typeof olderClientHistory>) {
      return [`${a}:-2`, pending(e), pending(b), `${f}:-3`, `${c}:-3`, pending(d), pending(g), pending(h)]
    }

    it('rebases the pending entries around the skipped ones', async () => {
      const repo = new MemoryRepoAdapter()
      const ids = olderClientHistory(repo)
      const { a, z, e, b, c, d, f, g, h } = ids
      await repo.setParent(h)
      const store = new FileRebaseStateStore(path.join(dir, 'state'))
      await writeOlderClientState(store, h, z, storedEntries(ids))
      const before = repo.commitCount()

      const result = await RebaseExecutor.resume(createContext(repo, store))

      if (result.status !== 'completed') throw new Error(`expected completion, got ${result.status}`)
      const { mappings, skipped, workingParent } = result.summary
      expect(mappings.map((mapping) => mapping.original)).toEqual([e, b, d, g, h])
      expect(skipped).toEqual([
        { original: a, reason: 'already-in-destination' },
        { original: f, reason: 'ignored' },
        { original: c, reason: 'ignored' }
      ])
      expect(repo.commitCount()).toBe(before + 5)

      const rebased = new Map(mappings.map((mapping) => [mapping.original, mapping.newId]))
      const eNew = rebased.get(e) ?? ''
      const bNew = rebased.get(b) ?? ''
      const dNew = rebased.get(d) ?? ''
      const gNew = rebased.get(g) ?? ''
      const hNew = rebased.get(h) ?? ''

      expect(repo.get(eNew).parents).toEqual([z])
      expect(repo.get(bNew).parents).toEqual([z])
      expect(repo.get(dNew).parents).toEqual([bNew])
      expect(repo.get(gNew).parents).toEqual([eNew])
      expect(repo.get(hNew).parents).toEqual([gNew])

      expect(repo.filesOf(bNew)).toEqual({ 'b.txt': 'b', 'r.txt': 'r', 'z.txt': 'z' })
      expect(repo.filesOf(dNew)).toEqual({ 'b.txt': 'b', 'd.txt': 'd', 'r.txt': 'r', 'z.txt': 'z' })
      expect(repo.filesOf(eNew)).toEqual({ 'e.txt': 'e', 'r.txt': 'r', 'z.txt': 'z' })

      expect(workingParent).toBe(hNew)
      expect(await repo.parent()).toBe(hNew)
      expect(await repo.successors(e)).toEqual([eNew])
      expect(await repo.successors(b)).toEqual([bNew])
      expect(await repo.successors(d)).toEqual([dNew])
      expect(await repo.successors(g)).toEqual([gNew])
      expect(await repo.successors(h)).toEqual([hNew])
      expect(await repo.isObsolete(f)).toBe(false)
      expect(await store.exists()).toBe(false)
    })

    it('follows the stored order when G is listed before D', async () => {
      const repo = new MemoryRepoAdapter()
      const { a, z, e, b, c, d, f, g, h } = olderClientHistory(repo)
      await repo.setParent(h)
      const store = new FileRebaseStateStore(path.join(dir, 'state'))
      await writeOlderClientState(store, h, z, [
        `${a}:-2`,
        pending(e),
        pending(b),
        `${f}:-3`,
        `${c}:-3`,
        pending(g),
        pending(d),
        pending(h)
      ])
      const started: CommitId[] = []

      const result = await RebaseExecutor.resume(createContext(repo, store), {
        onEntryStart: (original) => started.push(original)
      })

      if (result.status !== 'completed') throw new Error(`expected completion, got ${result.status}`)
      expect(started).toEqual([e, b, g, d, h])
      expect(result.summary.mappings.map((mapping) => mapping.original)).toEqual([e, b, g, d, h])

      const rebased = new Map(result.summary.mappings.map((mapping) => [mapping.original, mapping.newId]))
      expect(repo.get(rebased.get(d) ?? '').parents).toEqual([rebased.get(b)])
      expect(repo.get(rebased.get(g) ?? '').parents).toEqual([rebased.get(e)])
    })

    it('produces the same mapping when the same file is resumed twice', async () => {
      const resumeOnce = async (stateDir: string) => {
        const repo = new MemoryRepoAdapter()
        const ids = olderClientHistory(repo)
        await repo.setParent(ids.h)
        const store = new FileRebaseStateStore(stateDir)
        await writeOlderClientState(store, ids.h, ids.z, storedEntries(ids))
        const result = await RebaseExecutor.resume(createContext(repo, store))
        if (result.status !== 'completed') throw new Error(`expected completion, got ${result.status}`)
        return result.summary.mappings
      }

      const first = await resumeOnce(path.join(dir, 'first'))
      const second = await resumeOnce(path.join(dir, 'second'))

      expect(first).toHaveLength(5)
      expect(second).toEqual(first)
    })

    it('completes a file with no entries', async () => {
      const repo = new MemoryRepoAdapter()
      const { dest, a } = linearHistory(repo)
      const store = new FileRebaseStateStore(dir)
      await fs.promises.writeFile(
        store.location,
        [a, dest, NULL_COMMIT_ID, '0', '0', '0', '', ''].join('\n')
      )

      const result = await RebaseExecutor.resume(createContext(repo, store))

      expect(result).toEqual({
        status: 'completed',
        summary: { mappings: [], skipped: [], workingParent: a }
      })
      expect(await repo.parent()).toBe(a)
      expect(await store.exists()).toBe(false)
    })
  })

  describe('begin', () => {
    it('rebases a stack and records where each commit came from', async () => {
      const repo = new MemoryRepoAdapter()
      const { dest, a, b } = linearHistory(repo)
      await repo.setParent(b)
      const ctx = createContext(repo)

      const result = await RebaseExecutor.begin(ctx, { revset: [b, a], destination: dest })

      if (result.status !== 'completed') throw new Error('expected completion')
      const [first, second] = result.summary.mappings
      expect(first?.original).toBe(a)
      expect(second?.original).toBe(b)

      const aNew = first?.newId ?? ''
      const bNew = second?.newId ?? ''
      expect(repo.get(aNew)).toMatchObject({
        parents: [dest],
        metadata: { message: 'A', extra: { [REBASE_SOURCE_KEY]: a } }
      })
      expect(repo.get(bNew).parents).toEqual([aNew])
      expect(repo.filesOf(bNew)).toEqual({ 'a.txt': 'a', 'b.txt': 'b', 'r.txt': 'r', 'z.txt': 'z' })
      expect(await repo.parent()).toBe(bNew)
      expect(await repo.isObsolete(a)).toBe(true)
      expect(await ctx.store.exists()).toBe(false)
      expect(await RebaseExecutor.resume(ctx)).toEqual({ status: 'nothing-to-rebase' })
    })

    it('produces the same commits for the same input', async () => {
      const run = async () => {
        const repo = new MemoryRepoAdapter()
        const { dest, a, b } = linearHistory(repo)
        const result = await RebaseExecutor.begin(createContext(repo), { revset: [a, b], destination: dest })
        if (result.status !== 'completed') throw new Error('expected completion')
        return result.summary.mappings
      }

      expect(await run()).toEqual(await run())
    })

    it('reports progress through callbacks', async () => {
      const repo = new MemoryRepoAdapter()
      const { dest, a, b } = linearHistory(repo)
      const phases: RebasePhase['kind'][] = []
      const started: CommitId[] = []
      const onEntryRebased = vi.fn()

      await RebaseExecutor.begin(
        createContext(repo),
        { revset: [a, b], destination: dest },
        {
          onPhaseChange: (phase) => phases.push(phase.kind),
          onEntryStart: (original) => started.push(original),
          onEntryRebased
        }
      )

      expect(started).toEqual([a, b])
      expect(onEntryRebased).toHaveBeenCalledTimes(2)
      expect(onEntryRebased).toHaveBeenNthCalledWith(1, a, expect.any(String))
      expect(phases[0]).toBe('running')
      expect(phases.at(-1)).toBe('completed')
    })

    it('leaves originals visible with keepOriginals', async () => {
      const repo = new MemoryRepoAdapter()
      const { dest, a, b } = linearHistory(repo)

      await RebaseExecutor.begin(createContext(repo), {
        revset: [a, b],
        destination: dest,
        options: { keepOriginals: true }
      })

      expect(await repo.isObsolete(a)).toBe(false)
      expect(await repo.isObsolete(b)).toBe(false)
    })

    it('adopts the destination branch unless asked to keep names', async () => {
      const build = () => {
        const repo = new MemoryRepoAdapter()
        const root = repo.commit([], { 'r.txt': 'r' }, { message: 'R' })
        const dest = repo.commit([root], { 'z.txt': 'z' }, { message: 'Z', branch: 'main' })
        const a = repo.commit([root], { 'a.txt': 'a' }, { message: 'A', branch: 'topic' })
        return { repo, dest, a }
      }

      const adopted = build()
      const first = await RebaseExecutor.begin(createContext(adopted.repo), {
        revset: [adopted.a],
        destination: adopted.dest
      })
      const kept = build()
      const second = await RebaseExecutor.begin(createContext(kept.repo), {
        revset: [kept.a],
        destination: kept.dest,
        options: { keepBranchNames: true }
      })

      if (first.status !== 'completed' || second.status !== 'completed') {
        throw new Error('expected completion')
      }
      expect(adopted.repo.get(first.summary.mappings[0]?.newId ?? '').metadata.branch).toBe('main')
      expect(kept.repo.get(second.summary.mappings[0]?.newId ?? '').metadata.branch).toBe('topic')
    })

    it('collapses the rebased commits into one', async () => {
      const repo = new MemoryRepoAdapter()
      const { root, dest, a, b } = linearHistory(repo)
      await repo.setParent(b)

      const result = await RebaseExecutor.begin(createContext(repo), {
        revset: [a, b],
        destination: dest,
        options: { collapse: true }
      })

      if (result.status !== 'completed') throw new Error('expected completion')
      const collapsed = result.summary.mappings[0]?.newId ?? ''
      expect(result.summary.mappings).toEqual([
        { original: a, newId: collapsed },
        { original: b, newId: collapsed }
      ])
      expect(repo.get(collapsed).parents).toEqual([dest])
      expect(repo.get(collapsed).metadata.message).toBe('Collapsed revision\n* A\n* B')
      expect(repo.filesOf(collapsed)).toEqual({ 'a.txt': 'a', 'b.txt': 'b', 'r.txt': 'r', 'z.txt': 'z' })
      expect(repo.visibleCommits()).toEqual([root, dest, collapsed])
      expect(await repo.parent()).toBe(collapsed)
    })

    it('refuses to start while another rebase is in progress', async () => {
      const repo = new MemoryRepoAdapter()
      const { dest, a, b } = conflictingHistory(repo)
      const ctx = createContext(repo)
      await RebaseExecutor.begin(ctx, { revset: [a, b], destination: dest })

      const error = await RebaseExecutor.begin(ctx, { revset: [a], destination: dest }).catch(
        (err: unknown) => err
      )

      expect(error).toBeInstanceOf(PlanError)
      expect(error instanceof PlanError && error.reason).toBe('in-progress')
    })

    it('fails fast while the repository is locked', async () => {
      const repo = new MemoryRepoAdapter()
      const { dest, a } = linearHistory(repo)
      const ctx = createContext(repo)
      const release = await new RepoLock(ctx.lock.lockPath).acquire()

      try {
        await expect(
          RebaseExecutor.begin(ctx, { revset: [a], destination: dest })
        ).rejects.toBeInstanceOf(LockContentionError)
        expect(await ctx.store.exists()).toBe(false)
      } finally {
        await release()
      }
    })
  })

  describe('conflicts', () => {
    it('pauses with the state saved and the conflict in the working copy', async () => {
      const repo = new MemoryRepoAdapter()
      const { dest, a, b } = conflictingHistory(repo)
      await repo.setParent(b)
      const ctx = createContext(repo)

      const result = await RebaseExecutor.begin(ctx, { revset: [a, b], destination: dest })

      if (result.status !== 'conflict') throw new Error('expected a conflict')
      expect(result.pause.original).toBe(b)
      expect(result.pause.paths).toEqual(['f.txt'])

      const saved = await ctx.store.load()
      const aNew = newIdOf(result.state, a)
      expect(saved?.entries).toEqual([
        { original: a, status: { kind: 'rebased', newId: aNew } },
        { original: b, status: { kind: 'pending' } }
      ])
      expect(await repo.parent()).toBe(aNew)
      expect(repo.conflictMarkers()).toEqual([
        { path: 'f.txt', content: '<<<<<<< ours\ndest\n=======\nmine\n>>>>>>> theirs\n' }
      ])
    })

    it('pauses again when continued before the conflict is resolved', async () => {
      const repo = new MemoryRepoAdapter()
      const { dest, a, b } = conflictingHistory(repo)
      const ctx = createContext(repo)
      await RebaseExecutor.begin(ctx, { revset: [a, b], destination: dest })
      const count = repo.commitCount()

      const result = await RebaseExecutor.resume(ctx)

      expect(result.status).toBe('conflict')
      if (result.status === 'conflict') expect(result.pause.paths).toEqual(['f.txt'])
      expect(repo.commitCount()).toBe(count)
    })

    it('uses the resolution on continue and finishes the rebase', async () => {
      const repo = new MemoryRepoAdapter()
      const { dest, a, b } = conflictingHistory(repo)
      await repo.setParent(b)
      const ctx = createContext(repo)
      await RebaseExecutor.begin(ctx, { revset: [a, b], destination: dest })

      repo.resolveConflict({ 'f.txt': 'merged', 'a.txt': 'a' })
      const result = await RebaseExecutor.resume(ctx)

      if (result.status !== 'completed') throw new Error('expected completion')
      const bNew = result.summary.mappings[1]?.newId ?? ''
      expect(repo.filesOf(bNew)).toEqual({ 'a.txt': 'a', 'f.txt': 'merged' })
      expect(repo.get(bNew).parents).toEqual([result.summary.mappings[0]?.newId])
      expect(await repo.resolution()).toBeNull()
      expect(await repo.parent()).toBe(bNew)
      expect(await ctx.store.exists()).toBe(false)
    })
  })

  describe('resume', () => {
    it('reports nothing to do without a saved state', async () => {
      const repo = new MemoryRepoAdapter()

      expect(await RebaseExecutor.resume(createContext(repo))).toEqual({ status: 'nothing-to-rebase' })
    })

    it('leaves the repository alone when every entry is already done', async () => {
      const repo = new MemoryRepoAdapter()
      const { root, dest, a, b } = linearHistory(repo)
      const aNew = repo.commit([dest], { 'r.txt': 'r', 'z.txt': 'z', 'a.txt': 'a' }, { message: 'A' })
      const other = repo.commit([root], { 'r.txt': 'r', 'o.txt': 'o' }, { message: 'O' })
      await repo.setParent(other)
      const ctx = createContext(repo)
      await ctx.store.save(
        RebaseStateMachine.markRebased(
          RebaseStateMachine.createState({
            originalWorkingParent: b,
            destination: dest,
            entries: [{ original: a }, { original: b, skip: 'ignored' }]
          }),
          a,
          aNew
        )
      )
      const before = repo.commitCount()

      const result = await RebaseExecutor.resume(ctx)

      expect(result).toEqual({ status: 'nothing-to-rebase' })
      expect(await repo.parent()).toBe(other)
      expect(await repo.isObsolete(a)).toBe(false)
      expect(repo.commitCount()).toBe(before)
      expect(await ctx.store.exists()).toBe(false)
    })

    it('refuses a state that names unknown commits without touching the repository', async () => {
      const repo = new MemoryRepoAdapter()
      const { dest, a } = linearHistory(repo)
      await repo.setParent(a)
      const unknown = 'f'.repeat(40)
      const ctx = createContext(repo)
      await ctx.store.save(
        RebaseStateMachine.createState({
          originalWorkingParent: a,
          destination: dest,
          entries: [{ original: a }, { original: unknown }]
        })
      )
      const count = repo.commitCount()

      const error = await RebaseExecutor.resume(ctx).catch((err: unknown) => err)

      expect(error).toBeInstanceOf(StateCorruptError)
      expect(error instanceof StateCorruptError && error.message).toBe(
        `Rebase state refers to unknown commit ${unknown.slice(0, 12)}`
      )
      expect(repo.commitCount()).toBe(count)
      expect(await repo.parent()).toBe(a)
      expect(await ctx.store.exists()).toBe(true)
    })

    it('refuses a state listing a child before its parent', async () => {
      const repo = new MemoryRepoAdapter()
      const { dest, a, b } = linearHistory(repo)
      const ctx = createContext(repo)
      await ctx.store.save(
        RebaseStateMachine.createState({
          originalWorkingParent: null,
          destination: dest,
          entries: [{ original: b }, { original: a }]
        })
      )

      await expect(RebaseExecutor.resume(ctx)).rejects.toBeInstanceOf(StateCorruptError)
    })

    it('refuses to resume onto a different destination', async () => {
      const repo = new MemoryRepoAdapter()
      const { dest, a, b } = conflictingHistory(repo)
      const ctx = createContext(repo)
      await RebaseExecutor.begin(ctx, { revset: [a, b], destination: dest })

      const error = await RebaseExecutor.resume(ctx, { expectedDestination: a }).catch(
        (err: unknown) => err
      )

      expect(error instanceof PlanError && error.reason).toBe('destination-changed')
    })

    it('keeps earlier entries when the merge engine fails', async () => {
      const repo = new MemoryRepoAdapter()
      const { dest, a, b } = linearHistory(repo)
      const ctx = createContext(repo)
      const merge = repo.merge.bind(repo)
      let calls = 0
      vi.spyOn(repo, 'merge').mockImplementation(async (base, ours, theirs) => {
        calls++
        if (calls === 2) throw new Error('engine crashed')
        return merge(base, ours, theirs)
      })
      const phases: RebasePhase['kind'][] = []

      const error = await RebaseExecutor.begin(
        ctx,
        { revset: [a, b], destination: dest },
        { onPhaseChange: (phase) => phases.push(phase.kind) }
      ).catch((err: unknown) => err)

      expect(error).toBeInstanceOf(MergeEngineError)
      expect(error instanceof MergeEngineError && error.message).toBe(
        `Merge failed while rebasing ${b.slice(0, 12)}: engine crashed`
      )
      expect(phases.at(-1)).toBe('failed')

      const saved = await ctx.store.load()
      expect(saved?.entries[0]?.status.kind).toBe('rebased')
      expect(saved?.entries[1]?.status).toEqual({ kind: 'pending' })

      vi.mocked(repo.merge).mockRestore()
      const result = await RebaseExecutor.resume(ctx)
      expect(result.status).toBe('completed')
    })
  })

  describe('abort', () => {
    it('discards new commits and restores the working copy', async () => {
      const repo = new MemoryRepoAdapter()
      const { root, dest, a, b } = conflictingHistory(repo)
      await repo.setParent(b)
      const ctx = createContext(repo)
      const paused = await RebaseExecutor.begin(ctx, { revset: [a, b], destination: dest })
      if (paused.status !== 'conflict') throw new Error('expected a conflict')
      const aNew = newIdOf(paused.state, a)

      const result = await RebaseExecutor.abort(ctx)

      expect(result).toEqual({ status: 'aborted', restoredParent: b, discarded: [aNew] })
      expect(await repo.parent()).toBe(b)
      expect(await repo.resolution()).toBeNull()
      expect(await repo.isObsolete(aNew)).toBe(true)
      expect(await repo.isObsolete(a)).toBe(false)
      expect(repo.visibleCommits()).toEqual([root, dest, a, b])
      expect(await ctx.store.exists()).toBe(false)
    })

    it('reports when there is nothing to abort', async () => {
      const repo = new MemoryRepoAdapter()

      expect(await RebaseExecutor.abort(createContext(repo))).toEqual({ status: 'nothing-to-abort' })
    })

    it('clears a state file that cannot be read', async () => {
      const repo = new MemoryRepoAdapter()
      const store = new FileRebaseStateStore(dir)
      await fs.promises.writeFile(store.location, 'not a state file\n')

      const result = await RebaseExecutor.abort(createContext(repo, store))

      expect(result).toEqual({ status: 'aborted', restoredParent: null, discarded: [] })
      expect(await store.exists()).toBe(false)
    })
  })
})

describe('pickWorkingParent', () => {
  const mappings = [
    { original: 'a'.repeat(40), newId: '1'.repeat(40) },
    { original: 'b'.repeat(40), newId: '2'.repeat(40) }
  ]

  it('follows the original working parent when it was rebased', () => {
    expect(pickWorkingParent('a'.repeat(40), mappings)).toBe('1'.repeat(40))
  })

  it('moves to the last new commit otherwise', () => {
    expect(pickWorkingParent('c'.repeat(40), mappings)).toBe('2'.repeat(40))
  })

  it('stays put when nothing was rebased', () => {
    expect(pickWorkingParent('c'.repeat(40), [])).toBe('c'.repeat(40))
    expect(pickWorkingParent(null, [])).toBeNull()
  })
})

describe('collapsedMessage', () => {
  it('lists every folded message', () => {
    expect(collapsedMessage(['first', 'second'])).toBe('Collapsed revision\n* first\n* second')
  })
})
