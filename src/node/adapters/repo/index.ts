/**
 * Repo Adapter Module
 *
 * Collaborator contracts for the rebase engine and their two backends.
 *
 * Usage:
 * ```typescript
 * import { createRepoAdapter } from './adapters/repo'
 *
 * const repo = createRepoAdapter(loadConfiguration())
 * const commit = await repo.resolve(id)
 * ```
 */

export { createRepoAdapter } from './factory'
export type { RepoAdapterConfig } from './factory'

export type { CommitGraph, CommitWriter, MergeEngine, RepoAdapter, WorkingCopy } from './interface'

export { MemoryRepoAdapter } from './MemoryRepoAdapter'
export type { FileMap } from './MemoryRepoAdapter'
export { SimpleGitAdapter } from './SimpleGitAdapter'
export type { SimpleGitAdapterOptions } from './SimpleGitAdapter'
