/**
 * Public entry point of the rebase engine.
 *
 * ```typescript
 * import { getRebaseContext, loadConfiguration, RebaseOperation } from 'rebasekit'
 *
 * const ctx = getRebaseContext(loadConfiguration())
 * const response = await RebaseOperation.start(ctx, { revset, destination })
 * process.exitCode = response.exitCode
 * ```
 */

export * from './adapters/repo'
export { loadConfiguration } from './core/config'
export { getRebaseContext, resetRebaseContexts } from './core/rebase-context'
export { FileRebaseStateStore, InMemoryRebaseStateStore } from './core/rebase-state-store'
export type { IRebaseStateStore } from './core/rebase-state-store'
export { RepoLock } from './core/repo-lock'
export type { RepoLockOptions } from './core/repo-lock'
export { buildRebasePlan } from './core/utils/build-rebase-plan'
export * from './domain'
export { RebaseExecutor } from './operations/RebaseExecutor'
export type {
  AbortResult,
  ExecutorOptions,
  RebaseContext,
  RebaseExecutionResult,
  ResumeOptions
} from './operations/RebaseExecutor'
export { RebaseOperation } from './operations/RebaseOperation'
export * from './shared/constants'
export * from './shared/errors'
export type * from '@shared/types'
export { log, setLogLevel } from '@shared/logger'
