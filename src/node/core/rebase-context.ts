import type { Configuration } from '@shared/types'
import path from 'path'
import { createRepoAdapter } from '../adapters/repo'
import type { RebaseContext } from '../operations/RebaseExecutor'
import { LOCK_FILE } from '../shared/constants'
import { FileRebaseStateStore } from './rebase-state-store'
import { RepoLock } from './repo-lock'

const contexts = new Map<string, RebaseContext>()

/**
 * Returns the rebase context for a configuration, creating it on first use.
 * Contexts are cached per state directory so the in-memory backend keeps
 * its commits across calls within one process.
 */
export function getRebaseContext(config: Configuration): RebaseContext {
  const key = `${config.backend}:${config.stateDir}`
  const existing = contexts.get(key)
  if (existing) return existing

  const context: RebaseContext = {
    repo: createRepoAdapter(config, { verbose: true }),
    store: new FileRebaseStateStore(config.stateDir),
    lock: new RepoLock(path.join(config.stateDir, LOCK_FILE))
  }
  contexts.set(key, context)
  return context
}

export function resetRebaseContexts(): void {
  contexts.clear()
}
