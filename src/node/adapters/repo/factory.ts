/**
 * Repo Adapter Factory
 *
 * Picks the repository backend named in the configuration.
 */

import { log } from '@shared/logger'
import type { Configuration } from '@shared/types'
import type { RepoAdapter } from './interface'
import { MemoryRepoAdapter } from './MemoryRepoAdapter'
import { SimpleGitAdapter } from './SimpleGitAdapter'

export interface RepoAdapterConfig {
  /**
   * Whether to log adapter creation
   */
  verbose?: boolean
}

export function createRepoAdapter(
  config: Configuration,
  options: RepoAdapterConfig = {}
): RepoAdapter {
  const adapter: RepoAdapter =
    config.backend === 'memory'
      ? new MemoryRepoAdapter()
      : new SimpleGitAdapter({ repoPath: config.repoPath, stateDir: config.stateDir })

  if (options.verbose) {
    log.info(`[RepoAdapter] Created ${adapter.name} adapter for ${config.repoPath}`)
  }

  return adapter
}
