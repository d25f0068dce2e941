import type { Configuration, RepoBackend } from '@shared/types'
import dotenv from 'dotenv'
import path from 'path'

dotenv.config()

/**
 * Reads configuration from the environment (and `.env`, when present).
 * Explicit overrides win over the environment.
 */
export function loadConfiguration(overrides: Partial<Configuration> = {}): Configuration {
  const repoPath = path.resolve(overrides.repoPath ?? process.env.REPO_PATH ?? process.cwd())
  const stateDir = overrides.stateDir ?? (process.env.REBASEKIT_STATE_DIR || defaultStateDir(repoPath))
  const backend = overrides.backend ?? parseBackend(process.env.REBASEKIT_BACKEND)

  return { repoPath, stateDir: path.resolve(repoPath, stateDir), backend }
}

function defaultStateDir(repoPath: string): string {
  return path.join(repoPath, '.git', 'rebasekit')
}

function parseBackend(value: string | undefined): RepoBackend {
  if (!value || value === 'git') return 'git'
  if (value === 'memory') return 'memory'
  throw new Error(`Unknown REBASEKIT_BACKEND '${value}' (expected 'git' or 'memory')`)
}
