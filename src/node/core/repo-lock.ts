/**
 * Repository lock
 *
 * At most one rebase may rewrite a repository at a time. The lock is a file
 * created atomically with O_EXCL (`wx`) holding the owner's pid, a unique
 * lock id and a timestamp. A second caller fails fast with
 * LockContentionError instead of waiting.
 *
 * A lock file is broken and re-acquired only when it cannot be parsed or
 * the process that created it no longer exists. Age alone never breaks a
 * lock.
 */

import { log } from '@shared/logger'
import crypto from 'crypto'
import fs from 'fs'
import path from 'path'
import { LockContentionError } from '../shared/errors'

const MAX_ATTEMPTS = 5

type LockInfo = {
  pid: number
  lockId: string
  timestamp: number
}

export type RepoLockOptions = {
  /** Replaceable for tests. Defaults to a signal-0 probe. */
  isProcessAlive?: (pid: number) => boolean
}

export type ReleaseLock = () => Promise<void>

export class RepoLock {
  private readonly isProcessAlive: (pid: number) => boolean

  constructor(
    readonly lockPath: string,
    options: RepoLockOptions = {}
  ) {
    this.isProcessAlive = options.isProcessAlive ?? isProcessAlive
  }

  /**
   * Acquires the lock or throws LockContentionError.
   * Returns a release function that must be called when done.
   */
  async acquire(): Promise<ReleaseLock> {
    const lockId = crypto.randomUUID()
    await fs.promises.mkdir(path.dirname(this.lockPath), { recursive: true })

    for (let attempt = 0; attempt < MAX_ATTEMPTS; attempt++) {
      const info: LockInfo = { pid: process.pid, lockId, timestamp: Date.now() }
      try {
        await fs.promises.writeFile(this.lockPath, JSON.stringify(info), { flag: 'wx' })
      } catch (err) {
        if ((err as NodeJS.ErrnoException).code !== 'EEXIST') throw err

        const owner = await this.breakIfStale()
        if (owner === null) continue
        throw new LockContentionError(
          `Repository is locked by another rebase (pid ${owner.pid})`,
          this.lockPath,
          owner.pid
        )
      }

      // Another process may have broken a stale lock and written its own
      // between our unlink and writeFile.
      const current = await this.readLock()
      if (current === 'missing' || current === 'corrupt' || current.lockId !== lockId) {
        log.debug('[RepoLock] Lost lock race, retrying', { lockPath: this.lockPath, attempt })
        continue
      }

      log.debug('[RepoLock] Acquired', { lockPath: this.lockPath, lockId: lockId.slice(0, 8) })
      return () => this.release(lockId)
    }

    throw new LockContentionError(
      `Failed to acquire repository lock after ${MAX_ATTEMPTS} attempts`,
      this.lockPath
    )
  }

  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire()
    try {
      return await fn()
    } finally {
      await release()
    }
  }

  /** True when a live owner holds the lock. */
  async isHeld(): Promise<boolean> {
    const current = await this.readLock()
    if (current === 'missing' || current === 'corrupt') return false
    return !this.isStale(current)
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  /**
   * Returns null when the lock was broken (or vanished) and the caller should
   * retry, otherwise the live owner.
   */
  private async breakIfStale(): Promise<LockInfo | null> {
    const current = await this.readLock()
    if (current === 'missing') return null

    if (current === 'corrupt') {
      log.warn('[RepoLock] Breaking corrupted lock file', { lockPath: this.lockPath })
      await safeUnlink(this.lockPath)
      return null
    }

    if (this.isStale(current)) {
      log.warn(`[RepoLock] Breaking lock held by exited pid ${current.pid}`, {
        lockPath: this.lockPath,
        ageMs: Date.now() - current.timestamp
      })
      await safeUnlink(this.lockPath)
      return null
    }

    return current
  }

  private isStale(info: LockInfo): boolean {
    return !this.isProcessAlive(info.pid)
  }

  private async readLock(): Promise<LockInfo | 'missing' | 'corrupt'> {
    let content: string
    try {
      content = await fs.promises.readFile(this.lockPath, 'utf-8')
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === 'ENOENT') return 'missing'
      throw err
    }

    try {
      const parsed: unknown = JSON.parse(content)
      return isLockInfo(parsed) ? parsed : 'corrupt'
    } catch {
      return 'corrupt'
    }
  }

  private async release(lockId: string): Promise<void> {
    const current = await this.readLock()
    if (current === 'missing' || current === 'corrupt' || current.lockId !== lockId) {
      log.warn('[RepoLock] Lock no longer owned at release', { lockPath: this.lockPath })
      return
    }
    await safeUnlink(this.lockPath)
    log.debug('[RepoLock] Released', { lockPath: this.lockPath })
  }
}

export function isProcessAlive(pid: number): boolean {
  try {
    // Signal 0 checks if process exists without killing it
    process.kill(pid, 0)
    return true
  } catch (err) {
    return (err as NodeJS.ErrnoException).code === 'EPERM'
  }
}

async function safeUnlink(filePath: string): Promise<void> {
  try {
    await fs.promises.unlink(filePath)
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code !== 'ENOENT') {
      throw err
    }
  }
}

function isLockInfo(value: unknown): value is LockInfo {
  if (typeof value !== 'object' || value === null) return false
  return (
    'pid' in value &&
    typeof value.pid === 'number' &&
    'lockId' in value &&
    typeof value.lockId === 'string' &&
    'timestamp' in value &&
    typeof value.timestamp === 'number'
  )
}
