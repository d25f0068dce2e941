/**
 * Skip Tokens
 *
 * Legacy state files encode skipped entries as small negative integers in
 * place of a commit id. The table is a bijection between skip reasons and
 * tokens. Older clients only ever wrote the built-in tokens; new reasons can
 * be added with `with()` without touching the codec.
 *
 * `-1` is not a skip token: old clients wrote it for pending entries.
 */

import type { SkipReason } from '@shared/types'

export const LEGACY_PENDING_TOKEN = -1

const BUILTIN_TOKENS: ReadonlyArray<readonly [SkipReason, number]> = [
  ['already-in-destination', -2],
  ['ignored', -3],
  ['obsolete', -4],
  ['pruned', -5]
]

export class SkipTokenTable {
  private readonly byReason: ReadonlyMap<SkipReason, number>
  private readonly byToken: ReadonlyMap<number, SkipReason>

  constructor(pairs: ReadonlyArray<readonly [SkipReason, number]> = BUILTIN_TOKENS) {
    const byReason = new Map<SkipReason, number>()
    const byToken = new Map<number, SkipReason>()

    for (const [reason, token] of pairs) {
      if (!Number.isInteger(token) || token > -2) {
        throw new Error(`Skip token for '${reason}' must be an integer below -1, got ${token}`)
      }
      if (byReason.has(reason)) {
        throw new Error(`Skip reason '${reason}' is already registered`)
      }
      const existing = byToken.get(token)
      if (existing !== undefined) {
        throw new Error(`Skip token ${token} is already used by '${existing}'`)
      }
      byReason.set(reason, token)
      byToken.set(token, reason)
    }

    this.byReason = byReason
    this.byToken = byToken
  }

  /**
   * Returns a new table with one more reason registered.
   */
  with(reason: SkipReason, token: number): SkipTokenTable {
    return new SkipTokenTable([...this.entries(), [reason, token]])
  }

  tokenFor(reason: SkipReason): number | undefined {
    return this.byReason.get(reason)
  }

  reasonFor(token: number): SkipReason | undefined {
    return this.byToken.get(token)
  }

  reasons(): SkipReason[] {
    return [...this.byReason.keys()]
  }

  entries(): Array<[SkipReason, number]> {
    return [...this.byReason.entries()]
  }
}

export const defaultSkipTokens = new SkipTokenTable()
