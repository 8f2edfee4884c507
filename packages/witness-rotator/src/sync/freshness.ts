import type { SyncState } from '../types.js'

/** Maximum lag between head-block time and wall-clock time for a synced node. */
export const FRESHNESS_WINDOW_SECONDS = 300

const BLOCK_TIME = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})$/

/**
 * Parse a node block timestamp (`YYYY-MM-DDTHH:MM:SS`, always UTC).
 *
 * @returns `undefined` for anything malformed, including out-of-range fields
 * such as `2024-02-30T00:00:00` or `T24:00:00`.
 */
export function parseBlockTime(text: string): Date | undefined {
  const match = BLOCK_TIME.exec(text.trim())
  if (match === null) return undefined
  const year = Number(match[1])
  const month = Number(match[2])
  const day = Number(match[3])
  const hour = Number(match[4])
  const minute = Number(match[5])
  const second = Number(match[6])

  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second))
  // Date.UTC rolls over out-of-range fields; reject instead.
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day ||
    date.getUTCHours() !== hour ||
    date.getUTCMinutes() !== minute ||
    date.getUTCSeconds() !== second
  ) {
    return undefined
  }
  return date
}

/** Describe how far `blockTime` lags behind `now`. */
export function measureSync(blockTime: Date, now: Date): SyncState {
  return {
    blockTime,
    observedAt: now,
    deltaSeconds: (now.getTime() - blockTime.getTime()) / 1000,
  }
}

/** `true` when `|now - blockTime|` is strictly below the window. */
export function isFresh(
  blockTime: Date,
  now: Date,
  windowSec: number = FRESHNESS_WINDOW_SECONDS,
): boolean {
  return Math.abs(measureSync(blockTime, now).deltaSeconds) < windowSec
}
