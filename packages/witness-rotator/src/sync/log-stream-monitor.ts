import type { ProgressFeed } from '../progress/feed.js'
import { systemClock } from '../util/clock.js'
import type { Clock } from '../util/clock.js'
import type { LineStream } from '../util/exec.js'
import { isFresh, parseBlockTime } from './freshness.js'
import type { SyncMonitor, SyncOutcome } from './types.js'

/** Opens a fresh log stream for the node. */
export type LineSource = () => LineStream

/** Options for {@link LogStreamSyncMonitor}. */
export interface LogStreamSyncMonitorOptions {
  /** Give up after this long without a sync signal. Default two hours. */
  deadlineMs?: number | undefined
  clock?: Clock | undefined
}

const BLOCK_LINE = /handle_block.*Got block: #\d+.*time: (.*?)\s/

/** Whether a log line is worth forwarding to the feed. */
export function isProgressLine(line: string): boolean {
  return line.includes('reindex') || line.includes('Got block')
}

/**
 * Watches the node's log until it finishes reindexing or logs a received
 * block whose timestamp is fresh.
 *
 * @remarks
 * Only reindex and block-received lines reach the feed. The log source is
 * closed on every exit path.
 */
export class LogStreamSyncMonitor implements SyncMonitor {
  readonly #source: LineSource
  readonly #feed: ProgressFeed
  readonly #deadlineMs: number
  readonly #clock: Clock

  constructor(source: LineSource, feed: ProgressFeed, options: LogStreamSyncMonitorOptions = {}) {
    this.#source = source
    this.#feed = feed
    this.#deadlineMs = options.deadlineMs ?? 2 * 60 * 60 * 1000
    this.#clock = options.clock ?? systemClock
  }

  async waitForSync(): Promise<SyncOutcome> {
    const feed = this.#feed
    feed.info('Monitoring node logs for sync progress...')

    const lines = this.#source()
    let timedOut = false
    let seen = 0
    const deadline = setTimeout(() => {
      timedOut = true
      lines.close()
    }, this.#deadlineMs)

    try {
      for await (const raw of lines) {
        const line = raw.trim()
        if (line === '') continue
        seen++

        if (isProgressLine(line)) {
          feed.info(`Node log: ${line}`)
        }

        if (line.includes('Done reindexing')) {
          feed.info('Reindexing complete. Node is synced.')
          return { status: 'synced', via: 'reindex' }
        }

        const match = BLOCK_LINE.exec(line)
        const blockTime = match?.[1] === undefined ? undefined : parseBlockTime(match[1])
        if (blockTime !== undefined && isFresh(blockTime, this.#clock())) {
          feed.info('Node is synced with the network.')
          return { status: 'synced', via: 'block-time', blockTime }
        }
      }
    } finally {
      clearTimeout(deadline)
      lines.close()
    }

    if (timedOut) {
      feed.warn('Sync monitoring timed out; continuing with the rotation.')
      return { status: 'timeout', attempts: seen }
    }
    feed.warn('Log stream ended before the node reported sync.')
    return { status: 'stream-ended' }
  }
}
