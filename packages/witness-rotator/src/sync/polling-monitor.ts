import type { ProgressFeed } from '../progress/feed.js'
import { realSleep, systemClock } from '../util/clock.js'
import type { Clock, Sleep } from '../util/clock.js'
import type { ExecCommandResult } from '../util/exec.js'
import { hasTransportError, parseHeadBlockTime } from '../wallet/parse.js'
import { isFresh, measureSync, parseBlockTime } from './freshness.js'
import type { SyncMonitor, SyncOutcome } from './types.js'

/** Options for {@link PollingSyncMonitor}. */
export interface PollingSyncMonitorOptions {
  /** Delay between probes. Default 60000. */
  intervalMs?: number | undefined
  /** Default 120, about two hours at the default interval. */
  maxAttempts?: number | undefined
  sleep?: Sleep | undefined
  clock?: Clock | undefined
}

/**
 * Watches sync progress by issuing `get_info` through the wallet on a fixed
 * interval and comparing `head_block_time` with the wall clock.
 *
 * @remarks
 * A transport error means the node is not accepting connections yet and is
 * reported as waiting, not as a failure. A probe that throws is reported and
 * counts as an attempt. Running out of attempts returns a soft timeout.
 */
export class PollingSyncMonitor implements SyncMonitor {
  readonly #probe: () => Promise<ExecCommandResult>
  readonly #feed: ProgressFeed
  readonly #intervalMs: number
  readonly #maxAttempts: number
  readonly #sleep: Sleep
  readonly #clock: Clock

  constructor(
    probe: () => Promise<ExecCommandResult>,
    feed: ProgressFeed,
    options: PollingSyncMonitorOptions = {},
  ) {
    this.#probe = probe
    this.#feed = feed
    this.#intervalMs = options.intervalMs ?? 60_000
    this.#maxAttempts = options.maxAttempts ?? 120
    this.#sleep = options.sleep ?? realSleep
    this.#clock = options.clock ?? systemClock
  }

  async waitForSync(): Promise<SyncOutcome> {
    const feed = this.#feed
    feed.info('Monitoring node sync via RPC calls...')

    for (let attempt = 1; attempt <= this.#maxAttempts; attempt++) {
      const counter = `attempt ${String(attempt)}/${String(this.#maxAttempts)}`
      try {
        const result = await this.#probe()
        if (hasTransportError(result)) {
          feed.info(`Waiting for node to start (${counter})`)
        } else {
          const outcome = this.#inspect(result.stdout)
          if (outcome !== undefined) return outcome
          feed.info(`Node responding to RPC calls (${counter})`)
        }
      } catch (err) {
        feed.warn(`Error checking node status: ${err instanceof Error ? err.message : String(err)}`)
      }

      if (attempt < this.#maxAttempts) {
        await this.#sleep(this.#intervalMs)
      }
    }

    feed.warn('Sync monitoring timed out; continuing with the rotation.')
    return { status: 'timeout', attempts: this.#maxAttempts }
  }

  #inspect(stdout: string): SyncOutcome | undefined {
    const raw = parseHeadBlockTime(stdout)
    if (raw === undefined) return undefined
    const blockTime = parseBlockTime(raw)
    if (blockTime === undefined) return undefined

    const now = this.#clock()
    const { deltaSeconds } = measureSync(blockTime, now)
    this.#feed.info(`Latest block time: ${raw} (diff: ${String(Math.trunc(deltaSeconds))}s)`)
    if (!isFresh(blockTime, now)) return undefined

    this.#feed.info('Node is synced.')
    return { status: 'synced', via: 'block-time', blockTime }
  }
}
