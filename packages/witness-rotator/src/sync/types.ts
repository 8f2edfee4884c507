/** Result of watching a freshly started node catch up. */
export type SyncOutcome =
  | {
      status: 'synced'
      /** Which signal ended the watch. */
      via: 'reindex' | 'block-time'
      /** Head-block time of the deciding observation, when there was one. */
      blockTime?: Date | undefined
    }
  | {
      /** Attempts or the deadline ran out. Not fatal. */
      status: 'timeout'
      attempts: number
    }
  | {
      /** The log source closed without a sync signal. */
      status: 'stream-ended'
    }

/**
 * A strategy for blocking until the managed node reports a fresh head block.
 * Progress is reported through the feed the monitor was created with.
 */
export interface SyncMonitor {
  waitForSync(): Promise<SyncOutcome>
}
