/**
 * In-process node backend for testing.
 */

import type {
  NodeBackend,
  NodeLogger,
  NodeMode,
  ProgressFeed,
  ReadinessOptions,
  SyncMonitor,
  SyncOutcome,
  WalletInvocation,
  WitnessIdentity,
} from 'witness-rotator'

/**
 * Options for creating a {@link FakeNodeBackend}.
 * @public
 */
export interface FakeNodeBackendOptions {
  /** Modes in which `start` reports failure. */
  failStartIn?: NodeMode[] | undefined
  /** Error thrown by `start` in the given mode, instead of returning. */
  throwOnStart?: { mode: NodeMode; error: Error } | undefined
  /** Result of `isReady`. Defaults to `true`. */
  ready?: boolean | undefined
  /** Result of the sync monitor. Defaults to synced via reindex. */
  syncOutcome?: SyncOutcome | undefined
  /** RPC endpoint baked into wallet invocations. */
  rpcEndpoint?: string | undefined
}

/**
 * A `NodeBackend` that simulates one node instance without any processes.
 *
 * @remarks
 * Every lifecycle call is appended to {@link FakeNodeBackend.calls}, and the
 * number of running instances is tracked so tests can assert the
 * at-most-one-instance rule. Like the real backends, `start` tears down the
 * running instance before creating a new one.
 *
 * @public
 */
export class FakeNodeBackend implements NodeBackend {
  readonly kind = 'native'
  readonly handle = 'fake-node'
  /** Lifecycle calls in order, e.g. `start:listener`, `stop`, `isReady`. */
  readonly calls: string[] = []
  /** Identity of the running witness-mode instance, if any. */
  identity: WitnessIdentity | undefined
  /** Highest number of instances that were ever running at once. */
  maxConcurrent = 0
  #running = 0
  #mode: NodeMode | undefined
  readonly #options: FakeNodeBackendOptions

  constructor(options: FakeNodeBackendOptions = {}) {
    this.#options = options
  }

  /** Number of running instances: 0 or 1. */
  get running(): number {
    return this.#running
  }

  /** Mode of the running instance. */
  get mode(): NodeMode | undefined {
    return this.#running > 0 ? this.#mode : undefined
  }

  walletInvocation(rpcEndpoint?: string): WalletInvocation {
    return {
      command: 'cli_wallet',
      args: ['-s', rpcEndpoint ?? this.#options.rpcEndpoint ?? 'ws://127.0.0.1:8090'],
    }
  }

  keygenInvocation(): WalletInvocation {
    return { command: 'cli_wallet', args: ['--suggest-brain-key'] }
  }

  async start(mode: NodeMode, identity?: WitnessIdentity, log?: NodeLogger): Promise<boolean> {
    this.calls.push(`start:${mode}`)
    await this.#teardown()

    const failure = this.#options.throwOnStart
    if (failure !== undefined && failure.mode === mode) {
      throw failure.error
    }
    if (this.#options.failStartIn?.includes(mode) === true) {
      log?.('error', `Fake node failed to start in ${mode} mode.`)
      return false
    }

    this.#running += 1
    this.maxConcurrent = Math.max(this.maxConcurrent, this.#running)
    this.#mode = mode
    this.identity = mode === 'witness' ? identity : undefined
    log?.('info', `Fake node started in ${mode} mode.`)
    return true
  }

  async stop(): Promise<void> {
    this.calls.push('stop')
    await this.#teardown()
  }

  isReady(_options?: ReadinessOptions): Promise<boolean> {
    this.calls.push('isReady')
    return Promise.resolve(this.#options.ready ?? true)
  }

  createSyncMonitor(feed: ProgressFeed): SyncMonitor {
    const outcome: SyncOutcome = this.#options.syncOutcome ?? { status: 'synced', via: 'reindex' }
    return {
      waitForSync: () => {
        this.calls.push('waitForSync')
        feed.info(`Fake sync finished: ${outcome.status}`)
        return Promise.resolve(outcome)
      },
    }
  }

  #teardown(): Promise<void> {
    this.#running = 0
    this.identity = undefined
    return Promise.resolve()
  }
}
