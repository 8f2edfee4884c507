/**
 * Rotation service: runs rotations in the background, one at a time, and
 * keeps the progress feed and keys of the latest run available to status
 * consumers.
 *
 * @packageDocumentation
 */

import { randomUUID } from 'node:crypto'
import { RotationInProgressError } from '../errors.js'
import { createNodeBackend } from '../node/registry.js'
import type { NodeBackend, NodeBackendOptions, ReadinessOptions } from '../node/types.js'
import { ProgressFeed } from '../progress/feed.js'
import { KeyRotationOrchestrator } from '../rotation/orchestrator.js'
import { hasNewKeys } from '../rotation/types.js'
import type { RotationResult } from '../rotation/types.js'
import type { ExecutionProfile, Keypair, RotationRequest } from '../types.js'
import { systemClock } from '../util/clock.js'
import type { Clock } from '../util/clock.js'
import { WalletClient } from '../wallet/client.js'
import type { WalletOperations } from '../wallet/types.js'

/** A rotation started by {@link RotationService.start}. */
export interface RotationRun {
  id: string
  startedAt: Date
  feed: ProgressFeed
  /** Settles with the run's result. Never rejects. */
  done: Promise<RotationResult>
}

/** Options for {@link RotationService}. */
export interface RotationServiceOptions {
  /** Defaults to the backend registered for the profile. */
  backend?: NodeBackend | undefined
  /** Defaults to a {@link WalletClient} on the backend. */
  wallet?: WalletOperations | undefined
  backendOptions?: NodeBackendOptions | undefined
  readiness?: Omit<ReadinessOptions, 'log'> | undefined
  clock?: Clock | undefined
}

/**
 * Holds at most one active rotation run.
 *
 * @remarks
 * A second `start` while a run is active is rejected rather than queued. Keys
 * from a run that produced them (success, or a relaunch failure) stay
 * available through {@link RotationService.getKeys} until the next run starts.
 *
 * @public
 */
export class RotationService {
  readonly #profile: ExecutionProfile
  readonly #backend: NodeBackend
  readonly #wallet: WalletOperations
  readonly #readiness: Omit<ReadinessOptions, 'log'> | undefined
  readonly #clock: Clock
  #active: RotationRun | undefined
  #last: RotationRun | undefined
  #keys: Keypair | undefined

  constructor(profile: ExecutionProfile, options: RotationServiceOptions = {}) {
    this.#profile = profile
    this.#backend = options.backend ?? createNodeBackend(profile, options.backendOptions)
    this.#wallet =
      options.wallet ??
      new WalletClient(this.#backend, {
        runner: options.backendOptions?.runner,
        settleMs: options.backendOptions?.walletSettleMs,
      })
    this.#readiness = options.readiness
    this.#clock = options.clock ?? systemClock
  }

  /** The run in progress, if any. */
  get current(): RotationRun | undefined {
    return this.#active
  }

  /** The most recently started run, finished or not. */
  get lastRun(): RotationRun | undefined {
    return this.#last
  }

  get profile(): ExecutionProfile {
    return this.#profile
  }

  /**
   * Start a rotation in the background.
   * @throws {@link RotationInProgressError} if a run is already active.
   */
  start(request: RotationRequest): RotationRun {
    if (this.#active !== undefined) {
      throw new RotationInProgressError('A rotation is already running')
    }

    const feed = new ProgressFeed({ clock: this.#clock })
    const orchestrator = new KeyRotationOrchestrator({
      profile: this.#profile,
      backend: this.#backend,
      wallet: this.#wallet,
      feed,
      readiness: this.#readiness,
    })

    this.#keys = undefined
    const run: RotationRun = {
      id: randomUUID(),
      startedAt: this.#clock(),
      feed,
      done: orchestrator.run(request).then((result) => {
        if (hasNewKeys(result)) {
          this.#keys = { publicKey: result.newPublicKey, privateKey: result.newPrivateKey }
        }
        this.#active = undefined
        return result
      }),
    }
    this.#active = run
    this.#last = run
    return run
  }

  /** Keys from the latest run that produced them, or `undefined`. */
  getKeys(): Keypair | undefined {
    return this.#keys
  }
}
