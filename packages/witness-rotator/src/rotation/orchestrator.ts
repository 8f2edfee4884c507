/**
 * Key rotation orchestrator: drives the node backend and the wallet through
 * the rotation steps and turns every outcome into a {@link RotationResult}.
 *
 * @packageDocumentation
 */

import {
  ConfigurationError,
  GenerationError,
  InvalidKeyError,
  NodeNotReadyError,
  RelaunchError,
  RotationInProgressError,
  TxRejectedError,
  WalletCommandError,
  WitnessNotFoundError,
} from '../errors.js'
import type { NodeBackend, NodeLogger, ReadinessOptions } from '../node/types.js'
import { ProgressFeed } from '../progress/feed.js'
import type { SyncMonitor } from '../sync/types.js'
import type { ExecutionProfile, RotationRequest, WitnessIdentity } from '../types.js'
import type { WalletOperations } from '../wallet/types.js'
import type { FailureReason, RotationResult, RotationState } from './types.js'

/** Collaborators of one orchestrator. */
export interface OrchestratorDeps {
  profile: ExecutionProfile
  backend: NodeBackend
  wallet: WalletOperations
  /** Defaults to a new feed. */
  feed?: ProgressFeed | undefined
  /** Defaults to the backend's own strategy. */
  syncMonitor?: SyncMonitor | undefined
  readiness?: Omit<ReadinessOptions, 'log'> | undefined
}

/** Map a step error to its taxonomy name. */
export function classifyFailure(err: unknown): Exclude<FailureReason, 'RelaunchError'> {
  if (err instanceof ConfigurationError) return 'ConfigurationError'
  if (err instanceof NodeNotReadyError) return 'NodeNotReady'
  if (err instanceof InvalidKeyError) return 'InvalidKey'
  if (err instanceof WitnessNotFoundError) return 'WitnessNotFound'
  if (err instanceof GenerationError) return 'GenerationError'
  if (err instanceof TxRejectedError) return 'TxRejected'
  return 'Unexpected'
}

/**
 * Runs one key rotation.
 *
 * @remarks
 * Before the first wallet call the node must pass its gates: a local node is
 * restarted in listener mode, watched until it is synced (a sync timeout only
 * warns), then probed for readiness. With an external node only the readiness
 * probe applies. A gate failure ends the run in `failed` without any wallet
 * interaction.
 *
 * The first failing step is terminal. Authorization is never retried. A
 * relaunch failure after the chain accepted the new key still returns the
 * keys.
 *
 * Each instance runs once; `run()` never rejects except when called a second
 * time.
 *
 * @public
 */
export class KeyRotationOrchestrator {
  readonly #profile: ExecutionProfile
  readonly #backend: NodeBackend
  readonly #wallet: WalletOperations
  readonly #feed: ProgressFeed
  readonly #syncMonitor: SyncMonitor | undefined
  readonly #readiness: Omit<ReadinessOptions, 'log'>
  readonly #log: NodeLogger
  #state: RotationState = 'idle'
  #started = false

  constructor(deps: OrchestratorDeps) {
    this.#profile = deps.profile
    this.#backend = deps.backend
    this.#wallet = deps.wallet
    this.#feed = deps.feed ?? new ProgressFeed()
    this.#syncMonitor = deps.syncMonitor
    this.#readiness = deps.readiness ?? {}
    this.#log = (level, message) => {
      this.#feed[level](message)
    }
  }

  get state(): RotationState {
    return this.#state
  }

  get feed(): ProgressFeed {
    return this.#feed
  }

  /**
   * Execute the rotation.
   * @throws {@link RotationInProgressError} if this instance has already been run.
   */
  async run(request: RotationRequest): Promise<RotationResult> {
    if (this.#started) {
      throw new RotationInProgressError('This orchestrator has already been run')
    }
    this.#started = true

    const feed = this.#feed
    const { account, url, wif } = request
    feed.redact(wif)
    feed.info(`Starting witness key rotation for '${account}'...`)

    try {
      await this.#ensureNodeReady()

      this.#enter('verifying-key')
      feed.info(`Verifying WIF key and fetching witness id for '${account}'...`)
      const witnessId = await this.#wallet.verifyKeyAndFetchWitnessId(account, wif)
      feed.info(`Key is valid. Witness id: ${witnessId}`)

      this.#enter('generating-key')
      feed.info('Generating new signing keypair...')
      const keypair = await this.#wallet.generateKeypair()
      feed.redact(keypair.privateKey)
      feed.info(`New public key: ${keypair.publicKey}`)

      this.#enter('authorizing')
      feed.info('Authorizing new key on the blockchain...')
      await this.#wallet.authorizeNewKey(account, url, keypair.publicKey, wif)
      feed.info('Transaction accepted by the blockchain.')

      this.#enter('relaunching')
      const identity: WitnessIdentity = { witnessId, keypair }
      try {
        await this.#relaunch(identity)
      } catch (err) {
        if (!(err instanceof RelaunchError)) throw err
        this.#enter('failed')
        feed.error(`Relaunch failed: ${err.message}`)
        feed.warn(
          'The new key is authorized on chain, but the local node needs manual attention: ' +
            'restart it in witness mode with the new key.',
        )
        feed.complete('failure')
        return {
          success: false,
          state: 'failed',
          reason: 'RelaunchError',
          message: feed.mask(err.message),
          witnessId,
          newPublicKey: keypair.publicKey,
          newPrivateKey: keypair.privateKey,
          events: feed.events,
        }
      }

      this.#enter('succeeded')
      feed.info('Key rotation complete. The witness node is running with the new key.')
      feed.complete('success')
      return {
        success: true,
        state: 'succeeded',
        witnessId,
        newPublicKey: keypair.publicKey,
        newPrivateKey: keypair.privateKey,
        events: feed.events,
      }
    } catch (err) {
      return this.#fail(err)
    }
  }

  async #ensureNodeReady(): Promise<void> {
    const feed = this.#feed
    if (this.#profile.localNode) {
      feed.info('Starting local node in listener mode...')
      const started = await this.#backend.start('listener', undefined, this.#log)
      if (!started) {
        throw new NodeNotReadyError('The local node could not be started in listener mode', 0)
      }
      const monitor = this.#syncMonitor ?? this.#backend.createSyncMonitor(feed)
      await monitor.waitForSync()
    } else {
      feed.info(`Using external node at ${this.#profile.rpcEndpoint}`)
      await this.#backend.stop(this.#log)
    }

    const maxRetries = this.#readiness.maxRetries ?? 5
    const ready = await this.#backend.isReady({
      maxRetries,
      delayMs: this.#readiness.delayMs,
      log: this.#log,
    })
    if (!ready) {
      throw new NodeNotReadyError(
        `Node RPC did not become responsive after ${String(maxRetries)} attempts`,
        maxRetries,
      )
    }
  }

  /** @throws {@link RelaunchError} if the node does not come back in witness mode. */
  async #relaunch(identity: WitnessIdentity): Promise<void> {
    this.#feed.info('Relaunching the node with the new signing key...')
    let started: boolean
    try {
      await this.#backend.stop(this.#log)
      started = await this.#backend.start('witness', identity, this.#log)
    } catch (err) {
      throw new RelaunchError(err instanceof Error ? err.message : String(err))
    }
    if (!started) {
      throw new RelaunchError('the node did not start in witness mode')
    }
  }

  #fail(err: unknown): RotationResult {
    const feed = this.#feed
    const failedIn = this.#state
    this.#enter('failed')

    const reason = classifyFailure(err)
    const message = err instanceof Error ? err.message : String(err)
    const details = err instanceof WalletCommandError ? err.details : undefined
    const hint = err instanceof TxRejectedError ? err.hint : undefined

    feed.error(`${reason}: ${message}`, details)
    if (hint !== undefined) {
      feed.error(`Likely cause: ${hint}`)
    }
    feed.complete('failure')

    return {
      success: false,
      state: 'failed',
      reason,
      message: feed.mask(message),
      failedIn,
      ...(hint !== undefined ? { hint } : {}),
      events: feed.events,
    }
  }

  #enter(state: RotationState): void {
    this.#state = state
  }
}
