/**
 * Node controller types.
 */

import type { ProgressFeed } from '../progress/feed.js'
import type { SyncMonitor } from '../sync/types.js'
import type {
  BackendKind,
  ExecutionProfile,
  NodeMode,
  ProgressLevel,
  WitnessIdentity,
} from '../types.js'
import type { Clock, Sleep } from '../util/clock.js'
import type { ProcessRunner } from '../util/exec.js'
import type { WalletInvocationSource } from '../wallet/types.js'

/** Receives node lifecycle messages, typically bound to a progress feed. */
export type NodeLogger = (level: ProgressLevel, message: string) => void

/** Options for {@link NodeBackend.isReady}. */
export interface ReadinessOptions {
  /** Default 5. */
  maxRetries?: number | undefined
  /** Delay between probes. Default 5000. */
  delayMs?: number | undefined
  log?: NodeLogger | undefined
}

/**
 * Lifecycle of the one node instance an execution profile manages, plus the
 * wallet invocations that reach it.
 *
 * @remarks
 * At most one instance runs per profile: `start` always tears down the
 * previous instance under the same handle before creating a new one.
 */
export interface NodeBackend extends WalletInvocationSource {
  readonly kind: BackendKind
  /** Container name or pid file path identifying the managed instance. */
  readonly handle: string

  /**
   * Start the node. Witness mode requires `identity`.
   * @returns `false` if the node could not be launched.
   * @throws {@link ConfigurationError} for witness mode without an identity,
   * or when the backend's executable cannot be run.
   */
  start(mode: NodeMode, identity?: WitnessIdentity, log?: NodeLogger): Promise<boolean>

  /** Best-effort stop. A node that is not running counts as stopped. */
  stop(log?: NodeLogger): Promise<void>

  /** Probe `get_info` until the node answers or retries run out. */
  isReady(options?: ReadinessOptions): Promise<boolean>

  /** The sync strategy suited to this backend, reporting to `feed`. */
  createSyncMonitor(feed: ProgressFeed): SyncMonitor
}

/** Tuning shared by both backends. All timing is injectable for tests. */
export interface NodeBackendOptions {
  /** Runs wallet probes. Defaults to real child processes. */
  runner?: ProcessRunner | undefined
  sleep?: Sleep | undefined
  clock?: Clock | undefined
  /** Longest wait for the wallet prompt. Default 5000. */
  walletSettleMs?: number | undefined
  /** How long a native node must survive before it counts as started. Default 3000. */
  launchSettleMs?: number | undefined
  /** Log-stream monitor deadline. */
  syncDeadlineMs?: number | undefined
  /** Polling monitor interval. */
  syncIntervalMs?: number | undefined
  /** Polling monitor attempt bound. */
  syncMaxAttempts?: number | undefined
}

/** Creates a backend for a profile of the kind it was registered under. */
export type NodeBackendFactory = (
  profile: ExecutionProfile,
  options: NodeBackendOptions,
) => NodeBackend
