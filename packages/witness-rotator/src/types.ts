/**
 * Shared types and interfaces for witness-rotator.
 */

/** Execution backend used to run the node and the wallet. */
export type BackendKind = 'docker' | 'native'

/** How the node is started. */
export type NodeMode = 'listener' | 'witness'

/** Status of a preflight check. */
export type PreflightCheckStatus = 'ok' | 'missing' | 'version-unsupported'

/** Result of a preflight check for a single dependency. */
export interface PreflightCheck {
  /** Human-readable name of the dependency being checked. */
  name: string
  /** Whether the dependency was found and is usable. */
  status: PreflightCheckStatus
  /** The detected version string, if the dependency was found. */
  version?: string | undefined
  /** Human-readable explanation of why the status is not `'ok'`. */
  reason?: string | undefined
}

/** Aggregated result from all preflight checks. */
export interface PreflightResult {
  /** Individual check results, one per dependency inspected. */
  checks: PreflightCheck[]
  /** `true` if all required checks passed. */
  ready: boolean
  /** Non-fatal advisory messages about optional missing dependencies. */
  warnings: string[]
  /** Action items the operator should complete before rotating. */
  nextSteps: string[]
}

/**
 * Input to one rotation attempt.
 *
 * `wif` is secret material: it is never logged and never written to disk in
 * plaintext.
 */
export interface RotationRequest {
  /** Witness account name on chain. */
  account: string
  /** Witness URL submitted with `update_witness`. May be empty. */
  url: string
  /** Currently active signing key, WIF-encoded. */
  wif: string
}

/** A signing keypair produced by the wallet. */
export interface Keypair {
  publicKey: string
  /** WIF-encoded private key. Secret. */
  privateKey: string
}

/** Signing identity injected into a witness-mode node. */
export interface WitnessIdentity {
  witnessId: string
  keypair: Keypair
}

/** Flag name to value. An empty value renders as a bare `--flag`. */
export type NodeArgs = Record<string, string>

/** Container launch settings for the docker backend. */
export interface DockerSettings {
  image: string
  network: string
  containerName: string
  restartPolicy: 'no' | 'always' | 'unless-stopped' | 'on-failure'
  /** Host port to container port. */
  ports: Record<string, string>
  /** Absolute host path to container path. */
  volumes: Record<string, string>
  /** Arguments passed to the node in every mode. */
  nodeArgs: NodeArgs
  /** Extra arguments in witness mode only. */
  witnessModeArgs: NodeArgs
  /** Extra arguments in listener mode only. */
  syncModeArgs: NodeArgs
  /** Raw arguments appended to `docker run` before the image. */
  extraDockerArgs: string[]
  environment: Record<string, string>
}

/** Binary locations and bind addresses for the native backend. */
export interface NativeSettings {
  walletPath: string
  nodePath: string
  dataDir: string
  /** Sidecar file holding the running node's process id. */
  pidFile: string
  rpcBind: string
  p2pBind: string
}

interface ProfileBase {
  /** Profile schema version. Currently must be `1`. */
  version: 1
  /**
   * `true` when this host runs its own node. `false` means the wallet talks to
   * an externally managed node at `rpcEndpoint` and no local node is started.
   */
  localNode: boolean
  /** Websocket RPC endpoint the wallet connects to. */
  rpcEndpoint: string
  /** `host:port` seed nodes for the P2P network. */
  seedNodes: string[]
}

/** Execution profile for the docker backend. */
export interface DockerProfile extends ProfileBase {
  backend: 'docker'
  docker: DockerSettings
}

/** Execution profile for the native backend. */
export interface NativeProfile extends ProfileBase {
  backend: 'native'
  native: NativeSettings
}

/**
 * How to reach the node and the wallet. Loaded once and treated as immutable
 * for the duration of a rotation run.
 */
export type ExecutionProfile = DockerProfile | NativeProfile

/** Severity of a progress event. */
export type ProgressLevel = 'info' | 'warn' | 'error'

/** Terminal marker of a progress feed. */
export type ProgressOutcome = 'success' | 'failure'

/** One entry in a rotation run's progress feed. */
export interface ProgressEvent {
  /** Position in the feed, starting at 0. */
  seq: number
  at: Date
  level: ProgressLevel
  /** Human-readable message with secrets masked. */
  message: string
  /** Captured tool output attached to failures, with secrets masked. */
  details?: string | undefined
  /** Set only on the final event of the feed. */
  sentinel?: ProgressOutcome | undefined
}

/** Point-in-time observation used by the sync monitors. */
export interface SyncState {
  /** Head-block time reported by the node. */
  blockTime: Date
  /** Wall-clock time of the observation. */
  observedAt: Date
  /** `observedAt - blockTime` in seconds. */
  deltaSeconds: number
}
