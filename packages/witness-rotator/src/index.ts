/**
 * witness-rotator: automated signing-key rotation for witness nodes.
 *
 * @packageDocumentation
 */

export {
  RotatorError,
  ConfigurationError,
  NodeNotReadyError,
  WalletCommandError,
  InvalidKeyError,
  WitnessNotFoundError,
  GenerationError,
  TxRejectedError,
  RelaunchError,
  RotationInProgressError,
  StoredConfigError,
  FeedClosedError,
} from './errors.js'

export type {
  BackendKind,
  NodeMode,
  PreflightCheckStatus,
  PreflightCheck,
  PreflightResult,
  RotationRequest,
  Keypair,
  WitnessIdentity,
  NodeArgs,
  DockerSettings,
  NativeSettings,
  DockerProfile,
  NativeProfile,
  ExecutionProfile,
  ProgressLevel,
  ProgressOutcome,
  ProgressEvent,
  SyncState,
} from './types.js'

export {
  PROFILE_FILE,
  DEFAULT_IMAGE,
  DEFAULT_SEED_NODES,
  getDefaultConfigDir,
  defaultDockerSettings,
  createProfile,
  validateProfile,
  assertExecutable,
  loadProfile,
  saveProfile,
} from './config.js'
export type { CreateProfileOptions } from './config.js'

export {
  execCommand,
  execCommandFull,
  execInteractive,
  spawnDetached,
  followLines,
  defaultRunner,
} from './util/exec.js'
export type {
  ExecCommandOptions,
  ExecCommandResult,
  InteractiveOptions,
  DetachedProcess,
  LineStream,
  ProcessRunner,
} from './util/exec.js'
export type { Sleep, Clock } from './util/clock.js'

export {
  ProgressFeed,
  formatEvent,
  SUCCESS_SENTINEL,
  FAILURE_SENTINEL,
  REDACTED,
} from './progress/feed.js'
export type { ProgressListener, ProgressFeedOptions } from './progress/feed.js'

export { NodeBackendRegistry, createNodeBackend } from './node/registry.js'
export { DockerNodeBackend } from './node/docker-backend.js'
export { NativeNodeBackend } from './node/native-backend.js'
export { waitForNodeReady } from './node/readiness.js'
export {
  buildDockerRunArgs,
  buildNativeNodeArgs,
  maskSensitiveArgs,
  formatCommandLine,
} from './node/args.js'
export type {
  NodeBackend,
  NodeBackendFactory,
  NodeBackendOptions,
  NodeLogger,
  ReadinessOptions,
} from './node/types.js'

export { FRESHNESS_WINDOW_SECONDS, isFresh, parseBlockTime, measureSync } from './sync/freshness.js'
export { LogStreamSyncMonitor } from './sync/log-stream-monitor.js'
export type { LineSource, LogStreamSyncMonitorOptions } from './sync/log-stream-monitor.js'
export { PollingSyncMonitor } from './sync/polling-monitor.js'
export type { PollingSyncMonitorOptions } from './sync/polling-monitor.js'
export type { SyncMonitor, SyncOutcome } from './sync/types.js'

export { WalletClient, AUTHORIZATION_HINT, WALLET_PROMPT } from './wallet/client.js'
export type { WalletClientOptions } from './wallet/client.js'
export { renderScript } from './wallet/commands.js'
export type { WalletCommand } from './wallet/commands.js'
export {
  extractWitnessId,
  parseKeypair,
  parseHeadBlockTime,
  isAuthorizationRejected,
  hasInvalidKeyMarker,
  TRANSPORT_ERROR_MARKER,
} from './wallet/parse.js'
export type {
  WalletInvocation,
  WalletInvocationSource,
  WalletOperations,
} from './wallet/types.js'

export { KeyRotationOrchestrator, classifyFailure } from './rotation/orchestrator.js'
export type { OrchestratorDeps } from './rotation/orchestrator.js'
export { hasNewKeys } from './rotation/types.js'
export type {
  RotationState,
  FailureReason,
  RotationResult,
  RotationSuccess,
  RelaunchFailure,
  RotationFailure,
} from './rotation/types.js'

export { RotationService } from './service/rotation-service.js'
export type { RotationRun, RotationServiceOptions } from './service/rotation-service.js'

export {
  encryptRequest,
  decryptRequest,
  saveStoredRequest,
  loadStoredRequest,
  STORED_REQUEST_FILE,
  DEFAULT_ITERATIONS,
} from './store/stored-config.js'
export type { EncryptRequestOptions } from './store/stored-config.js'

export { runDoctor } from './doctor/runner.js'
