/**
 * Rotation state machine types.
 */

import type { ProgressEvent } from '../types.js'

/**
 * Orchestrator states. The machine only moves forward:
 * `idle → verifying-key → generating-key → authorizing → relaunching →
 * succeeded`, or from any state to `failed`.
 */
export type RotationState =
  | 'idle'
  | 'verifying-key'
  | 'generating-key'
  | 'authorizing'
  | 'relaunching'
  | 'succeeded'
  | 'failed'

/** Why a run failed. `Unexpected` covers errors outside the taxonomy. */
export type FailureReason =
  | 'ConfigurationError'
  | 'NodeNotReady'
  | 'InvalidKey'
  | 'WitnessNotFound'
  | 'GenerationError'
  | 'TxRejected'
  | 'RelaunchError'
  | 'Unexpected'

interface ResultBase {
  /** Every progress event of the run, ending with the sentinel. */
  events: readonly ProgressEvent[]
}

/** The new key is authorized on chain and the node runs with it. */
export interface RotationSuccess extends ResultBase {
  success: true
  state: 'succeeded'
  witnessId: string
  newPublicKey: string
  /** WIF-encoded. Secret. */
  newPrivateKey: string
}

/**
 * The new key is authorized on chain but the local node could not be
 * restarted with it. The keys are still valid and must reach the operator.
 */
export interface RelaunchFailure extends ResultBase {
  success: false
  state: 'failed'
  reason: 'RelaunchError'
  message: string
  witnessId: string
  newPublicKey: string
  /** WIF-encoded. Secret. */
  newPrivateKey: string
}

/** The run stopped before any key change took effect on chain. */
export interface RotationFailure extends ResultBase {
  success: false
  state: 'failed'
  reason: Exclude<FailureReason, 'RelaunchError'>
  message: string
  /** State the machine was in when it failed. */
  failedIn: RotationState
  /** Advisory guidance, set for `TxRejected`. */
  hint?: string | undefined
}

/** Terminal outcome of one orchestrator run. */
export type RotationResult = RotationSuccess | RelaunchFailure | RotationFailure

/** Whether the result carries a newly authorized keypair. */
export function hasNewKeys(result: RotationResult): result is RotationSuccess | RelaunchFailure {
  return result.success || result.reason === 'RelaunchError'
}
