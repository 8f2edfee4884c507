/**
 * Error hierarchy for witness-rotator.
 *
 * @packageDocumentation
 */

/** Base error for all witness-rotator errors. */
export class RotatorError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'RotatorError'
  }
}

// --- Environment Failures ---

/**
 * Thrown when the execution profile is missing or invalid, or when a
 * configured executable cannot be found or run. Always raised before any
 * wallet or chain interaction.
 */
export class ConfigurationError extends RotatorError {
  /**
   * Dotted path of the offending profile field, when the failure is tied to
   * one (e.g. `'native.walletPath'`).
   */
  readonly field: string | undefined

  constructor(message: string, field?: string) {
    super(message)
    this.name = 'ConfigurationError'
    this.field = field
  }
}

/**
 * Thrown when the node's RPC endpoint did not answer a `get_info` probe
 * within the allowed number of attempts.
 */
export class NodeNotReadyError extends RotatorError {
  /** How many probes were made before giving up. */
  readonly attempts: number

  constructor(message: string, attempts: number) {
    super(message)
    this.name = 'NodeNotReadyError'
    this.attempts = attempts
  }
}

// --- Wallet Failures ---

/**
 * Base class for failures detected by scanning wallet output. Carries the
 * captured (redacted) wallet streams for diagnostics.
 */
export class WalletCommandError extends RotatorError {
  /** Captured wallet output, with secrets already masked. */
  readonly details: string

  constructor(message: string, details: string) {
    super(message)
    this.name = 'WalletCommandError'
    this.details = details
  }
}

/**
 * Thrown when the wallet rejects or does not recognize the provided signing
 * key. No chain mutation has been attempted.
 */
export class InvalidKeyError extends WalletCommandError {
  constructor(message: string, details: string) {
    super(message, details)
    this.name = 'InvalidKeyError'
  }
}

/** Thrown when no witness id could be extracted from the wallet output. */
export class WitnessNotFoundError extends WalletCommandError {
  constructor(message: string, details: string) {
    super(message, details)
    this.name = 'WitnessNotFoundError'
  }
}

/**
 * Thrown when key generation output is missing the public key or the WIF
 * private key. No chain mutation has been attempted.
 */
export class GenerationError extends WalletCommandError {
  constructor(message: string, details: string) {
    super(message, details)
    this.name = 'GenerationError'
  }
}

/**
 * Thrown when the network refused the `update_witness` transaction.
 *
 * @remarks
 * The cause is inferred from output text only. `hint` is advisory guidance
 * for the operator, not a confirmed diagnosis.
 */
export class TxRejectedError extends WalletCommandError {
  /** Likely cause, suitable for showing to the operator. */
  readonly hint: string

  constructor(message: string, details: string, hint: string) {
    super(message, details)
    this.name = 'TxRejectedError'
    this.hint = hint
  }
}

// --- Lifecycle Failures ---

/**
 * Thrown when the node could not be restarted with the new signing key. The
 * on-chain authorization has already succeeded at this point.
 */
export class RelaunchError extends RotatorError {
  constructor(message: string) {
    super(message)
    this.name = 'RelaunchError'
  }
}

/** Thrown when a rotation is requested while another one is still running. */
export class RotationInProgressError extends RotatorError {
  constructor(message: string) {
    super(message)
    this.name = 'RotationInProgressError'
  }
}

/**
 * Thrown when the stored rotation request cannot be decrypted. A wrong
 * passphrase and a damaged file produce the same error.
 */
export class StoredConfigError extends RotatorError {
  constructor(message: string) {
    super(message)
    this.name = 'StoredConfigError'
  }
}

/** Thrown when an event is appended to a progress feed that has completed. */
export class FeedClosedError extends RotatorError {
  constructor(message: string) {
    super(message)
    this.name = 'FeedClosedError'
  }
}
