/**
 * Wallet client: runs command scripts against the wallet and classifies the
 * output.
 */

import { randomBytes } from 'node:crypto'
import {
  GenerationError,
  InvalidKeyError,
  TxRejectedError,
  WitnessNotFoundError,
} from '../errors.js'
import type { Keypair } from '../types.js'
import { defaultRunner } from '../util/exec.js'
import type { ExecCommandResult, ProcessRunner } from '../util/exec.js'
import { maskSecrets } from '../util/redact.js'
import { authorizeKeyScript, getInfoScript, verifyKeyScript } from './commands.js'
import {
  extractWitnessId,
  formatWalletOutput,
  hasInvalidKeyMarker,
  isAuthorizationRejected,
  maskKeyFields,
  parseKeypair,
} from './parse.js'
import type { WalletInvocationSource, WalletOperations } from './types.js'

/** Likely cause shown to the operator when `update_witness` is refused. */
export const AUTHORIZATION_HINT =
  'The WIF key you provided may not be the currently active signing key.'

/** Prompt the wallet prints once it accepts commands. */
export const WALLET_PROMPT = '>>>'

/** Options for {@link WalletClient}. */
export interface WalletClientOptions {
  /** Defaults to real child processes. */
  runner?: ProcessRunner | undefined
  /** Overrides the profile's RPC endpoint. */
  rpcEndpoint?: string | undefined
  /** Longest wait for the wallet prompt before input is written. Default 5000. */
  settleMs?: number | undefined
  /** Per-invocation timeout. Default 120000. */
  timeoutMs?: number | undefined
  /** Source of throwaway wallet passwords. */
  generatePassword?: (() => string) | undefined
}

function randomPassword(): string {
  return randomBytes(16).toString('hex')
}

/**
 * {@link WalletOperations} backed by wallet processes started from an
 * execution backend's invocation templates.
 *
 * @remarks
 * Every script starts with a freshly generated wallet password, so no wallet
 * file state carries over between calls. Error details attached to thrown
 * errors have the imported key and the wallet password masked.
 */
export class WalletClient implements WalletOperations {
  readonly #source: WalletInvocationSource
  readonly #runner: ProcessRunner
  readonly #rpcEndpoint: string | undefined
  readonly #settleMs: number
  readonly #timeoutMs: number
  readonly #generatePassword: () => string

  constructor(source: WalletInvocationSource, options: WalletClientOptions = {}) {
    this.#source = source
    this.#runner = options.runner ?? defaultRunner
    this.#rpcEndpoint = options.rpcEndpoint
    this.#settleMs = options.settleMs ?? 5000
    this.#timeoutMs = options.timeoutMs ?? 120_000
    this.#generatePassword = options.generatePassword ?? randomPassword
  }

  async verifyKeyAndFetchWitnessId(account: string, wif: string): Promise<string> {
    const password = this.#generatePassword()
    const result = await this.#interactive(verifyKeyScript(password, account, wif))
    const details = maskSecrets(formatWalletOutput(result), [wif, password])

    if (hasInvalidKeyMarker(result.stdout)) {
      throw new InvalidKeyError('The wallet rejected the provided WIF key', details)
    }
    const witnessId = extractWitnessId(result.stdout)
    if (witnessId === undefined) {
      throw new WitnessNotFoundError(
        `Could not find a witness id for account "${account}" in the wallet output`,
        details,
      )
    }
    return witnessId
  }

  async generateKeypair(): Promise<Keypair> {
    const { command, args } = this.#source.keygenInvocation()
    const result = await this.#runner.run(command, args, { timeoutMs: this.#timeoutMs })
    const keypair = parseKeypair(result.stdout)
    if (keypair === undefined) {
      throw new GenerationError(
        'Key generation output did not contain both pub_key and wif_priv_key',
        maskKeyFields(formatWalletOutput(result)),
      )
    }
    return keypair
  }

  async authorizeNewKey(
    account: string,
    url: string,
    newPublicKey: string,
    existingWif: string,
  ): Promise<void> {
    const password = this.#generatePassword()
    const result = await this.#interactive(
      authorizeKeyScript(password, account, existingWif, url, newPublicKey),
    )
    if (isAuthorizationRejected(result.stdout, result.stderr)) {
      throw new TxRejectedError(
        'The network rejected the update_witness transaction',
        maskSecrets(formatWalletOutput(result), [existingWif, password]),
        AUTHORIZATION_HINT,
      )
    }
  }

  getInfo(): Promise<ExecCommandResult> {
    return this.#interactive(getInfoScript())
  }

  #interactive(script: string): Promise<ExecCommandResult> {
    const { command, args } = this.#source.walletInvocation(this.#rpcEndpoint)
    return this.#runner.runInteractive(command, args, script, {
      settleMs: this.#settleMs,
      readyPattern: WALLET_PROMPT,
      timeoutMs: this.#timeoutMs,
    })
  }
}
