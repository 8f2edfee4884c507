import type { Keypair } from '../types.js'
import type { ExecCommandResult } from '../util/exec.js'

/** Executable and arguments used to start the wallet. */
export interface WalletInvocation {
  command: string
  args: string[]
}

/**
 * Produces wallet invocations for one execution backend. Implemented by every
 * node backend.
 */
export interface WalletInvocationSource {
  /** Interactive wallet connected to `rpcEndpoint`, or the profile's endpoint. */
  walletInvocation(rpcEndpoint?: string): WalletInvocation
  /** Non-interactive key generation (`--suggest-brain-key`). */
  keygenInvocation(): WalletInvocation
}

/**
 * The wallet operations a rotation needs. Each call starts a fresh wallet
 * process with a throwaway wallet file.
 */
export interface WalletOperations {
  /**
   * Import `wif` under `account` and look up the account's witness record.
   * @returns The witness id, e.g. `1.6.42`.
   * @throws {@link InvalidKeyError} if the wallet rejects the key.
   * @throws {@link WitnessNotFoundError} if no witness id is in the output.
   */
  verifyKeyAndFetchWitnessId(account: string, wif: string): Promise<string>

  /**
   * Ask the wallet for a fresh signing keypair.
   * @throws {@link GenerationError} if either key is missing from the output.
   */
  generateKeypair(): Promise<Keypair>

  /**
   * Submit `update_witness` setting `newPublicKey` as the signing key.
   * @throws {@link TxRejectedError} if error markers appear in the output.
   */
  authorizeNewKey(
    account: string,
    url: string,
    newPublicKey: string,
    existingWif: string,
  ): Promise<void>

  /** Issue `get_info` and return the raw streams. */
  getInfo(): Promise<ExecCommandResult>
}
