import * as path from 'node:path'
import {
  KeyRotationOrchestrator,
  ProgressFeed,
  WalletClient,
  createNodeBackend,
  hasNewKeys,
} from 'witness-rotator'
import type {
  ExecutionProfile,
  NodeBackend,
  RotationRequest,
  WalletOperations,
} from 'witness-rotator'
import { formatError, renderEvent } from './output.js'
import { KEYS_FILE, formatKeys, saveKeys } from './keys-file.js'

export interface RotateOptions {
  configDir: string
  /** Defaults to {@link KEYS_FILE} in the config directory. */
  saveKeysPath?: string | undefined
  debug: boolean
  /** Defaults to the backend registered for the profile. */
  backend?: NodeBackend | undefined
  /** Defaults to a {@link WalletClient} on the backend. */
  wallet?: WalletOperations | undefined
}

/**
 * Run one rotation in the foreground, streaming progress to stdout.
 *
 * @remarks
 * New keys are written to the keys file whenever the run produced them,
 * including a relaunch failure. The private key goes to stderr only when
 * the keys file cannot be written.
 *
 * @returns The process exit code.
 * @internal
 */
export async function rotate(
  profile: ExecutionProfile,
  request: RotationRequest,
  options: RotateOptions,
): Promise<number> {
  const backend = options.backend ?? createNodeBackend(profile)
  const feed = new ProgressFeed()
  feed.subscribe((event) => {
    process.stdout.write(renderEvent(event, options.debug))
  })

  const orchestrator = new KeyRotationOrchestrator({
    profile,
    backend,
    wallet: options.wallet ?? new WalletClient(backend),
    feed,
  })
  const result = await orchestrator.run(request)

  if (hasNewKeys(result)) {
    const keysPath = options.saveKeysPath ?? path.join(options.configDir, KEYS_FILE)
    const keys = { publicKey: result.newPublicKey, privateKey: result.newPrivateKey }
    try {
      await saveKeys(keysPath, keys)
    } catch (err) {
      // The key is already authorized on chain; this is the only copy left.
      process.stderr.write(
        `\nWARNING: could not save the new keys to ${keysPath}: ${formatError(err)}\n` +
          'Record these keys now. They will not be shown again.\n\n' +
          formatKeys(keys),
      )
      return 1
    }
    process.stdout.write(`\nNew public key: ${result.newPublicKey}\n`)
    process.stdout.write(`Keys saved to ${keysPath}. Keep this file safe.\n`)
  }

  return result.success ? 0 : 1
}
