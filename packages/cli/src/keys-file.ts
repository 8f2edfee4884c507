import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import type { Keypair } from 'witness-rotator'

/** Default file name for new keys, inside the config directory. */
export const KEYS_FILE = 'new_witness_keys.txt'

/** Render keys in the keys-file format. */
export function formatKeys(keys: Keypair): string {
  return `New Public Key: ${keys.publicKey}\nNew Private WIF Key: ${keys.privateKey}\n`
}

/**
 * Write new keys to `filePath` readable only by the owner.
 *
 * @remarks
 * `writeFile` only applies `mode` when it creates the file, so an existing
 * file is re-permissioned explicitly.
 */
export async function saveKeys(filePath: string, keys: Keypair): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true })
  await fs.writeFile(filePath, formatKeys(keys), { mode: 0o600 })
  await fs.chmod(filePath, 0o600)
}
