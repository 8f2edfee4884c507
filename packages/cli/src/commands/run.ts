import { parseArgs } from 'node:util'
import { decryptRequest, loadStoredRequest } from 'witness-rotator'
import { formatError } from '../output.js'
import {
  PASSPHRASE_ENV,
  loadCheckedProfile,
  readPassphrase,
  readStdin,
  resolveConfigDir,
} from '../context.js'
import { rotate } from '../rotate.js'

/**
 * Rotate using the request stored by `witness-rotator store`. A request
 * stored with `--manual` has no key, which is then read from stdin.
 */
export async function runCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      'passphrase-env': { type: 'string' },
      'save-keys': { type: 'string' },
      'config-dir': { type: 'string' },
      debug: { type: 'boolean', default: false },
    },
    strict: true,
  })

  try {
    const configDir = resolveConfigDir(values['config-dir'])
    const passphrase = readPassphrase(values['passphrase-env'] ?? PASSPHRASE_ENV)
    const stored = await decryptRequest(await loadStoredRequest(configDir), passphrase)
    const wif = stored.wif === '' ? await readStdin() : stored.wif
    if (wif.length === 0) {
      process.stderr.write('Error: No WIF key provided on stdin\n')
      return 1
    }
    const request = { ...stored, wif }
    const profile = await loadCheckedProfile(configDir)
    return await rotate(profile, request, {
      configDir,
      saveKeysPath: values['save-keys'],
      debug: values.debug,
    })
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    return 1
  }
}
