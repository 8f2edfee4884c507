import { parseArgs } from 'node:util'
import { encryptRequest, saveStoredRequest } from 'witness-rotator'
import { formatError } from '../output.js'
import { PASSPHRASE_ENV, readPassphrase, readStdin, resolveConfigDir } from '../context.js'

export async function storeCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      account: { type: 'string' },
      url: { type: 'string' },
      'passphrase-env': { type: 'string' },
      'config-dir': { type: 'string' },
      manual: { type: 'boolean', default: false },
    },
    strict: true,
  })

  if (values.account === undefined || values.account === '') {
    process.stderr.write('Error: --account is required\n')
    process.stderr.write(
      'Usage: echo "<wif>" | witness-rotator store --account <name> [--url <url>] [--manual]\n',
    )
    return 1
  }

  try {
    const passphrase = readPassphrase(values['passphrase-env'] ?? PASSPHRASE_ENV)
    // A manual request leaves the key out; `run` reads it from stdin instead.
    const wif = values.manual ? '' : await readStdin()
    if (!values.manual && wif.length === 0) {
      process.stderr.write('Error: No WIF key provided on stdin\n')
      return 1
    }

    const jwe = await encryptRequest(
      { account: values.account, url: values.url ?? '', wif },
      passphrase,
    )
    const filePath = await saveStoredRequest(resolveConfigDir(values['config-dir']), jwe)
    process.stdout.write(`Rotation request for "${values.account}" stored at ${filePath}\n`)
    if (values.manual) {
      process.stdout.write('No key was stored. "witness-rotator run" will read it from stdin.\n')
    }
    return 0
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    return 1
  }
}
