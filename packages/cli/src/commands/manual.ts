import { parseArgs } from 'node:util'
import { formatError } from '../output.js'
import { loadCheckedProfile, readStdin, resolveConfigDir } from '../context.js'
import { rotate } from '../rotate.js'

/** Rotate with a WIF key read from stdin. Nothing is stored. */
export async function manualCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      account: { type: 'string' },
      url: { type: 'string' },
      'save-keys': { type: 'string' },
      'config-dir': { type: 'string' },
      debug: { type: 'boolean', default: false },
    },
    strict: true,
  })

  if (values.account === undefined || values.account === '') {
    process.stderr.write('Error: --account is required\n')
    process.stderr.write(
      'Usage: echo "<wif>" | witness-rotator manual --account <name> [--url <url>]\n',
    )
    return 1
  }

  try {
    const wif = await readStdin()
    if (wif.length === 0) {
      process.stderr.write('Error: No WIF key provided on stdin\n')
      return 1
    }

    const configDir = resolveConfigDir(values['config-dir'])
    const profile = await loadCheckedProfile(configDir)
    return await rotate(
      profile,
      { account: values.account, url: values.url ?? '', wif },
      { configDir, saveKeysPath: values['save-keys'], debug: values.debug },
    )
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    return 1
  }
}
