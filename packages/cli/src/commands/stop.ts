import { parseArgs } from 'node:util'
import { createNodeBackend, loadProfile } from 'witness-rotator'
import { formatError } from '../output.js'
import { resolveConfigDir } from '../context.js'
import { printLog } from './launch.js'

/** Stop the managed node. Stopping a node that is not running succeeds. */
export async function stopCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      'config-dir': { type: 'string' },
    },
    strict: true,
  })

  try {
    const profile = await loadProfile(resolveConfigDir(values['config-dir']))
    const backend = createNodeBackend(profile)
    await backend.stop(printLog)
    process.stdout.write(`Node stopped (${backend.handle}).\n`)
    return 0
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    return 1
  }
}
