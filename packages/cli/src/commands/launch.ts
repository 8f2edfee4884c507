import { parseArgs } from 'node:util'
import { createNodeBackend } from 'witness-rotator'
import type { NodeLogger } from 'witness-rotator'
import { formatError } from '../output.js'
import { loadCheckedProfile, resolveConfigDir } from '../context.js'

export const printLog: NodeLogger = (level, message) => {
  const stream = level === 'info' ? process.stdout : process.stderr
  stream.write(`${message}\n`)
}

/** Start the local node in listener mode. */
export async function launchCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      'config-dir': { type: 'string' },
    },
    strict: true,
  })

  try {
    const profile = await loadCheckedProfile(resolveConfigDir(values['config-dir']))
    if (!profile.localNode) {
      process.stderr.write(
        `Error: this profile uses an external node at ${profile.rpcEndpoint}; nothing to launch\n`,
      )
      return 1
    }

    const backend = createNodeBackend(profile)
    const started = await backend.start('listener', undefined, printLog)
    if (!started) {
      process.stderr.write('Error: the node could not be started\n')
      return 1
    }
    process.stdout.write(`Node started in listener mode (${backend.handle}).\n`)
    return 0
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    return 1
  }
}
