import { parseArgs } from 'node:util'
import { loadProfile } from 'witness-rotator'
import { bold, formatError } from '../output.js'
import { resolveConfigDir } from '../context.js'

/** Print a summary of the execution profile. */
export async function configCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      'config-dir': { type: 'string' },
    },
    strict: true,
  })

  try {
    const profile = await loadProfile(resolveConfigDir(values['config-dir']))
    const lines = [
      `${bold('Backend:')} ${profile.backend}`,
      `${bold('Local node:')} ${profile.localNode ? 'yes' : 'no'}`,
      `${bold('RPC endpoint:')} ${profile.rpcEndpoint}`,
      `${bold('Seed nodes:')} ${profile.seedNodes.length > 0 ? profile.seedNodes.join(', ') : '(none)'}`,
    ]
    if (profile.backend === 'docker') {
      lines.push(`${bold('Image:')} ${profile.docker.image}`)
      lines.push(`${bold('Container:')} ${profile.docker.containerName}`)
      lines.push(`${bold('Network:')} ${profile.docker.network}`)
    } else {
      lines.push(`${bold('Wallet:')} ${profile.native.walletPath}`)
      lines.push(`${bold('Node:')} ${profile.native.nodePath}`)
      lines.push(`${bold('Data dir:')} ${profile.native.dataDir}`)
    }
    process.stdout.write(`${lines.join('\n')}\n`)
    return 0
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    return 1
  }
}
