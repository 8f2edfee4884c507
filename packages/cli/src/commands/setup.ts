import { parseArgs } from 'node:util'
import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import { PROFILE_FILE, createProfile, saveProfile } from 'witness-rotator'
import type { BackendKind } from 'witness-rotator'
import { formatError } from '../output.js'
import { resolveConfigDir } from '../context.js'

function isBackendKind(value: string): value is BackendKind {
  return value === 'docker' || value === 'native'
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath)
    return true
  } catch {
    return false
  }
}

/** Write a new execution profile. */
export async function setupCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      backend: { type: 'string', default: 'docker' },
      'wallet-path': { type: 'string' },
      'node-path': { type: 'string' },
      external: { type: 'boolean', default: false },
      rpc: { type: 'string' },
      image: { type: 'string' },
      network: { type: 'string' },
      force: { type: 'boolean', default: false },
      'config-dir': { type: 'string' },
    },
    strict: true,
  })

  if (!isBackendKind(values.backend)) {
    process.stderr.write(`Error: --backend must be "docker" or "native", got "${values.backend}"\n`)
    return 1
  }
  if (values.external && values.rpc === undefined) {
    process.stderr.write('Error: --external needs --rpc <url> of the node to use\n')
    return 1
  }

  try {
    const configDir = resolveConfigDir(values['config-dir'])
    const profilePath = path.join(configDir, PROFILE_FILE)
    if (!values.force && (await exists(profilePath))) {
      process.stderr.write(`Profile already exists at ${profilePath} (use --force to replace it)\n`)
      return 1
    }

    const profile = createProfile({
      backend: values.backend,
      configDir,
      walletPath: values['wallet-path'],
      nodePath: values['node-path'],
      localNode: !values.external,
      rpcEndpoint: values.rpc,
      image: values.image,
      network: values.network,
    })
    const written = await saveProfile(profile, configDir)
    process.stdout.write(`Profile written to ${written}\n`)
    return 0
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    return 1
  }
}
