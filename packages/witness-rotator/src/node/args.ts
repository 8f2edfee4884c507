/**
 * Command-line construction for the node and the container runtime.
 */

import type {
  DockerSettings,
  NativeSettings,
  NodeArgs,
  NodeMode,
  WitnessIdentity,
} from '../types.js'

/** Flags whose values are never shown in logs. */
const SENSITIVE_FLAGS = new Set(['--private-key', '--witness-id'])

/** `{ flag: value }` as `--flag value`, or a bare `--flag` for an empty value. */
export function renderFlags(args: NodeArgs): string[] {
  const rendered: string[] = []
  for (const [flag, value] of Object.entries(args)) {
    rendered.push(`--${flag}`)
    if (value !== '') rendered.push(value)
  }
  return rendered
}

/**
 * Signing identity arguments. The witness id is passed as a JSON string
 * literal and the keypair as a JSON `[public, private]` array.
 */
export function identityArgs(identity: WitnessIdentity): string[] {
  return [
    '--witness-id',
    JSON.stringify(identity.witnessId),
    '--private-key',
    JSON.stringify([identity.keypair.publicKey, identity.keypair.privateKey]),
  ]
}

/**
 * Arguments to `docker` that launch the node container.
 *
 * @remarks
 * Layout: `run -d --name` with restart policy, network, ports, volumes,
 * environment and extra docker arguments, then the image and `witness_node`
 * followed by the node arguments and the mode arguments.
 */
export function buildDockerRunArgs(
  settings: DockerSettings,
  seedNodes: string[],
  mode: NodeMode,
  identity?: WitnessIdentity,
): string[] {
  const args = ['run', '-d', '--name', settings.containerName]
  if (settings.restartPolicy !== 'no') {
    args.push('--restart', settings.restartPolicy)
  }
  args.push('--network', settings.network)
  for (const [hostPort, containerPort] of Object.entries(settings.ports)) {
    args.push('-p', `${hostPort}:${containerPort}`)
  }
  for (const [hostPath, containerPath] of Object.entries(settings.volumes)) {
    args.push('-v', `${hostPath}:${containerPath}`)
  }
  for (const [name, value] of Object.entries(settings.environment)) {
    args.push('-e', `${name}=${value}`)
  }
  args.push(...settings.extraDockerArgs, settings.image, 'witness_node')

  args.push(...renderFlags(settings.nodeArgs))
  if (seedNodes.length > 0 && settings.nodeArgs['seed-nodes'] === undefined) {
    args.push('--seed-nodes', JSON.stringify(seedNodes))
  }

  if (mode === 'witness' && identity !== undefined) {
    args.push(...renderFlags(settings.witnessModeArgs), ...identityArgs(identity))
  } else {
    args.push(...renderFlags(settings.syncModeArgs))
  }
  return args
}

/** Arguments to the native node binary. */
export function buildNativeNodeArgs(
  settings: NativeSettings,
  seedNodes: string[],
  mode: NodeMode,
  identity?: WitnessIdentity,
): string[] {
  const args = [
    `--data-dir=${settings.dataDir}`,
    `--rpc-endpoint=${settings.rpcBind}`,
    `--p2p-endpoint=${settings.p2pBind}`,
    `--seed-nodes=${JSON.stringify(seedNodes)}`,
  ]
  if (mode === 'witness' && identity !== undefined) {
    args.push(...identityArgs(identity))
  } else {
    args.push('--replay-blockchain')
  }
  return args
}

/** Copy of `args` with the values of sensitive flags hidden. */
export function maskSensitiveArgs(args: string[]): string[] {
  return args.map((arg, i) => {
    const previous = args[i - 1]
    return previous !== undefined && SENSITIVE_FLAGS.has(previous) ? '[HIDDEN]' : arg
  })
}

/** Render a command line for display, quoting arguments with spaces. */
export function formatCommandLine(command: string, args: string[]): string {
  return [command, ...args].map((part) => (/\s/.test(part) ? `'${part}'` : part)).join(' ')
}
