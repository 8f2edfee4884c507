/**
 * Execution profile loading, validation, and defaults.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises'
import { constants as fsConstants } from 'node:fs'
import * as path from 'node:path'
import * as os from 'node:os'
import { ConfigurationError } from './errors.js'
import type {
  BackendKind,
  DockerSettings,
  ExecutionProfile,
  NativeSettings,
  NodeArgs,
} from './types.js'

/** File name of the execution profile inside the config directory. */
export const PROFILE_FILE = 'profile.json'

export const DEFAULT_IMAGE = 'ghcr.io/r-squared-project/r-squared-core:1.0.0'
export const DEFAULT_NETWORK = 'witness-net'
export const DEFAULT_CONTAINER_NAME = 'witness-node'
export const DEFAULT_SEED_NODES = ['node01.rsquared.digital:2771', 'node02.rsquared.digital:2771']

const RESTART_POLICIES = ['no', 'always', 'unless-stopped', 'on-failure'] as const

/** Return the platform-appropriate default config directory. */
export function getDefaultConfigDir(): string {
  if (process.platform === 'win32') {
    const appData = process.env.APPDATA
    if (appData !== undefined) {
      return path.join(appData, 'witness-rotator')
    }
    return path.join(os.homedir(), 'AppData', 'Roaming', 'witness-rotator')
  }
  return path.join(os.homedir(), '.config', 'witness-rotator')
}

/** Container settings used when the profile omits them. */
export function defaultDockerSettings(configDir: string): DockerSettings {
  return {
    image: DEFAULT_IMAGE,
    network: DEFAULT_NETWORK,
    containerName: DEFAULT_CONTAINER_NAME,
    restartPolicy: 'unless-stopped',
    ports: { '8090': '8090', '2771': '2771' },
    volumes: { [path.join(configDir, 'witness_node_data_dir')]: '/witness_node_data_dir' },
    nodeArgs: {
      'data-dir': '/witness_node_data_dir',
      'rpc-endpoint': '0.0.0.0:8090',
      'p2p-endpoint': '0.0.0.0:2771',
    },
    witnessModeArgs: {},
    syncModeArgs: { 'replay-blockchain': '' },
    extraDockerArgs: [],
    environment: {},
  }
}

/** Options for {@link createProfile}. */
export interface CreateProfileOptions {
  backend: BackendKind
  configDir: string
  /** Required for the native backend. */
  walletPath?: string | undefined
  /** Required for the native backend. */
  nodePath?: string | undefined
  /** Defaults to `true`. */
  localNode?: boolean | undefined
  /** Defaults to the local node's endpoint for the chosen backend. */
  rpcEndpoint?: string | undefined
  image?: string | undefined
  network?: string | undefined
}

/**
 * Build a complete profile from a handful of choices, filling the rest with
 * defaults.
 */
export function createProfile(options: CreateProfileOptions): ExecutionProfile {
  const localNode = options.localNode ?? true
  if (options.backend === 'docker') {
    const docker = defaultDockerSettings(options.configDir)
    if (options.image !== undefined) docker.image = options.image
    if (options.network !== undefined) docker.network = options.network
    return {
      version: 1,
      backend: 'docker',
      localNode,
      rpcEndpoint: options.rpcEndpoint ?? `ws://${docker.containerName}:8090`,
      seedNodes: [...DEFAULT_SEED_NODES],
      docker,
    }
  }

  if (options.walletPath === undefined || options.nodePath === undefined) {
    throw new ConfigurationError('The native backend needs both a wallet path and a node path')
  }
  return {
    version: 1,
    backend: 'native',
    localNode,
    rpcEndpoint: options.rpcEndpoint ?? 'ws://127.0.0.1:8090',
    seedNodes: [...DEFAULT_SEED_NODES],
    native: {
      walletPath: options.walletPath,
      nodePath: options.nodePath,
      dataDir: path.join(options.configDir, 'witness_node_data_dir'),
      pidFile: path.join(options.configDir, 'witness_node.pid'),
      rpcBind: '127.0.0.1:8090',
      p2pBind: '127.0.0.1:2771',
    },
  }
}

/**
 * Type guard for plain objects.
 */
function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function readString(
  obj: Record<string, unknown>,
  key: string,
  field: string,
  fallback?: string,
): string {
  const value = obj[key]
  if (value === undefined && fallback !== undefined) return fallback
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ConfigurationError(`${field} must be a non-empty string`, field)
  }
  return value
}

function readStringArray(value: unknown, field: string, fallback: string[]): string[] {
  if (value === undefined) return fallback
  if (!Array.isArray(value)) {
    throw new ConfigurationError(`${field} must be an array of strings`, field)
  }
  const result: string[] = []
  for (const [i, entry] of Array.from(value).entries()) {
    if (typeof entry !== 'string') {
      throw new ConfigurationError(`${field}[${String(i)}] must be a string`, field)
    }
    result.push(entry)
  }
  return result
}

function readStringMap(
  value: unknown,
  field: string,
  fallback: Record<string, string>,
): Record<string, string> {
  if (value === undefined) return fallback
  if (!isObject(value)) {
    throw new ConfigurationError(`${field} must be an object of strings`, field)
  }
  const result: Record<string, string> = {}
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry !== 'string') {
      throw new ConfigurationError(`${field}.${key} must be a string`, field)
    }
    result[key] = entry
  }
  return result
}

function isRestartPolicy(value: unknown): value is DockerSettings['restartPolicy'] {
  return RESTART_POLICIES.some((policy) => policy === value)
}

function validateDocker(raw: unknown, configDir: string): DockerSettings {
  const defaults = defaultDockerSettings(configDir)
  if (raw === undefined) return defaults
  if (!isObject(raw)) {
    throw new ConfigurationError('docker must be an object', 'docker')
  }

  const restartPolicy = raw.restartPolicy ?? defaults.restartPolicy
  if (!isRestartPolicy(restartPolicy)) {
    throw new ConfigurationError(
      `docker.restartPolicy must be one of ${RESTART_POLICIES.join(', ')}`,
      'docker.restartPolicy',
    )
  }

  // Relative host paths are anchored to the config directory.
  const volumes: Record<string, string> = {}
  for (const [hostPath, containerPath] of Object.entries(
    readStringMap(raw.volumes, 'docker.volumes', defaults.volumes),
  )) {
    volumes[path.isAbsolute(hostPath) ? hostPath : path.join(configDir, hostPath)] = containerPath
  }

  const nodeArgs: NodeArgs = readStringMap(raw.nodeArgs, 'docker.nodeArgs', defaults.nodeArgs)

  return {
    image: readString(raw, 'image', 'docker.image', defaults.image),
    network: readString(raw, 'network', 'docker.network', defaults.network),
    containerName: readString(raw, 'containerName', 'docker.containerName', defaults.containerName),
    restartPolicy,
    ports: readStringMap(raw.ports, 'docker.ports', defaults.ports),
    volumes,
    nodeArgs,
    witnessModeArgs: readStringMap(raw.witnessModeArgs, 'docker.witnessModeArgs', {}),
    syncModeArgs: readStringMap(raw.syncModeArgs, 'docker.syncModeArgs', defaults.syncModeArgs),
    extraDockerArgs: readStringArray(raw.extraDockerArgs, 'docker.extraDockerArgs', []),
    environment: readStringMap(raw.environment, 'docker.environment', {}),
  }
}

function validateNative(raw: unknown, configDir: string): NativeSettings {
  if (!isObject(raw)) {
    throw new ConfigurationError('native must be an object for the native backend', 'native')
  }
  return {
    walletPath: readString(raw, 'walletPath', 'native.walletPath'),
    nodePath: readString(raw, 'nodePath', 'native.nodePath'),
    dataDir: readString(
      raw,
      'dataDir',
      'native.dataDir',
      path.join(configDir, 'witness_node_data_dir'),
    ),
    pidFile: readString(raw, 'pidFile', 'native.pidFile', path.join(configDir, 'witness_node.pid')),
    rpcBind: readString(raw, 'rpcBind', 'native.rpcBind', '127.0.0.1:8090'),
    p2pBind: readString(raw, 'p2pBind', 'native.p2pBind', '127.0.0.1:2771'),
  }
}

/**
 * Validate an unknown value as an ExecutionProfile, filling defaults and
 * throwing {@link ConfigurationError} on the first invalid field.
 *
 * @param configDir - Directory that relative paths are resolved against.
 */
export function validateProfile(raw: unknown, configDir: string): ExecutionProfile {
  if (!isObject(raw)) {
    throw new ConfigurationError('Profile must be an object')
  }
  if (raw.version !== 1) {
    throw new ConfigurationError('Profile version must be 1', 'version')
  }

  const localNode = raw.localNode ?? true
  if (typeof localNode !== 'boolean') {
    throw new ConfigurationError('localNode must be a boolean', 'localNode')
  }
  const seedNodes = readStringArray(raw.seedNodes, 'seedNodes', [...DEFAULT_SEED_NODES])

  if (raw.backend === 'docker') {
    const docker = validateDocker(raw.docker, configDir)
    return {
      version: 1,
      backend: 'docker',
      localNode,
      rpcEndpoint: readString(raw, 'rpcEndpoint', 'rpcEndpoint', `ws://${docker.containerName}:8090`),
      seedNodes,
      docker,
    }
  }

  if (raw.backend === 'native') {
    return {
      version: 1,
      backend: 'native',
      localNode,
      rpcEndpoint: readString(raw, 'rpcEndpoint', 'rpcEndpoint', 'ws://127.0.0.1:8090'),
      seedNodes,
      native: validateNative(raw.native, configDir),
    }
  }

  throw new ConfigurationError('backend must be "docker" or "native"', 'backend')
}

/**
 * Check that `filePath` exists and is executable by the current user.
 * @throws {@link ConfigurationError} naming `field` otherwise.
 */
export async function assertExecutable(filePath: string, field: string): Promise<void> {
  try {
    await fs.access(filePath, fsConstants.X_OK)
  } catch {
    throw new ConfigurationError(`${field} '${filePath}' is missing or not executable`, field)
  }
}

/**
 * Load and validate the execution profile. Native profiles additionally have
 * both binaries checked for presence and execute permission.
 *
 * @param configDir - Directory containing profile.json. Defaults to the platform path.
 */
export async function loadProfile(configDir?: string): Promise<ExecutionProfile> {
  const dir = configDir ?? getDefaultConfigDir()
  const profilePath = path.join(dir, PROFILE_FILE)

  let raw: string
  try {
    raw = await fs.readFile(profilePath, 'utf-8')
  } catch {
    throw new ConfigurationError(
      `No execution profile at ${profilePath}. Run "witness-rotator setup" first.`,
    )
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch {
    throw new ConfigurationError(`Failed to parse execution profile at ${profilePath}`)
  }

  const profile = validateProfile(parsed, dir)
  if (profile.backend === 'native') {
    await assertExecutable(profile.native.walletPath, 'native.walletPath')
    await assertExecutable(profile.native.nodePath, 'native.nodePath')
  }
  return profile
}

/** Write the profile as `profile.json` readable only by the owner. */
export async function saveProfile(profile: ExecutionProfile, configDir?: string): Promise<string> {
  const dir = configDir ?? getDefaultConfigDir()
  await fs.mkdir(dir, { recursive: true, mode: 0o700 })
  const profilePath = path.join(dir, PROFILE_FILE)
  await fs.writeFile(profilePath, `${JSON.stringify(profile, null, 2)}\n`, { mode: 0o600 })
  return profilePath
}
