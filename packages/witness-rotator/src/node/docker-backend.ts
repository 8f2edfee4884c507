/**
 * Node backend running the node and the wallet in containers.
 */

import * as fs from 'node:fs/promises'
import { ConfigurationError } from '../errors.js'
import type { ProgressFeed } from '../progress/feed.js'
import { LogStreamSyncMonitor } from '../sync/log-stream-monitor.js'
import type { SyncMonitor } from '../sync/types.js'
import type { DockerProfile, NodeMode, WitnessIdentity } from '../types.js'
import { execCommandFull, followLines } from '../util/exec.js'
import { WalletClient } from '../wallet/client.js'
import type { WalletInvocation } from '../wallet/types.js'
import { buildDockerRunArgs, formatCommandLine, maskSensitiveArgs } from './args.js'
import { waitForNodeReady } from './readiness.js'
import type { NodeBackend, NodeBackendOptions, NodeLogger, ReadinessOptions } from './types.js'

const WALLET_MOUNT = 'type=tmpfs,destination=/wallet_data'
const WALLET_BINARY = '/usr/local/bin/cli_wallet'

/**
 * Manages the node as a named container.
 *
 * @remarks
 * The container name is the node handle. Wallet invocations run throwaway
 * containers of the same image with the wallet file on a tmpfs mount, so no
 * wallet state reaches the host.
 */
export class DockerNodeBackend implements NodeBackend {
  readonly kind = 'docker'
  readonly #profile: DockerProfile
  readonly #options: NodeBackendOptions

  constructor(profile: DockerProfile, options: NodeBackendOptions = {}) {
    this.#profile = profile
    this.#options = options
  }

  get handle(): string {
    return this.#profile.docker.containerName
  }

  walletInvocation(rpcEndpoint?: string): WalletInvocation {
    const { docker } = this.#profile
    return {
      command: 'docker',
      args: [
        'run',
        '-i',
        '--rm',
        '--network',
        docker.network,
        '--mount',
        WALLET_MOUNT,
        docker.image,
        WALLET_BINARY,
        '--wallet-file=/wallet_data/wallet.json',
        '-s',
        rpcEndpoint ?? this.#profile.rpcEndpoint,
      ],
    }
  }

  keygenInvocation(): WalletInvocation {
    return {
      command: 'docker',
      args: [
        'run',
        '--platform',
        'linux/amd64',
        '--rm',
        '--mount',
        WALLET_MOUNT,
        this.#profile.docker.image,
        WALLET_BINARY,
        '--suggest-brain-key',
      ],
    }
  }

  async start(mode: NodeMode, identity?: WitnessIdentity, log?: NodeLogger): Promise<boolean> {
    if (mode === 'witness' && identity === undefined) {
      throw new ConfigurationError('Witness mode requires a witness id and keypair')
    }
    const { docker } = this.#profile
    log?.('info', `Launching container '${docker.containerName}' in ${mode} mode...`)

    await this.stop()
    // Fails when the network already exists, which is the common case.
    await execCommandFull('docker', ['network', 'create', docker.network])
    for (const hostPath of Object.keys(docker.volumes)) {
      await fs.mkdir(hostPath, { recursive: true })
    }

    const args = buildDockerRunArgs(docker, this.#profile.seedNodes, mode, identity)
    log?.('info', `Command: ${formatCommandLine('docker', maskSensitiveArgs(args))}`)
    const result = await execCommandFull('docker', args)
    if (result.exitCode !== 0 || /error/i.test(result.stderr)) {
      log?.('error', `Container launch failed: ${result.stderr.trim()}`)
      return false
    }
    log?.('info', 'Container launched.')
    return true
  }

  async stop(log?: NodeLogger): Promise<void> {
    const name = this.#profile.docker.containerName
    log?.('info', `Stopping container '${name}'...`)
    // Both report an error for a container that does not exist; that is fine.
    await execCommandFull('docker', ['stop', name])
    await execCommandFull('docker', ['rm', name])
  }

  isReady(options: ReadinessOptions = {}): Promise<boolean> {
    return waitForNodeReady(() => this.#wallet().getInfo(), {
      ...options,
      sleep: this.#options.sleep,
    })
  }

  createSyncMonitor(feed: ProgressFeed): SyncMonitor {
    const name = this.#profile.docker.containerName
    return new LogStreamSyncMonitor(() => followLines('docker', ['logs', '-f', name]), feed, {
      deadlineMs: this.#options.syncDeadlineMs,
      clock: this.#options.clock,
    })
  }

  #wallet(): WalletClient {
    return new WalletClient(this, {
      runner: this.#options.runner,
      settleMs: this.#options.walletSettleMs,
    })
  }
}
