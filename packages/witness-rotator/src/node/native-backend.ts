/**
 * Node backend running the node and wallet binaries directly on the host.
 */

import * as fs from 'node:fs/promises'
import { ConfigurationError } from '../errors.js'
import type { ProgressFeed } from '../progress/feed.js'
import { PollingSyncMonitor } from '../sync/polling-monitor.js'
import type { SyncMonitor } from '../sync/types.js'
import type { NativeProfile, NodeMode, WitnessIdentity } from '../types.js'
import { spawnDetached } from '../util/exec.js'
import { WalletClient } from '../wallet/client.js'
import type { WalletInvocation } from '../wallet/types.js'
import { buildNativeNodeArgs, formatCommandLine, maskSensitiveArgs } from './args.js'
import { waitForNodeReady } from './readiness.js'
import type { NodeBackend, NodeBackendOptions, NodeLogger, ReadinessOptions } from './types.js'

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err
}

/**
 * Manages the node as a detached host process whose id is kept in a pid file,
 * so a later invocation can stop it.
 */
export class NativeNodeBackend implements NodeBackend {
  readonly kind = 'native'
  readonly #profile: NativeProfile
  readonly #options: NodeBackendOptions

  constructor(profile: NativeProfile, options: NodeBackendOptions = {}) {
    this.#profile = profile
    this.#options = options
  }

  get handle(): string {
    return this.#profile.native.pidFile
  }

  walletInvocation(rpcEndpoint?: string): WalletInvocation {
    return {
      command: this.#profile.native.walletPath,
      args: ['-s', rpcEndpoint ?? this.#profile.rpcEndpoint],
    }
  }

  keygenInvocation(): WalletInvocation {
    return { command: this.#profile.native.walletPath, args: ['--suggest-brain-key'] }
  }

  async start(mode: NodeMode, identity?: WitnessIdentity, log?: NodeLogger): Promise<boolean> {
    if (mode === 'witness' && identity === undefined) {
      throw new ConfigurationError('Witness mode requires a witness id and keypair')
    }
    const { native } = this.#profile
    log?.('info', `Launching native node in ${mode} mode...`)

    await this.stop()
    await fs.mkdir(native.dataDir, { recursive: true })

    const args = buildNativeNodeArgs(native, this.#profile.seedNodes, mode, identity)
    log?.('info', `Command: ${formatCommandLine(native.nodePath, maskSensitiveArgs(args))}`)
    const proc = await spawnDetached(native.nodePath, args, {
      settleMs: this.#options.launchSettleMs ?? 3000,
    })
    if (!proc.alive || proc.pid === undefined) {
      log?.('error', 'The node exited during startup.')
      return false
    }

    await fs.writeFile(native.pidFile, String(proc.pid), { mode: 0o600 })
    log?.('info', `Native node started (pid ${String(proc.pid)}).`)
    return true
  }

  async stop(log?: NodeLogger): Promise<void> {
    const { pidFile } = this.#profile.native
    let raw: string
    try {
      raw = await fs.readFile(pidFile, 'utf-8')
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') {
        log?.('info', 'No pid file found; the node is not running.')
        return
      }
      throw err
    }

    const pid = Number.parseInt(raw.trim(), 10)
    if (Number.isInteger(pid) && pid > 0) {
      try {
        process.kill(pid, 'SIGTERM')
        log?.('info', `Sent SIGTERM to node process ${String(pid)}.`)
      } catch (err) {
        if (!isErrnoException(err) || err.code !== 'ESRCH') throw err
        log?.('info', `Node process ${String(pid)} had already exited.`)
      }
    }
    await fs.rm(pidFile, { force: true })
  }

  isReady(options: ReadinessOptions = {}): Promise<boolean> {
    return waitForNodeReady(() => this.#wallet().getInfo(), {
      ...options,
      sleep: this.#options.sleep,
    })
  }

  createSyncMonitor(feed: ProgressFeed): SyncMonitor {
    return new PollingSyncMonitor(() => this.#wallet().getInfo(), feed, {
      intervalMs: this.#options.syncIntervalMs,
      maxAttempts: this.#options.syncMaxAttempts,
      sleep: this.#options.sleep,
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
