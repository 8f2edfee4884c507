import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import * as fs from 'node:fs/promises'
import * as os from 'node:os'
import * as path from 'node:path'
import { DockerNodeBackend } from '../../../src/node/docker-backend.js'
import { buildDockerRunArgs } from '../../../src/node/args.js'
import { createProfile } from '../../../src/config.js'
import { ConfigurationError } from '../../../src/errors.js'
import { ProgressFeed } from '../../../src/progress/feed.js'
import { getInfoScript } from '../../../src/wallet/commands.js'
import * as exec from '../../../src/util/exec.js'
import type { ExecCommandResult, LineStream, ProcessRunner } from '../../../src/util/exec.js'
import type { DockerProfile, ProgressLevel } from '../../../src/types.js'

vi.mock('../../../src/util/exec.js', async (importOriginal) => ({
  ...(await importOriginal<typeof exec>()),
  execCommandFull: vi.fn(),
  followLines: vi.fn(),
}))

const mockExecCommandFull = vi.mocked(exec.execCommandFull)
const mockFollowLines = vi.mocked(exec.followLines)

function makeResult(exitCode: number, stdout = '', stderr = ''): ExecCommandResult {
  return { exitCode, stdout, stderr }
}

function linesOf(lines: string[]): LineStream {
  return {
    close: vi.fn(),
    async *[Symbol.asyncIterator]() {
      for (const line of lines) {
        await Promise.resolve()
        yield line
      }
    },
  }
}

function dockerProfile(configDir: string): DockerProfile {
  const profile = createProfile({ backend: 'docker', configDir })
  if (profile.backend !== 'docker') throw new Error('expected a docker profile')
  return profile
}

const identity = { witnessId: '1.6.7', keypair: { publicKey: 'PUB1', privateKey: 'WIF1' } }

describe('DockerNodeBackend', () => {
  let configDir: string
  let profile: DockerProfile
  let logged: [ProgressLevel, string][]
  const log = (level: ProgressLevel, message: string): void => {
    logged.push([level, message])
  }

  beforeEach(async () => {
    configDir = await fs.mkdtemp(path.join(os.tmpdir(), 'witness-rotator-docker-'))
    profile = dockerProfile(configDir)
    logged = []
    mockExecCommandFull.mockResolvedValue(makeResult(0))
  })

  afterEach(async () => {
    vi.resetAllMocks()
    await fs.rm(configDir, { recursive: true, force: true })
  })

  it('should use the container name as handle', () => {
    expect(new DockerNodeBackend(profile).handle).toBe('witness-node')
  })

  it('should run the wallet in a throwaway container on the node network', () => {
    const backend = new DockerNodeBackend(profile)
    expect(backend.walletInvocation()).toEqual({
      command: 'docker',
      args: [
        'run',
        '-i',
        '--rm',
        '--network',
        'witness-net',
        '--mount',
        'type=tmpfs,destination=/wallet_data',
        profile.docker.image,
        '/usr/local/bin/cli_wallet',
        '--wallet-file=/wallet_data/wallet.json',
        '-s',
        'ws://witness-node:8090',
      ],
    })
    expect(backend.walletInvocation('ws://other:8090').args.at(-1)).toBe('ws://other:8090')
  })

  it('should generate keys without touching the network', () => {
    const { args } = new DockerNodeBackend(profile).keygenInvocation()
    expect(args).not.toContain('--network')
    expect(args.at(-1)).toBe('--suggest-brain-key')
  })

  it('should replace the previous container before launching', async () => {
    const backend = new DockerNodeBackend(profile)

    await expect(backend.start('listener', undefined, log)).resolves.toBe(true)

    expect(mockExecCommandFull.mock.calls).toEqual([
      ['docker', ['stop', 'witness-node']],
      ['docker', ['rm', 'witness-node']],
      ['docker', ['network', 'create', 'witness-net']],
      ['docker', buildDockerRunArgs(profile.docker, profile.seedNodes, 'listener')],
    ])
    const stat = await fs.stat(path.join(configDir, 'witness_node_data_dir'))
    expect(stat.isDirectory()).toBe(true)
    expect(logged[0]).toEqual(['info', "Launching container 'witness-node' in listener mode..."])
    expect(logged.at(-1)).toEqual(['info', 'Container launched.'])
  })

  it('should hide the identity in the logged command line', async () => {
    const backend = new DockerNodeBackend(profile)

    await backend.start('witness', identity, log)

    const command = logged.find(([, message]) => message.startsWith('Command: '))
    expect(command?.[1]).toContain('--witness-id [HIDDEN] --private-key [HIDDEN]')
    expect(command?.[1]).not.toContain('WIF1')
  })

  it('should report a failed launch', async () => {
    mockExecCommandFull.mockImplementation((_command, args) =>
      Promise.resolve(
        args[0] === 'run'
          ? makeResult(125, '', 'docker: Error response from daemon: Conflict.\n')
          : makeResult(0),
      ),
    )
    const backend = new DockerNodeBackend(profile)

    await expect(backend.start('listener', undefined, log)).resolves.toBe(false)
    expect(logged.at(-1)).toEqual([
      'error',
      'Container launch failed: docker: Error response from daemon: Conflict.',
    ])
  })

  it('should refuse witness mode without an identity', async () => {
    const backend = new DockerNodeBackend(profile)

    await expect(backend.start('witness')).rejects.toThrow(ConfigurationError)
    expect(mockExecCommandFull).not.toHaveBeenCalled()
  })

  it('should probe readiness through the wallet', async () => {
    const runInteractive = vi.fn<ProcessRunner['runInteractive']>(() =>
      Promise.resolve(makeResult(0, 'new >>> get_info\n{}')),
    )
    const runner: ProcessRunner = { run: vi.fn<ProcessRunner['run']>(), runInteractive }
    const backend = new DockerNodeBackend(profile, { runner, walletSettleMs: 10 })

    await expect(backend.isReady({ maxRetries: 1 })).resolves.toBe(true)
    expect(runInteractive).toHaveBeenCalledWith(
      'docker',
      backend.walletInvocation().args,
      getInfoScript(),
      { settleMs: 10, readyPattern: '>>>', timeoutMs: 120_000 },
    )
  })

  it('should follow the container log for sync', async () => {
    mockFollowLines.mockReturnValue(linesOf(['th_a reindexing 50%', 'Done reindexing']))
    const feed = new ProgressFeed()
    const backend = new DockerNodeBackend(profile)

    await expect(backend.createSyncMonitor(feed).waitForSync()).resolves.toEqual({
      status: 'synced',
      via: 'reindex',
    })
    expect(mockFollowLines).toHaveBeenCalledWith('docker', ['logs', '-f', 'witness-node'])
  })
})
