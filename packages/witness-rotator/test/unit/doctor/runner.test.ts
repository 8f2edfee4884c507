import { describe, it, expect, vi, afterEach } from 'vitest'
import { runDoctor } from '../../../src/doctor/runner.js'
import { createProfile } from '../../../src/config.js'
import * as checks from '../../../src/doctor/checks.js'

vi.mock('../../../src/doctor/checks.js', () => ({
  checkDocker: vi.fn(),
  checkDockerDaemon: vi.fn(),
  checkExecutable: vi.fn(),
}))

const mockCheckDocker = vi.mocked(checks.checkDocker)
const mockCheckDockerDaemon = vi.mocked(checks.checkDockerDaemon)
const mockCheckExecutable = vi.mocked(checks.checkExecutable)

const dockerProfile = createProfile({ backend: 'docker', configDir: '/cfg' })
const nativeProfile = createProfile({
  backend: 'native',
  configDir: '/cfg',
  walletPath: '/opt/chain/cli_wallet',
  nodePath: '/opt/chain/witness_node',
})

describe('runDoctor', () => {
  afterEach(() => {
    vi.resetAllMocks()
  })

  it('should be ready when docker and its daemon are available', async () => {
    mockCheckDocker.mockResolvedValue({ name: 'docker', status: 'ok', version: '24.0.7' })
    mockCheckDockerDaemon.mockResolvedValue({ name: 'docker daemon', status: 'ok' })

    const result = await runDoctor(dockerProfile)

    expect(result).toEqual({
      checks: [
        { name: 'docker', status: 'ok', version: '24.0.7' },
        { name: 'docker daemon', status: 'ok' },
      ],
      ready: true,
      warnings: [],
      nextSteps: [],
    })
    expect(mockCheckExecutable).not.toHaveBeenCalled()
  })

  it('should list next steps for failing required checks', async () => {
    mockCheckDocker.mockResolvedValue({
      name: 'docker',
      status: 'version-unsupported',
      reason: 'docker >= 20.10.0 is required',
    })
    mockCheckDockerDaemon.mockResolvedValue({
      name: 'docker daemon',
      status: 'missing',
      reason: 'not running',
    })

    const result = await runDoctor(dockerProfile)

    expect(result.ready).toBe(false)
    expect(result.nextSteps).toEqual([
      'Upgrade required dependency: docker version is unsupported: docker >= 20.10.0 is required',
      'Make docker daemon available: not running',
    ])
  })

  it('should check both binaries of a native profile', async () => {
    mockCheckExecutable.mockImplementation((name) => Promise.resolve({ name, status: 'ok' }))

    const result = await runDoctor(nativeProfile)

    expect(result.ready).toBe(true)
    expect(mockCheckExecutable.mock.calls).toEqual([
      ['wallet', '/opt/chain/cli_wallet'],
      ['node', '/opt/chain/witness_node'],
    ])
  })

  it('should warn when no local node is managed', async () => {
    mockCheckExecutable.mockImplementation((name) => Promise.resolve({ name, status: 'ok' }))

    const result = await runDoctor({ ...nativeProfile, localNode: false })

    expect(result.warnings).toEqual([
      'No local node is managed; the wallet connects to ws://127.0.0.1:8090',
    ])
  })
})
