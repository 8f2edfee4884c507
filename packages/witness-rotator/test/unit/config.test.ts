import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import * as fs from 'node:fs/promises'
import * as os from 'node:os'
import * as path from 'node:path'
import {
  DEFAULT_IMAGE,
  DEFAULT_SEED_NODES,
  PROFILE_FILE,
  createProfile,
  loadProfile,
  saveProfile,
  validateProfile,
} from '../../src/config.js'
import { ConfigurationError } from '../../src/errors.js'

describe('createProfile', () => {
  it('should fill docker defaults', () => {
    const profile = createProfile({ backend: 'docker', configDir: '/cfg', image: 'chain:2' })

    expect(profile).toMatchObject({
      version: 1,
      backend: 'docker',
      localNode: true,
      rpcEndpoint: 'ws://witness-node:8090',
      seedNodes: DEFAULT_SEED_NODES,
    })
    if (profile.backend !== 'docker') throw new Error('expected a docker profile')
    expect(profile.docker.image).toBe('chain:2')
    expect(profile.docker.volumes).toEqual({
      [path.join('/cfg', 'witness_node_data_dir')]: '/witness_node_data_dir',
    })
  })

  it('should require both binaries for the native backend', () => {
    expect(() => createProfile({ backend: 'native', configDir: '/cfg' })).toThrow(
      ConfigurationError,
    )
  })

  it('should keep an external endpoint', () => {
    const profile = createProfile({
      backend: 'native',
      configDir: '/cfg',
      walletPath: '/bin/cli_wallet',
      nodePath: '/bin/witness_node',
      localNode: false,
      rpcEndpoint: 'ws://rpc.example:8090',
    })
    expect(profile.localNode).toBe(false)
    expect(profile.rpcEndpoint).toBe('ws://rpc.example:8090')
  })
})

describe('validateProfile', () => {
  it('should accept a minimal docker profile', () => {
    const profile = validateProfile({ version: 1, backend: 'docker' }, '/cfg')

    expect(profile).toEqual(createProfile({ backend: 'docker', configDir: '/cfg' }))
  })

  it('should anchor relative volume paths to the config directory', () => {
    const profile = validateProfile(
      { version: 1, backend: 'docker', docker: { volumes: { data: '/witness_node_data_dir' } } },
      '/cfg',
    )
    if (profile.backend !== 'docker') throw new Error('expected a docker profile')
    expect(profile.docker.volumes).toEqual({
      [path.join('/cfg', 'data')]: '/witness_node_data_dir',
    })
    expect(profile.docker.image).toBe(DEFAULT_IMAGE)
  })

  it.each([
    [null, 'Profile must be an object'],
    [{ version: 2, backend: 'docker' }, 'Profile version must be 1'],
    [{ version: 1, backend: 'podman' }, 'backend must be "docker" or "native"'],
    [{ version: 1, backend: 'docker', localNode: 'yes' }, 'localNode must be a boolean'],
    [{ version: 1, backend: 'docker', seedNodes: [1] }, 'seedNodes[0] must be a string'],
    [{ version: 1, backend: 'docker', rpcEndpoint: ' ' }, 'rpcEndpoint must be a non-empty string'],
    [
      { version: 1, backend: 'docker', docker: { restartPolicy: 'sometimes' } },
      'docker.restartPolicy must be one of no, always, unless-stopped, on-failure',
    ],
    [
      { version: 1, backend: 'docker', docker: { ports: { '8090': 8090 } } },
      'docker.ports.8090 must be a string',
    ],
    [{ version: 1, backend: 'native' }, 'native must be an object for the native backend'],
    [
      { version: 1, backend: 'native', native: { walletPath: '/w' } },
      'native.nodePath must be a non-empty string',
    ],
  ])('should reject %j', (raw, message) => {
    expect(() => validateProfile(raw, '/cfg')).toThrow(message)
  })

  it('should name the offending field', () => {
    try {
      validateProfile({ version: 1, backend: 'docker', localNode: 1 }, '/cfg')
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigurationError)
      if (err instanceof ConfigurationError) {
        expect(err.field).toBe('localNode')
      }
    }
  })
})

describe('loadProfile / saveProfile', () => {
  let configDir: string

  beforeEach(async () => {
    configDir = await fs.mkdtemp(path.join(os.tmpdir(), 'witness-rotator-config-'))
  })

  afterEach(async () => {
    await fs.rm(configDir, { recursive: true, force: true })
  })

  it('should round-trip a saved profile', async () => {
    const profile = createProfile({ backend: 'docker', configDir })

    const written = await saveProfile(profile, configDir)

    expect(written).toBe(path.join(configDir, PROFILE_FILE))
    await expect(loadProfile(configDir)).resolves.toEqual(profile)
  })

  it('should point to setup when there is no profile', async () => {
    await expect(loadProfile(configDir)).rejects.toThrow(
      `No execution profile at ${path.join(configDir, PROFILE_FILE)}. Run "witness-rotator setup" first.`,
    )
  })

  it('should reject malformed JSON', async () => {
    await fs.writeFile(path.join(configDir, PROFILE_FILE), '{')

    await expect(loadProfile(configDir)).rejects.toThrow('Failed to parse execution profile')
  })

  it('should check that native binaries are executable', async () => {
    const wallet = path.join(configDir, 'cli_wallet')
    await fs.writeFile(wallet, '#!/bin/sh\n', { mode: 0o755 })
    const profile = createProfile({
      backend: 'native',
      configDir,
      walletPath: wallet,
      nodePath: path.join(configDir, 'witness_node'),
    })
    await saveProfile(profile, configDir)

    await expect(loadProfile(configDir)).rejects.toThrow(
      `native.nodePath '${path.join(configDir, 'witness_node')}' is missing or not executable`,
    )
  })
})
