import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import * as fs from 'node:fs/promises'
import * as os from 'node:os'
import * as path from 'node:path'
import { checkDocker, checkDockerDaemon, checkExecutable } from '../../../src/doctor/checks.js'
import * as exec from '../../../src/util/exec.js'

vi.mock('../../../src/util/exec.js', () => ({
  execCommand: vi.fn(),
  execCommandFull: vi.fn(),
}))

const mockExecCommand = vi.mocked(exec.execCommand)

describe('checkDocker', () => {
  afterEach(() => {
    vi.resetAllMocks()
  })

  it('should accept a supported version', async () => {
    mockExecCommand.mockResolvedValue('Docker version 24.0.7, build afdd53b')

    await expect(checkDocker()).resolves.toEqual({
      name: 'docker',
      status: 'ok',
      version: 'Docker version 24.0.7, build afdd53b',
    })
    expect(mockExecCommand).toHaveBeenCalledWith('docker', ['--version'])
  })

  it('should reject an old version', async () => {
    mockExecCommand.mockResolvedValue('Docker version 19.03.12, build 48a66213fe')

    await expect(checkDocker()).resolves.toMatchObject({
      status: 'version-unsupported',
      reason: 'docker >= 20.10.0 is required',
    })
  })

  it('should report unparseable output', async () => {
    mockExecCommand.mockResolvedValue('Docker version dev')

    await expect(checkDocker()).resolves.toMatchObject({
      status: 'version-unsupported',
      reason: 'Could not parse docker version',
    })
  })

  it('should report a missing binary', async () => {
    mockExecCommand.mockRejectedValue(new Error('Cannot execute docker: ENOENT'))

    await expect(checkDocker()).resolves.toEqual({
      name: 'docker',
      status: 'missing',
      reason: 'docker not found in PATH',
    })
  })
})

describe('checkDockerDaemon', () => {
  afterEach(() => {
    vi.resetAllMocks()
  })

  it('should report the server version', async () => {
    mockExecCommand.mockResolvedValue('24.0.7')

    await expect(checkDockerDaemon()).resolves.toEqual({
      name: 'docker daemon',
      status: 'ok',
      version: '24.0.7',
    })
  })

  it('should report an unreachable daemon', async () => {
    mockExecCommand.mockRejectedValue(new Error('Command failed with exit code 1'))

    await expect(checkDockerDaemon()).resolves.toMatchObject({ status: 'missing' })
  })
})

describe('checkExecutable', () => {
  let dir: string

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'witness-rotator-doctor-'))
  })

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true })
  })

  it('should accept an executable file', async () => {
    const file = path.join(dir, 'cli_wallet')
    await fs.writeFile(file, '#!/bin/sh\n', { mode: 0o755 })

    await expect(checkExecutable('wallet', file)).resolves.toEqual({
      name: 'wallet',
      status: 'ok',
    })
  })

  it('should report a missing file', async () => {
    const file = path.join(dir, 'witness_node')

    await expect(checkExecutable('node', file)).resolves.toEqual({
      name: 'node',
      status: 'missing',
      reason: `${file} is missing or not executable`,
    })
  })
})
