import { describe, it, expect } from 'vitest'
import { KeyRotationOrchestrator, classifyFailure } from '../../../src/rotation/orchestrator.js'
import { hasNewKeys } from '../../../src/rotation/types.js'
import { createProfile } from '../../../src/config.js'
import {
  ConfigurationError,
  GenerationError,
  InvalidKeyError,
  NodeNotReadyError,
  RotationInProgressError,
  TxRejectedError,
  WitnessNotFoundError,
} from '../../../src/errors.js'
import { FAILURE_SENTINEL, ProgressFeed, SUCCESS_SENTINEL } from '../../../src/progress/feed.js'
import type { ExecutionProfile, RotationRequest } from '../../../src/types.js'
import { createStubBackend, createStubWallet } from '../../helpers/backend.js'
import type { StubBackendOptions } from '../../helpers/backend.js'

const request: RotationRequest = { account: 'alice', url: 'https://example.org', wif: 'old-wif' }
const localProfile = createProfile({ backend: 'docker', configDir: '/cfg' })
const externalProfile = createProfile({
  backend: 'docker',
  configDir: '/cfg',
  localNode: false,
  rpcEndpoint: 'ws://rpc.example:8090',
})

function setup(backendOptions: StubBackendOptions = {}, profile: ExecutionProfile = localProfile) {
  const backend = createStubBackend(backendOptions)
  const wallet = createStubWallet()
  const feed = new ProgressFeed()
  const orchestrator = new KeyRotationOrchestrator({ profile, backend, wallet, feed })
  return { backend, wallet, feed, orchestrator }
}

describe('KeyRotationOrchestrator', () => {
  it('should rotate the key on a local node', async () => {
    const { backend, wallet, orchestrator } = setup()

    const result = await orchestrator.run(request)

    expect(result).toMatchObject({
      success: true,
      state: 'succeeded',
      witnessId: '1.6.7',
      newPublicKey: 'PUB1',
      newPrivateKey: 'WIF1',
    })
    expect(orchestrator.state).toBe('succeeded')
    expect(backend.calls).toEqual([
      'start:listener',
      'waitForSync',
      'isReady',
      'stop',
      'start:witness',
    ])
    expect(wallet.verifyKeyAndFetchWitnessId).toHaveBeenCalledWith('alice', 'old-wif')
    expect(wallet.authorizeNewKey).toHaveBeenCalledWith(
      'alice',
      'https://example.org',
      'PUB1',
      'old-wif',
    )
    expect(result.events.map((e) => e.message)).toEqual([
      "Starting witness key rotation for 'alice'...",
      'Starting local node in listener mode...',
      "Verifying WIF key and fetching witness id for 'alice'...",
      'Key is valid. Witness id: 1.6.7',
      'Generating new signing keypair...',
      'New public key: PUB1',
      'Authorizing new key on the blockchain...',
      'Transaction accepted by the blockchain.',
      'Relaunching the node with the new signing key...',
      'Key rotation complete. The witness node is running with the new key.',
      SUCCESS_SENTINEL,
    ])
  })

  it('should only probe an external node', async () => {
    const { backend, orchestrator } = setup({}, externalProfile)

    const result = await orchestrator.run(request)

    expect(result.success).toBe(true)
    expect(backend.calls.slice(0, 2)).toEqual(['stop', 'isReady'])
    expect(backend.calls).not.toContain('start:listener')
    expect(result.events[1]?.message).toBe('Using external node at ws://rpc.example:8090')
  })

  it('should continue after a sync timeout', async () => {
    const { orchestrator } = setup({ sync: { status: 'timeout', attempts: 120 } })

    await expect(orchestrator.run(request)).resolves.toMatchObject({ success: true })
  })

  it('should stop before the wallet when the listener fails to start', async () => {
    const { backend, wallet, orchestrator } = setup({ start: { listener: false } })

    const result = await orchestrator.run(request)

    expect(result).toMatchObject({
      success: false,
      reason: 'NodeNotReady',
      message: 'The local node could not be started in listener mode',
      failedIn: 'idle',
    })
    expect(backend.calls).toEqual(['start:listener'])
    expect(wallet.verifyKeyAndFetchWitnessId).not.toHaveBeenCalled()
  })

  it('should fail when the node never becomes ready', async () => {
    const backend = createStubBackend({ ready: false })
    const wallet = createStubWallet()
    const orchestrator = new KeyRotationOrchestrator({
      profile: localProfile,
      backend,
      wallet,
      readiness: { maxRetries: 3 },
    })

    const result = await orchestrator.run(request)

    expect(result).toMatchObject({
      reason: 'NodeNotReady',
      message: 'Node RPC did not become responsive after 3 attempts',
    })
    expect(wallet.verifyKeyAndFetchWitnessId).not.toHaveBeenCalled()
  })

  it('should classify an unusable backend as a configuration error', async () => {
    const { orchestrator } = setup({
      start: { listener: new ConfigurationError('Cannot execute docker: ENOENT') },
    })

    await expect(orchestrator.run(request)).resolves.toMatchObject({
      reason: 'ConfigurationError',
      message: 'Cannot execute docker: ENOENT',
    })
  })

  it('should stop at an invalid key with masked details', async () => {
    const { wallet, orchestrator } = setup()
    wallet.verifyKeyAndFetchWitnessId.mockRejectedValue(
      new InvalidKeyError('The wallet rejected the provided WIF key', 'import_key "alice" "old-wif"'),
    )

    const result = await orchestrator.run(request)

    expect(result).toMatchObject({ reason: 'InvalidKey', failedIn: 'verifying-key' })
    expect(wallet.generateKeypair).not.toHaveBeenCalled()
    const failure = result.events.find((e) => e.level === 'error' && e.sentinel === undefined)
    expect(failure?.message).toBe('InvalidKey: The wallet rejected the provided WIF key')
    expect(failure?.details).toBe('import_key "alice" "[REDACTED]"')
    expect(result.events.at(-1)).toMatchObject({ message: FAILURE_SENTINEL, sentinel: 'failure' })
  })

  it('should report a missing witness', async () => {
    const { orchestrator, wallet } = setup()
    wallet.verifyKeyAndFetchWitnessId.mockRejectedValue(
      new WitnessNotFoundError('Could not find a witness id', 'null'),
    )

    await expect(orchestrator.run(request)).resolves.toMatchObject({
      reason: 'WitnessNotFound',
      failedIn: 'verifying-key',
    })
  })

  it('should report a key generation failure', async () => {
    const { orchestrator, wallet } = setup()
    wallet.generateKeypair.mockRejectedValue(new GenerationError('no keys', ''))

    const result = await orchestrator.run(request)

    expect(result).toMatchObject({ reason: 'GenerationError', failedIn: 'generating-key' })
    expect(wallet.authorizeNewKey).not.toHaveBeenCalled()
  })

  it('should not retry or relaunch after a rejected authorization', async () => {
    const { backend, orchestrator, wallet } = setup()
    wallet.authorizeNewKey.mockRejectedValue(
      new TxRejectedError('rejected', 'missing required active authority', 'Check the key.'),
    )

    const result = await orchestrator.run(request)

    expect(result).toMatchObject({
      reason: 'TxRejected',
      failedIn: 'authorizing',
      hint: 'Check the key.',
    })
    expect(hasNewKeys(result)).toBe(false)
    expect(wallet.authorizeNewKey).toHaveBeenCalledTimes(1)
    expect(backend.calls).not.toContain('start:witness')
    expect(result.events.map((e) => e.message)).toContain('Likely cause: Check the key.')
  })

  it('should keep the new keys when the relaunch fails', async () => {
    const { orchestrator } = setup({ start: { witness: false } })

    const result = await orchestrator.run(request)

    expect(result).toMatchObject({
      success: false,
      reason: 'RelaunchError',
      message: 'the node did not start in witness mode',
      newPublicKey: 'PUB1',
      newPrivateKey: 'WIF1',
    })
    expect(hasNewKeys(result)).toBe(true)
    const messages = result.events.map((e) => e.message)
    expect(messages).toContain('Relaunch failed: the node did not start in witness mode')
    expect(messages.at(-1)).toBe(FAILURE_SENTINEL)
  })

  it('should turn a thrown relaunch error into a relaunch failure', async () => {
    const { orchestrator } = setup({ start: { witness: new Error('container exited') } })

    await expect(orchestrator.run(request)).resolves.toMatchObject({
      reason: 'RelaunchError',
      message: 'container exited',
    })
  })

  it('should never put the current or new private key in the feed', async () => {
    const { orchestrator, wallet } = setup()
    wallet.generateKeypair.mockResolvedValue({ publicKey: 'PUB2', privateKey: 'new-secret-wif' })
    wallet.authorizeNewKey.mockRejectedValue(
      new TxRejectedError('rejected', 'old-wif then new-secret-wif', 'hint'),
    )

    const result = await orchestrator.run(request)

    const text = result.events.map((e) => `${e.message} ${e.details ?? ''}`).join('\n')
    expect(text).not.toContain('old-wif')
    expect(text).not.toContain('new-secret-wif')
  })

  it('should refuse to run twice', async () => {
    const { orchestrator } = setup()
    await orchestrator.run(request)

    await expect(orchestrator.run(request)).rejects.toThrow(RotationInProgressError)
  })
})

describe('classifyFailure', () => {
  it('should map errors to failure reasons', () => {
    expect(classifyFailure(new ConfigurationError('x'))).toBe('ConfigurationError')
    expect(classifyFailure(new NodeNotReadyError('x', 5))).toBe('NodeNotReady')
    expect(classifyFailure(new InvalidKeyError('x', ''))).toBe('InvalidKey')
    expect(classifyFailure(new WitnessNotFoundError('x', ''))).toBe('WitnessNotFound')
    expect(classifyFailure(new GenerationError('x', ''))).toBe('GenerationError')
    expect(classifyFailure(new TxRejectedError('x', '', 'h'))).toBe('TxRejected')
    expect(classifyFailure(new Error('x'))).toBe('Unexpected')
    expect(classifyFailure('x')).toBe('Unexpected')
  })
})
