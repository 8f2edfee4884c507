import { describe, it, expect } from 'vitest'
import { RotationService } from '../../../src/service/rotation-service.js'
import { createProfile } from '../../../src/config.js'
import { RotationInProgressError, InvalidKeyError } from '../../../src/errors.js'
import { SUCCESS_SENTINEL } from '../../../src/progress/feed.js'
import type { RotationRequest } from '../../../src/types.js'
import { createStubBackend, createStubWallet } from '../../helpers/backend.js'
import type { StubBackendOptions } from '../../helpers/backend.js'

const request: RotationRequest = { account: 'alice', url: '', wif: 'old-wif' }
const profile = createProfile({ backend: 'docker', configDir: '/cfg' })
const startedAt = new Date(Date.UTC(2026, 0, 1, 12, 0, 0))

function createService(backendOptions: StubBackendOptions = {}) {
  const wallet = createStubWallet()
  const service = new RotationService(profile, {
    backend: createStubBackend(backendOptions),
    wallet,
    clock: () => startedAt,
  })
  return { service, wallet }
}

describe('RotationService', () => {
  it('should start with no runs', () => {
    const { service } = createService()
    expect(service.current).toBeUndefined()
    expect(service.lastRun).toBeUndefined()
    expect(service.getKeys()).toBeUndefined()
    expect(service.profile).toBe(profile)
  })

  it('should run a rotation in the background and keep its keys', async () => {
    const { service } = createService()

    const run = service.start(request)
    expect(service.current).toBe(run)
    expect(service.lastRun).toBe(run)
    expect(run.startedAt).toBe(startedAt)

    const result = await run.done
    expect(result.success).toBe(true)
    expect(service.current).toBeUndefined()
    expect(service.lastRun).toBe(run)
    expect(service.getKeys()).toEqual({ publicKey: 'PUB1', privateKey: 'WIF1' })
    expect(run.feed.events.at(-1)?.message).toBe(SUCCESS_SENTINEL)
  })

  it('should reject a second start while a run is active', async () => {
    const { service } = createService()
    const run = service.start(request)

    expect(() => service.start(request)).toThrow(RotationInProgressError)
    await run.done
    expect(() => service.start(request)).not.toThrow()
  })

  it('should keep keys after a relaunch failure', async () => {
    const { service } = createService({ start: { witness: false } })

    const result = await service.start(request).done

    expect(result).toMatchObject({ success: false, reason: 'RelaunchError' })
    expect(service.getKeys()).toEqual({ publicKey: 'PUB1', privateKey: 'WIF1' })
  })

  it('should clear the previous keys when a new run starts', async () => {
    const { service, wallet } = createService()
    await service.start(request).done
    wallet.verifyKeyAndFetchWitnessId.mockRejectedValue(new InvalidKeyError('bad key', ''))

    const run = service.start(request)
    expect(service.getKeys()).toBeUndefined()
    await run.done
    expect(service.getKeys()).toBeUndefined()
  })

  it('should give every run its own feed and id', async () => {
    const { service } = createService()
    const first = service.start(request)
    await first.done
    const second = service.start(request)
    await second.done

    expect(second.id).not.toBe(first.id)
    expect(second.feed).not.toBe(first.feed)
  })
})
