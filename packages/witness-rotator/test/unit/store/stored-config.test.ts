import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import * as fs from 'node:fs/promises'
import * as os from 'node:os'
import * as path from 'node:path'
import {
  STORED_REQUEST_FILE,
  decryptRequest,
  encryptRequest,
  loadStoredRequest,
  saveStoredRequest,
} from '../../../src/store/stored-config.js'
import { ConfigurationError, StoredConfigError } from '../../../src/errors.js'
import type { RotationRequest } from '../../../src/types.js'

const request: RotationRequest = {
  account: 'alice',
  url: 'https://example.org/witness',
  wif: 'test-wif-placeholder',
}
const options = { iterations: 1000 }

describe('encryptRequest / decryptRequest', () => {
  it('should recover the request with the right passphrase', async () => {
    const jwe = await encryptRequest(request, 'test-secret', options)

    expect(jwe.split('.')).toHaveLength(5)
    expect(jwe).not.toContain('test-wif-placeholder')
    await expect(decryptRequest(jwe, 'test-secret')).resolves.toEqual(request)
  })

  it('should salt every encryption', async () => {
    const a = await encryptRequest(request, 'test-secret', options)
    const b = await encryptRequest(request, 'test-secret', options)
    expect(a).not.toBe(b)
  })

  it('should reject an empty passphrase', async () => {
    await expect(encryptRequest(request, '', options)).rejects.toThrow(ConfigurationError)
  })

  it('should give the same error for a wrong passphrase and a damaged token', async () => {
    const jwe = await encryptRequest(request, 'test-secret', options)
    const [header, key, iv, ciphertext, tag] = jwe.split('.')
    const damaged = [header, key, iv, `A${ciphertext ?? ''}`.slice(0, -1), tag].join('.')

    await expect(decryptRequest(jwe, 'wrong-secret')).rejects.toThrow(
      new StoredConfigError('Invalid passphrase or corrupted configuration'),
    )
    await expect(decryptRequest(damaged, 'test-secret')).rejects.toThrow(
      'Invalid passphrase or corrupted configuration',
    )
    await expect(decryptRequest('not a token', 'test-secret')).rejects.toThrow(StoredConfigError)
  })
})

describe('saveStoredRequest / loadStoredRequest', () => {
  let configDir: string

  beforeEach(async () => {
    configDir = await fs.mkdtemp(path.join(os.tmpdir(), 'witness-rotator-store-'))
  })

  afterEach(async () => {
    await fs.rm(configDir, { recursive: true, force: true })
  })

  it('should write an owner-only file and read it back', async () => {
    const filePath = await saveStoredRequest(configDir, 'a.b.c.d.e')

    expect(filePath).toBe(path.join(configDir, STORED_REQUEST_FILE))
    const stat = await fs.stat(filePath)
    expect(stat.mode & 0o777).toBe(0o600)
    await expect(loadStoredRequest(configDir)).resolves.toBe('a.b.c.d.e')
  })

  it('should point to the store command when nothing is stored', async () => {
    await expect(loadStoredRequest(configDir)).rejects.toThrow(
      `No stored request at ${path.join(configDir, STORED_REQUEST_FILE)}. Run "witness-rotator store" first.`,
    )
  })
})
