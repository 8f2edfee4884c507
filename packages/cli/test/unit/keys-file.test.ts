import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import * as fs from 'node:fs/promises'
import * as os from 'node:os'
import * as path from 'node:path'
import { formatKeys, saveKeys } from '../../src/keys-file.js'

describe('keys file', () => {
  let tempDir: string

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'witness-rotator-keys-'))
  })

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true })
  })

  it('should format both keys on their own lines', () => {
    expect(formatKeys({ publicKey: 'PUB1', privateKey: 'WIF1' })).toBe(
      'New Public Key: PUB1\nNew Private WIF Key: WIF1\n',
    )
  })

  it('should tighten permissions on an existing file', async () => {
    const filePath = path.join(tempDir, 'keys.txt')
    await fs.writeFile(filePath, 'old', { mode: 0o644 })

    await saveKeys(filePath, { publicKey: 'PUB1', privateKey: 'WIF1' })

    const stat = await fs.stat(filePath)
    expect(stat.mode & 0o777).toBe(0o600)
    expect(await fs.readFile(filePath, 'utf8')).toBe(
      'New Public Key: PUB1\nNew Private WIF Key: WIF1\n',
    )
  })
})
