/**
 * Passphrase-encrypted storage of a rotation request using `jose` with
 * `PBES2-HS256+A128KW` + `A256GCM`.
 */

import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import { CompactEncrypt, compactDecrypt } from 'jose'
import { ConfigurationError, StoredConfigError } from '../errors.js'
import type { RotationRequest } from '../types.js'

const ALGORITHM = 'PBES2-HS256+A128KW'
const ENCRYPTION = 'A256GCM'

/** File name of the stored request inside the config directory. */
export const STORED_REQUEST_FILE = 'request.jwe'

/** Default PBKDF2 iteration count. */
export const DEFAULT_ITERATIONS = 390_000

const MAX_ITERATIONS = 1_000_000

/** The one error every decryption failure maps to. */
const DECRYPT_FAILURE = 'Invalid passphrase or corrupted configuration'

/**
 * Options for {@link encryptRequest}.
 * @internal
 */
export interface EncryptRequestOptions {
  /** PBKDF2 iterations (`p2c`). At least 1000. */
  iterations?: number | undefined
}

/**
 * Type guard that checks whether an unknown value is a non-null object.
 */
function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Parses a decrypted payload into a RotationRequest. Returns `undefined` if
 * any field is missing or of the wrong type.
 */
function parseRotationRequest(raw: unknown): RotationRequest | undefined {
  if (!isObject(raw)) {
    return undefined
  }
  const { account, url, wif } = raw
  if (typeof account !== 'string' || account === '') return undefined
  if (typeof url !== 'string') return undefined
  if (typeof wif !== 'string') return undefined
  return { account, url, wif }
}

/**
 * Encrypt a rotation request under a passphrase.
 *
 * @remarks
 * The key is derived with PBKDF2-HMAC-SHA256 over a random salt that `jose`
 * generates per call, so encrypting the same request twice yields different
 * tokens.
 *
 * @returns Compact JWE string
 */
export async function encryptRequest(
  request: RotationRequest,
  passphrase: string,
  options?: EncryptRequestOptions,
): Promise<string> {
  if (passphrase === '') {
    throw new ConfigurationError('Passphrase must not be empty')
  }
  const plaintext = new TextEncoder().encode(
    JSON.stringify({ account: request.account, url: request.url, wif: request.wif }),
  )
  return new CompactEncrypt(plaintext)
    .setProtectedHeader({ alg: ALGORITHM, enc: ENCRYPTION })
    .setKeyManagementParameters({ p2c: options?.iterations ?? DEFAULT_ITERATIONS })
    .encrypt(new TextEncoder().encode(passphrase))
}

/**
 * Decrypt a stored rotation request.
 *
 * @throws {@link StoredConfigError} for a wrong passphrase, a damaged token,
 * or a payload of the wrong shape, with the same message in every case.
 */
export async function decryptRequest(jwe: string, passphrase: string): Promise<RotationRequest> {
  let parsed: unknown
  try {
    const { plaintext } = await compactDecrypt(jwe.trim(), new TextEncoder().encode(passphrase), {
      keyManagementAlgorithms: [ALGORITHM],
      contentEncryptionAlgorithms: [ENCRYPTION],
      maxPBES2Count: MAX_ITERATIONS,
    })
    parsed = JSON.parse(new TextDecoder().decode(plaintext))
  } catch {
    throw new StoredConfigError(DECRYPT_FAILURE)
  }

  const request = parseRotationRequest(parsed)
  if (request === undefined) {
    throw new StoredConfigError(DECRYPT_FAILURE)
  }
  return request
}

/** Write an encrypted request to `request.jwe` readable only by the owner. */
export async function saveStoredRequest(configDir: string, jwe: string): Promise<string> {
  await fs.mkdir(configDir, { recursive: true, mode: 0o700 })
  const filePath = path.join(configDir, STORED_REQUEST_FILE)
  await fs.writeFile(filePath, `${jwe}\n`, { mode: 0o600 })
  return filePath
}

/**
 * Read the encrypted request.
 * @throws {@link ConfigurationError} if no request has been stored.
 */
export async function loadStoredRequest(configDir: string): Promise<string> {
  const filePath = path.join(configDir, STORED_REQUEST_FILE)
  try {
    return (await fs.readFile(filePath, 'utf-8')).trim()
  } catch {
    throw new ConfigurationError(
      `No stored request at ${filePath}. Run "witness-rotator store" first.`,
    )
  }
}
