/**
 * Login for the HTTP status service.
 *
 * @remarks
 * Only a salted scrypt hash of the password is stored. The file is written
 * with mode `0600`.
 *
 * @internal
 */

import { randomBytes, scrypt, timingSafeEqual, createHash } from 'node:crypto'
import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import { ConfigurationError } from 'witness-rotator'

/** File name of the stored login inside the config directory. */
export const CREDENTIALS_FILE = 'ui-credentials.json'

const KEY_LENGTH = 32

export interface UiCredentials {
  username: string
  /** Hex-encoded random salt. */
  salt: string
  /** Hex-encoded scrypt hash of the password. */
  hash: string
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function derive(password: string, salt: string): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    scrypt(password, Buffer.from(salt, 'hex'), KEY_LENGTH, (err, key) => {
      if (err !== null) {
        reject(err)
      } else {
        resolve(key)
      }
    })
  })
}

/** Hash `password` under a fresh salt. */
export async function createCredentials(
  username: string,
  password: string,
): Promise<UiCredentials> {
  if (username === '' || password === '') {
    throw new ConfigurationError('Username and password must not be empty')
  }
  const salt = randomBytes(16).toString('hex')
  const hash = (await derive(password, salt)).toString('hex')
  return { username, salt, hash }
}

/** Constant-time check of a login attempt. */
export async function verifyCredentials(
  stored: UiCredentials,
  username: string,
  password: string,
): Promise<boolean> {
  const digest = (value: string): Buffer => createHash('sha256').update(value).digest()
  const userMatches = timingSafeEqual(digest(stored.username), digest(username))
  const expected = Buffer.from(stored.hash, 'hex')
  const actual = await derive(password, stored.salt)
  const passwordMatches = expected.length === actual.length && timingSafeEqual(expected, actual)
  return userMatches && passwordMatches
}

/** Write `ui-credentials.json` readable only by the owner. */
export async function saveCredentials(
  configDir: string,
  credentials: UiCredentials,
): Promise<string> {
  await fs.mkdir(configDir, { recursive: true, mode: 0o700 })
  const filePath = path.join(configDir, CREDENTIALS_FILE)
  await fs.writeFile(filePath, JSON.stringify(credentials, null, 2) + '\n', {
    encoding: 'utf8',
    mode: 0o600,
  })
  await fs.chmod(filePath, 0o600)
  return filePath
}

/**
 * Read the stored login.
 * @throws {@link ConfigurationError} if the file is missing or malformed.
 */
export async function loadCredentials(configDir: string): Promise<UiCredentials> {
  const filePath = path.join(configDir, CREDENTIALS_FILE)
  let raw: unknown
  try {
    raw = JSON.parse(await fs.readFile(filePath, 'utf8'))
  } catch {
    throw new ConfigurationError(
      `No readable login at ${filePath}. Run "witness-rotator credentials" first.`,
    )
  }
  if (
    !isObject(raw) ||
    typeof raw.username !== 'string' ||
    typeof raw.salt !== 'string' ||
    typeof raw.hash !== 'string'
  ) {
    throw new ConfigurationError(`Malformed login file at ${filePath}`)
  }
  return { username: raw.username, salt: raw.salt, hash: raw.hash }
}
