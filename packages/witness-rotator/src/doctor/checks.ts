/**
 * Individual preflight check functions for each external dependency.
 */

import * as fs from 'node:fs/promises'
import { constants as fsConstants } from 'node:fs'
import { execCommand } from '../util/exec.js'
import type { PreflightCheck } from '../types.js'

/**
 * Parse a semver-like version string and return [major, minor, patch].
 * Returns null if unparseable.
 */
function parseVersion(raw: string): [number, number, number] | null {
  const match = /(\d+)\.(\d+)\.(\d+)/.exec(raw)
  if (!match) return null
  const major = parseInt(match[1] ?? '0', 10)
  const minor = parseInt(match[2] ?? '0', 10)
  const patch = parseInt(match[3] ?? '0', 10)
  return [major, minor, patch]
}

/**
 * Returns true if [aMajor, aMinor, aPatch] >= [bMajor, bMinor, bPatch].
 */
function versionGte(a: [number, number, number], b: [number, number, number]): boolean {
  if (a[0] !== b[0]) return a[0] > b[0]
  if (a[1] !== b[1]) return a[1] > b[1]
  return a[2] >= b[2]
}

/**
 * Check that the docker CLI is present and >= 20.10.0.
 * @internal
 */
export async function checkDocker(): Promise<PreflightCheck> {
  const name = 'docker'
  try {
    const output = await execCommand('docker', ['--version'])
    const parsed = parseVersion(output)
    if (!parsed) {
      return {
        name,
        status: 'version-unsupported',
        version: output,
        reason: 'Could not parse docker version',
      }
    }
    if (!versionGte(parsed, [20, 10, 0])) {
      return {
        name,
        status: 'version-unsupported',
        version: output,
        reason: 'docker >= 20.10.0 is required',
      }
    }
    return { name, status: 'ok', version: output }
  } catch {
    return { name, status: 'missing', reason: 'docker not found in PATH' }
  }
}

/**
 * Check that the docker daemon answers.
 * @internal
 */
export async function checkDockerDaemon(): Promise<PreflightCheck> {
  const name = 'docker daemon'
  try {
    const version = await execCommand('docker', ['info', '--format', '{{.ServerVersion}}'])
    return { name, status: 'ok', version }
  } catch {
    return {
      name,
      status: 'missing',
      reason: 'the docker daemon is not running or not accessible to this user',
    }
  }
}

/**
 * Check that a configured binary exists and is executable.
 * @internal
 */
export async function checkExecutable(name: string, filePath: string): Promise<PreflightCheck> {
  try {
    await fs.access(filePath, fsConstants.X_OK)
    return { name, status: 'ok' }
  } catch {
    return { name, status: 'missing', reason: `${filePath} is missing or not executable` }
  }
}
