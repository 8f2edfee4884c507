/**
 * Doctor runner: runs the checks an execution profile needs and aggregates
 * the results.
 *
 * @packageDocumentation
 */

import { checkDocker, checkDockerDaemon, checkExecutable } from './checks.js'
import type { ExecutionProfile, PreflightCheck, PreflightResult } from '../types.js'

/** A doctor check entry pairing the check function with whether it is required. */
interface CheckEntry {
  check: () => Promise<PreflightCheck>
  required: boolean
}

/** Aggregated check entry with its result. */
interface ResolvedEntry {
  required: boolean
  result: PreflightCheck
}

/**
 * Run every preflight check the profile's backend needs and aggregate the
 * results.
 */
export async function runDoctor(profile: ExecutionProfile): Promise<PreflightResult> {
  const entries = buildCheckList(profile)

  const resolved: ResolvedEntry[] = await Promise.all(
    entries.map(async ({ check, required }) => {
      const result = await check()
      return { required, result }
    }),
  )

  const ready = resolved.every(({ required, result }) => {
    if (!required) return true
    return result.status === 'ok'
  })

  const warnings: string[] = []
  const nextSteps: string[] = []

  for (const { required, result } of resolved) {
    const detail = result.reason !== undefined ? `: ${result.reason}` : ''
    if (result.status === 'missing') {
      if (required) {
        nextSteps.push(`Make ${result.name} available${detail}`)
      } else {
        warnings.push(`Optional dependency not found: ${result.name}${detail}`)
      }
    } else if (result.status === 'version-unsupported') {
      const msg = `${result.name} version is unsupported${detail}`
      if (required) {
        nextSteps.push(`Upgrade required dependency: ${msg}`)
      } else {
        warnings.push(`Optional dependency version unsupported: ${msg}`)
      }
    }
  }

  if (!profile.localNode) {
    warnings.push(`No local node is managed; the wallet connects to ${profile.rpcEndpoint}`)
  }

  const checks = resolved.map(({ result }) => result)

  return { checks, ready, warnings, nextSteps }
}

function buildCheckList(profile: ExecutionProfile): CheckEntry[] {
  if (profile.backend === 'docker') {
    return [
      { check: checkDocker, required: true },
      { check: checkDockerDaemon, required: true },
    ]
  }
  const { walletPath, nodePath } = profile.native
  return [
    { check: () => checkExecutable('wallet', walletPath), required: true },
    { check: () => checkExecutable('node', nodePath), required: true },
  ]
}
