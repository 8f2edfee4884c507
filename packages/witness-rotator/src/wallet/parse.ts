/**
 * Extraction of structured values from freeform wallet output.
 *
 * @remarks
 * The wallet mixes prompts, log text, and JSON fragments on stdout and only
 * signals errors through substrings. Every parser here is a pure function
 * returning `undefined` when its value is absent.
 *
 * @packageDocumentation
 */

import type { Keypair } from '../types.js'
import type { ExecCommandResult } from '../util/exec.js'

/** Marker printed when the wallet cannot reach the node's RPC endpoint. */
export const TRANSPORT_ERROR_MARKER = 'Underlying Transport Error'

const WITNESS_ID_PREFIX = '1.6.'

/** One witness-id extraction strategy. */
export type WitnessIdStrategy = (output: string) => string | undefined

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text)
  } catch {
    return undefined
  }
}

/** A whole line that is a JSON object with a witness `id` field. */
export const fromJsonRecord: WitnessIdStrategy = (output) => {
  for (const raw of output.split(/\r?\n/)) {
    const line = raw.trim()
    if (!line.startsWith('{') || !line.endsWith('}')) continue
    const record = tryParseJson(line)
    if (isObject(record) && typeof record.id === 'string' && record.id.startsWith(WITNESS_ID_PREFIX)) {
      return record.id
    }
  }
  return undefined
}

/** An `"id": "1.6.N"` pair anywhere in the output, e.g. in pretty-printed JSON. */
export const fromIdField: WitnessIdStrategy = (output) => {
  return /"id":\s*"(1\.6\.\d+)"/.exec(output)?.[1]
}

/** Any bare `1.6.N` token. */
export const fromBareToken: WitnessIdStrategy = (output) => {
  return /1\.6\.\d+/.exec(output)?.[0]
}

/** Strategies in order of preference; each is more permissive than the last. */
export const WITNESS_ID_STRATEGIES: readonly WitnessIdStrategy[] = [
  fromJsonRecord,
  fromIdField,
  fromBareToken,
]

/** Return the first witness id any strategy finds. */
export function extractWitnessId(output: string): string | undefined {
  for (const strategy of WITNESS_ID_STRATEGIES) {
    const id = strategy(output)
    if (id !== undefined) return id
  }
  return undefined
}

/**
 * Parse `--suggest-brain-key` output. The whole output is tried as JSON
 * first, then the span from the first `{` to the last `}`.
 */
export function parseKeypair(output: string): Keypair | undefined {
  let parsed = tryParseJson(output.trim())
  if (!isObject(parsed)) {
    const start = output.indexOf('{')
    const end = output.lastIndexOf('}')
    if (start === -1 || end <= start) return undefined
    parsed = tryParseJson(output.slice(start, end + 1))
  }
  if (!isObject(parsed)) return undefined

  const publicKey = parsed.pub_key
  const privateKey = parsed.wif_priv_key
  if (typeof publicKey !== 'string' || publicKey === '') return undefined
  if (typeof privateKey !== 'string' || privateKey === '') return undefined
  return { publicKey, privateKey }
}

/** Hide private key fields that key generation output may contain. */
export function maskKeyFields(output: string): string {
  return output.replace(
    /("(?:wif_priv_key|brain_priv_key)"\s*:\s*")[^"]*(")/g,
    '$1[REDACTED]$2',
  )
}

/** The wallet refused the imported key. Checked on stdout only. */
export function hasInvalidKeyMarker(stdout: string): boolean {
  return stdout.includes('Invalid private key') || stdout.includes('exception')
}

/**
 * Whether `update_witness` output indicates the transaction was refused:
 * `exception` on stdout (case sensitive) or `error` on either stream (any
 * case).
 */
export function isAuthorizationRejected(stdout: string, stderr: string): boolean {
  return (
    stdout.includes('exception') ||
    stdout.toLowerCase().includes('error') ||
    stderr.toLowerCase().includes('error')
  )
}

export function hasTransportError(result: ExecCommandResult): boolean {
  return (
    result.stdout.includes(TRANSPORT_ERROR_MARKER) || result.stderr.includes(TRANSPORT_ERROR_MARKER)
  )
}

/**
 * A `get_info` probe reached the node: no transport error and the command
 * was echoed back at the prompt.
 */
export function isInfoResponse(result: ExecCommandResult): boolean {
  return !hasTransportError(result) && result.stdout.includes('get_info')
}

/** The raw `head_block_time` value of a `get_info` response. */
export function parseHeadBlockTime(stdout: string): string | undefined {
  return /"head_block_time":\s*"([^"]+)"/.exec(stdout)?.[1]
}

/** Combine captured streams into a diagnostic block. */
export function formatWalletOutput(result: ExecCommandResult): string {
  return `STDOUT:\n${result.stdout.trim()}\n\nSTDERR:\n${result.stderr.trim()}`
}
