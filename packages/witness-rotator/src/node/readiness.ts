import { ConfigurationError } from '../errors.js'
import { realSleep } from '../util/clock.js'
import type { Sleep } from '../util/clock.js'
import type { ExecCommandResult } from '../util/exec.js'
import { isInfoResponse } from '../wallet/parse.js'
import type { ReadinessOptions } from './types.js'

/**
 * Probe the node until a `get_info` response comes back.
 *
 * @remarks
 * A probe that fails for any reason other than a configuration problem counts
 * as "not ready yet". A {@link ConfigurationError} (the wallet cannot be
 * executed at all) propagates immediately.
 *
 * @returns `true` as soon as one probe succeeds, `false` once retries run out.
 */
export async function waitForNodeReady(
  probe: () => Promise<ExecCommandResult>,
  options: ReadinessOptions & { sleep?: Sleep | undefined } = {},
): Promise<boolean> {
  const maxRetries = options.maxRetries ?? 5
  const delayMs = options.delayMs ?? 5000
  const sleep = options.sleep ?? realSleep
  const log = options.log

  log?.('info', "Checking if the node's RPC endpoint is ready...")
  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    let ready = false
    try {
      ready = isInfoResponse(await probe())
    } catch (err) {
      if (err instanceof ConfigurationError) throw err
      log?.('warn', `Probe failed: ${err instanceof Error ? err.message : String(err)}`)
    }
    if (ready) {
      log?.('info', 'Node RPC is responsive.')
      return true
    }
    if (attempt < maxRetries) {
      log?.(
        'info',
        `Attempt ${String(attempt)}/${String(maxRetries)}: node not ready yet. ` +
          `Retrying in ${String(delayMs / 1000)} seconds...`,
      )
      await sleep(delayMs)
    }
  }
  log?.('error', `Node RPC did not become responsive after ${String(maxRetries)} attempts.`)
  return false
}
