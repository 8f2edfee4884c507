/**
 * Formatted output helpers for CLI display.
 *
 * @internal
 */

import { formatEvent } from 'witness-rotator'
import type { ProgressEvent } from 'witness-rotator'

/** Check if stdout is a TTY at call time (not module load time). */
function isTTY(): boolean {
  return process.stdout.isTTY ?? false
}

/** Wrap text in ANSI bold if stdout is a TTY. */
export function bold(text: string): string {
  return isTTY() ? `\x1b[1m${text}\x1b[22m` : text
}

/** Wrap text in ANSI dim if stdout is a TTY. */
export function dim(text: string): string {
  return isTTY() ? `\x1b[2m${text}\x1b[22m` : text
}

/** Format an error for display on stderr. */
export function formatError(err: unknown): string {
  if (err instanceof Error) {
    return `${err.name}: ${err.message}`
  }
  return String(err)
}

/**
 * Render a progress event for the terminal. Errors and sentinels are bold;
 * captured tool output is only included when `debug` is set.
 */
export function renderEvent(event: ProgressEvent, debug: boolean): string {
  const line = formatEvent(event)
  const head = event.level === 'error' || event.sentinel !== undefined ? bold(line) : line
  if (!debug || event.details === undefined) return `${head}\n`
  return `${head}\n${dim(event.details)}\n`
}
