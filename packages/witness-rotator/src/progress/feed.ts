/**
 * Append-only progress log for a single rotation run.
 *
 * @packageDocumentation
 */

import { FeedClosedError } from '../errors.js'
import type { ProgressEvent, ProgressLevel, ProgressOutcome } from '../types.js'
import { systemClock } from '../util/clock.js'
import type { Clock } from '../util/clock.js'
import { maskSecrets } from '../util/redact.js'

/** Message of the final event of a successful run. */
export const SUCCESS_SENTINEL = 'PROCESS_COMPLETE_SUCCESS'

/** Message of the final event of a failed run. */
export const FAILURE_SENTINEL = 'PROCESS_COMPLETE_FAILURE'

/** Replacement text for registered secrets. */
export const REDACTED = '[REDACTED]'

/** Callback receiving feed events in order. */
export type ProgressListener = (event: ProgressEvent) => void

/** Options for {@link ProgressFeed}. */
export interface ProgressFeedOptions {
  clock?: Clock | undefined
}

/**
 * Render an event as a single log line: `[YYYY-MM-DD HH:MM:SS UTC] message`.
 */
export function formatEvent(event: ProgressEvent): string {
  const stamp = event.at.toISOString().slice(0, 19).replace('T', ' ')
  return `[${stamp} UTC] ${event.message}`
}

/**
 * Timestamped, ordered event log owned by one rotation run.
 *
 * @remarks
 * Registered secrets are replaced with `[REDACTED]` in every message and
 * details string before the event is stored, so nothing downstream of the
 * feed ever sees them. The feed ends with exactly one sentinel event; any
 * append after that throws {@link FeedClosedError}.
 *
 * A subscriber that attaches mid-run receives the full history synchronously
 * before any live event.
 *
 * @public
 */
export class ProgressFeed {
  readonly #events: ProgressEvent[] = []
  readonly #listeners = new Set<ProgressListener>()
  readonly #secrets = new Set<string>()
  readonly #clock: Clock
  #closed = false

  constructor(options: ProgressFeedOptions = {}) {
    this.#clock = options.clock ?? systemClock
  }

  /** `true` once the sentinel has been appended. */
  get closed(): boolean {
    return this.#closed
  }

  /** Snapshot of all events so far, oldest first. */
  get events(): readonly ProgressEvent[] {
    return [...this.#events]
  }

  /** The outcome recorded by the sentinel, if the feed has completed. */
  get outcome(): ProgressOutcome | undefined {
    return this.#events.at(-1)?.sentinel
  }

  /**
   * Register a value that must never appear in the feed. Empty strings are
   * ignored.
   */
  redact(secret: string): void {
    if (secret.length > 0) {
      this.#secrets.add(secret)
    }
  }

  /** Replace every registered secret in `text`. */
  mask(text: string): string {
    return maskSecrets(text, this.#secrets, REDACTED)
  }

  info(message: string, details?: string): ProgressEvent {
    return this.#append('info', message, details)
  }

  warn(message: string, details?: string): ProgressEvent {
    return this.#append('warn', message, details)
  }

  error(message: string, details?: string): ProgressEvent {
    return this.#append('error', message, details)
  }

  /** Append the terminal sentinel and close the feed. */
  complete(outcome: ProgressOutcome): ProgressEvent {
    const event = this.#append(
      outcome === 'success' ? 'info' : 'error',
      outcome === 'success' ? SUCCESS_SENTINEL : FAILURE_SENTINEL,
      undefined,
      outcome,
    )
    this.#closed = true
    this.#listeners.clear()
    return event
  }

  /**
   * Deliver every past event to `listener` immediately, then each new event as
   * it is appended.
   *
   * @remarks
   * A listener that throws is detached; the run it observes is unaffected.
   *
   * @returns A function that detaches the listener.
   */
  subscribe(listener: ProgressListener): () => void {
    for (const event of this.#events) {
      listener(event)
    }
    if (!this.#closed) {
      this.#listeners.add(listener)
    }
    return () => {
      this.#listeners.delete(listener)
    }
  }

  /**
   * Iterate the feed from the first event. Ends after the sentinel.
   */
  async *stream(): AsyncGenerator<ProgressEvent, void, undefined> {
    const queue: ProgressEvent[] = []
    let wake: (() => void) | undefined
    const unsubscribe = this.subscribe((event) => {
      queue.push(event)
      wake?.()
      wake = undefined
    })

    try {
      for (;;) {
        const next = queue.shift()
        if (next === undefined) {
          await new Promise<void>((resolve) => {
            wake = resolve
          })
          continue
        }
        yield next
        if (next.sentinel !== undefined) return
      }
    } finally {
      unsubscribe()
    }
  }

  #append(
    level: ProgressLevel,
    message: string,
    details: string | undefined,
    sentinel?: ProgressOutcome,
  ): ProgressEvent {
    if (this.#closed) {
      throw new FeedClosedError(`Progress feed is closed; cannot append "${this.mask(message)}"`)
    }
    const event: ProgressEvent = {
      seq: this.#events.length,
      at: this.#clock(),
      level,
      message: this.mask(message),
      ...(details !== undefined ? { details: this.mask(details) } : {}),
      ...(sentinel !== undefined ? { sentinel } : {}),
    }
    this.#events.push(event)
    for (const listener of [...this.#listeners]) {
      try {
        listener(event)
      } catch {
        this.#listeners.delete(listener)
      }
    }
    return event
  }
}
