import { setTimeout as delay } from 'node:timers/promises'

/** Waits for the given number of milliseconds. Injectable for tests. */
export type Sleep = (ms: number) => Promise<void>

/** Returns the current wall-clock time. Injectable for tests. */
export type Clock = () => Date

export const realSleep: Sleep = (ms) => delay(ms)

export const systemClock: Clock = () => new Date()
