/**
 * Wait-for-completion polling for long-running platform actions
 */

import { setTimeout as delay } from 'node:timers/promises'

import { logger } from '../logger.js'

export interface WaitOptions {
  pollIntervalMs: number
  sleep?: (ms: number) => Promise<void>
  timeoutMs: number
}

export const DEFAULT_WAIT: Readonly<WaitOptions> = {
  pollIntervalMs: 5000,
  timeoutMs: 20 * 60 * 1000,
}

/**
 * Outcome of inspecting one polled value
 */
export type PollVerdict = 'done' | 'pending' | { failed: string }

/**
 * Poll `fetchState` until `inspect` reports done.
 * Throws on a failed verdict or when `timeoutMs` elapses.
 */
export async function pollUntil<T>(
  description: string,
  fetchState: () => Promise<T>,
  inspect: (value: T) => PollVerdict,
  options: Partial<WaitOptions> = {}
): Promise<T> {
  const pollIntervalMs = options.pollIntervalMs ?? DEFAULT_WAIT.pollIntervalMs
  const timeoutMs = options.timeoutMs ?? DEFAULT_WAIT.timeoutMs
  const sleep = options.sleep ?? (async (ms: number) => { await delay(ms) })
  const deadline = Date.now() + timeoutMs

  for (;;) {
    // eslint-disable-next-line no-await-in-loop
    const value = await fetchState()
    const verdict = inspect(value)

    if (verdict === 'done') {
      return value
    }

    if (verdict !== 'pending') {
      throw new Error(`${description} failed: ${verdict.failed}`)
    }

    if (Date.now() + pollIntervalMs > deadline) {
      throw new Error(`Timed out after ${timeoutMs}ms waiting for ${description}`)
    }

    logger.trace(`Waiting for ${description}, next poll in ${pollIntervalMs}ms`)
    // eslint-disable-next-line no-await-in-loop
    await sleep(pollIntervalMs)
  }
}
