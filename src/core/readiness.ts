import {setTimeout as sleep} from 'node:timers/promises'

/**
 * Answers whether the service is ready. `signal` aborts once the attempt
 * runs out of time; the probe should stop its work then.
 */
export type ReadinessProbe = (signal: AbortSignal) => Promise<boolean>

export type WaitOptions = {
  /** Upper bound on the total wait, probe attempts included. */
  timeoutMs: number;
  /** Delay between two probe attempts. */
  intervalMs: number;
}

export type ReadinessResult = {
  ready: boolean;
  attempts: number;
  elapsedMs: number;
}

/**
 * Runs one probe attempt, answering false when it has not settled within
 * `limitMs`.
 */
async function attempt(probe: ReadinessProbe, limitMs: number): Promise<boolean> {
  const controller = new AbortController()
  try {
    return await Promise.race([
      probe(controller.signal),
      sleep(limitMs, false, {signal: controller.signal})
    ])
  } finally {
    controller.abort()
  }
}

/**
 * Polls `probe` until it reports ready or the timeout is reached. The
 * probe always runs at least once; an attempt still pending at the
 * deadline counts as not ready. Errors thrown by the probe propagate.
 */
export async function waitUntilReady(probe: ReadinessProbe, options: WaitOptions): Promise<ReadinessResult> {
  const startedAt = Date.now()
  let attempts = 0

  for (;;) {
    attempts++
    const remainingMs = Math.max(options.timeoutMs - (Date.now() - startedAt), 0)
    if (await attempt(probe, remainingMs)) {
      return {ready: true, attempts, elapsedMs: Date.now() - startedAt}
    }

    const elapsedMs = Date.now() - startedAt
    if (elapsedMs + options.intervalMs > options.timeoutMs) {
      return {ready: false, attempts, elapsedMs}
    }

    await sleep(options.intervalMs)
  }
}
