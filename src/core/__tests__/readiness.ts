import test from 'ava'
import {waitUntilReady} from '../readiness.js'

function probeReadyAfter(failures: number): {probe: () => Promise<boolean>; calls: () => number} {
  let count = 0
  return {
    async probe() {
      count++
      return count > failures
    },
    calls: () => count
  }
}

test('ready on the first attempt', async t => {
  const {probe} = probeReadyAfter(0)
  const result = await waitUntilReady(probe, {timeoutMs: 1000, intervalMs: 10})
  t.true(result.ready)
  t.is(result.attempts, 1)
})

test('keeps polling until the probe answers ready', async t => {
  const {probe, calls} = probeReadyAfter(3)
  const result = await waitUntilReady(probe, {timeoutMs: 5000, intervalMs: 1})
  t.true(result.ready)
  t.is(result.attempts, 4)
  t.is(calls(), 4)
})

test('a zero timeout still makes one attempt', async t => {
  const {probe} = probeReadyAfter(Number.POSITIVE_INFINITY)
  const result = await waitUntilReady(probe, {timeoutMs: 0, intervalMs: 10})
  t.false(result.ready)
  t.is(result.attempts, 1)
})

test('gives up once the timeout would be exceeded', async t => {
  const {probe} = probeReadyAfter(Number.POSITIVE_INFINITY)
  const result = await waitUntilReady(probe, {timeoutMs: 50, intervalMs: 10})
  t.false(result.ready)
  t.true(result.attempts >= 2)
})

test('probe errors propagate', async t => {
  const probe = async (): Promise<boolean> => {
    throw new Error('probe crashed')
  }

  await t.throwsAsync(waitUntilReady(probe, {timeoutMs: 100, intervalMs: 10}), {message: 'probe crashed'})
})

test('a probe that never settles is cut off at the timeout', async t => {
  let received: AbortSignal | undefined
  const probe = async (signal: AbortSignal): Promise<boolean> => {
    received = signal
    return new Promise<boolean>(() => {/* never settles */})
  }

  const result = await waitUntilReady(probe, {timeoutMs: 100, intervalMs: 10})

  t.false(result.ready)
  t.is(result.attempts, 1)
  t.true(received?.aborted)
})

test('the signal of a settled attempt is released', async t => {
  let received: AbortSignal | undefined
  const probe = async (signal: AbortSignal): Promise<boolean> => {
    received = signal
    return true
  }

  const result = await waitUntilReady(probe, {timeoutMs: 1000, intervalMs: 10})

  t.true(result.ready)
  t.true(received?.aborted)
})
