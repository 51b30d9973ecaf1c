import test from 'ava'
import {formatDuration, formatResultTable} from '../utils.js'

test('formatDuration: milliseconds', t => {
  t.is(formatDuration(250), '250ms')
})

test('formatDuration: seconds', t => {
  t.is(formatDuration(12_340), '12.3s')
})

test('formatDuration: minutes', t => {
  t.is(formatDuration(125_000), '2m 5s')
})

test('formatResultTable: aligns columns under the header', t => {
  const lines = formatResultTable([
    {name: 'sqllib', status: 'success', exitCode: 0, durationMs: 1500},
    {name: 'api-framework', status: 'skipped', durationMs: 0}
  ])

  t.deepEqual(lines, [
    'LIBRARY        STATUS   EXIT  DURATION',
    'sqllib         success     0  1.5s',
    'api-framework  skipped     -  0ms'
  ])
})
