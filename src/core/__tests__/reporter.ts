import test from 'ava'
import {ConsoleReporter} from '../reporter.js'

function memoryDestination(): {write(chunk: string): void; records: Array<Record<string, unknown>>} {
  const records: Array<Record<string, unknown>> = []
  return {
    records,
    write(chunk: string) {
      const parsed: unknown = JSON.parse(chunk)
      if (typeof parsed === 'object' && parsed !== null) {
        records.push({...parsed})
      }
    }
  }
}

test('events are logged at info with their fields', t => {
  const destination = memoryDestination()
  const reporter = new ConsoleReporter({destination})

  reporter.emit({event: 'LIBRARY_FINISHED', library: 'sqllib', durationMs: 42})

  t.is(destination.records.length, 1)
  const [record] = destination.records
  t.is(record.level, 30)
  t.is(record.event, 'LIBRARY_FINISHED')
  t.is(record.library, 'sqllib')
  t.is(record.durationMs, 42)
})

test('failure events are logged at error', t => {
  const destination = memoryDestination()
  const reporter = new ConsoleReporter({destination})

  reporter.emit({event: 'LIBRARY_FAILED', library: 'cachelib', exitCode: 2, durationMs: 5})
  reporter.emit({event: 'SERVICE_NOT_READY', service: 'mysql-server', attempts: 3, elapsedMs: 2000})
  reporter.emit({event: 'TEARDOWN_FAILED', project: 'libpress', error: 'busy'})

  t.deepEqual(destination.records.map(record => record.level), [50, 50, 50])
})

test('output lines are debug records, hidden at the default level', t => {
  const destination = memoryDestination()
  new ConsoleReporter({destination}).log({kind: 'library', library: 'sqllib'}, 'stdout', 'hello')
  t.is(destination.records.length, 0)

  const verbose = memoryDestination()
  new ConsoleReporter({level: 'debug', destination: verbose}).log({kind: 'image'}, 'stderr', 'step 1/4')
  t.is(verbose.records.length, 1)
  const [record] = verbose.records
  t.is(record.level, 20)
  t.is(record.source, 'image')
  t.is(record.stream, 'stderr')
  t.is(record.line, 'step 1/4')
})
