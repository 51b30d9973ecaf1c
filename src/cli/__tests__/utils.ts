import test from 'ava'
import {ConfigError, ImageBuildError, ServiceNotReadyError} from '../../errors.js'
import {exitCodeFor} from '../utils.js'

test('exitCodeFor passes on the exit code of a failed image build', t => {
  t.is(exitCodeFor(new ImageBuildError('pylibs-builder:latest', 2)), 2)
})

test('exitCodeFor maps other errors to 1', t => {
  t.is(exitCodeFor(new ServiceNotReadyError('mysql-server', 60_000)), 1)
  t.is(exitCodeFor(new ConfigError('bad')), 1)
  t.is(exitCodeFor('not an error'), 1)
})
