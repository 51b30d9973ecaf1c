import test from 'ava'
import {
  LibpressError,
  DockerError,
  DockerNotAvailableError,
  ImageBuildError,
  ComposeError,
  ServiceNotReadyError,
  TeardownError,
  ConfigError,
  ValidationError
} from '../errors.js'

// -- instanceof chains -------------------------------------------------------

test('DockerNotAvailableError is instanceof DockerError and LibpressError', t => {
  const error = new DockerNotAvailableError()
  t.true(error instanceof DockerNotAvailableError)
  t.true(error instanceof DockerError)
  t.true(error instanceof LibpressError)
  t.true(error instanceof Error)
})

test('ImageBuildError is instanceof DockerError and LibpressError', t => {
  const error = new ImageBuildError('pylibs-builder:latest', 1)
  t.true(error instanceof DockerError)
  t.true(error instanceof LibpressError)
})

test('ServiceNotReadyError and TeardownError are DockerErrors', t => {
  t.true(new ServiceNotReadyError('mysql-server', 1000) instanceof DockerError)
  t.true(new TeardownError('down failed') instanceof DockerError)
  t.true(new ComposeError('up failed') instanceof DockerError)
})

test('ConfigError and ValidationError are not DockerErrors', t => {
  t.false(new ConfigError('bad') instanceof DockerError)
  t.false(new ValidationError('bad') instanceof DockerError)
  t.true(new ConfigError('bad') instanceof LibpressError)
})

// -- code property -----------------------------------------------------------

test('each error carries its code', t => {
  t.is(new DockerNotAvailableError().code, 'DOCKER_NOT_AVAILABLE')
  t.is(new ImageBuildError('img', 2).code, 'IMAGE_BUILD_FAILED')
  t.is(new ComposeError('msg').code, 'COMPOSE_FAILED')
  t.is(new ServiceNotReadyError('db', 10).code, 'SERVICE_NOT_READY')
  t.is(new TeardownError('msg').code, 'TEARDOWN_FAILED')
  t.is(new ConfigError('msg').code, 'CONFIG_ERROR')
  t.is(new ValidationError('msg').code, 'VALIDATION_ERROR')
})

// -- transient flag ----------------------------------------------------------

test('DockerNotAvailableError is transient', t => {
  t.true(new DockerNotAvailableError().transient)
})

test('ServiceNotReadyError is transient', t => {
  t.true(new ServiceNotReadyError('mysql-server', 60_000).transient)
})

test('ImageBuildError is not transient', t => {
  t.false(new ImageBuildError('img', 1).transient)
})

test('TeardownError is not transient', t => {
  t.false(new TeardownError('msg').transient)
})

// -- cause chaining ----------------------------------------------------------

test('LibpressError supports cause chaining', t => {
  const cause = new Error('original')
  const error = new ConfigError('wrapped', {cause})
  t.is(error.cause, cause)
})

test('TeardownError supports cause chaining', t => {
  const cause = new Error('network busy')
  t.is(new TeardownError('down failed', {cause}).cause, cause)
})

// -- message content ---------------------------------------------------------

test('ImageBuildError names the image and exit code', t => {
  const error = new ImageBuildError('pylibs-builder:ci', 137)
  t.is(error.message, 'Failed to build image "pylibs-builder:ci" (exit code 137)')
  t.is(error.image, 'pylibs-builder:ci')
  t.is(error.exitCode, 137)
})

test('ServiceNotReadyError names the service and timeout', t => {
  const error = new ServiceNotReadyError('mysql-server', 60_000)
  t.is(error.message, 'Service "mysql-server" was not ready within 60000ms')
  t.is(error.service, 'mysql-server')
  t.is(error.timeoutMs, 60_000)
})

test('error names match their classes', t => {
  t.is(new ServiceNotReadyError('db', 1).name, 'ServiceNotReadyError')
  t.is(new ConfigError('msg').name, 'ConfigError')
})
