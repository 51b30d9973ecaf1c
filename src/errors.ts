export class LibpressError extends Error {
  constructor(
    readonly code: string,
    message: string,
    options?: {cause?: unknown}
  ) {
    super(message, options)
    this.name = 'LibpressError'
  }

  get transient(): boolean {
    return false
  }
}

// -- Docker errors -----------------------------------------------------------

export class DockerError extends LibpressError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'DockerError'
  }
}

export class DockerNotAvailableError extends DockerError {
  constructor(options?: {cause?: unknown}) {
    super('DOCKER_NOT_AVAILABLE', 'Docker CLI or Docker Compose not found. Please install Docker.', options)
    this.name = 'DockerNotAvailableError'
  }

  override get transient(): boolean {
    return true
  }
}

export class ImageBuildError extends DockerError {
  constructor(
    readonly image: string,
    readonly exitCode: number,
    options?: {cause?: unknown}
  ) {
    super('IMAGE_BUILD_FAILED', `Failed to build image "${image}" (exit code ${exitCode})`, options)
    this.name = 'ImageBuildError'
  }
}

export class ComposeError extends DockerError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('COMPOSE_FAILED', message, options)
    this.name = 'ComposeError'
  }
}

export class ServiceNotReadyError extends DockerError {
  constructor(
    readonly service: string,
    readonly timeoutMs: number,
    options?: {cause?: unknown}
  ) {
    super('SERVICE_NOT_READY', `Service "${service}" was not ready within ${timeoutMs}ms`, options)
    this.name = 'ServiceNotReadyError'
  }

  override get transient(): boolean {
    return true
  }
}

export class TeardownError extends DockerError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('TEARDOWN_FAILED', message, options)
    this.name = 'TeardownError'
  }
}

// -- Configuration errors ----------------------------------------------------

export class ConfigError extends LibpressError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('CONFIG_ERROR', message, options)
    this.name = 'ConfigError'
  }
}

export class ValidationError extends LibpressError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('VALIDATION_ERROR', message, options)
    this.name = 'ValidationError'
  }
}
