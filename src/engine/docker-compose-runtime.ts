import process from 'node:process'
import {execa} from 'execa'
import {ComposeError, DockerError, DockerNotAvailableError} from '../errors.js'
import {ContainerRuntime, type OnLogLine} from './runtime.js'
import type {CommandResult, ComposeProject, DownOptions, ImageBuildRequest, ServiceRunRequest} from './types.js'

/**
 * Build a minimal environment for the Docker CLI process.
 * Only PATH, HOME, and DOCKER_* are kept, so host secrets never reach
 * the Docker CLI or the containers it starts.
 */
export function dockerCliEnv(source: NodeJS.ProcessEnv = process.env): Record<string, string> {
  const env: Record<string, string> = {}
  for (const [key, value] of Object.entries(source)) {
    if (value !== undefined && (key === 'PATH' || key === 'HOME' || key.startsWith('DOCKER_'))) {
      env[key] = value
    }
  }

  return env
}

// -- Argument builders -------------------------------------------------------

export function buildImageArgs(request: ImageBuildRequest): string[] {
  const args = ['build', '-t', request.image]
  if (request.dockerfile) {
    args.push('-f', request.dockerfile)
  }

  args.push(request.context)
  return args
}

export function composeArgs(project: ComposeProject, ...args: string[]): string[] {
  return ['compose', '-p', project.name, '-f', project.file, '--project-directory', project.directory, ...args]
}

export function upArgs(project: ComposeProject, service: string): string[] {
  return composeArgs(project, 'up', '-d', service)
}

export function probeArgs(project: ComposeProject, service: string, command: string[]): string[] {
  return composeArgs(project, 'exec', '-T', service, ...command)
}

export function runArgs(project: ComposeProject, request: ServiceRunRequest): string[] {
  const args = ['run', '--rm', '-w', request.workdir]
  if (!request.tty) {
    args.push('-T')
  }

  return composeArgs(project, ...args, request.service, ...request.command)
}

export function downArgs(project: ComposeProject, options: DownOptions): string[] {
  const args = ['down']
  if (options.removeVolumes) {
    args.push('-v')
  }

  if (options.removeLocalImages) {
    args.push('--rmi', 'local')
  }

  if (options.removeOrphans) {
    args.push('--remove-orphans')
  }

  return composeArgs(project, ...args)
}

function errorOutput(error: unknown): string {
  if (error instanceof Error && 'stderr' in error && typeof error.stderr === 'string' && error.stderr.length > 0) {
    return error.stderr.trim()
  }

  return error instanceof Error ? error.message : String(error)
}

export class DockerComposeRuntime extends ContainerRuntime {
  private readonly env = dockerCliEnv()

  async check(): Promise<void> {
    try {
      await execa('docker', ['--version'], {env: this.env})
      await execa('docker', ['compose', 'version'], {env: this.env})
    } catch (error) {
      throw new DockerNotAvailableError({cause: error})
    }
  }

  async buildImage(request: ImageBuildRequest, onLogLine: OnLogLine): Promise<CommandResult> {
    return this.stream(buildImageArgs(request), onLogLine)
  }

  async startService(project: ComposeProject, service: string): Promise<void> {
    try {
      await execa('docker', upArgs(project, service), {env: this.env})
    } catch (error) {
      throw new ComposeError(`Failed to start service "${service}": ${errorOutput(error)}`, {cause: error})
    }
  }

  async probeService(project: ComposeProject, service: string, command: string[], signal?: AbortSignal): Promise<boolean> {
    const result = await execa('docker', probeArgs(project, service, command), {env: this.env, reject: false, cancelSignal: signal})
    return result.exitCode === 0
  }

  async runService(project: ComposeProject, request: ServiceRunRequest, onLogLine: OnLogLine): Promise<CommandResult> {
    return this.stream(runArgs(project, request), onLogLine, request.tty)
  }

  async down(project: ComposeProject, options: DownOptions): Promise<void> {
    try {
      await execa('docker', downArgs(project, options), {env: this.env})
    } catch (error) {
      throw new ComposeError(`Failed to tear down project "${project.name}": ${errorOutput(error)}`, {cause: error})
    }
  }

  async removeImage(image: string): Promise<void> {
    try {
      await execa('docker', ['rmi', image], {env: this.env})
    } catch (error) {
      throw new DockerError('IMAGE_REMOVE_FAILED', `Failed to remove image "${image}": ${errorOutput(error)}`, {cause: error})
    }
  }

  /**
   * Run a Docker CLI command, streaming its output line by line.
   * A non-zero exit code is returned rather than thrown.
   */
  private async stream(args: string[], onLogLine: OnLogLine, interactive = false): Promise<CommandResult> {
    const startedAt = new Date()
    let exitCode = 0
    let error: string | undefined

    try {
      const proc = execa('docker', args, {
        env: this.env,
        reject: false,
        stdin: interactive ? 'inherit' : 'ignore'
      })

      await this.streamLogs(proc, onLogLine)
      const result = await proc
      exitCode = result.exitCode ?? 1
      if (result.exitCode === undefined) {
        error = 'Docker CLI was terminated by a signal'
      }
    } catch (error_) {
      exitCode = 1
      error = error_ instanceof Error ? error_.message : String(error_)
    }

    return {exitCode, startedAt, finishedAt: new Date(), error}
  }

  /**
   * Stream stdout/stderr from a subprocess via iterables.
   */
  private async streamLogs(
    proc: ReturnType<typeof execa>,
    onLogLine: OnLogLine
  ): Promise<void> {
    const stdoutDone = (async () => {
      for await (const line of proc.iterable({from: 'stdout'})) {
        onLogLine({stream: 'stdout', line: String(line)})
      }
    })()

    const stderrDone = (async () => {
      for await (const line of proc.iterable({from: 'stderr'})) {
        onLogLine({stream: 'stderr', line: String(line)})
      }
    })()

    await Promise.all([stdoutDone, stderrDone])
  }
}
