import type {CommandResult, ComposeProject, DownOptions, ImageBuildRequest, ServiceRunRequest} from './types.js'

/**
 * Log line from a Docker CLI command.
 */
export type LogLine = {
  /** Output stream (stdout or stderr) */
  stream: 'stdout' | 'stderr';
  /** Log line content */
  line: string;
}

/**
 * Callback for receiving real-time logs during command execution.
 */
export type OnLogLine = (log: LogLine) => void

/**
 * Abstract interface over the container runtime driving a build.
 *
 * Implementations:
 * - `DockerComposeRuntime`: Uses the Docker and Docker Compose CLIs
 *
 * Commands whose failure is part of a normal run (image build, packaging
 * command) report an exit code; infrastructure failures (runtime missing,
 * service that cannot start) throw.
 */
export abstract class ContainerRuntime {
  /**
   * Verifies that the runtime is available and functional.
   * @throws DockerNotAvailableError if the CLI is not installed or not accessible
   */
  abstract check(): Promise<void>

  /**
   * Builds and tags an image, streaming build output.
   */
  abstract buildImage(request: ImageBuildRequest, onLogLine: OnLogLine): Promise<CommandResult>

  /**
   * Starts a long-running service of the project in the background.
   * @throws ComposeError when the service cannot be started
   */
  abstract startService(project: ComposeProject, service: string): Promise<void>

  /**
   * Runs `command` inside a running service container. Aborting `signal`
   * stops the command, which then counts as not ready.
   * @returns true when the command exits with code 0
   */
  abstract probeService(project: ComposeProject, service: string, command: string[], signal?: AbortSignal): Promise<boolean>

  /**
   * Runs a one-off container of a service and removes it afterwards.
   */
  abstract runService(project: ComposeProject, request: ServiceRunRequest, onLogLine: OnLogLine): Promise<CommandResult>

  /**
   * Stops and removes the project's containers, networks and, depending on
   * `options`, volumes and local images.
   * @throws ComposeError when teardown fails
   */
  abstract down(project: ComposeProject, options: DownOptions): Promise<void>

  /**
   * Removes a locally tagged image.
   * @throws DockerError when the image cannot be removed
   */
  abstract removeImage(image: string): Promise<void>
}
