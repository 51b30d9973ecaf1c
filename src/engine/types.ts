/**
 * A Docker Compose project: every compose invocation targets one project
 * file and one project directory under a fixed project name.
 */
export type ComposeProject = {
  /** Compose project name (`-p`) */
  name: string;
  /** Absolute path of the compose file (`-f`) */
  file: string;
  /** Directory relative paths in the compose file resolve against */
  directory: string;
}

/**
 * Request to build the builder image.
 */
export type ImageBuildRequest = {
  /** Image reference to tag the build with (e.g. pylibs-builder:latest) */
  image: string;
  /** Absolute path of the build context */
  context: string;
  /** Absolute path of the Dockerfile (Docker default when absent) */
  dockerfile?: string;
}

/**
 * Request to run a one-off container of a compose service.
 */
export type ServiceRunRequest = {
  /** Compose service to run */
  service: string;
  /** Working directory inside the container */
  workdir: string;
  /** Command and arguments to execute */
  command: string[];
  /** Allocate a pseudo-TTY and keep stdin attached */
  tty: boolean;
}

/**
 * Options for tearing down a compose project.
 */
export type DownOptions = {
  /** Remove named and anonymous volumes (`-v`) */
  removeVolumes: boolean;
  /** Remove images built or tagged locally for the project (`--rmi local`) */
  removeLocalImages: boolean;
  /** Remove containers of services not in the compose file */
  removeOrphans: boolean;
}

/**
 * Result of a Docker CLI command whose exit code is reported, not thrown.
 */
export type CommandResult = {
  /** Exit code (0 = success, non-zero = failure) */
  exitCode: number;
  startedAt: Date;
  finishedAt: Date;
  /** Error message when the command could not be run */
  error?: string;
}
