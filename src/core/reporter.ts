import pino from 'pino'
import type {CollectedArtifact, LibraryResult} from '../types.js'

/**
 * Discriminated union of orchestration events.
 *
 * Lifecycle:
 * 1. RUN_START - Run begins with the selected libraries
 * 2. CLEAN_FINISHED - Stale build outputs removed
 * 3. IMAGE_BUILD_STARTING, then IMAGE_BUILD_FINISHED
 *    OR IMAGE_BUILD_FAILED - run stops, nothing else happens
 * 4. SERVICE_STARTING, then SERVICE_READY
 *    OR SERVICE_NOT_READY - no library runs, teardown follows
 * 5. For each library:
 *    LIBRARY_STARTING, then LIBRARY_FINISHED or LIBRARY_FAILED
 *    OR LIBRARY_SKIPPED (fail-fast policy after a failure)
 * 6. TEARDOWN_STARTING, then TEARDOWN_FINISHED or TEARDOWN_FAILED
 * 7. ARTIFACTS_COLLECTED
 * 8. RUN_FINISHED
 */
export type RunStartEvent = {
  event: 'RUN_START';
  project: string;
  image: string;
  libraries: string[];
}

export type CleanFinishedEvent = {
  event: 'CLEAN_FINISHED';
  removed: string[];
}

export type ImageBuildStartingEvent = {
  event: 'IMAGE_BUILD_STARTING';
  image: string;
}

export type ImageBuildFinishedEvent = {
  event: 'IMAGE_BUILD_FINISHED';
  image: string;
  durationMs: number;
}

export type ImageBuildFailedEvent = {
  event: 'IMAGE_BUILD_FAILED';
  image: string;
  exitCode: number;
}

export type ServiceStartingEvent = {
  event: 'SERVICE_STARTING';
  service: string;
}

export type ServiceReadyEvent = {
  event: 'SERVICE_READY';
  service: string;
  attempts: number;
  elapsedMs: number;
}

export type ServiceNotReadyEvent = {
  event: 'SERVICE_NOT_READY';
  service: string;
  attempts: number;
  elapsedMs: number;
}

export type LibraryStartingEvent = {
  event: 'LIBRARY_STARTING';
  library: string;
  mountPath: string;
}

export type LibraryFinishedEvent = {
  event: 'LIBRARY_FINISHED';
  library: string;
  durationMs: number;
}

export type LibraryFailedEvent = {
  event: 'LIBRARY_FAILED';
  library: string;
  exitCode: number;
  durationMs: number;
  error?: string;
}

export type LibrarySkippedEvent = {
  event: 'LIBRARY_SKIPPED';
  library: string;
}

export type TeardownStartingEvent = {
  event: 'TEARDOWN_STARTING';
  project: string;
}

export type TeardownFinishedEvent = {
  event: 'TEARDOWN_FINISHED';
  project: string;
  imageRemoved: boolean;
}

export type TeardownFailedEvent = {
  event: 'TEARDOWN_FAILED';
  project: string;
  error: string;
}

export type ArtifactsCollectedEvent = {
  event: 'ARTIFACTS_COLLECTED';
  artifacts: CollectedArtifact[];
}

export type RunFinishedEvent = {
  event: 'RUN_FINISHED';
  results: LibraryResult[];
  durationMs: number;
}

export type OrchestrationEvent =
  | RunStartEvent
  | CleanFinishedEvent
  | ImageBuildStartingEvent
  | ImageBuildFinishedEvent
  | ImageBuildFailedEvent
  | ServiceStartingEvent
  | ServiceReadyEvent
  | ServiceNotReadyEvent
  | LibraryStartingEvent
  | LibraryFinishedEvent
  | LibraryFailedEvent
  | LibrarySkippedEvent
  | TeardownStartingEvent
  | TeardownFinishedEvent
  | TeardownFailedEvent
  | ArtifactsCollectedEvent
  | RunFinishedEvent

/** Source of a log line: the image build or one library's packaging command. */
export type LogScope = {kind: 'image'} | {kind: 'library'; library: string}

/**
 * Interface for reporting orchestration events.
 */
export type Reporter = {
  /** Reports phase and library state transitions */
  emit(event: OrchestrationEvent): void;
  /** Reports Docker CLI output (stdout/stderr) */
  log(scope: LogScope, stream: 'stdout' | 'stderr', line: string): void;
}

/**
 * Reporter that outputs structured JSON logs via pino.
 * Suitable for CI/CD environments and log aggregation.
 */
export class ConsoleReporter implements Reporter {
  private readonly logger: pino.Logger

  constructor(options?: {level?: string; destination?: pino.DestinationStream}) {
    const pinoOptions = {level: options?.level ?? 'info'}
    this.logger = options?.destination ? pino(pinoOptions, options.destination) : pino(pinoOptions)
  }

  emit(event: OrchestrationEvent): void {
    if (event.event === 'LIBRARY_FAILED' || event.event === 'IMAGE_BUILD_FAILED' || event.event === 'SERVICE_NOT_READY' || event.event === 'TEARDOWN_FAILED') {
      this.logger.error(event)
      return
    }

    this.logger.info(event)
  }

  log(scope: LogScope, stream: 'stdout' | 'stderr', line: string): void {
    const source = scope.kind === 'image' ? 'image' : scope.library
    this.logger.debug({source, stream, line})
  }
}
