// ---------------------------------------------------------------------------
// Shared orchestration domain types.
//
// Used by the orchestrator, the container runtime and the CLI reporters.
// ---------------------------------------------------------------------------

/** A library directory built and published by one builder container. */
export type LibraryEntry = {
  /** Directory name, relative to the project root. */
  name: string;
  /** Absolute path of the library directory on the host. */
  hostPath: string;
  /** Path where the library is mounted inside the builder container. */
  mountPath: string;
}

/** What to do with the remaining libraries once one has failed. */
export type FailurePolicy = 'continue' | 'fail-fast'

export type LibraryStatus = 'success' | 'failure' | 'skipped'

/** Outcome of the packaging command for one library. */
export type LibraryResult = {
  name: string;
  status: LibraryStatus;
  /** Exit code of the packaging command (absent when skipped). */
  exitCode?: number;
  durationMs: number;
  /** Runtime error message, when the command could not be run at all. */
  error?: string;
}

/** A package file found in a library's build output. */
export type CollectedArtifact = {
  library: string;
  /** Absolute path of the file in the library's build output. */
  source: string;
  /** Absolute path of the copy, when an output directory is configured. */
  destination?: string;
}

export type OrchestrationReport = {
  /** Builder image reference used for every library. */
  image: string;
  /** One result per library, in list order. */
  libraries: LibraryResult[];
  artifacts: CollectedArtifact[];
  /** Stale output directories removed before the image build (relative paths). */
  removedOutputs: string[];
  startedAt: Date;
  finishedAt: Date;
}
