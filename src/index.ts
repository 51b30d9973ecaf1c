/**
 * Programmatic API.
 *
 * For CLI usage, see src/cli/index.ts
 *
 * @example
 * ```typescript
 * import {BuildOrchestrator, ConsoleReporter, DockerComposeRuntime, loadConfig} from 'libpress'
 *
 * const config = await loadConfig(process.cwd(), process.env, {failurePolicy: 'fail-fast'})
 * const orchestrator = new BuildOrchestrator({
 *   runtime: new DockerComposeRuntime(),
 *   reporter: new ConsoleReporter(),
 *   config,
 *   root: process.cwd()
 * })
 *
 * const report = await orchestrator.run(['sqllib', 'cachelib'])
 * ```
 */

export {
  ContainerRuntime,
  DockerComposeRuntime,
  buildComposeDefinition,
  renderComposeFile,
  writeComposeFile,
  type ComposeDefinition,
  type ComposeProject,
  type CommandResult,
  type DownOptions,
  type ImageBuildRequest,
  type ServiceRunRequest,
  type LogLine,
  type OnLogLine
} from './engine/index.js'

export {
  BuildOrchestrator,
  hasFailures,
  ConsoleReporter,
  collectArtifacts,
  findStaleOutputs,
  removeStaleOutputs,
  waitUntilReady,
  parseLibraryList,
  resolveLibraries,
  defaultConfig,
  resolveConfig,
  loadConfig,
  loadConfigFile,
  configFromEnv,
  imageRef,
  formatDuration,
  type OrchestratorConfig,
  type PartialConfig,
  type Reporter,
  type LogScope,
  type OrchestrationEvent,
  type ReadinessResult,
  type RunOptions
} from './core/index.js'

export type {
  LibraryEntry,
  LibraryResult,
  LibraryStatus,
  FailurePolicy,
  CollectedArtifact,
  OrchestrationReport
} from './types.js'

export {
  LibpressError,
  DockerError,
  DockerNotAvailableError,
  ImageBuildError,
  ComposeError,
  ServiceNotReadyError,
  TeardownError,
  ConfigError,
  ValidationError
} from './errors.js'
