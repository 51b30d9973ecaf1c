import {mkdtemp, rm} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {dirname, join, resolve} from 'node:path'
import {uniqBy} from 'lodash-es'
import {ImageBuildError, ServiceNotReadyError, TeardownError} from '../errors.js'
import type {ContainerRuntime} from '../engine/runtime.js'
import type {ComposeProject} from '../engine/types.js'
import {buildComposeDefinition, writeComposeFile} from '../engine/compose-file.js'
import type {CollectedArtifact, LibraryEntry, LibraryResult, OrchestrationReport} from '../types.js'
import {collectArtifacts} from './artifacts.js'
import {imageRef, type OrchestratorConfig} from './config.js'
import {resolveLibraries} from './library-list.js'
import {waitUntilReady} from './readiness.js'
import type {Reporter} from './reporter.js'
import {removeStaleOutputs} from './stale-outputs.js'

export type BuildOrchestratorOptions = {
  runtime: ContainerRuntime;
  reporter: Reporter;
  config: OrchestratorConfig;
  /** Project root holding the library directories and the build context. */
  root: string;
}

export type RunOptions = {
  /** Gather package files after teardown (default: true). */
  collectArtifacts?: boolean;
}

/**
 * Builds and publishes a list of libraries inside a shared builder image.
 *
 * ## Workflow
 *
 * 1. **Check**: the container runtime must be available
 * 2. **Clean**: stale build output directories are removed from the tree
 * 3. **Image**: the builder image is built once; a failed build stops the
 *    run before anything else is started
 * 4. **Database**: the database service is started and polled until ready
 * 5. **Libraries**: each library runs the packaging command in a fresh
 *    builder container, in list order. Failures are recorded; under the
 *    `continue` policy the remaining libraries still run, under
 *    `fail-fast` they are marked skipped
 * 6. **Teardown**: containers, volumes and the builder image are removed
 *    exactly once, whatever happened in steps 4 and 5
 * 7. **Artifacts**: package files are gathered from each library
 */
export class BuildOrchestrator {
  private readonly runtime: ContainerRuntime
  private readonly reporter: Reporter
  private readonly config: OrchestratorConfig
  private readonly root: string

  constructor(options: BuildOrchestratorOptions) {
    this.runtime = options.runtime
    this.reporter = options.reporter
    this.config = options.config
    this.root = options.root
  }

  async run(names: string[], options?: RunOptions): Promise<OrchestrationReport> {
    const startedAt = new Date()
    const image = imageRef(this.config)
    const libraries = resolveLibraries(names, this.root, this.config.builder.mountPrefix)

    this.reporter.emit({event: 'RUN_START', project: this.config.project, image, libraries: names})

    await this.runtime.check()

    const removedOutputs = await removeStaleOutputs(this.root, this.config.clean)
    this.reporter.emit({event: 'CLEAN_FINISHED', removed: removedOutputs})

    await this.buildImage(image)

    const project = await this.prepareProject(libraries)
    let results: LibraryResult[]
    try {
      results = await this.runLibraries(project, libraries)
    } catch (error) {
      await this.teardown(project, {raise: false})
      throw error
    }

    await this.teardown(project, {raise: true})

    const artifacts = options?.collectArtifacts === false
      ? []
      : await this.collect(libraries)

    const finishedAt = new Date()
    this.reporter.emit({event: 'RUN_FINISHED', results, durationMs: finishedAt.getTime() - startedAt.getTime()})

    return {image, libraries: results, artifacts, removedOutputs, startedAt, finishedAt}
  }

  /**
   * Tears down the compose project of the configured libraries without
   * running anything, e.g. after an interrupted run.
   */
  async teardownOnly(): Promise<void> {
    const libraries = resolveLibraries(this.config.libraries, this.root, this.config.builder.mountPrefix)
    const project = await this.prepareProject(libraries)
    await this.teardown(project, {raise: true})
  }

  private async buildImage(image: string): Promise<void> {
    const {context, dockerfile} = this.config.image
    this.reporter.emit({event: 'IMAGE_BUILD_STARTING', image})

    const result = await this.runtime.buildImage(
      {
        image,
        context: resolve(this.root, context),
        dockerfile: dockerfile ? resolve(this.root, dockerfile) : undefined
      },
      ({stream, line}) => {
        this.reporter.log({kind: 'image'}, stream, line)
      }
    )

    if (result.exitCode !== 0) {
      this.reporter.emit({event: 'IMAGE_BUILD_FAILED', image, exitCode: result.exitCode})
      throw new ImageBuildError(image, result.exitCode)
    }

    this.reporter.emit({
      event: 'IMAGE_BUILD_FINISHED',
      image,
      durationMs: result.finishedAt.getTime() - result.startedAt.getTime()
    })
  }

  private async prepareProject(libraries: LibraryEntry[]): Promise<ComposeProject> {
    const dir = await mkdtemp(join(tmpdir(), 'libpress-'))
    const file = await writeComposeFile(dir, buildComposeDefinition(this.config, libraries))
    return {name: this.config.project, file, directory: this.root}
  }

  private async waitForDatabase(project: ComposeProject): Promise<void> {
    const {service, readiness} = this.config.database

    this.reporter.emit({event: 'SERVICE_STARTING', service})
    await this.runtime.startService(project, service)

    const timeoutMs = readiness.timeoutSec * 1000
    const {ready, attempts, elapsedMs} = await waitUntilReady(
      async signal => this.runtime.probeService(project, service, readiness.command, signal),
      {timeoutMs, intervalMs: readiness.intervalMs}
    )

    if (!ready) {
      this.reporter.emit({event: 'SERVICE_NOT_READY', service, attempts, elapsedMs})
      throw new ServiceNotReadyError(service, timeoutMs)
    }

    this.reporter.emit({event: 'SERVICE_READY', service, attempts, elapsedMs})
  }

  private async runLibraries(project: ComposeProject, libraries: LibraryEntry[]): Promise<LibraryResult[]> {
    await this.waitForDatabase(project)

    const {builder, failurePolicy} = this.config
    const results: LibraryResult[] = []
    let failed = false

    for (const library of libraries) {
      if (failed && failurePolicy === 'fail-fast') {
        results.push({name: library.name, status: 'skipped', durationMs: 0})
        this.reporter.emit({event: 'LIBRARY_SKIPPED', library: library.name})
        continue
      }

      this.reporter.emit({event: 'LIBRARY_STARTING', library: library.name, mountPath: library.mountPath})

      const result = await this.runtime.runService(
        project,
        {service: builder.service, workdir: library.mountPath, command: builder.command, tty: builder.tty},
        ({stream, line}) => {
          this.reporter.log({kind: 'library', library: library.name}, stream, line)
        }
      )

      const durationMs = result.finishedAt.getTime() - result.startedAt.getTime()
      if (result.exitCode === 0) {
        results.push({name: library.name, status: 'success', exitCode: 0, durationMs})
        this.reporter.emit({event: 'LIBRARY_FINISHED', library: library.name, durationMs})
      } else {
        failed = true
        results.push({name: library.name, status: 'failure', exitCode: result.exitCode, durationMs, error: result.error})
        this.reporter.emit({event: 'LIBRARY_FAILED', library: library.name, exitCode: result.exitCode, durationMs, error: result.error})
      }
    }

    return results
  }

  /**
   * Removes everything the run created. With `raise: false` (an error is
   * already propagating) a teardown failure is reported but not thrown.
   */
  private async teardown(project: ComposeProject, {raise}: {raise: boolean}): Promise<void> {
    this.reporter.emit({event: 'TEARDOWN_STARTING', project: project.name})

    try {
      await this.runtime.down(project, {removeVolumes: true, removeLocalImages: true, removeOrphans: true})
      if (this.config.image.remove) {
        await this.runtime.removeImage(imageRef(this.config))
      }

      this.reporter.emit({event: 'TEARDOWN_FINISHED', project: project.name, imageRemoved: this.config.image.remove})
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      this.reporter.emit({event: 'TEARDOWN_FAILED', project: project.name, error: message})
      if (raise) {
        throw new TeardownError(`Teardown of project "${project.name}" failed: ${message}`, {cause: error})
      }
    } finally {
      await rm(dirname(project.file), {recursive: true, force: true})
    }
  }

  private async collect(libraries: LibraryEntry[]): Promise<CollectedArtifact[]> {
    const {directory, extensions, outputDir} = this.config.artifacts
    const artifacts = await collectArtifacts(uniqBy(libraries, library => library.name), {
      directory,
      extensions,
      outputDir: outputDir ? resolve(this.root, outputDir) : undefined
    })

    this.reporter.emit({event: 'ARTIFACTS_COLLECTED', artifacts})
    return artifacts
  }
}

/**
 * True when at least one library did not succeed.
 */
export function hasFailures(report: OrchestrationReport): boolean {
  return report.libraries.some(result => result.status !== 'success')
}
