import {mkdtemp} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {join} from 'node:path'
import type {OrchestrationEvent, Reporter} from '../core/reporter.js'
import {ContainerRuntime, type OnLogLine} from '../engine/runtime.js'
import type {CommandResult, ComposeProject, DownOptions, ImageBuildRequest, ServiceRunRequest} from '../engine/types.js'

/**
 * Creates a temporary directory for test isolation.
 * Each test should use its own tmpdir to avoid interference.
 */
export async function createTmpDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'libpress-test-'))
}

/**
 * Silent reporter: all methods are no-ops.
 */
export const noopReporter: Reporter = {
  emit() {/* noop */},
  log() {/* noop */}
}

/**
 * Returns a reporter that records emit() calls for assertions.
 */
export function recordingReporter(): {reporter: Reporter; events: OrchestrationEvent[]; logs: string[]} {
  const events: OrchestrationEvent[] = []
  const logs: string[] = []
  const reporter: Reporter = {
    emit(event: OrchestrationEvent) {
      events.push(event)
    },
    log(scope, stream, line) {
      logs.push(`${scope.kind === 'image' ? 'image' : scope.library}:${stream}:${line}`)
    }
  }

  return {reporter, events, logs}
}

export type RuntimeCall =
  | {op: 'check'}
  | {op: 'buildImage'; request: ImageBuildRequest}
  | {op: 'startService'; service: string; project: ComposeProject}
  | {op: 'probeService'; service: string; command: string[]}
  | {op: 'runService'; request: ServiceRunRequest}
  | {op: 'down'; options: DownOptions}
  | {op: 'removeImage'; image: string}

export type FakeRuntimeOptions = {
  /** Exit code of the image build (default 0). */
  buildExitCode?: number;
  /** Exit code per library mount path (default 0). */
  exitCodes?: Record<string, number>;
  /** Probe calls answering "not ready" before the first "ready" (default 0; Infinity = never ready). */
  notReadyProbes?: number;
  /** Probe calls that never answer until their signal aborts. */
  hangingProbes?: number;
  /** Error thrown by down(). */
  downError?: Error;
  /** Called while the image is being built. */
  onBuild?: (request: ImageBuildRequest) => Promise<void>;
  /** Called while a packaging command runs. */
  onRun?: (request: ServiceRunRequest) => Promise<void>;
}

/**
 * In-process container runtime recording every call in order.
 */
export class FakeRuntime extends ContainerRuntime {
  readonly calls: RuntimeCall[] = []
  private probes = 0

  constructor(private readonly options: FakeRuntimeOptions = {}) {
    super()
  }

  async check(): Promise<void> {
    this.calls.push({op: 'check'})
  }

  async buildImage(request: ImageBuildRequest, onLogLine: OnLogLine): Promise<CommandResult> {
    this.calls.push({op: 'buildImage', request})
    await this.options.onBuild?.(request)
    onLogLine({stream: 'stdout', line: `built ${request.image}`})
    return this.result(this.options.buildExitCode ?? 0)
  }

  async startService(project: ComposeProject, service: string): Promise<void> {
    this.calls.push({op: 'startService', service, project})
  }

  async probeService(_project: ComposeProject, service: string, command: string[], signal?: AbortSignal): Promise<boolean> {
    this.calls.push({op: 'probeService', service, command})
    this.probes++
    if (this.options.hangingProbes !== undefined && this.probes <= this.options.hangingProbes) {
      return new Promise<boolean>(resolve => {
        signal?.addEventListener('abort', () => {
          resolve(false)
        })
      })
    }

    return this.probes > (this.options.notReadyProbes ?? 0)
  }

  async runService(_project: ComposeProject, request: ServiceRunRequest, onLogLine: OnLogLine): Promise<CommandResult> {
    this.calls.push({op: 'runService', request})
    await this.options.onRun?.(request)
    const exitCode = this.options.exitCodes?.[request.workdir] ?? 0
    if (exitCode !== 0) {
      onLogLine({stream: 'stderr', line: `failed in ${request.workdir}`})
    }

    return this.result(exitCode)
  }

  async down(_project: ComposeProject, options: DownOptions): Promise<void> {
    this.calls.push({op: 'down', options})
    if (this.options.downError) {
      throw this.options.downError
    }
  }

  async removeImage(image: string): Promise<void> {
    this.calls.push({op: 'removeImage', image})
  }

  /** Working directories of the packaging commands, in call order. */
  get ranWorkdirs(): string[] {
    return this.calls.flatMap(call => call.op === 'runService' ? [call.request.workdir] : [])
  }

  ops(): string[] {
    return this.calls.map(call => call.op)
  }

  private result(exitCode: number): CommandResult {
    const now = new Date()
    return {exitCode, startedAt: now, finishedAt: now}
  }
}
