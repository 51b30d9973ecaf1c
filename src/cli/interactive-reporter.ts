import chalk from 'chalk'
import ora, {type Ora} from 'ora'
import type {LogScope, OrchestrationEvent, Reporter, RunFinishedEvent} from '../core/reporter.js'
import {formatDuration, formatResultTable} from '../core/utils.js'

/**
 * Reporter with interactive terminal UI using spinners and colors.
 * Suitable for local development and manual execution.
 */
export class InteractiveReporter implements Reporter {
  private static get maxStderrLines() {
    return 20
  }

  private readonly verbose: boolean
  private spinner?: Ora
  private readonly stderrBuffers = new Map<string, string[]>()

  constructor(options?: {verbose?: boolean}) {
    this.verbose = options?.verbose ?? false
  }

  emit(event: OrchestrationEvent): void {
    switch (event.event) {
      case 'RUN_START': {
        console.log(chalk.bold(`\n▶ Building ${chalk.cyan(event.libraries.join(', '))} with ${chalk.cyan(event.image)}\n`))
        break
      }

      case 'CLEAN_FINISHED': {
        if (event.removed.length > 0) {
          console.log(`  ${chalk.gray('⊙')} ${chalk.gray(`Removed ${event.removed.length} stale output director${event.removed.length > 1 ? 'ies' : 'y'}`)}`)
        }

        break
      }

      case 'IMAGE_BUILD_STARTING': {
        this.start(`Building image ${event.image}`)
        break
      }

      case 'IMAGE_BUILD_FINISHED': {
        this.succeed(`Image ${event.image} (${formatDuration(event.durationMs)})`)
        break
      }

      case 'IMAGE_BUILD_FAILED': {
        this.fail(`Image ${event.image} (exit ${event.exitCode})`)
        this.flushStderr('image')
        break
      }

      case 'SERVICE_STARTING': {
        this.start(`Starting ${event.service}`)
        break
      }

      case 'SERVICE_READY': {
        this.succeed(`${event.service} ready (${formatDuration(event.elapsedMs)})`)
        break
      }

      case 'SERVICE_NOT_READY': {
        this.fail(`${event.service} not ready after ${event.attempts} attempt${event.attempts > 1 ? 's' : ''}`)
        break
      }

      case 'LIBRARY_STARTING': {
        this.start(event.library)
        break
      }

      case 'LIBRARY_FINISHED': {
        this.succeed(`${event.library} (${formatDuration(event.durationMs)})`)
        this.stderrBuffers.delete(event.library)
        break
      }

      case 'LIBRARY_FAILED': {
        this.fail(`${event.library} (exit ${event.exitCode})`)
        this.flushStderr(event.library)
        break
      }

      case 'LIBRARY_SKIPPED': {
        console.log(`  ${chalk.gray('⊙')} ${chalk.gray(`${event.library} (skipped)`)}`)
        break
      }

      case 'TEARDOWN_STARTING': {
        this.start('Tearing down')
        break
      }

      case 'TEARDOWN_FINISHED': {
        this.succeed(event.imageRemoved ? 'Torn down (image removed)' : 'Torn down')
        break
      }

      case 'TEARDOWN_FAILED': {
        this.fail(`Teardown failed: ${event.error}`)
        break
      }

      case 'ARTIFACTS_COLLECTED': {
        for (const artifact of event.artifacts) {
          console.log(`  ${chalk.blue('▪')} ${artifact.library}: ${artifact.destination ?? artifact.source}`)
        }

        break
      }

      case 'RUN_FINISHED': {
        this.handleRunFinished(event)
        break
      }
    }
  }

  log(scope: LogScope, stream: 'stdout' | 'stderr', line: string): void {
    const key = scope.kind === 'image' ? 'image' : scope.library

    if (this.verbose) {
      const prefix = chalk.gray(`  [${key}]`)
      if (this.spinner) {
        this.spinner.clear()
        console.log(`${prefix} ${line}`)
        this.spinner.render()
      } else {
        console.log(`${prefix} ${line}`)
      }
    }

    if (stream === 'stderr') {
      let buffer = this.stderrBuffers.get(key)
      if (!buffer) {
        buffer = []
        this.stderrBuffers.set(key, buffer)
      }

      buffer.push(line)
      if (buffer.length > InteractiveReporter.maxStderrLines) {
        buffer.shift()
      }
    }
  }

  private start(text: string): void {
    this.spinner = ora({text, prefixText: ' '}).start()
  }

  private succeed(text: string): void {
    this.persist(chalk.green('✓'), chalk.green(text))
  }

  private fail(text: string): void {
    this.persist(chalk.red('✗'), chalk.red(text))
  }

  private persist(symbol: string, text: string): void {
    if (this.spinner) {
      this.spinner.stopAndPersist({symbol, text})
      this.spinner = undefined
    } else {
      console.log(`  ${symbol} ${text}`)
    }
  }

  private flushStderr(key: string): void {
    const stderr = this.stderrBuffers.get(key)
    if (stderr && stderr.length > 0) {
      console.log(chalk.red('  ── stderr ──'))
      for (const line of stderr) {
        console.log(chalk.red(`  ${line}`))
      }
    }

    this.stderrBuffers.delete(key)
  }

  private handleRunFinished(event: RunFinishedEvent): void {
    console.log()
    const [header, ...rows] = formatResultTable(event.results)
    console.log(chalk.bold(`  ${header}`))
    for (const [index, row] of rows.entries()) {
      const {status} = event.results[index]
      const color = status === 'success' ? chalk.green : (status === 'failure' ? chalk.red : chalk.gray)
      console.log(`  ${color(row)}`)
    }

    const failed = event.results.filter(r => r.status !== 'success').length
    if (failed === 0) {
      console.log(chalk.bold.green(`\n✓ All libraries published (${formatDuration(event.durationMs)})\n`))
    } else {
      console.log(chalk.bold.red(`\n✗ ${failed} of ${event.results.length} libraries not published\n`))
    }
  }
}
