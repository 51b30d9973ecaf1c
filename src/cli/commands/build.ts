import process from 'node:process'
import {writeFile} from 'node:fs/promises'
import {resolve} from 'node:path'
import type {Command} from 'commander'
import {parseNumber, type PartialConfig} from '../../core/config.js'
import {parseLibraryList} from '../../core/library-list.js'
import {BuildOrchestrator, hasFailures} from '../../core/orchestrator.js'
import {DockerComposeRuntime} from '../../engine/docker-compose-runtime.js'
import {createReporter, getGlobalOptions, resolveProject} from '../utils.js'

type BuildOptions = {
  tag?: string;
  failFast?: boolean;
  keepImage?: boolean;
  readyTimeout?: string;
  collect: boolean;
  report?: string;
  verbose?: boolean;
}

export function registerBuildCommand(program: Command): void {
  program
    .command('build', {isDefault: true})
    .description('Build the builder image and publish each library inside it')
    .argument('[libraries]', 'Space-separated library names (default: configured list)')
    .option('-t, --tag <tag>', 'Builder image tag')
    .option('--fail-fast', 'Skip the remaining libraries after the first failure')
    .option('--keep-image', 'Keep the builder image after teardown')
    .option('--ready-timeout <seconds>', 'Maximum wait for the database to become ready')
    .option('--no-collect', 'Do not gather package files after the run')
    .option('--report <file>', 'Write the run report as JSON')
    .option('--verbose', 'Stream Docker output in real-time')
    .action(async (librariesArg: string | undefined, options: BuildOptions, cmd: Command) => {
      const overrides: PartialConfig = {
        failurePolicy: options.failFast ? 'fail-fast' : undefined,
        image: {
          tag: options.tag,
          remove: options.keepImage ? false : undefined
        },
        database: {
          readiness: {
            timeoutSec: options.readyTimeout === undefined ? undefined : parseNumber(options.readyTimeout, '--ready-timeout')
          }
        }
      }

      const {root, config} = await resolveProject(cmd, overrides)
      const libraries = parseLibraryList(librariesArg, config.libraries)
      const reporter = createReporter(cmd, {verbose: options.verbose})
      const orchestrator = new BuildOrchestrator({runtime: new DockerComposeRuntime(), reporter, config, root})

      const report = await orchestrator.run(libraries, {collectArtifacts: options.collect})

      if (options.report) {
        await writeFile(resolve(options.report), JSON.stringify(report, null, 2), 'utf8')
      }

      if (hasFailures(report)) {
        process.exitCode = 1
      }

      if (getGlobalOptions(cmd).json) {
        console.log(JSON.stringify(report.libraries))
      }
    })
}
