import type {Command} from 'commander'
import {BuildOrchestrator} from '../../core/orchestrator.js'
import {DockerComposeRuntime} from '../../engine/docker-compose-runtime.js'
import {createReporter, resolveProject} from '../utils.js'

export function registerTeardownCommand(program: Command): void {
  program
    .command('teardown')
    .description('Remove containers, volumes and the builder image left by an interrupted run')
    .option('--keep-image', 'Keep the builder image')
    .action(async (options: {keepImage?: boolean}, cmd: Command) => {
      const {root, config} = await resolveProject(cmd, {image: {remove: options.keepImage ? false : undefined}})
      const runtime = new DockerComposeRuntime()
      await runtime.check()

      const orchestrator = new BuildOrchestrator({runtime, reporter: createReporter(cmd), config, root})
      await orchestrator.teardownOnly()
    })
}
