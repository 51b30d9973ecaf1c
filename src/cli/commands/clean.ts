import chalk from 'chalk'
import type {Command} from 'commander'
import {removeStaleOutputs} from '../../core/stale-outputs.js'
import {getGlobalOptions, resolveProject} from '../utils.js'

export function registerCleanCommand(program: Command): void {
  program
    .command('clean')
    .description('Remove stale build output directories')
    .action(async (_options: Record<string, unknown>, cmd: Command) => {
      const {json} = getGlobalOptions(cmd)
      const {root, config} = await resolveProject(cmd)

      const removed = await removeStaleOutputs(root, config.clean)

      if (json) {
        console.log(JSON.stringify(removed))
        return
      }

      if (removed.length === 0) {
        console.log(chalk.gray('No stale build outputs.'))
        return
      }

      for (const path of removed) {
        console.log(chalk.green(`Removed ${path}`))
      }
    })
}
