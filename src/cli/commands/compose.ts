import process from 'node:process'
import type {Command} from 'commander'
import {parseLibraryList, resolveLibraries} from '../../core/library-list.js'
import {buildComposeDefinition, renderComposeFile} from '../../engine/compose-file.js'
import {resolveProject} from '../utils.js'

export function registerComposeCommand(program: Command): void {
  program
    .command('compose')
    .description('Print the compose definition used for a build')
    .argument('[libraries]', 'Space-separated library names (default: configured list)')
    .action(async (librariesArg: string | undefined, _options: Record<string, unknown>, cmd: Command) => {
      const {root, config} = await resolveProject(cmd)
      const names = parseLibraryList(librariesArg, config.libraries)
      const libraries = resolveLibraries(names, root, config.builder.mountPrefix)

      process.stdout.write(renderComposeFile(buildComposeDefinition(config, libraries)))
    })
}
