#!/usr/bin/env node
import 'dotenv/config'
import process from 'node:process'
import {Command} from 'commander'
import {registerBuildCommand} from './commands/build.js'
import {registerCleanCommand} from './commands/clean.js'
import {registerComposeCommand} from './commands/compose.js'
import {registerTeardownCommand} from './commands/teardown.js'
import {exitCodeFor} from './utils.js'

async function main() {
  const program = new Command()

  program
    .name('libpress')
    .description('Build and publish libraries inside a shared builder image')
    .version('0.1.0')
    .option('-C, --dir <path>', 'Project root holding the libraries and the build context', process.env.LIBPRESS_DIR ?? '.')
    .option('--json', 'Output structured JSON logs')

  registerBuildCommand(program)
  registerCleanCommand(program)
  registerComposeCommand(program)
  registerTeardownCommand(program)

  await program.parseAsync()
}

try {
  await main()
} catch (error: unknown) {
  console.error('Fatal error:', error instanceof Error ? error.message : error)
  process.exitCode = exitCodeFor(error)
}
