import process from 'node:process'
import {resolve} from 'node:path'
import type {Command} from 'commander'
import {loadConfig, type OrchestratorConfig, type PartialConfig} from '../core/config.js'
import {ConsoleReporter, type Reporter} from '../core/reporter.js'
import {ImageBuildError} from '../errors.js'
import {InteractiveReporter} from './interactive-reporter.js'

export type GlobalOptions = {
  dir: string;
  json?: boolean;
}

export function getGlobalOptions(cmd: Command): GlobalOptions {
  return cmd.optsWithGlobals<GlobalOptions>()
}

/**
 * Resolves the project root and the effective configuration for a command.
 */
export async function resolveProject(cmd: Command, overrides: PartialConfig = {}): Promise<{root: string; config: OrchestratorConfig}> {
  const {dir} = getGlobalOptions(cmd)
  const root = resolve(dir)
  const config = await loadConfig(root, process.env, overrides)
  return {root, config}
}

export function createReporter(cmd: Command, options?: {verbose?: boolean}): Reporter {
  const {json} = getGlobalOptions(cmd)
  return json
    ? new ConsoleReporter({level: options?.verbose ? 'debug' : 'info'})
    : new InteractiveReporter({verbose: options?.verbose})
}

/**
 * Process exit code for an error ending the CLI. A failed image build
 * passes on the build's own exit code.
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof ImageBuildError && error.exitCode !== 0) {
    return error.exitCode
  }

  return 1
}
