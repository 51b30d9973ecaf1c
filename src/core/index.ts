export {BuildOrchestrator, hasFailures, type BuildOrchestratorOptions, type RunOptions} from './orchestrator.js'
export {ConsoleReporter, type Reporter, type LogScope, type OrchestrationEvent} from './reporter.js'
export {collectArtifacts, type CollectOptions} from './artifacts.js'
export {findStaleOutputs, removeStaleOutputs, type StaleOutputOptions} from './stale-outputs.js'
export {waitUntilReady, type ReadinessProbe, type ReadinessResult, type WaitOptions} from './readiness.js'
export {parseLibraryList, resolveLibraries, validateLibraryName} from './library-list.js'
export {
  defaultConfig,
  resolveConfig,
  loadConfig,
  loadConfigFile,
  configFromEnv,
  parsePartialConfig,
  imageRef,
  type OrchestratorConfig,
  type PartialConfig
} from './config.js'
export {formatDuration, formatResultTable} from './utils.js'
