export {ContainerRuntime, type LogLine, type OnLogLine} from './runtime.js'
export {DockerComposeRuntime} from './docker-compose-runtime.js'
export {buildComposeDefinition, renderComposeFile, writeComposeFile, type ComposeDefinition} from './compose-file.js'
export type {ComposeProject, CommandResult, DownOptions, ImageBuildRequest, ServiceRunRequest} from './types.js'
