import {readFile} from 'node:fs/promises'
import {join} from 'node:path'
import {mergeWith} from 'lodash-es'
import {parse as parseYaml} from 'yaml'
import {ConfigError} from '../errors.js'
import type {FailurePolicy} from '../types.js'

export const configFileName = '.libpress.yml'

export type ImageConfig = {
  /** Repository name of the builder image. */
  name: string;
  tag: string;
  /** Build context, relative to the project root. */
  context: string;
  /** Dockerfile path, relative to the project root (Docker default when absent). */
  dockerfile?: string;
  /** Remove the builder image during teardown. */
  remove: boolean;
}

export type BuilderConfig = {
  /** Compose service name of the builder container. */
  service: string;
  /** Container directory under which each library is mounted. */
  mountPrefix: string;
  /** Packaging command run in each library's mount path. */
  command: string[];
  /** Allocate an interactive TTY for the packaging command. */
  tty: boolean;
}

export type ReadinessConfig = {
  /** Command run inside the database container; exit code 0 means ready. */
  command: string[];
  timeoutSec: number;
  intervalMs: number;
}

export type DatabaseConfig = {
  service: string;
  image: string;
  /** Hostname under which builder containers reach the database. */
  alias: string;
  port: number;
  rootPassword: string;
  user: string;
  password: string;
  name: string;
  readiness: ReadinessConfig;
}

export type CleanConfig = {
  /** Name of the build output directories removed before each run. */
  directoryName: string;
  /** Paths containing one of these segments are never removed. */
  skipSegments: string[];
}

export type ArtifactsConfig = {
  /** Build output directory searched in each library. */
  directory: string;
  extensions: string[];
  /** Directory (relative to the project root) receiving copies; no copy when absent. */
  outputDir?: string;
}

export type OrchestratorConfig = {
  /** Compose project name. */
  project: string;
  /** Libraries built when no list is given. */
  libraries: string[];
  failurePolicy: FailurePolicy;
  image: ImageConfig;
  builder: BuilderConfig;
  database: DatabaseConfig;
  clean: CleanConfig;
  artifacts: ArtifactsConfig;
}

export type PartialConfig = {
  project?: string;
  libraries?: string[];
  failurePolicy?: FailurePolicy;
  image?: Partial<ImageConfig>;
  builder?: Partial<BuilderConfig>;
  database?: Partial<Omit<DatabaseConfig, 'readiness'>> & {readiness?: Partial<ReadinessConfig>};
  clean?: Partial<CleanConfig>;
  artifacts?: Partial<ArtifactsConfig>;
}

export function defaultConfig(): OrchestratorConfig {
  return {
    project: 'libpress',
    libraries: ['api-framework', 'sqllib', 'cachelib', 'configlib'],
    failurePolicy: 'continue',
    image: {
      name: 'pylibs-builder',
      tag: 'latest',
      context: '.',
      remove: true
    },
    builder: {
      service: 'builder',
      mountPrefix: '/pylibs',
      command: ['pyb', 'install_dependencies', 'publish', '-v'],
      tty: true
    },
    database: {
      service: 'mysql-server',
      image: 'mysql:5.7',
      alias: 'unit_test-mysql',
      port: 3306,
      rootPassword: 'admin',
      user: 'wombat',
      password: '1wombat2',
      name: 'test',
      readiness: {
        command: ['mysqladmin', 'ping', '-h', '127.0.0.1', '--silent'],
        timeoutSec: 60,
        intervalMs: 1000
      }
    },
    clean: {
      directoryName: 'target',
      skipSegments: ['artifacts', '.git', 'node_modules']
    },
    artifacts: {
      directory: 'target/dist',
      extensions: ['.tar.gz', '.whl', '.egg'],
      outputDir: 'artifacts'
    }
  }
}

export function imageRef(config: OrchestratorConfig): string {
  return `${config.image.name}:${config.image.tag}`
}

/**
 * Merges partial configurations over the defaults. Later partials win;
 * arrays replace instead of concatenating, undefined fields are ignored.
 * @throws ConfigError when the builder and database share a service name
 */
export function resolveConfig(...partials: PartialConfig[]): OrchestratorConfig {
  let config = defaultConfig()
  for (const partial of partials) {
    config = mergeWith(config, partial, (_value: unknown, source: unknown) => Array.isArray(source) ? [...source] : undefined)
  }

  if (config.builder.service === config.database.service) {
    throw new ConfigError(`builder.service and database.service must differ, both are "${config.builder.service}"`)
  }

  return config
}

/**
 * Loads the project-level `.libpress.yml` configuration from a directory.
 * Returns an empty config when the file does not exist.
 */
export async function loadConfigFile(dir: string): Promise<PartialConfig> {
  let content: string
  try {
    content = await readFile(join(dir, configFileName), 'utf8')
  } catch (error: unknown) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return {}
    }

    throw error
  }

  let parsed: unknown
  try {
    parsed = parseYaml(content)
  } catch (error: unknown) {
    throw new ConfigError(`Invalid ${configFileName}: ${error instanceof Error ? error.message : String(error)}`, {cause: error})
  }

  if (parsed === null || parsed === undefined) {
    return {}
  }

  return parsePartialConfig(parsed)
}

/**
 * Reads configuration overrides from environment variables.
 */
export function configFromEnv(env: NodeJS.ProcessEnv): PartialConfig {
  const readinessTimeout = env.LIBPRESS_READY_TIMEOUT
  const port = env.LIBPRESS_DB_PORT

  return {
    image: {tag: env.LIBPRESS_IMAGE_TAG},
    database: {
      rootPassword: env.LIBPRESS_DB_ROOT_PASSWORD,
      user: env.LIBPRESS_DB_USER,
      password: env.LIBPRESS_DB_PASSWORD,
      name: env.LIBPRESS_DB_NAME,
      port: port === undefined ? undefined : parseNumber(port, 'LIBPRESS_DB_PORT'),
      readiness: {
        timeoutSec: readinessTimeout === undefined ? undefined : parseNumber(readinessTimeout, 'LIBPRESS_READY_TIMEOUT')
      }
    }
  }
}

/**
 * Resolves the effective configuration: CLI overrides, then environment,
 * then `.libpress.yml`, then defaults.
 */
export async function loadConfig(dir: string, env: NodeJS.ProcessEnv, overrides: PartialConfig = {}): Promise<OrchestratorConfig> {
  const fromFile = await loadConfigFile(dir)
  return resolveConfig(fromFile, configFromEnv(env), overrides)
}

export function parseNumber(value: string, label: string): number {
  const parsed = Number(value)
  if (value.trim() === '' || !Number.isFinite(parsed) || parsed < 0) {
    throw new ConfigError(`${label} must be a non-negative number, got "${value}"`)
  }

  return parsed
}

// -- File validation ---------------------------------------------------------

type Fields = Record<string, unknown>

function isRecord(value: unknown): value is Fields {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function section(fields: Fields, key: string, path: string): Fields | undefined {
  const value = fields[key]
  if (value === undefined) {
    return undefined
  }

  if (!isRecord(value)) {
    throw new ConfigError(`${path}${key} must be a mapping`)
  }

  return value
}

function optionalString(fields: Fields, key: string, path: string): string | undefined {
  const value = fields[key]
  if (value === undefined) {
    return undefined
  }

  if (typeof value !== 'string' || value.length === 0) {
    throw new ConfigError(`${path}${key} must be a non-empty string`)
  }

  return value
}

function optionalNumber(fields: Fields, key: string, path: string): number | undefined {
  const value = fields[key]
  if (value === undefined) {
    return undefined
  }

  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
    throw new ConfigError(`${path}${key} must be a non-negative number`)
  }

  return value
}

function optionalBoolean(fields: Fields, key: string, path: string): boolean | undefined {
  const value = fields[key]
  if (value === undefined) {
    return undefined
  }

  if (typeof value !== 'boolean') {
    throw new ConfigError(`${path}${key} must be a boolean`)
  }

  return value
}

function optionalStringList(fields: Fields, key: string, path: string): string[] | undefined {
  const value = fields[key]
  if (value === undefined) {
    return undefined
  }

  if (!Array.isArray(value)) {
    throw new ConfigError(`${path}${key} must be a list of strings`)
  }

  const items: string[] = []
  for (const item of value) {
    // YAML reads bare numbers such as `3306` as numbers
    if (typeof item === 'number') {
      items.push(String(item))
    } else if (typeof item === 'string') {
      items.push(item)
    } else {
      throw new ConfigError(`${path}${key} must be a list of strings`)
    }
  }

  return items
}

function optionalFailurePolicy(fields: Fields): FailurePolicy | undefined {
  const value = fields.failurePolicy
  if (value === undefined) {
    return undefined
  }

  if (value !== 'continue' && value !== 'fail-fast') {
    throw new ConfigError('failurePolicy must be "continue" or "fail-fast"')
  }

  return value
}

export function parsePartialConfig(input: unknown): PartialConfig {
  if (!isRecord(input)) {
    throw new ConfigError(`${configFileName} must contain a mapping`)
  }

  const config: PartialConfig = {
    project: optionalString(input, 'project', ''),
    libraries: optionalStringList(input, 'libraries', ''),
    failurePolicy: optionalFailurePolicy(input)
  }

  const image = section(input, 'image', '')
  if (image) {
    config.image = {
      name: optionalString(image, 'name', 'image.'),
      tag: optionalString(image, 'tag', 'image.'),
      context: optionalString(image, 'context', 'image.'),
      dockerfile: optionalString(image, 'dockerfile', 'image.'),
      remove: optionalBoolean(image, 'remove', 'image.')
    }
  }

  const builder = section(input, 'builder', '')
  if (builder) {
    config.builder = {
      service: optionalString(builder, 'service', 'builder.'),
      mountPrefix: optionalString(builder, 'mountPrefix', 'builder.'),
      command: optionalStringList(builder, 'command', 'builder.'),
      tty: optionalBoolean(builder, 'tty', 'builder.')
    }
  }

  const database = section(input, 'database', '')
  if (database) {
    const readiness = section(database, 'readiness', 'database.')
    config.database = {
      service: optionalString(database, 'service', 'database.'),
      image: optionalString(database, 'image', 'database.'),
      alias: optionalString(database, 'alias', 'database.'),
      port: optionalNumber(database, 'port', 'database.'),
      rootPassword: optionalScalar(database, 'rootPassword', 'database.'),
      user: optionalScalar(database, 'user', 'database.'),
      password: optionalScalar(database, 'password', 'database.'),
      name: optionalScalar(database, 'name', 'database.'),
      readiness: readiness && {
        command: optionalStringList(readiness, 'command', 'database.readiness.'),
        timeoutSec: optionalNumber(readiness, 'timeoutSec', 'database.readiness.'),
        intervalMs: optionalNumber(readiness, 'intervalMs', 'database.readiness.')
      }
    }
  }

  const clean = section(input, 'clean', '')
  if (clean) {
    config.clean = {
      directoryName: optionalString(clean, 'directoryName', 'clean.'),
      skipSegments: optionalStringList(clean, 'skipSegments', 'clean.')
    }
  }

  const artifacts = section(input, 'artifacts', '')
  if (artifacts) {
    config.artifacts = {
      directory: optionalString(artifacts, 'directory', 'artifacts.'),
      extensions: optionalStringList(artifacts, 'extensions', 'artifacts.'),
      outputDir: optionalString(artifacts, 'outputDir', 'artifacts.')
    }
  }

  return config
}

/** Credentials may be written as bare YAML numbers; they are passed on as text. */
function optionalScalar(fields: Fields, key: string, path: string): string | undefined {
  const value = fields[key]
  if (typeof value === 'number') {
    return String(value)
  }

  return optionalString(fields, key, path)
}
