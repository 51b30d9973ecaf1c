import {writeFile} from 'node:fs/promises'
import {join} from 'node:path'
import {uniq} from 'lodash-es'
import {stringify as yamlStringify} from 'yaml'
import type {OrchestratorConfig} from '../core/config.js'
import {imageRef} from '../core/config.js'
import type {LibraryEntry} from '../types.js'

export type BuilderService = {
  image: string;
  links: string[];
  tty: boolean;
  stdin_open: boolean;
  depends_on: string[];
  volumes: string[];
}

export type DatabaseService = {
  image: string;
  environment: Record<string, string>;
  ports: string[];
}

export type ComposeDefinition = {
  services: Record<string, BuilderService | DatabaseService>;
}

/**
 * Builds the compose definition of a run: one builder service mounting
 * every library, and the database it depends on.
 */
export function buildComposeDefinition(config: OrchestratorConfig, libraries: LibraryEntry[]): ComposeDefinition {
  const {builder, database} = config

  const builderService: BuilderService = {
    image: imageRef(config),
    links: [`${database.service}:${database.alias}`],
    tty: builder.tty,
    stdin_open: builder.tty,
    depends_on: [database.service],
    // a repeated library is mounted once; Docker rejects duplicate mount points
    volumes: uniq(libraries.map(library => `${library.hostPath}:${library.mountPath}`))
  }

  const databaseService: DatabaseService = {
    image: database.image,
    environment: {
      MYSQL_ROOT_PASSWORD: database.rootPassword,
      MYSQL_USER: database.user,
      MYSQL_PASSWORD: database.password,
      MYSQL_DATABASE: database.name
    },
    ports: [`${database.port}:${database.port}`]
  }

  return {
    services: {
      [builder.service]: builderService,
      [database.service]: databaseService
    }
  }
}

export function renderComposeFile(definition: ComposeDefinition): string {
  return yamlStringify(definition)
}

/**
 * Writes the definition as `compose.yml` in `dir` and returns its path.
 */
export async function writeComposeFile(dir: string, definition: ComposeDefinition): Promise<string> {
  const file = join(dir, 'compose.yml')
  await writeFile(file, renderComposeFile(definition), 'utf8')
  return file
}
