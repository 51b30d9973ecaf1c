import {copyFile, mkdir, readdir} from 'node:fs/promises'
import {basename, join} from 'node:path'
import type {CollectedArtifact, LibraryEntry} from '../types.js'

export type CollectOptions = {
  /** Build output directory, relative to each library directory. */
  directory: string;
  /** File name suffixes of package files (e.g. `.whl`). */
  extensions: string[];
  /** Absolute directory receiving a copy per library; no copy when absent. */
  outputDir?: string;
}

async function listPackageFiles(dir: string, extensions: string[]): Promise<string[]> {
  let entries
  try {
    entries = await readdir(dir, {withFileTypes: true})
  } catch (error: unknown) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return []
    }

    throw error
  }

  const files: string[] = []
  for (const entry of entries) {
    const fullPath = join(dir, entry.name)
    if (entry.isDirectory()) {
      files.push(...await listPackageFiles(fullPath, extensions))
    } else if (entry.isFile() && extensions.some(ext => entry.name.endsWith(ext))) {
      files.push(fullPath)
    }
  }

  return files.sort((a, b) => a.localeCompare(b))
}

/**
 * Gathers the package files produced by each library, in library order.
 * Libraries without build output contribute nothing.
 */
export async function collectArtifacts(libraries: LibraryEntry[], options: CollectOptions): Promise<CollectedArtifact[]> {
  const artifacts: CollectedArtifact[] = []

  for (const library of libraries) {
    const files = await listPackageFiles(join(library.hostPath, options.directory), options.extensions)
    if (files.length === 0) {
      continue
    }

    let targetDir: string | undefined
    if (options.outputDir) {
      targetDir = join(options.outputDir, library.name)
      await mkdir(targetDir, {recursive: true})
    }

    for (const source of files) {
      if (targetDir) {
        const destination = join(targetDir, basename(source))
        await copyFile(source, destination)
        artifacts.push({library: library.name, source, destination})
      } else {
        artifacts.push({library: library.name, source})
      }
    }
  }

  return artifacts
}
