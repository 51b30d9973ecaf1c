import {readdir, rm} from 'node:fs/promises'
import {join, relative, sep} from 'node:path'

export type StaleOutputOptions = {
  /** Name of the build output directories to remove (e.g. `target`). */
  directoryName: string;
  /** Relative paths containing one of these segments are left alone. */
  skipSegments: string[];
}

/**
 * Finds build output directories below `root`, returned as sorted paths
 * relative to `root`. Matched directories are not descended into and
 * symbolic links are never followed.
 */
export async function findStaleOutputs(root: string, options: StaleOutputOptions): Promise<string[]> {
  const found: string[] = []
  const skip = new Set(options.skipSegments)

  const walk = async (dir: string): Promise<void> => {
    const entries = await readdir(dir, {withFileTypes: true})
    for (const entry of entries) {
      if (!entry.isDirectory() || skip.has(entry.name)) {
        continue
      }

      const fullPath = join(dir, entry.name)
      if (entry.name === options.directoryName) {
        found.push(relative(root, fullPath).split(sep).join('/'))
        continue
      }

      await walk(fullPath)
    }
  }

  await walk(root)
  return found.sort((a, b) => a.localeCompare(b))
}

/**
 * Removes every stale build output directory below `root` and returns
 * the removed relative paths.
 */
export async function removeStaleOutputs(root: string, options: StaleOutputOptions): Promise<string[]> {
  const stale = await findStaleOutputs(root, options)
  for (const path of stale) {
    await rm(join(root, path), {recursive: true, force: true})
  }

  return stale
}
