import {posix, resolve} from 'node:path'
import {ValidationError} from '../errors.js'
import type {LibraryEntry} from '../types.js'

/**
 * Parses a whitespace-separated list of library names.
 * A missing or blank argument selects the default list.
 */
export function parseLibraryList(argument: string | undefined, defaults: string[]): string[] {
  const names = argument === undefined ? [] : argument.split(/\s+/).filter(Boolean)
  const selected = names.length > 0 ? names : [...defaults]

  for (const name of selected) {
    validateLibraryName(name)
  }

  return selected
}

/**
 * A library name is a single directory under the project root.
 */
export function validateLibraryName(name: string): void {
  if (name.length === 0) {
    throw new ValidationError('Library name must not be empty')
  }

  if (name.includes('/') || name.includes('\\')) {
    throw new ValidationError(`Library name '${name}' must not contain path separators`)
  }

  // `:` separates host and container paths in a volume
  if (name.includes(':')) {
    throw new ValidationError(`Library name '${name}' must not contain ':'`)
  }

  if (name === '.' || name === '..') {
    throw new ValidationError(`Library name '${name}' is not a directory name`)
  }
}

export function resolveLibraries(names: string[], root: string, mountPrefix: string): LibraryEntry[] {
  return names.map(name => ({
    name,
    hostPath: resolve(root, name),
    mountPath: posix.join(mountPrefix, name)
  }))
}
