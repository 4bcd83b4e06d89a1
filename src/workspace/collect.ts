import fs from 'fs/promises'
import type { Stats } from 'fs'
import path from 'path'
import { glob } from 'glob'
import { IoError, getErrorMessage } from '../errors'

export const SOURCE_PATTERN = '**/*.{c,h}'

/**
 * Resolve a CLI target to the C files it names. A file is taken as is, whatever
 * its extension; a directory is searched recursively for `.c` and `.h` files.
 * Results are sorted and keep the target's own prefix, so a relative target
 * gives relative paths.
 */
export async function collectSources(target: string): Promise<string[]> {
  let stats: Stats
  try {
    stats = await fs.stat(target)
  } catch (error) {
    throw new IoError(`cannot access '${target}': ${getErrorMessage(error)}`, target)
  }

  if (stats.isFile()) {
    return [target]
  }
  if (!stats.isDirectory()) {
    throw new IoError(`'${target}' is not a file or directory`, target)
  }

  const files = await glob(SOURCE_PATTERN, {
    cwd: target,
    nodir: true,
    posix: true,
  })
  return files.sort().map((file) => path.join(target, file))
}
