// Follows `#include` directives from an entry file through the file system.
// Every file is analyzed once; summaries come out in post-order, so a header
// is listed before the file that includes it.

import fs from 'fs/promises'
import path from 'path'
import { analyzeFile } from './analyze-files'
import type { AnalyzeOptions } from '../analyzer'
import { IoError } from '../errors'
import { logDebug } from '../logger'
import type { FileAnalysis, Include } from '../ast/nodes'

export interface IncludeOptions extends AnalyzeOptions {
  /** Searched in order after the including file's own directory. */
  includeDirs?: readonly string[]
  /** Also follow `<...>` includes (searched in `includeDirs` only). */
  followSystemIncludes?: boolean
  signal?: AbortSignal
}

export interface UnresolvedInclude {
  from: string
  include: Include
}

export interface IncludeAnalysis {
  /** Post-order: included files first, the entry file last. */
  analyses: FileAnalysis[]
  /** Each analyzed file to the files its includes resolved to, in directive order. */
  graph: Map<string, string[]>
  unresolved: UnresolvedInclude[]
  /** Included files that resolved but could not be read. */
  errors: IoError[]
}

async function isFile(candidate: string): Promise<boolean> {
  try {
    return (await fs.stat(candidate)).isFile()
  } catch {
    return false
  }
}

/**
 * Find the file an include names. Quoted includes look next to the including
 * file first; both forms then try each include directory in order.
 */
export async function resolveInclude(
  from: string,
  include: Include,
  includeDirs: readonly string[],
): Promise<string | null> {
  const bases = include.isSystem ? [...includeDirs] : [path.dirname(from), ...includeDirs]
  for (const base of bases) {
    const candidate = path.join(base, include.path)
    if (await isFile(candidate)) return candidate
  }
  return null
}

export async function analyzeWithIncludes(
  entry: string,
  options?: IncludeOptions,
): Promise<IncludeAnalysis> {
  const includeDirs = options?.includeDirs ?? []
  const followSystem = options?.followSystemIncludes ?? false
  const signal = options?.signal

  const result: IncludeAnalysis = { analyses: [], graph: new Map(), unresolved: [], errors: [] }
  const visited = new Set<string>()

  const visit = async (file: string, analysis: FileAnalysis): Promise<void> => {
    const edges: string[] = []
    result.graph.set(file, edges)

    for (const include of analysis.includes) {
      if (include.isSystem && !followSystem) continue
      const resolved = await resolveInclude(file, include, includeDirs)
      if (resolved === null) {
        logDebug(`${file}:${include.line}: cannot resolve include '${include.path}'`)
        result.unresolved.push({ from: file, include })
        continue
      }
      edges.push(resolved)

      const key = path.resolve(resolved)
      if (visited.has(key) || signal?.aborted) continue
      visited.add(key)

      let child: FileAnalysis
      try {
        child = await analyzeFile(resolved, options)
      } catch (error) {
        if (!(error instanceof IoError)) throw error
        result.errors.push(error)
        continue
      }
      await visit(resolved, child)
    }

    result.analyses.push(analysis)
  }

  // The entry file must be readable; its IoError propagates
  visited.add(path.resolve(entry))
  const root = await analyzeFile(entry, options)
  await visit(entry, root)
  return result
}
