import fs from 'fs/promises'
import pLimit from 'p-limit'
import { analyzeSource, AnalyzeOptions } from '../analyzer'
import { DEFAULT_CONCURRENCY } from '../config'
import { IoError, getErrorMessage } from '../errors'
import { logDebug, logWarn } from '../logger'
import type { FileAnalysis } from '../ast/nodes'

export interface AnalyzeFilesOptions extends AnalyzeOptions {
  /** Maximum number of files read at once (default: 8) */
  concurrency?: number
  /** Stops the batch between files; finished results are still returned. */
  signal?: AbortSignal
}

export type FileResult =
  | { path: string; analysis: FileAnalysis }
  | { path: string; error: IoError }

export async function readSource(filepath: string): Promise<string> {
  try {
    return await fs.readFile(filepath, 'utf-8')
  } catch (error) {
    throw new IoError(`cannot read '${filepath}': ${getErrorMessage(error)}`, filepath)
  }
}

/**
 * Read and analyze one file. Throws IoError when it cannot be read.
 */
export async function analyzeFile(filepath: string, options?: AnalyzeOptions): Promise<FileAnalysis> {
  const text = await readSource(filepath)
  return analyzeSource(filepath, text, options)
}

/**
 * Analyze many files with bounded concurrency. Results come back in input
 * order. An unreadable file yields an error result and the rest of the batch
 * carries on. Once `signal` aborts, files not yet started are left out.
 */
export async function analyzeFiles(
  filepaths: readonly string[],
  options?: AnalyzeFilesOptions,
): Promise<FileResult[]> {
  const limit = pLimit(options?.concurrency ?? DEFAULT_CONCURRENCY)
  const signal = options?.signal

  const results = await Promise.all(
    filepaths.map((filepath) =>
      limit(async (): Promise<FileResult | null> => {
        if (signal?.aborted) return null
        try {
          return { path: filepath, analysis: await analyzeFile(filepath, options) }
        } catch (error) {
          if (!(error instanceof IoError)) throw error
          logWarn(error.message)
          return { path: filepath, error }
        }
      }),
    ),
  )

  const finished = results.filter((r): r is FileResult => r !== null)
  if (finished.length < filepaths.length) {
    logDebug(`batch aborted after ${finished.length} of ${filepaths.length} files`)
  }
  return finished
}
