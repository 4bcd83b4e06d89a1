import fs from 'fs'
import path from 'path'
import { fileURLToPath } from 'url'
import chalk from 'chalk'
import { Command, CommanderError, InvalidArgumentError, Option } from 'commander'
import { z } from 'zod'
import { loadConfig, parsePositiveInt, InventoryConfig } from '../config'
import { ConfigError, IoError, isAnalyzerError, getErrorMessage } from '../errors'
import { logDebug, logInfo, setDebugEnabled } from '../logger'
import { formatDiagnostic, formatReport, OUTPUT_FORMATS, OutputFormat } from '../report'
import { analyzeFiles, analyzeWithIncludes, collectSources } from '../workspace'
import type { FileAnalysis } from '../ast/nodes'

export const EXIT_OK = 0
export const EXIT_IO_ERROR = 1
export const EXIT_USAGE = 2

export interface CliIo {
  stdout: (text: string) => void
  stderr: (text: string) => void
  env: NodeJS.ProcessEnv
  signal?: AbortSignal
}

interface CliOptions {
  includeDir: string[]
  followIncludes?: boolean
  systemIncludes?: boolean
  format: OutputFormat
  concurrency?: number
  verbose?: boolean
  diagnostics: boolean
}

const packageJsonSchema = z.object({ version: z.string() })

// Get version from package.json: next to src/ in development, next to dist/ once built
function readVersion(): string {
  const here = path.dirname(fileURLToPath(import.meta.url))
  for (const candidate of ['../package.json', '../../package.json']) {
    const file = path.join(here, candidate)
    if (!fs.existsSync(file)) continue
    const parsed = packageJsonSchema.safeParse(JSON.parse(fs.readFileSync(file, 'utf-8')))
    if (parsed.success) return parsed.data.version
  }
  return '0.0.0'
}

function collectDirs(value: string, previous: string[]): string[] {
  return [...previous, value]
}

function parseConcurrency(value: string): number {
  try {
    return parsePositiveInt(value, 'concurrency')
  } catch (error) {
    if (error instanceof ConfigError) throw new InvalidArgumentError(error.message)
    throw error
  }
}

export function createProgram(io: CliIo): Command {
  return new Command()
    .name('c-header-inventory')
    .description('List the functions, types and macros declared in C headers and sources')
    .version(readVersion())
    .argument('<path>', 'C file or directory to analyze')
    .option('-I, --include-dir <dir>', 'Directory searched for included headers (repeatable)', collectDirs, [])
    .option('--follow-includes', 'Also analyze the headers each file includes')
    .option('--system-includes', 'Follow <...> includes too (searched in include directories only)')
    .addOption(
      new Option('-f, --format <format>', 'Output format').choices(OUTPUT_FORMATS).default('text'),
    )
    .option('-c, --concurrency <n>', 'Maximum number of files read at once', parseConcurrency)
    .option('-v, --verbose', 'Show detailed logging on stderr')
    .option('--no-diagnostics', 'Do not print parse diagnostics')
    .allowExcessArguments(false)
    .exitOverride()
    .configureOutput({
      writeOut: (str) => io.stdout(str),
      writeErr: (str) => io.stderr(str),
    })
}

// Same file reached from two entries is reported once
function dedupeAnalyses(analyses: FileAnalysis[]): FileAnalysis[] {
  const seen = new Set<string>()
  return analyses.filter((a) => {
    const key = path.resolve(a.summary.path)
    if (seen.has(key)) return false
    seen.add(key)
    return true
  })
}

/**
 * Run the CLI and return its exit code: 0 when every file was analyzed, 1 when
 * the path is missing or a file could not be read, 2 for invalid usage.
 */
export async function run(argv: readonly string[], io: CliIo): Promise<number> {
  const program = createProgram(io)
  try {
    program.parse([...argv], { from: 'node' })
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? EXIT_OK : EXIT_USAGE
    }
    throw error
  }

  let config: InventoryConfig
  try {
    config = loadConfig(io.env)
  } catch (error) {
    if (!(error instanceof ConfigError)) throw error
    io.stderr(chalk.red(`Error: ${error.message}\n`))
    return EXIT_USAGE
  }

  const options = program.opts<CliOptions>()
  const [target] = program.args
  if (options.verbose || config.debug) setDebugEnabled(true)

  const includeDirs = [...options.includeDir, ...config.includeDirs]
  const concurrency = options.concurrency ?? config.concurrency
  logDebug(`analyzing ${target} (concurrency ${concurrency}, include dirs: ${includeDirs.join(', ') || 'none'})`)

  const errors: IoError[] = []
  let analyses: FileAnalysis[] = []
  let files: string[] = []
  try {
    files = await collectSources(target)
  } catch (error) {
    if (!(error instanceof IoError)) throw error
    errors.push(error)
  }

  if (options.followIncludes) {
    for (const file of files) {
      if (io.signal?.aborted) break
      // An unreadable entry file is reported; the other files still run
      try {
        const result = await analyzeWithIncludes(file, {
          includeDirs,
          followSystemIncludes: options.systemIncludes ?? false,
          signal: io.signal,
        })
        analyses.push(...result.analyses)
        errors.push(...result.errors)
      } catch (error) {
        if (!(error instanceof IoError)) throw error
        errors.push(error)
      }
    }
    analyses = dedupeAnalyses(analyses)
  } else if (files.length > 0) {
    for (const result of await analyzeFiles(files, { concurrency, signal: io.signal })) {
      if ('error' in result) errors.push(result.error)
      else analyses.push(result.analysis)
    }
  }
  logInfo(`analyzed ${analyses.length} of ${files.length} files, ${errors.length} errors`)

  if (options.diagnostics) {
    for (const analysis of analyses) {
      for (const d of analysis.diagnostics) {
        io.stderr(chalk.yellow(formatDiagnostic(analysis.summary.path, d)) + '\n')
      }
    }
  }
  for (const error of errors) {
    io.stderr(chalk.red(`Error: ${error.message}`) + '\n')
  }

  if (analyses.length > 0) {
    io.stdout(formatReport(analyses, options.format) + '\n')
  }
  return errors.length > 0 ? EXIT_IO_ERROR : EXIT_OK
}

/** Render an unexpected failure for the terminal. */
export function describeFailure(error: unknown): string {
  if (isAnalyzerError(error)) return `${error.code}: ${error.message}`
  return getErrorMessage(error)
}
