// One file, start to finish: tokens -> directives and code -> macros, includes
// and declarations -> summary. Pure: no I/O, no state kept between calls.

import { Scanner } from './lexer/scanner'
import { splitDirectives } from './preprocessor/directives'
import {
  buildMacroCatalog,
  emptyObjectMacros,
  functionMacroNames,
  objectMacroNames,
} from './preprocessor/macros'
import { extractIncludes } from './preprocessor/includes'
import { parseDeclarations } from './parser'
import { aggregate } from './summary'
import { logDebug } from './logger'
import type { Diagnostic, FileAnalysis } from './ast/nodes'

export interface AnalyzeOptions {
  /** Recognize GNU keyword spellings such as bare `typeof` and `asm`. Default: true. */
  gnuExtensions?: boolean
}

function byPosition(a: Diagnostic, b: Diagnostic): number {
  return a.line - b.line || a.column - b.column
}

export function analyzeSource(path: string, text: string, options?: AnalyzeOptions): FileAnalysis {
  const scanner = new Scanner(text, { gnuExtensions: options?.gnuExtensions ?? true })
  const { directives, code } = splitDirectives(scanner.tokens())

  const catalog = buildMacroCatalog(directives)
  const includes = extractIncludes(directives, scanner.text)
  const parsed = parseDeclarations(code, {
    emptyMacros: emptyObjectMacros(catalog.macros),
    functionMacros: functionMacroNames(catalog.macros),
    objectMacros: objectMacroNames(catalog.macros),
  })

  const summary = aggregate(path, parsed.functions, parsed.types, catalog.macros)
  // Array.prototype.sort is stable, so equal positions keep stage order
  const diagnostics = [...scanner.diagnostics, ...catalog.diagnostics, ...parsed.diagnostics].sort(
    byPosition,
  )

  logDebug(
    `${path}: ${summary.functions.length} functions, ${summary.types.length} types, ` +
      `${summary.macros.length} macros, ${diagnostics.length} diagnostics`,
  )

  return Object.freeze({
    summary,
    diagnostics: Object.freeze(diagnostics),
    includes: Object.freeze(includes),
  })
}
