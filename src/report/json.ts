import { renderMacroParams, renderSignature, renderType, renderDeclaration } from '../ast/render'
import { summaryCounts, SummaryCounts } from '../summary'
import type { Diagnostic, FileAnalysis, Include, MacroDecl, TypeDeclKind } from '../ast/nodes'

export interface JsonFunction {
  name: string
  signature: string
  returnType: string
  params: { name: string | null; type: string; declaration: string }[]
  variadic: boolean
  definition: boolean
  storage: string | null
  line: number
}

export interface JsonType {
  name: string
  kind: TypeDeclKind
  underlying: string | null
  line: number
}

export interface JsonMacro extends Pick<MacroDecl, 'name' | 'kind' | 'params' | 'body' | 'line'> {
  headerGuard: boolean
  parameters: string
}

export interface JsonFileReport {
  path: string
  description: string
  counts: SummaryCounts
  functions: JsonFunction[]
  types: JsonType[]
  macros: JsonMacro[]
  includes: Include[]
  diagnostics: Diagnostic[]
}

export interface JsonReport {
  files: JsonFileReport[]
}

export function toJsonFileReport(analysis: FileAnalysis): JsonFileReport {
  const { summary } = analysis
  return {
    path: summary.path,
    description: summary.description,
    counts: summaryCounts(summary),
    functions: summary.functions.map((fn) => ({
      name: fn.name,
      signature: renderSignature(fn),
      returnType: renderType(fn.returnType),
      params: fn.params.map((p) => ({
        name: p.name ?? null,
        type: renderType(p.type),
        declaration: renderDeclaration(p.type, p.name),
      })),
      variadic: fn.isVariadic,
      definition: fn.isDefinition,
      storage: fn.storage ?? null,
      line: fn.line,
    })),
    types: summary.types.map((t) => ({
      name: t.name,
      kind: t.kind,
      underlying: t.underlying === undefined ? null : renderType(t.underlying),
      line: t.line,
    })),
    macros: summary.macros.map((m) => ({
      name: m.name,
      kind: m.kind,
      params: [...m.params],
      body: m.body,
      line: m.line,
      headerGuard: m.isHeaderGuard,
      parameters: renderMacroParams(m),
    })),
    includes: [...analysis.includes],
    diagnostics: [...analysis.diagnostics],
  }
}

/**
 * Format analyses as a JSON document for tools that generate bindings from the
 * inventory. Unlike the text report, types are listed.
 */
export function formatJsonReport(analyses: readonly FileAnalysis[]): string {
  const report: JsonReport = { files: analyses.map(toJsonFileReport) }
  return JSON.stringify(report, null, 2)
}
