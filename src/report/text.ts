import { renderMacroParams, renderSignature } from '../ast/render'
import { summaryCounts } from '../summary'
import type { Diagnostic, HeaderSummary } from '../ast/nodes'

/**
 * One numbered summary block. Types are counted but not listed.
 */
export function formatSummary(summary: HeaderSummary, index: number): string {
  const counts = summaryCounts(summary)
  const lines = [
    `--- Summary ${index} ---`,
    `Header Path: ${summary.path}`,
    `Description: ${summary.description}`,
    `Number of Functions: ${counts.functions}`,
    `Number of Types: ${counts.types}`,
    `Number of Macros: ${counts.macros}`,
    'Functions:',
  ]
  for (const fn of summary.functions) {
    lines.push(`  - ${fn.name}: ${renderSignature(fn)}`)
  }
  lines.push('Macros:')
  for (const macro of summary.macros) {
    lines.push(`  - ${macro.name}: ${macro.body} (Parameters: ${renderMacroParams(macro)})`)
  }
  return lines.join('\n')
}

/**
 * Summaries numbered from 1 in the order given, separated by a blank line.
 */
export function formatTextReport(summaries: readonly HeaderSummary[]): string {
  return summaries.map((s, i) => formatSummary(s, i + 1)).join('\n\n')
}

/** `path:line:column: Code: message`, the shape compilers and editors understand. */
export function formatDiagnostic(path: string, diagnostic: Diagnostic): string {
  return `${path}:${diagnostic.line}:${diagnostic.column}: ${diagnostic.code}: ${diagnostic.message}`
}
