import type { FileAnalysis } from '../ast/nodes'
import { formatTextReport, formatSummary, formatDiagnostic } from './text'
import { formatJsonReport, toJsonFileReport } from './json'

export type OutputFormat = 'text' | 'json'

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['text', 'json']

/**
 * Format analyses in the specified format
 */
export function formatReport(analyses: readonly FileAnalysis[], format: OutputFormat = 'text'): string {
  switch (format) {
    case 'json':
      return formatJsonReport(analyses)
    case 'text':
    default:
      return formatTextReport(analyses.map((a) => a.summary))
  }
}

// Export individual formatters
export { formatTextReport, formatSummary, formatDiagnostic, formatJsonReport, toJsonFileReport }
export type { JsonReport, JsonFileReport, JsonFunction, JsonType, JsonMacro } from './json'
