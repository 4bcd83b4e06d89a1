// Public API for the C header inventory.
// Usage: import { analyzeSource, formatReport } from 'c-header-inventory';

import * as AST from './ast/nodes'

export { analyzeSource } from './analyzer'
export type { AnalyzeOptions } from './analyzer'

// Pipeline stages, for callers that need one step on its own
export { Scanner, tokenize } from './lexer/scanner'
export type { ScannerOptions } from './lexer/scanner'
export { TokenKind, tokenKindName } from './lexer/token'
export type { Token } from './lexer/token'
export { splitDirectives, joinTokenText } from './preprocessor/directives'
export type { Directive, SplitTokens } from './preprocessor/directives'
export { buildMacroCatalog } from './preprocessor/macros'
export type { MacroCatalog } from './preprocessor/macros'
export { extractIncludes } from './preprocessor/includes'
export { parseDeclarations, Parser } from './parser'
export type { ParsedDeclarations, ParserOptions } from './parser'
export { aggregate, describeCounts, summaryCounts } from './summary'
export type { SummaryCounts } from './summary'

export { renderType, renderDeclaration, renderParams, renderSignature, renderMacroParams } from './ast/render'
export * from './ast/builders'

export { formatReport, formatTextReport, formatSummary, formatJsonReport, formatDiagnostic } from './report'
export type { OutputFormat, JsonReport, JsonFileReport } from './report'

export { collectSources, analyzeFile, analyzeFiles, analyzeWithIncludes, resolveInclude } from './workspace'
export type { AnalyzeFilesOptions, FileResult, IncludeAnalysis, IncludeOptions, UnresolvedInclude } from './workspace'

export { loadConfig, DEFAULT_CONCURRENCY } from './config'
export type { InventoryConfig } from './config'
export {
  AnalyzerError,
  SourceError,
  LexError,
  MacroSyntaxError,
  DeclarationSyntaxError,
  IoError,
  ConfigError,
  wrapError,
  isAnalyzerError,
  getErrorMessage,
} from './errors'
export type { ErrorCode } from './errors'
export { setDebugEnabled, isDebugEnabled } from './logger'

// Re-export types for consumers
export { AST }
export type {
  TypeExpr,
  Parameter,
  FunctionDecl,
  TypeDecl,
  MacroDecl,
  Include,
  Diagnostic,
  HeaderSummary,
  FileAnalysis,
} from './ast/nodes'
