export { collectSources, SOURCE_PATTERN } from './collect'
export { analyzeFile, analyzeFiles, readSource } from './analyze-files'
export type { AnalyzeFilesOptions, FileResult } from './analyze-files'
export { analyzeWithIncludes, resolveInclude } from './include-graph'
export type { IncludeAnalysis, IncludeOptions, UnresolvedInclude } from './include-graph'
