// Entry point for the declaration parser.

import { Parser, ParserOptions } from './parser'
import type { Token } from '../lexer/token'
import type { Diagnostic, FunctionDecl, TypeDecl } from '../ast/nodes'

// Import all parser extensions to register prototype methods
import './types'
import './declarators'
import './declarations'

export interface ParsedDeclarations {
  functions: FunctionDecl[]
  types: TypeDecl[]
  diagnostics: Diagnostic[]
}

/**
 * Recognize the top-level functions and types in a stream of code tokens
 * (directives already removed). The stream must end with an Eof token.
 */
export function parseDeclarations(tokens: Token[], options?: ParserOptions): ParsedDeclarations {
  const parser = new Parser(tokens, options)
  parser.parseTranslationUnit()
  return {
    functions: parser.functions,
    types: parser.types,
    diagnostics: parser.diagnostics,
  }
}

export { Parser }
export type { ParserOptions }
