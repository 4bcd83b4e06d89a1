// Core Parser class with token helpers and state management.
// Methods are added to the prototype by other modules (types.ts, declarators.ts,
// declarations.ts).

import { Token, TokenKind } from '../lexer/token'
import { DeclarationSyntaxError } from '../errors'
import type { Diagnostic, FunctionDecl, TypeDecl } from '../ast/nodes'

export interface ParserOptions {
  /** Object-like macros with an empty body, skipped wherever they appear. */
  emptyMacros?: ReadonlySet<string>
  /** Function-like macros; an invocation in specifier position is an annotation. */
  functionMacros?: ReadonlySet<string>
  /** Object-like macros with a body; ahead of another type name they are annotations. */
  objectMacros?: ReadonlySet<string>
}

// Calling-convention and nullability spellings that decorate declarators
// without changing the type.
const DECLARATOR_NOISE = new Set([
  '__cdecl',
  '__stdcall',
  '__fastcall',
  '__vectorcall',
  '__thiscall',
  '_cdecl',
  '_stdcall',
  '__far',
  '__near',
  '_Nonnull',
  '_Nullable',
  '_Null_unspecified',
  '__nonnull',
  '__nullable',
])

const OPENERS: Record<string, string> = { '(': ')', '[': ']', '{': '}' }

export class Parser {
  tokens: Token[]
  pos: number
  typedefs: Set<string>
  emptyMacros: ReadonlySet<string>
  functionMacros: ReadonlySet<string>
  objectMacros: ReadonlySet<string>
  linkageDepth: number
  // Whether the declaration being parsed had a type keyword; guides recovery
  sawTypeKeyword: boolean
  functions: FunctionDecl[]
  types: TypeDecl[]
  diagnostics: Diagnostic[]

  constructor(tokens: Token[], options?: ParserOptions) {
    this.tokens = tokens
    this.pos = 0
    this.typedefs = Parser.builtinTypedefs()
    this.emptyMacros = options?.emptyMacros ?? new Set()
    this.functionMacros = options?.functionMacros ?? new Set()
    this.objectMacros = options?.objectMacros ?? new Set()
    this.linkageDepth = 0
    this.sawTypeKeyword = false
    this.functions = []
    this.types = []
    this.diagnostics = []
  }

  static builtinTypedefs(): Set<string> {
    return new Set([
      'size_t',
      'ssize_t',
      'ptrdiff_t',
      'wchar_t',
      'wint_t',
      'int8_t',
      'int16_t',
      'int32_t',
      'int64_t',
      'uint8_t',
      'uint16_t',
      'uint32_t',
      'uint64_t',
      'intptr_t',
      'uintptr_t',
      'intmax_t',
      'uintmax_t',
      'FILE',
      'fpos_t',
      'sig_atomic_t',
      'time_t',
      'clock_t',
      'off_t',
      'pid_t',
      'uid_t',
      'gid_t',
      'mode_t',
      'va_list',
      '__builtin_va_list',
      '__gnuc_va_list',
      'locale_t',
      'pthread_t',
      'pthread_mutex_t',
      'pthread_cond_t',
      'pthread_attr_t',
      'jmp_buf',
      'DIR',
      'bool',
    ])
  }

  // --- Token access helpers ---
  atEof(): boolean {
    return this.peek().kind === TokenKind.Eof
  }

  peek(offset = 0): Token {
    const i = this.pos + offset
    if (i < this.tokens.length) {
      return this.tokens[i]
    }
    return this.tokens[this.tokens.length - 1]
  }

  advance(): Token {
    const tok = this.peek()
    if (this.pos < this.tokens.length - 1) {
      this.pos++
    }
    return tok
  }

  isPunct(text: string, offset = 0): boolean {
    const tok = this.peek(offset)
    return tok.kind === TokenKind.Punctuator && tok.text === text
  }

  isKeyword(keyword: string, offset = 0): boolean {
    const tok = this.peek(offset)
    return tok.kind === TokenKind.Keyword && tok.value === keyword
  }

  isIdentifier(offset = 0): boolean {
    return this.peek(offset).kind === TokenKind.Identifier
  }

  consumePunct(text: string): boolean {
    if (this.isPunct(text)) {
      this.advance()
      return true
    }
    return false
  }

  expectPunct(text: string, context: string): Token {
    if (this.isPunct(text)) {
      return this.advance()
    }
    throw this.errorAtPeek(`expected '${text}' ${context}`)
  }

  errorAt(tok: Token, message: string): DeclarationSyntaxError {
    return new DeclarationSyntaxError(message, { line: tok.line, column: tok.column })
  }

  errorAtPeek(message: string): DeclarationSyntaxError {
    const tok = this.peek()
    const found = tok.kind === TokenKind.Eof ? 'end of file' : `'${tok.text}'`
    return this.errorAt(tok, `${message}, found ${found}`)
  }

  isNoise(tok: Token): boolean {
    return (
      tok.kind === TokenKind.Identifier &&
      (DECLARATOR_NOISE.has(tok.text) || this.emptyMacros.has(tok.text))
    )
  }

  /**
   * Consume a bracketed group starting at the current '(' '[' or '{', returning
   * the tokens strictly inside it. Throws on a mismatched or missing closer.
   */
  skipBalanced(): Token[] {
    const open = this.peek()
    const expected: string[] = []
    const inside: Token[] = []
    const first = OPENERS[open.text]
    if (open.kind !== TokenKind.Punctuator || first === undefined) {
      throw this.errorAtPeek("expected '(', '[' or '{'")
    }
    expected.push(first)
    this.advance()

    while (expected.length > 0) {
      const tok = this.peek()
      if (tok.kind === TokenKind.Eof) {
        throw this.errorAt(open, `unbalanced '${open.text}'`)
      }
      this.advance()
      if (tok.kind === TokenKind.Punctuator) {
        const closer = OPENERS[tok.text]
        if (closer !== undefined) {
          expected.push(closer)
        } else if (tok.text === ')' || tok.text === ']' || tok.text === '}') {
          if (tok.text !== expected[expected.length - 1]) {
            throw this.errorAt(tok, `mismatched '${tok.text}'`)
          }
          expected.pop()
          if (expected.length === 0) break
        }
      }
      inside.push(tok)
    }
    return inside
  }

  /**
   * Skip ahead after a failed declaration: to just past the next top-level ';',
   * or past a balanced '}' group (and a ';' that directly follows it).
   */
  synchronize(): void {
    let depth = 0
    while (!this.atEof()) {
      const tok = this.peek()
      if (tok.kind === TokenKind.Punctuator) {
        if (tok.text === '(' || tok.text === '[' || tok.text === '{') {
          depth++
        } else if (tok.text === ')' || tok.text === ']' || tok.text === '}') {
          if (depth === 0) {
            // Closes an enclosing extern "C" block: leave it for the caller
            if (tok.text === '}' && this.linkageDepth > 0) return
          } else {
            depth--
            if (depth === 0 && tok.text === '}') {
              this.advance()
              this.consumePunct(';')
              return
            }
          }
        } else if (tok.text === ';' && depth === 0) {
          this.advance()
          return
        }
      }
      this.advance()
    }
  }
}
