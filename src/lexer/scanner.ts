import { TokenKind, Token, keywordFromString, MULTI_PUNCTUATORS, SINGLE_PUNCTUATORS } from './token'
import { SourceText } from './positions'
import { LexError } from '../errors'
import type { Diagnostic } from '../ast/nodes'

// Character code constants
const CH_0 = 0x30 // '0'
const CH_9 = 0x39 // '9'
const CH_A = 0x41 // 'A'
const CH_E = 0x45
const CH_P = 0x50
const CH_Z = 0x5a
const CH_a = 0x61 // 'a'
const CH_e = 0x65
const CH_p = 0x70
const CH_z = 0x7a
const CH_DQUOTE = 0x22 // '"'
const CH_SQUOTE = 0x27 // "'"
const CH_BSLASH = 0x5c // '\'
const CH_UNDERSCORE = 0x5f // '_'
const CH_DOLLAR = 0x24 // '$'
const CH_DOT = 0x2e // '.'
const CH_SLASH = 0x2f // '/'
const CH_STAR = 0x2a // '*'
const CH_NEWLINE = 0x0a // '\n'
const CH_RETURN = 0x0d // '\r'
const CH_SPACE = 0x20 // ' '
const CH_PLUS = 0x2b
const CH_MINUS = 0x2d

function isDigit(c: number): boolean {
  return c >= CH_0 && c <= CH_9
}

function isAlpha(c: number): boolean {
  return (c >= CH_a && c <= CH_z) || (c >= CH_A && c <= CH_Z)
}

function isIdentStart(c: number): boolean {
  return c === CH_UNDERSCORE || c === CH_DOLLAR || isAlpha(c)
}

function isIdentContinue(c: number): boolean {
  return c === CH_UNDERSCORE || c === CH_DOLLAR || isAlpha(c) || isDigit(c)
}

function isWhitespace(c: number): boolean {
  return c === CH_SPACE || c === 0x09 || c === CH_NEWLINE || c === CH_RETURN || c === 0x0c || c === 0x0b
}

function isEncodingPrefix(s: string): boolean {
  return s === 'L' || s === 'u' || s === 'U' || s === 'u8'
}

export interface ScannerOptions {
  gnuExtensions?: boolean
}

/**
 * C lexer producing tokens with source locations.
 * Never throws: problems are recorded in `diagnostics` and the offending text
 * becomes an Unknown token.
 */
export class Scanner {
  readonly diagnostics: Diagnostic[] = []
  private source: SourceText
  private src: string
  private len: number
  private pos: number
  private atLineStart: boolean
  private gnuExtensions: boolean

  constructor(source: string, options?: ScannerOptions) {
    this.source = new SourceText(source)
    this.src = this.source.text
    this.len = this.src.length
    this.pos = 0
    this.atLineStart = true
    this.gnuExtensions = options?.gnuExtensions ?? true
  }

  /**
   * Lazily produce tokens, ending with a single Eof token. Every call restarts
   * from the beginning of the source.
   */
  *tokens(): Generator<Token, void, undefined> {
    this.pos = 0
    this.atLineStart = true
    this.diagnostics.length = 0
    for (;;) {
      const tok = this.nextToken()
      yield tok
      if (tok.kind === TokenKind.Eof) {
        return
      }
    }
  }

  /**
   * Eagerly scan the entire source and return all tokens (including Eof).
   */
  scan(): Token[] {
    return Array.from(this.tokens())
  }

  /** The continuation-joined source that token offsets refer to. */
  get text(): string {
    return this.src
  }

  /** Text between two offsets of the continuation-joined source. */
  slice(start: number, end: number): string {
    return this.src.substring(start, end)
  }

  private ch(): number {
    return this.src.charCodeAt(this.pos)
  }

  private chAt(i: number): number {
    return this.src.charCodeAt(i)
  }

  private report(message: string, offset: number): void {
    const { line, column } = this.source.position(offset)
    this.diagnostics.push(new LexError(message, { line, column }).toDiagnostic())
  }

  private makeToken(kind: TokenKind, start: number, value?: string): Token {
    const { line, column } = this.source.position(start)
    const lineStart = this.atLineStart
    this.atLineStart = false
    const tok: Token = {
      kind,
      text: this.src.substring(start, this.pos),
      line,
      column,
      start,
      end: this.pos,
      lineStart,
    }
    return value === undefined ? tok : { ...tok, value }
  }

  private nextToken(): Token {
    this.skipWhitespaceAndComments()

    if (this.pos >= this.len) {
      this.atLineStart = true
      return this.makeToken(TokenKind.Eof, this.pos)
    }

    const start = this.pos
    const c = this.ch()

    // Number literals
    if (isDigit(c) || (c === CH_DOT && isDigit(this.chAt(this.pos + 1)))) {
      return this.lexNumber(start)
    }

    if (c === CH_DQUOTE) {
      return this.lexQuoted(start, CH_DQUOTE)
    }

    if (c === CH_SQUOTE) {
      return this.lexQuoted(start, CH_SQUOTE)
    }

    // Identifiers and keywords
    if (isIdentStart(c)) {
      return this.lexIdentifier(start)
    }

    return this.lexPunctuation(start)
  }

  // --- Whitespace and comment skipping ---
  private skipWhitespaceAndComments(): void {
    for (;;) {
      while (this.pos < this.len && isWhitespace(this.ch())) {
        if (this.ch() === CH_NEWLINE) {
          this.atLineStart = true
        }
        this.pos++
      }

      if (this.pos >= this.len) return

      // Line comments stop before the newline so it still ends the logical line
      if (this.ch() === CH_SLASH && this.chAt(this.pos + 1) === CH_SLASH) {
        while (this.pos < this.len && this.ch() !== CH_NEWLINE) {
          this.pos++
        }
        continue
      }

      // Block comments; newlines inside do not end the logical line
      if (this.ch() === CH_SLASH && this.chAt(this.pos + 1) === CH_STAR) {
        const commentStart = this.pos
        this.pos += 2
        let closed = false
        while (this.pos + 1 < this.len) {
          if (this.ch() === CH_STAR && this.chAt(this.pos + 1) === CH_SLASH) {
            this.pos += 2
            closed = true
            break
          }
          this.pos++
        }
        if (!closed) {
          this.pos = this.len
          this.report('unterminated comment extends to end of file', commentStart)
        }
        continue
      }

      break
    }
  }

  // --- Numbers ---
  // pp-number: digits, letters, underscores, dots, and signed exponents.
  private lexNumber(start: number): Token {
    this.pos++
    while (this.pos < this.len) {
      const c = this.ch()
      if (
        (c === CH_PLUS || c === CH_MINUS) &&
        (this.chAt(this.pos - 1) === CH_e ||
          this.chAt(this.pos - 1) === CH_E ||
          this.chAt(this.pos - 1) === CH_p ||
          this.chAt(this.pos - 1) === CH_P)
      ) {
        this.pos++
        continue
      }
      if (isIdentContinue(c) || c === CH_DOT || c === CH_SQUOTE) {
        // C23 digit separator: only between digits
        if (c === CH_SQUOTE && !isIdentContinue(this.chAt(this.pos + 1))) break
        this.pos++
        continue
      }
      break
    }
    return this.makeToken(TokenKind.NumericLiteral, start)
  }

  // --- String and character literals ---
  private lexQuoted(start: number, quote: number): Token {
    this.pos++ // opening quote
    while (this.pos < this.len) {
      const c = this.ch()
      if (c === CH_BSLASH) {
        this.pos += 2
        continue
      }
      if (c === quote) {
        this.pos++
        return this.makeToken(
          quote === CH_DQUOTE ? TokenKind.StringLiteral : TokenKind.CharLiteral,
          start,
        )
      }
      if (c === CH_NEWLINE) {
        break
      }
      this.pos++
    }
    if (this.pos > this.len) this.pos = this.len
    // Drop a trailing '\r' so the token ends on its own line
    if (this.pos > start && this.chAt(this.pos - 1) === CH_RETURN) this.pos--
    const what = quote === CH_DQUOTE ? 'string' : 'character'
    this.report(`unterminated ${what} literal`, start)
    return this.makeToken(TokenKind.Unknown, start)
  }

  // --- Identifiers ---
  private lexIdentifier(start: number): Token {
    while (this.pos < this.len && isIdentContinue(this.ch())) {
      this.pos++
    }
    const text = this.src.substring(start, this.pos)

    if (isEncodingPrefix(text) && this.pos < this.len) {
      const c = this.ch()
      if (c === CH_DQUOTE || c === CH_SQUOTE) {
        return this.lexQuoted(start, c)
      }
    }

    const keyword = keywordFromString(text, this.gnuExtensions)
    if (keyword !== undefined) {
      return this.makeToken(TokenKind.Keyword, start, keyword)
    }
    return this.makeToken(TokenKind.Identifier, start)
  }

  // --- Punctuation ---
  private lexPunctuation(start: number): Token {
    for (const p of MULTI_PUNCTUATORS) {
      if (this.src.startsWith(p, this.pos)) {
        this.pos += p.length
        return this.makeToken(TokenKind.Punctuator, start)
      }
    }

    const c = this.src[this.pos]
    if (SINGLE_PUNCTUATORS.includes(c)) {
      this.pos++
      return this.makeToken(TokenKind.Punctuator, start)
    }

    // Consume a whole code point so surrogate pairs stay together
    const cp = this.src.codePointAt(this.pos) ?? 0
    this.pos += cp > 0xffff ? 2 : 1
    const tok = this.makeToken(TokenKind.Unknown, start)
    this.report(`unrecognized character '${tok.text}'`, start)
    return tok
  }
}

/**
 * Tokenize a whole source text. Total: never throws.
 */
export function tokenize(source: string, options?: ScannerOptions): Token[] {
  return new Scanner(source, options).scan()
}
