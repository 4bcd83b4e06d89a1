// Splits a token stream into preprocessor directive lines and ordinary code.
// A directive is a '#' that starts a logical line, plus every token up to the
// next logical line.

import { Token, TokenKind } from '../lexer/token'

export interface Directive {
  /** Directive name as written (`define`, `ifndef`); empty for `#` alone or line markers. */
  name: string
  hash: Token
  nameToken: Token | null
  /** Tokens after the name, up to the end of the logical line. */
  tokens: Token[]
  /** Number of code tokens that precede this directive. */
  codeIndex: number
}

export interface SplitTokens {
  directives: Directive[]
  code: Token[]
}

function isDirectiveStart(tok: Token): boolean {
  return tok.lineStart && tok.kind === TokenKind.Punctuator && tok.text === '#'
}

export function splitDirectives(tokens: Iterable<Token>): SplitTokens {
  const directives: Directive[] = []
  const code: Token[] = []
  let current: Directive | null = null
  let expectName = false

  for (const tok of tokens) {
    if (current !== null && !tok.lineStart && tok.kind !== TokenKind.Eof) {
      if (expectName) {
        expectName = false
        if (tok.kind === TokenKind.Identifier || tok.kind === TokenKind.Keyword) {
          current.name = tok.text
          current.nameToken = tok
          continue
        }
      }
      current.tokens.push(tok)
      continue
    }

    current = null
    if (isDirectiveStart(tok)) {
      current = { name: '', hash: tok, nameToken: null, tokens: [], codeIndex: code.length }
      directives.push(current)
      expectName = true
      continue
    }
    code.push(tok)
  }

  return { directives, code }
}

/**
 * Render tokens back to text, with one space wherever the source had
 * whitespace or a comment between two tokens.
 */
export function joinTokenText(tokens: readonly Token[]): string {
  let out = ''
  for (let i = 0; i < tokens.length; i++) {
    if (i > 0 && tokens[i].start > tokens[i - 1].end) {
      out += ' '
    }
    out += tokens[i].text
  }
  return out
}
