/**
 * Token kinds produced by the scanner.
 * Uses a numeric const enum for fast comparison (inlined at compile time).
 */
export const enum TokenKind {
  Identifier = 0,
  Keyword = 1,
  Punctuator = 2,
  NumericLiteral = 3,
  StringLiteral = 4,
  CharLiteral = 5,
  // Unrecognized characters and unterminated literals
  Unknown = 6,
  Eof = 7,
}

const KIND_NAMES = [
  'identifier',
  'keyword',
  'punctuator',
  'numeric-literal',
  'string-literal',
  'char-literal',
  'unknown',
  'eof',
] as const

export type TokenKindName = (typeof KIND_NAMES)[number]

export function tokenKindName(kind: TokenKind): TokenKindName {
  return KIND_NAMES[kind]
}

/**
 * A token with its kind and source location.
 *
 * `start`/`end` are offsets into the continuation-joined text the scanner works
 * on; `line`/`column` are 1-based and point into the original source.
 * `lineStart` marks the first token of a logical line, which is how directive
 * lines are found. Keywords carry their canonical spelling in `value`.
 */
export interface Token {
  readonly kind: TokenKind
  readonly text: string
  readonly line: number
  readonly column: number
  readonly start: number
  readonly end: number
  readonly lineStart: boolean
  readonly value?: string
}

/**
 * Longest-first list of multi-character punctuators. Single characters are
 * matched through SINGLE_PUNCTUATORS.
 */
export const MULTI_PUNCTUATORS: readonly string[] = [
  '...',
  '<<=',
  '>>=',
  '->',
  '++',
  '--',
  '<<',
  '>>',
  '<=',
  '>=',
  '==',
  '!=',
  '&&',
  '||',
  '*=',
  '/=',
  '%=',
  '+=',
  '-=',
  '&=',
  '^=',
  '|=',
  '##',
]

export const SINGLE_PUNCTUATORS = '[](){}.&*+-~!/%<>^|?:;=,#'

/**
 * Convert a keyword string to its canonical spelling.
 * When `gnuExtensions` is false (strict C standard mode, e.g. -std=c99),
 * bare GNU keywords like `typeof` and `asm` are treated as identifiers.
 * The double-underscore forms (`__typeof__`, `__asm__`) are always keywords.
 */
export function keywordFromString(s: string, gnuExtensions: boolean): string | undefined {
  const len = s.length
  if (len < 2 || len > 17) {
    return undefined
  }

  switch (s) {
    case 'auto':
    case 'break':
    case 'case':
    case 'char':
    case 'const':
    case 'continue':
    case 'default':
    case 'do':
    case 'double':
    case 'else':
    case 'enum':
    case 'extern':
    case 'float':
    case 'for':
    case 'goto':
    case 'if':
    case 'inline':
    case 'int':
    case 'long':
    case 'register':
    case 'restrict':
    case 'return':
    case 'short':
    case 'signed':
    case 'sizeof':
    case 'static':
    case 'struct':
    case 'switch':
    case 'typedef':
    case 'union':
    case 'unsigned':
    case 'void':
    case 'volatile':
    case 'while':
    case '_Alignas':
    case '_Alignof':
    case '_Atomic':
    case '_Bool':
    case '_Complex':
    case '_Generic':
    case '_Imaginary':
    case '_Noreturn':
    case '_Thread_local':
      return s
    case '__volatile__':
    case '__volatile':
      return 'volatile'
    case '__const':
    case '__const__':
      return 'const'
    case '__inline':
    case '__inline__':
      return 'inline'
    case '__restrict':
    case '__restrict__':
      return 'restrict'
    case '__signed__':
      return 'signed'
    case '__complex__':
    case '__complex':
      return '_Complex'
    case '__noreturn__':
      return '_Noreturn'
    case '_Static_assert':
    case 'static_assert':
      return '_Static_assert'
    case '__thread':
      return '_Thread_local'
    case 'typeof':
      return gnuExtensions ? 'typeof' : undefined
    case '__typeof__':
    case '__typeof':
      return 'typeof'
    case 'asm':
      return gnuExtensions ? 'asm' : undefined
    case '__asm__':
    case '__asm':
      return 'asm'
    case '__attribute__':
    case '__attribute':
      return '__attribute__'
    case '__extension__':
      return '__extension__'
    case '__int128':
      return '__int128'
    default:
      return undefined
  }
}
