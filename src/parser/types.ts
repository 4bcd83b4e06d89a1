// Declaration specifiers: storage class, qualifiers and the base type.
//
// Macros are not expanded, so this is where most of their damage is undone:
// empty object-like macros and calling conventions are dropped, and an
// identifier that cannot be a type name in its position is treated as an
// annotation macro (`int API_CALL f(void)`, `EXPORT int f(void)`).

import { Parser } from './parser'
import { TokenKind } from '../lexer/token'
import { primitive, named } from '../ast/builders'
import { joinTokenText } from '../preprocessor/directives'
import type { NamedType, Qualifier, StorageClass, TagKind, TypeExpr } from '../ast/nodes'

export type SpecifierContext = 'external' | 'param' | 'knr'

export interface TagDefinition {
  kind: TagKind
  name?: string
}

export interface DeclSpecifiers {
  base: TypeExpr
  isTypedef: boolean
  storage?: StorageClass
  /** Set when the specifiers contain a struct/union/enum body. */
  tagDefinition?: TagDefinition
  /** A builtin type keyword or struct/union/enum was seen. */
  hasTypeKeyword: boolean
  /** Anything at all was consumed. */
  explicit: boolean
}

const PRIMITIVE_KEYWORDS = new Set([
  'void',
  'char',
  'short',
  'int',
  'long',
  'float',
  'double',
  'signed',
  'unsigned',
  '_Bool',
  '_Complex',
  '_Imaginary',
  '__int128',
])

const QUALIFIER_KEYWORDS = new Set<string>(['const', 'volatile', 'restrict', '_Atomic'])

// Storage and function specifiers that do not show up in the inventory
const IGNORED_KEYWORDS = new Set(['inline', '_Noreturn', 'register', 'auto', '_Thread_local'])

function isQualifier(value: string | undefined): value is Qualifier {
  return value !== undefined && QUALIFIER_KEYWORDS.has(value)
}

// --- Module augmentation ---
declare module './parser' {
  interface Parser {
    parseDeclSpecifiers(context: SpecifierContext): DeclSpecifiers
    parseTagSpecifier(kind: TagKind): [NamedType, TagDefinition | undefined]
    skipAttributes(): boolean
    isAnnotationCall(): boolean
    isAnnotationBase(base: NamedType, next: string): boolean
  }
}

// ============================================================
// skipAttributes
// ============================================================
// __attribute__((...)), __declspec(...), [[...]] and asm labels.
Parser.prototype.skipAttributes = function (this: Parser): boolean {
  let skipped = false
  for (;;) {
    if (this.isKeyword('__attribute__') || this.isKeyword('asm')) {
      this.advance()
      while (this.isKeyword('volatile')) this.advance()
      if (this.isPunct('(')) this.skipBalanced()
      skipped = true
      continue
    }
    if (this.isIdentifier() && this.peek().text === '__declspec' && this.isPunct('(', 1)) {
      this.advance()
      this.skipBalanced()
      skipped = true
      continue
    }
    if (this.isPunct('[') && this.isPunct('[', 1)) {
      this.skipBalanced()
      skipped = true
      continue
    }
    return skipped
  }
}

// ============================================================
// isAnnotationBase
// ============================================================
// Whether a name taken as the base type is really an annotation macro, given
// the type name that follows it.
Parser.prototype.isAnnotationBase = function (
  this: Parser,
  base: NamedType,
  next: string,
): boolean {
  if (base.tag !== undefined) return false
  if (this.objectMacros.has(base.name)) return true
  return this.typedefs.has(next) && !this.typedefs.has(base.name)
}

// ============================================================
// isAnnotationCall
// ============================================================
// A known function-like macro invoked where more of the declaration follows,
// e.g. `DEPRECATED("use g") int f(void);`. The declarator `int max(int a);`
// is not one, even when `max` is also a macro.
Parser.prototype.isAnnotationCall = function (this: Parser): boolean {
  const tok = this.peek()
  if (tok.kind !== TokenKind.Identifier || !this.functionMacros.has(tok.text)) return false
  if (!this.isPunct('(', 1)) return false

  let depth = 0
  let i = 1
  for (;;) {
    const t = this.peek(i)
    if (t.kind === TokenKind.Eof) return false
    if (t.kind === TokenKind.Punctuator) {
      if (t.text === '(') depth++
      else if (t.text === ')') {
        depth--
        if (depth === 0) break
      }
    }
    i++
  }
  const after = this.peek(i + 1)
  return (
    after.kind === TokenKind.Identifier ||
    after.kind === TokenKind.Keyword ||
    (after.kind === TokenKind.Punctuator && (after.text === '*' || after.text === '('))
  )
}

// ============================================================
// parseTagSpecifier
// ============================================================
Parser.prototype.parseTagSpecifier = function (
  this: Parser,
  kind: TagKind,
): [NamedType, TagDefinition | undefined] {
  this.advance() // struct / union / enum
  this.skipAttributes()

  let name: string | undefined
  if (this.isIdentifier()) {
    name = this.advance().text
  }
  this.skipAttributes()

  // C23 enum base type: enum e : unsigned char { ... }
  if (kind === 'enum' && this.isPunct(':')) {
    while (!this.atEof() && !this.isPunct('{') && !this.isPunct(';')) {
      this.advance()
    }
  }

  if (this.isPunct('{')) {
    this.skipBalanced()
    this.skipAttributes()
    const definition: TagDefinition = name === undefined ? { kind } : { kind, name }
    return [named(name ?? '', kind), definition]
  }

  if (name === undefined) {
    throw this.errorAtPeek(`expected ${kind} name or '{'`)
  }
  return [named(name, kind), undefined]
}

// ============================================================
// parseDeclSpecifiers
// ============================================================
Parser.prototype.parseDeclSpecifiers = function (
  this: Parser,
  context: SpecifierContext,
): DeclSpecifiers {
  const qualifiers: Qualifier[] = []
  const prim: string[] = []
  let namedBase: NamedType | null = null
  let tagDefinition: TagDefinition | undefined
  let storage: StorageClass | undefined
  let isTypedef = false
  let explicit = false

  const hasBase = (): boolean => prim.length > 0 || namedBase !== null

  for (;;) {
    const tok = this.peek()

    if (tok.kind === TokenKind.Keyword) {
      const kw = tok.value
      if (kw === 'typedef') {
        isTypedef = true
      } else if (kw === 'extern' || kw === 'static') {
        storage = kw
      } else if (kw !== undefined && IGNORED_KEYWORDS.has(kw)) {
        // dropped
      } else if (kw === '_Atomic' && this.isPunct('(', 1)) {
        this.advance()
        prim.push(`_Atomic(${joinTokenText(this.skipBalanced())})`)
        explicit = true
        continue
      } else if (isQualifier(kw)) {
        if (!qualifiers.includes(kw)) qualifiers.push(kw)
      } else if (kw !== undefined && PRIMITIVE_KEYWORDS.has(kw)) {
        // A name taken as the base type was really an annotation macro
        if (namedBase !== null && namedBase.tag === undefined) namedBase = null
        prim.push(kw)
      } else if (kw === 'struct' || kw === 'union' || kw === 'enum') {
        if (namedBase !== null && namedBase.tag === undefined) namedBase = null
        const [type, definition] = this.parseTagSpecifier(kw)
        namedBase = type
        tagDefinition = definition
        explicit = true
        continue
      } else if (kw === 'typeof') {
        this.advance()
        prim.push(`typeof(${joinTokenText(this.skipBalanced())})`)
        explicit = true
        continue
      } else if (kw === '_Alignas') {
        this.advance()
        this.skipBalanced()
        explicit = true
        continue
      } else if (kw === '__extension__') {
        // dropped
      } else if (kw === '__attribute__') {
        this.skipAttributes()
        explicit = true
        continue
      } else {
        break
      }
      this.advance()
      explicit = true
      continue
    }

    if (tok.kind === TokenKind.Identifier) {
      const name = tok.text
      if (this.isNoise(tok)) {
        this.advance()
        continue
      }
      if (name === '__declspec') {
        this.skipAttributes()
        continue
      }
      if (this.isAnnotationCall()) {
        this.advance()
        this.skipBalanced()
        continue
      }

      const next = this.peek(1)
      if (!hasBase()) {
        if (next.kind === TokenKind.Punctuator) {
          const p = next.text
          // `name(` is a declarator with implicit int unless name is a known type
          if (p === '(' && !this.typedefs.has(name)) break
          if (context === 'param') {
            if (p === '[') break
          } else if (p === ';' || p === ',' || p === '=' || p === '[') {
            break
          }
        }
        namedBase = named(name)
        this.advance()
        explicit = true
        continue
      }

      // Base type already known: another name followed by a name or '*'
      // can only be an annotation macro.
      if (
        next.kind === TokenKind.Identifier ||
        (next.kind === TokenKind.Punctuator && next.text === '*')
      ) {
        // `API size_t f(void)`: the earlier name was the annotation
        if (namedBase !== null && this.isAnnotationBase(namedBase, name)) {
          namedBase = named(name)
        }
        this.advance()
        continue
      }
      break
    }

    if (this.isPunct('[') && this.isPunct('[', 1)) {
      this.skipAttributes()
      continue
    }

    break
  }

  let base: TypeExpr
  if (namedBase !== null) {
    base =
      qualifiers.length > 0
        ? named(namedBase.name, namedBase.tag, [...qualifiers])
        : namedBase
  } else {
    // Declarations without a type keyword default to int
    base = primitive(prim.length > 0 ? prim.join(' ') : 'int', qualifiers)
  }

  const specs: DeclSpecifiers = {
    base,
    isTypedef,
    hasTypeKeyword: prim.length > 0 || (namedBase !== null && namedBase.tag !== undefined),
    explicit,
  }
  if (storage !== undefined) specs.storage = storage
  if (tagDefinition !== undefined) specs.tagDefinition = tagDefinition
  return specs
}
