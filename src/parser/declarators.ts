// Declarator parsing: handles the C declarator syntax (the part after the type
// specifier that defines the name and type modifiers like pointers, arrays,
// and function parameters).
//
// C declarators follow an "inside-out" rule: int (*fp)(int) means fp is a
// pointer to a function returning int, read from the name outward.

import { Parser } from './parser'
import { TokenKind, Token } from '../lexer/token'
import { adjustParameterType, applyDerivations, param } from '../ast/builders'
import { joinTokenText } from '../preprocessor/directives'
import type { DerivedDeclarator, Parameter, Qualifier } from '../ast/nodes'

export interface Declarator {
  name?: string
  nameToken?: Token
  /** Ordered from the name outward. */
  derived: DerivedDeclarator[]
}

// Array dimension prefixes allowed in parameter declarations: `int v[static 4]`
const ARRAY_DIM_PREFIX = new Set(['static', 'const', 'volatile', 'restrict'])

// --- Module augmentation ---
declare module './parser' {
  interface Parser {
    parseDeclarator(abstractAllowed: boolean): Declarator
    isParenDeclarator(): boolean
    combineDeclaratorParts(
      outerPointers: DerivedDeclarator[],
      innerDerived: DerivedDeclarator[],
      outerSuffixes: DerivedDeclarator[],
    ): DerivedDeclarator[]
    parsePointerQualifiers(): Qualifier[]
    parseArraySuffix(): DerivedDeclarator
    parseParamList(): [Parameter[], boolean]
    parseParameter(): Parameter
    skipDeclaratorNoise(): void
  }
}

// ============================================================
// skipDeclaratorNoise
// ============================================================
Parser.prototype.skipDeclaratorNoise = function (this: Parser): void {
  for (;;) {
    if (this.skipAttributes()) continue
    const tok = this.peek()
    if (this.isNoise(tok)) {
      this.advance()
      continue
    }
    // Two names in a row: the first one is an annotation macro
    if (tok.kind === TokenKind.Identifier && this.isIdentifier(1)) {
      this.advance()
      continue
    }
    return
  }
}

// ============================================================
// isParenDeclarator
// ============================================================
// At '(': does it open a nested declarator `(*fp)` or a parameter list `(int)`?
Parser.prototype.isParenDeclarator = function (this: Parser): boolean {
  const next = this.peek(1)
  switch (next.kind) {
    case TokenKind.Punctuator:
      return next.text === '*' || next.text === '^' || next.text === '(' || next.text === '['
    case TokenKind.Identifier:
      // Typedef name -> parameter list; regular name -> declarator
      return !this.typedefs.has(next.text)
    case TokenKind.Keyword:
      return next.value === '__attribute__'
    default:
      return false
  }
}

// ============================================================
// parsePointerQualifiers
// ============================================================
Parser.prototype.parsePointerQualifiers = function (this: Parser): Qualifier[] {
  const qualifiers: Qualifier[] = []
  for (;;) {
    const tok = this.peek()
    if (tok.kind === TokenKind.Keyword) {
      const kw = tok.value
      if (kw === 'const' || kw === 'volatile' || kw === 'restrict' || kw === '_Atomic') {
        if (!qualifiers.includes(kw)) qualifiers.push(kw)
        this.advance()
        continue
      }
      if (kw === '__attribute__') {
        this.skipAttributes()
        continue
      }
    }
    if (this.isNoise(tok)) {
      this.advance()
      continue
    }
    return qualifiers
  }
}

// ============================================================
// parseArraySuffix
// ============================================================
Parser.prototype.parseArraySuffix = function (this: Parser): DerivedDeclarator {
  const inside = this.skipBalanced()
  let i = 0
  while (i < inside.length && inside[i].kind === TokenKind.Keyword) {
    const kw = inside[i].value
    if (kw === undefined || !ARRAY_DIM_PREFIX.has(kw)) break
    i++
  }
  const size = joinTokenText(inside.slice(i))
  return size === '' ? { kind: 'Array' } : { kind: 'Array', size }
}

// ============================================================
// combineDeclaratorParts
// ============================================================
// Name-outward order: whatever the parenthesized inner declarator derived sits
// closest to the name, then the suffixes, then the pointers written before the
// name (the one nearest the name first).
Parser.prototype.combineDeclaratorParts = function (
  this: Parser,
  outerPointers: DerivedDeclarator[],
  innerDerived: DerivedDeclarator[],
  outerSuffixes: DerivedDeclarator[],
): DerivedDeclarator[] {
  return [...innerDerived, ...outerSuffixes, ...[...outerPointers].reverse()]
}

// ============================================================
// parseDeclarator
// ============================================================
Parser.prototype.parseDeclarator = function (this: Parser, abstractAllowed: boolean): Declarator {
  const pointers: DerivedDeclarator[] = []
  this.skipDeclaratorNoise()

  // Pointers (and Apple block pointers) with their qualifiers
  while (this.isPunct('*') || this.isPunct('^')) {
    this.advance()
    pointers.push({ kind: 'Pointer', qualifiers: this.parsePointerQualifiers() })
    this.skipDeclaratorNoise()
  }

  // Direct declarator
  let name: string | undefined
  let nameToken: Token | undefined
  let innerDerived: DerivedDeclarator[] = []

  if (this.isIdentifier()) {
    nameToken = this.advance()
    name = nameToken.text
  } else if (this.isPunct('(') && this.isParenDeclarator()) {
    this.advance() // consume '('
    const inner = this.parseDeclarator(abstractAllowed)
    this.expectPunct(')', 'to close declarator')
    name = inner.name
    nameToken = inner.nameToken
    innerDerived = inner.derived
  } else if (!abstractAllowed) {
    throw this.errorAtPeek('expected identifier in declarator')
  }

  // Suffixes: array dimensions and function params
  const outerSuffixes: DerivedDeclarator[] = []
  for (;;) {
    if (this.isPunct('[')) {
      outerSuffixes.push(this.parseArraySuffix())
    } else if (this.isPunct('(')) {
      this.advance()
      const [params, variadic] = this.parseParamList()
      outerSuffixes.push({ kind: 'Function', params, variadic })
    } else {
      break
    }
  }

  const derived = this.combineDeclaratorParts(pointers, innerDerived, outerSuffixes)
  const result: Declarator = { derived }
  if (name !== undefined) result.name = name
  if (nameToken !== undefined) result.nameToken = nameToken
  return result
}

// ============================================================
// parseParamList
// ============================================================
// Called after '('. `()` and `(void)` are both empty; a trailing `...` sets
// the variadic flag and is not a parameter.
Parser.prototype.parseParamList = function (this: Parser): [Parameter[], boolean] {
  if (this.consumePunct(')')) {
    return [[], false]
  }
  if (this.isKeyword('void') && this.isPunct(')', 1)) {
    this.advance()
    this.advance()
    return [[], false]
  }

  const params: Parameter[] = []
  let variadic = false
  for (;;) {
    if (this.isPunct('...')) {
      this.advance()
      variadic = true
      this.expectPunct(')', "after '...'")
      break
    }
    params.push(this.parseParameter())
    if (this.consumePunct(',')) {
      continue
    }
    this.expectPunct(')', 'after parameter')
    break
  }
  return [params, variadic]
}

// ============================================================
// parseParameter
// ============================================================
Parser.prototype.parseParameter = function (this: Parser): Parameter {
  const start = this.peek()
  const specs = this.parseDeclSpecifiers('param')
  if (!specs.explicit && !this.isIdentifier()) {
    throw this.errorAt(start, `expected parameter declaration, found '${start.text}'`)
  }
  const declarator = this.parseDeclarator(true)
  this.skipAttributes()
  const type = adjustParameterType(applyDerivations(specs.base, declarator.derived))
  return param(type, declarator.name)
}
