// Top-level declarations: function prototypes and definitions, typedefs, and
// struct/union/enum definitions. Everything else at file scope (variables,
// static assertions, asm blocks) is consumed and dropped.

import { Parser } from './parser'
import { TokenKind, Token } from '../lexer/token'
import { DeclarationSyntaxError } from '../errors'
import { adjustParameterType, applyDerivations, named, param, primitive } from '../ast/builders'
import type { FunctionDecl, Parameter, TypeDecl, TypeExpr } from '../ast/nodes'
import type { DeclSpecifiers } from './types'
import type { Declarator } from './declarators'

// --- Module augmentation ---
declare module './parser' {
  interface Parser {
    parseTranslationUnit(): void
    parseExternalDecl(): void
    parseDeclaration(): void
    skipPostDeclarator(): void
    skipInitializer(): void
    hasKrDeclarationList(): boolean
    parseKrDeclarations(): Map<string, TypeExpr>
    makeTypedef(name: string, nameToken: Token | undefined, declarator: Declarator, specs: DeclSpecifiers): TypeDecl
    recover(startPos: number): void
  }
}

// ============================================================
// parseTranslationUnit
// ============================================================
Parser.prototype.parseTranslationUnit = function (this: Parser): void {
  while (!this.atEof()) {
    const startPos = this.pos
    this.sawTypeKeyword = false
    try {
      this.parseExternalDecl()
    } catch (err) {
      if (!(err instanceof DeclarationSyntaxError)) throw err
      this.diagnostics.push(err.toDiagnostic())
      this.recover(startPos)
    }
    // Skip unrecognized token to avoid infinite loop
    if (this.pos === startPos && !this.atEof()) {
      this.advance()
    }
  }
}

// ============================================================
// recover
// ============================================================
// A failure whose offending token starts a fresh line is usually an
// unterminated macro invocation above it (`DECLARE_THING(x)` with no ';'), so
// parsing resumes right there. Otherwise skip to the next statement boundary.
Parser.prototype.recover = function (this: Parser, startPos: number): void {
  const tok = this.peek()
  if (this.pos > startPos && tok.lineStart && (!this.sawTypeKeyword || tok.column === 1)) {
    return
  }
  this.synchronize()
}

// ============================================================
// parseExternalDecl
// ============================================================
Parser.prototype.parseExternalDecl = function (this: Parser): void {
  const tok = this.peek()

  if (this.consumePunct(';')) return

  if (this.isPunct('}')) {
    if (this.linkageDepth > 0) {
      this.linkageDepth--
      this.advance()
      return
    }
    this.advance()
    throw this.errorAt(tok, "unmatched '}'")
  }

  // extern "C" { ... } -- the block is transparent
  if (this.isKeyword('extern') && this.peek(1).kind === TokenKind.StringLiteral) {
    if (this.isPunct('{', 2)) {
      this.advance()
      this.advance()
      this.advance()
      this.linkageDepth++
      return
    }
    this.advance()
    this.advance()
    this.parseDeclaration()
    return
  }

  if (this.isKeyword('_Static_assert')) {
    this.advance()
    this.skipBalanced()
    this.expectPunct(';', 'after static assertion')
    return
  }

  if (this.isKeyword('asm')) {
    this.skipAttributes()
    this.expectPunct(';', 'after asm block')
    return
  }

  if (this.isKeyword('__extension__')) {
    this.advance()
    return
  }

  // A known function-like macro at statement start is an invocation, not a
  // declaration: DECLARE_HANDLE(name);
  if (
    tok.kind === TokenKind.Identifier &&
    this.functionMacros.has(tok.text) &&
    this.isPunct('(', 1) &&
    !this.isAnnotationCall()
  ) {
    this.advance()
    this.skipBalanced()
    this.consumePunct(';')
    return
  }

  this.parseDeclaration()
}

// ============================================================
// parseDeclaration
// ============================================================
Parser.prototype.parseDeclaration = function (this: Parser): void {
  const start = this.peek()
  const specs = this.parseDeclSpecifiers('external')
  this.sawTypeKeyword = specs.hasTypeKeyword

  // Implicit int is only plausible for `name(`
  if (!specs.explicit && !(this.isIdentifier() && this.isPunct('(', 1))) {
    throw this.errorAt(start, `unexpected '${start.text}' at file scope`)
  }

  const pendingTypes: TypeDecl[] = []
  const pendingFunctions: FunctionDecl[] = []

  const tag = specs.tagDefinition
  if (tag !== undefined && !specs.isTypedef && tag.name !== undefined) {
    pendingTypes.push({ name: tag.name, kind: tag.kind, line: start.line })
  }

  const commit = (): void => {
    this.types.push(...pendingTypes)
    this.functions.push(...pendingFunctions)
  }

  if (this.consumePunct(';')) {
    commit()
    return
  }

  let first = true
  for (;;) {
    const declarator = this.parseDeclarator(false)
    this.skipPostDeclarator()
    const name = declarator.name ?? ''
    const line = declarator.nameToken?.line ?? start.line
    const [outermost, ...rest] = declarator.derived

    if (specs.isTypedef) {
      pendingTypes.push(this.makeTypedef(name, declarator.nameToken, declarator, specs))
      this.typedefs.add(name)
    } else if (outermost !== undefined && outermost.kind === 'Function') {
      const fn: FunctionDecl = {
        name,
        returnType: applyDerivations(specs.base, rest),
        params: outermost.params,
        isVariadic: outermost.variadic,
        isDefinition: false,
        line,
      }
      if (specs.storage !== undefined) fn.storage = specs.storage

      const krList = first && this.hasKrDeclarationList()
      if (first && (this.isPunct('{') || krList)) {
        const krTypes = krList ? this.parseKrDeclarations() : new Map<string, TypeExpr>()
        fn.params = resolveKrParams(fn.params, krTypes, this.typedefs)
        fn.isDefinition = true
        this.skipBalanced()
        pendingFunctions.push(fn)
        commit()
        return
      }
      pendingFunctions.push(fn)
    } else if (this.consumePunct('=')) {
      this.skipInitializer()
    }

    first = false
    if (this.consumePunct(',')) {
      continue
    }
    this.expectPunct(';', 'after declaration')
    commit()
    return
  }
}

// ============================================================
// makeTypedef
// ============================================================
// `typedef struct point { ... } point_t;` is one type of kind struct named by
// the typedef; any derivation (`*point_ptr`) makes it a plain typedef.
Parser.prototype.makeTypedef = function (
  this: Parser,
  name: string,
  nameToken: Token | undefined,
  declarator: Declarator,
  specs: DeclSpecifiers,
): TypeDecl {
  const line = nameToken?.line ?? this.peek().line
  const tag = specs.tagDefinition
  if (tag !== undefined && declarator.derived.length === 0) {
    const decl: TypeDecl = { name, kind: tag.kind, line }
    if (tag.name !== undefined) decl.underlying = named(tag.name, tag.kind)
    return decl
  }
  return {
    name,
    kind: 'typedef',
    underlying: applyDerivations(specs.base, declarator.derived),
    line,
  }
}

// ============================================================
// skipPostDeclarator
// ============================================================
// Attributes, asm labels and annotation macros after a declarator:
// `int f(void) __attribute__((pure)) __THROW;`. A type name, or a name that
// starts a line and is followed by a declarator, begins the next declaration
// instead; the missing ';' is then reported.
Parser.prototype.skipPostDeclarator = function (this: Parser): void {
  for (;;) {
    if (this.skipAttributes()) continue
    if (this.isIdentifier()) {
      const tok = this.peek()
      if (this.typedefs.has(tok.text)) return
      const next = this.peek(1)
      const startsDeclarator =
        next.kind === TokenKind.Identifier || (next.kind === TokenKind.Punctuator && next.text === '*')
      if (startsDeclarator && tok.lineStart && tok.column === 1) return
      this.advance()
      if (this.isPunct('(')) this.skipBalanced()
      continue
    }
    return
  }
}

// ============================================================
// skipInitializer
// ============================================================
Parser.prototype.skipInitializer = function (this: Parser): void {
  while (!this.atEof() && !this.isPunct(',') && !this.isPunct(';')) {
    if (this.isPunct('(') || this.isPunct('[') || this.isPunct('{')) {
      this.skipBalanced()
    } else {
      this.advance()
    }
  }
}

// ============================================================
// hasKrDeclarationList
// ============================================================
// Old-style definitions put parameter declarations between ')' and '{':
// `int f(a, b) int a; char *b; { ... }`. Look ahead for a run of ';'-ended
// declarations that ends right at a '{'.
Parser.prototype.hasKrDeclarationList = function (this: Parser): boolean {
  const first = this.peek()
  if (first.kind === TokenKind.Punctuator) return false
  let depth = 0
  for (let i = 0; ; i++) {
    const t = this.peek(i)
    if (t.kind === TokenKind.Eof) return false
    if (t.kind !== TokenKind.Punctuator) continue
    if (t.text === '(' || t.text === '[') depth++
    else if (t.text === ')' || t.text === ']') depth--
    else if (t.text === '}') return false
    else if (t.text === '{' && depth === 0) {
      const prev = this.peek(i - 1)
      return prev.kind === TokenKind.Punctuator && prev.text === ';'
    }
  }
}

// ============================================================
// parseKrDeclarations
// ============================================================
Parser.prototype.parseKrDeclarations = function (this: Parser): Map<string, TypeExpr> {
  const types = new Map<string, TypeExpr>()
  while (!this.atEof() && !this.isPunct('{')) {
    const specs = this.parseDeclSpecifiers('knr')
    for (;;) {
      const declarator = this.parseDeclarator(false)
      if (declarator.name !== undefined) {
        types.set(
          declarator.name,
          adjustParameterType(applyDerivations(specs.base, declarator.derived)),
        )
      }
      if (this.consumePunct(',')) continue
      this.expectPunct(';', 'after parameter declaration')
      break
    }
  }
  return types
}

/**
 * In a definition, a bare unknown name in the parameter list is an old-style
 * parameter name, typed by the declaration list or int by default.
 */
function resolveKrParams(
  params: Parameter[],
  krTypes: ReadonlyMap<string, TypeExpr>,
  typedefs: ReadonlySet<string>,
): Parameter[] {
  return params.map((p) => {
    const t = p.type
    if (
      p.name !== undefined ||
      t.kind !== 'Named' ||
      t.tag !== undefined ||
      t.qualifiers.length > 0 ||
      typedefs.has(t.name)
    ) {
      return p
    }
    return param(krTypes.get(t.name) ?? primitive('int'), t.name)
  })
}
