// ---------------------------------------------------------------------------
// Declaration model -- what the analyzer reports about a C file
// ---------------------------------------------------------------------------

export type Qualifier = 'const' | 'volatile' | 'restrict' | '_Atomic'

export type TagKind = 'struct' | 'union' | 'enum'

// ---- Types ----
export type TypeExpr =
  | PrimitiveType
  | NamedType
  | PointerType
  | ArrayType
  | FunctionPointerType
  | FunctionType

/** Builtin arithmetic/void type, spelled as in the source (`unsigned long`). */
export interface PrimitiveType {
  kind: 'Primitive'
  name: string
  qualifiers: Qualifier[]
}

/** Reference to a typedef name or a struct/union/enum tag. */
export interface NamedType {
  kind: 'Named'
  name: string
  tag?: TagKind
  qualifiers: Qualifier[]
}

export interface PointerType {
  kind: 'Pointer'
  to: TypeExpr
  qualifiers: Qualifier[]
}

export interface ArrayType {
  kind: 'Array'
  of: TypeExpr
  // Dimension as written; absent for `[]`
  size?: string
}

export interface FunctionPointerType {
  kind: 'FunctionPointer'
  returns: TypeExpr
  params: Parameter[]
  variadic: boolean
}

/** Bare function type, only reachable through `typedef int fn_t(int);`. */
export interface FunctionType {
  kind: 'Function'
  returns: TypeExpr
  params: Parameter[]
  variadic: boolean
}

export interface Parameter {
  name?: string
  type: TypeExpr
}

// ---- Declarations ----
export type StorageClass = 'extern' | 'static'

export interface FunctionDecl {
  name: string
  returnType: TypeExpr
  params: Parameter[]
  isVariadic: boolean
  isDefinition: boolean
  storage?: StorageClass
  line: number
}

export type TypeDeclKind = TagKind | 'typedef'

export interface TypeDecl {
  name: string
  kind: TypeDeclKind
  underlying?: TypeExpr
  line: number
}

export type MacroKind = 'object' | 'function'

export interface MacroDecl {
  name: string
  kind: MacroKind
  params: string[]
  body: string
  isHeaderGuard: boolean
  line: number
}

export interface Include {
  path: string
  isSystem: boolean
  line: number
}

// ---- Results ----
export type DiagnosticCode = 'LexError' | 'MacroSyntaxError' | 'DeclarationSyntaxError'

export interface Diagnostic {
  code: DiagnosticCode
  message: string
  line: number
  column: number
}

/**
 * Per-file inventory. Counts are not stored; see `summaryCounts`.
 */
export interface HeaderSummary {
  readonly path: string
  readonly description: string
  readonly functions: readonly FunctionDecl[]
  readonly types: readonly TypeDecl[]
  readonly macros: readonly MacroDecl[]
}

export interface FileAnalysis {
  readonly summary: HeaderSummary
  readonly diagnostics: readonly Diagnostic[]
  readonly includes: readonly Include[]
}

// ---- Declarators ----
// Derivations collected while parsing a declarator, ordered from the declared
// name outward: `int *x[4]` is [Array, Pointer] (array of pointers).
export type DerivedDeclarator =
  | { kind: 'Pointer'; qualifiers: Qualifier[] }
  | { kind: 'Array'; size?: string }
  | { kind: 'Function'; params: Parameter[]; variadic: boolean }
