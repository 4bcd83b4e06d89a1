import { Token, TokenKind } from '../lexer/token'
import { MacroSyntaxError } from '../errors'
import type { Diagnostic, MacroDecl } from '../ast/nodes'
import { Directive, joinTokenText } from './directives'

export interface MacroCatalog {
  macros: MacroDecl[]
  diagnostics: Diagnostic[]
}

function isName(tok: Token | undefined): boolean {
  return tok !== undefined && (tok.kind === TokenKind.Identifier || tok.kind === TokenKind.Keyword)
}

function isPunct(tok: Token | undefined, text: string): boolean {
  return tok !== undefined && tok.kind === TokenKind.Punctuator && tok.text === text
}

function errorAt(tok: Token, message: string): MacroSyntaxError {
  return new MacroSyntaxError(message, { line: tok.line, column: tok.column })
}

/**
 * Name tested by a guard-style conditional: `#ifndef NAME` or
 * `#if !defined(NAME)` / `#if !defined NAME`.
 */
function guardedName(directive: Directive): string | null {
  const toks = directive.tokens
  if (directive.name === 'ifndef') {
    return toks.length === 1 && isName(toks[0]) ? toks[0].text : null
  }
  if (directive.name !== 'if' || !isPunct(toks[0], '!') || toks[1]?.text !== 'defined') {
    return null
  }
  if (toks.length === 3 && isName(toks[2])) return toks[2].text
  if (toks.length === 5 && isPunct(toks[2], '(') && isName(toks[3]) && isPunct(toks[4], ')')) {
    return toks[3].text
  }
  return null
}

/**
 * Parse the parameter list of a function-like macro. `tokens[0]` is the '('.
 * Returns the parameters and the index of the first body token.
 */
function parseMacroParams(tokens: readonly Token[], open: Token): [string[], number] {
  const params: string[] = []
  let i = 1
  if (isPunct(tokens[i], ')')) {
    return [params, i + 1]
  }
  for (;;) {
    const tok = tokens[i]
    if (tok === undefined) {
      throw errorAt(open, "missing ')' in macro parameter list")
    }
    if (isPunct(tok, '...')) {
      params.push('...')
      i++
    } else if (isName(tok)) {
      if (isPunct(tokens[i + 1], '...')) {
        params.push(`${tok.text}...`)
        i += 2
      } else {
        params.push(tok.text)
        i++
      }
    } else {
      throw errorAt(tok, `invalid token '${tok.text}' in macro parameter list`)
    }

    const sep = tokens[i]
    if (isPunct(sep, ')')) {
      return [params, i + 1]
    }
    if (isPunct(sep, ',')) {
      i++
      continue
    }
    if (sep === undefined) {
      throw errorAt(open, "missing ')' in macro parameter list")
    }
    throw errorAt(sep, `expected ',' or ')' in macro parameter list, found '${sep.text}'`)
  }
}

function parseDefine(directive: Directive): MacroDecl {
  const [nameTok, ...rest] = directive.tokens
  if (nameTok === undefined) {
    throw errorAt(directive.nameToken ?? directive.hash, 'macro name missing')
  }
  if (!isName(nameTok)) {
    throw errorAt(nameTok, `macro name must be an identifier, found '${nameTok.text}'`)
  }

  const open = rest[0]
  // Function-like only when '(' touches the name
  if (isPunct(open, '(') && open.start === nameTok.end) {
    const [params, bodyStart] = parseMacroParams(rest, open)
    return {
      name: nameTok.text,
      kind: 'function',
      params,
      body: joinTokenText(rest.slice(bodyStart)),
      isHeaderGuard: false,
      line: nameTok.line,
    }
  }

  return {
    name: nameTok.text,
    kind: 'object',
    params: [],
    body: joinTokenText(rest),
    isHeaderGuard: false,
    line: nameTok.line,
  }
}

/**
 * Collect every `#define` in declaration order. Malformed definitions are
 * skipped with a diagnostic.
 */
export function buildMacroCatalog(directives: readonly Directive[]): MacroCatalog {
  const macros: MacroDecl[] = []
  const diagnostics: Diagnostic[] = []
  let seenDefine = false

  for (let i = 0; i < directives.length; i++) {
    const directive = directives[i]
    if (directive.name !== 'define') continue

    const first = !seenDefine
    seenDefine = true

    let macro: MacroDecl
    try {
      macro = parseDefine(directive)
    } catch (err) {
      if (err instanceof MacroSyntaxError) {
        diagnostics.push(err.toDiagnostic())
        continue
      }
      throw err
    }

    if (first && i > 0 && macro.kind === 'object') {
      const prev = directives[i - 1]
      macro.isHeaderGuard =
        prev.codeIndex === directive.codeIndex && guardedName(prev) === macro.name
    }
    macros.push(macro)
  }

  return { macros, diagnostics }
}

/** Object-like macros that expand to nothing, e.g. `#define API_EXPORT`. */
export function emptyObjectMacros(macros: readonly MacroDecl[]): Set<string> {
  const names = new Set<string>()
  for (const m of macros) {
    if (m.kind === 'object' && m.body === '' && !m.isHeaderGuard) names.add(m.name)
  }
  return names
}

/** Object-like macros with a body, such as `#define API __declspec(dllexport)`. */
export function objectMacroNames(macros: readonly MacroDecl[]): Set<string> {
  const names = new Set<string>()
  for (const m of macros) {
    if (m.kind === 'object' && m.body !== '' && !m.isHeaderGuard) names.add(m.name)
  }
  return names
}

export function functionMacroNames(macros: readonly MacroDecl[]): Set<string> {
  const names = new Set<string>()
  for (const m of macros) {
    if (m.kind === 'function') names.add(m.name)
  }
  return names
}
