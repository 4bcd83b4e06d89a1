// Rendering of types and declarations back to C syntax.

import type { FunctionDecl, MacroDecl, Parameter, TypeExpr } from './nodes'

function joinBase(base: string, inner: string): string {
  if (inner === '') return base
  return inner.startsWith('[') ? `${base}${inner}` : `${base} ${inner}`
}

function renderDeclarator(type: TypeExpr, inner: string): string {
  switch (type.kind) {
    case 'Primitive':
    case 'Named': {
      let spelled = type.name
      if (type.kind === 'Named' && type.tag !== undefined) {
        // Anonymous struct/union/enum spells as the bare tag
        spelled = type.name === '' ? type.tag : `${type.tag} ${type.name}`
      }
      const base = type.qualifiers.length > 0 ? `${type.qualifiers.join(' ')} ${spelled}` : spelled
      return joinBase(base, inner)
    }
    case 'Pointer': {
      let ptr = '*'
      if (type.qualifiers.length > 0) {
        ptr += type.qualifiers.join(' ')
        if (inner !== '') ptr += ' '
      }
      ptr += inner
      // Postfix derivations bind tighter than '*'
      const to = type.to
      const wrapped = to.kind === 'Array' || to.kind === 'Function' ? `(${ptr})` : ptr
      return renderDeclarator(to, wrapped)
    }
    case 'Array':
      return renderDeclarator(type.of, `${inner}[${type.size ?? ''}]`)
    case 'FunctionPointer':
      return renderDeclarator(type.returns, `(*${inner})(${renderParams(type.params, type.variadic)})`)
    case 'Function':
      return renderDeclarator(type.returns, `${inner}(${renderParams(type.params, type.variadic)})`)
  }
}

/** Abstract rendering: `char *`, `int[4]`, `void (*)(int)`. */
export function renderType(type: TypeExpr): string {
  return renderDeclarator(type, '')
}

/** Declaration rendering: `char *name`, `int v[4]`, `void (*cb)(int)`. */
export function renderDeclaration(type: TypeExpr, name?: string): string {
  return renderDeclarator(type, name ?? '')
}

export function renderParams(params: readonly Parameter[], variadic: boolean): string {
  const parts = params.map((p) => renderDeclaration(p.type, p.name))
  if (variadic) parts.push('...')
  return parts.join(', ')
}

/** `int(int a, int b)` -- return type followed by the parameter list. */
export function renderSignature(fn: FunctionDecl): string {
  return `${renderType(fn.returnType)}(${renderParams(fn.params, fn.isVariadic)})`
}

export function renderMacroParams(macro: MacroDecl): string {
  return macro.params.length > 0 ? macro.params.join(', ') : 'None'
}
