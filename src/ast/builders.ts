// ---------------------------------------------------------------------------
// Type constructors and declarator folding
// ---------------------------------------------------------------------------

import type {
  ArrayType,
  DerivedDeclarator,
  FunctionPointerType,
  FunctionType,
  NamedType,
  Parameter,
  PointerType,
  PrimitiveType,
  Qualifier,
  TagKind,
  TypeExpr,
} from './nodes'

export function primitive(name: string, qualifiers: Qualifier[] = []): PrimitiveType {
  return { kind: 'Primitive', name, qualifiers }
}

export function named(name: string, tag?: TagKind, qualifiers: Qualifier[] = []): NamedType {
  return tag === undefined
    ? { kind: 'Named', name, qualifiers }
    : { kind: 'Named', name, tag, qualifiers }
}

export function pointer(to: TypeExpr, qualifiers: Qualifier[] = []): PointerType {
  return { kind: 'Pointer', to, qualifiers }
}

export function array(of: TypeExpr, size?: string): ArrayType {
  return size === undefined ? { kind: 'Array', of } : { kind: 'Array', of, size }
}

export function functionPointer(
  returns: TypeExpr,
  params: Parameter[],
  variadic = false,
): FunctionPointerType {
  return { kind: 'FunctionPointer', returns, params, variadic }
}

export function functionType(returns: TypeExpr, params: Parameter[], variadic = false): FunctionType {
  return { kind: 'Function', returns, params, variadic }
}

export function param(type: TypeExpr, name?: string): Parameter {
  return name === undefined ? { type } : { name, type }
}

/**
 * Apply declarator derivations to a base type. The outermost derivation wraps
 * the base first, so the one next to the name ends up on the outside:
 * `int (*fp)(int)` folds [Pointer, Function] into FunctionPointer(int, [int]).
 */
export function applyDerivations(base: TypeExpr, derived: readonly DerivedDeclarator[]): TypeExpr {
  let type = base
  for (let i = derived.length - 1; i >= 0; i--) {
    const d = derived[i]
    switch (d.kind) {
      case 'Pointer':
        type =
          type.kind === 'Function'
            ? functionPointer(type.returns, type.params, type.variadic)
            : pointer(type, d.qualifiers)
        break
      case 'Array':
        type = array(type, d.size)
        break
      case 'Function':
        type = functionType(type, d.params, d.variadic)
        break
    }
  }
  return type
}

/** Parameters of function type decay to function pointers. */
export function adjustParameterType(type: TypeExpr): TypeExpr {
  if (type.kind === 'Function') {
    return functionPointer(type.returns, type.params, type.variadic)
  }
  return type
}
