import {
  array,
  functionPointer,
  named,
  param,
  pointer,
  primitive,
} from '../src/ast/builders'
import { renderDeclaration } from '../src/ast/render'
import { parseFunction, signatures } from './helpers/parse'

const int = primitive('int')
const void_ = primitive('void')
const char = primitive('char')

/** Helper: the type of the only parameter of `void f(<decl>);` */
function paramType(decl: string) {
  const fn = parseFunction(`void f(${decl});`)
  expect(fn.params).toHaveLength(1)
  return fn.params[0]
}

describe('declarators', () => {
  describe('function prototypes', () => {
    it('parses a simple prototype', () => {
      expect(parseFunction('int add(int a, int b);')).toEqual({
        name: 'add',
        returnType: int,
        params: [param(int, 'a'), param(int, 'b')],
        isVariadic: false,
        isDefinition: false,
        line: 1,
      })
    })

    it('renders a simple prototype back to its signature', () => {
      expect(signatures('int add(int a, int b);')).toEqual(['add: int(int a, int b)'])
    })

    it('treats (void) and () as empty parameter lists', () => {
      expect(parseFunction('int f(void);').params).toEqual([])
      expect(parseFunction('int g();').params).toEqual([])
    })

    it('sets the variadic flag without adding a parameter', () => {
      const fn = parseFunction('int log_msg(const char *fmt, ...);')
      expect(fn.isVariadic).toBe(true)
      expect(fn.params).toEqual([param(pointer(primitive('char', ['const'])), 'fmt')])
      expect(signatures('int log_msg(const char *fmt, ...);')).toEqual([
        'log_msg: int(const char *fmt, ...)',
      ])
    })

    it('omits the names of unnamed parameters', () => {
      expect(signatures('int f(char *, int[4]);')).toEqual(['f: int(char *, int[4])'])
    })

    it('resolves a pointer return type', () => {
      const fn = parseFunction('char *dup(const char *s);')
      expect(fn.returnType).toEqual(pointer(char))
      expect(signatures('char *dup(const char *s);')).toEqual(['dup: char *(const char *s)'])
    })

    it('accepts a parenthesized function name', () => {
      expect(parseFunction('int (max)(int a, int b);').name).toBe('max')
    })
  })

  describe('nested declarators', () => {
    it('resolves a function pointer parameter', () => {
      expect(paramType('void (*cb)(int)')).toEqual(
        param(functionPointer(void_, [param(int)]), 'cb'),
      )
    })

    it('resolves an array of pointers', () => {
      expect(paramType('int *arr[10]')).toEqual(param(array(pointer(int), '10'), 'arr'))
    })

    it('resolves a pointer to an array', () => {
      expect(paramType('int (*grid)[3]')).toEqual(param(pointer(array(int, '3')), 'grid'))
    })

    it('resolves a pointer to a pointer', () => {
      expect(paramType('char **argv')).toEqual(param(pointer(pointer(char)), 'argv'))
    })

    it('keeps pointer qualifiers on the right level', () => {
      expect(paramType('const char *const name')).toEqual(
        param(pointer(primitive('char', ['const']), ['const']), 'name'),
      )
    })

    it('wraps a pointer to a function pointer in a Pointer', () => {
      expect(paramType('void (**pp)(void)')).toEqual(
        param(pointer(functionPointer(void_, [])), 'pp'),
      )
    })

    it('decays a parameter of function type to a function pointer', () => {
      expect(paramType('int cb(int)')).toEqual(param(functionPointer(int, [param(int)]), 'cb'))
    })

    it('drops static and qualifiers inside array dimensions', () => {
      expect(paramType('int v[static 4]')).toEqual(param(array(int, '4'), 'v'))
    })

    it('keeps a symbolic array dimension as written', () => {
      expect(paramType('char buf[MAX_LEN + 1]')).toEqual(param(array(char, 'MAX_LEN + 1'), 'buf'))
    })

    it('resolves a function returning a function pointer', () => {
      const fn = parseFunction('void (*signal(int sig, void (*func)(int)))(int);')
      expect(fn.name).toBe('signal')
      expect(fn.returnType).toEqual(functionPointer(void_, [param(int)]))
      expect(fn.params).toEqual([
        param(int, 'sig'),
        param(functionPointer(void_, [param(int)]), 'func'),
      ])
      expect(signatures('void (*signal(int sig, void (*func)(int)))(int);')).toEqual([
        'signal: void (*)(int)(int sig, void (*func)(int))',
      ])
    })

    it('uses typedef names to tell a parameter list from a nested declarator', () => {
      expect(signatures('typedef int T;\nvoid h(int (T));')).toEqual(['h: void(int (*)(T))'])
    })
  })

  describe('rendering', () => {
    it('renders parameters as C declarations', () => {
      expect(renderDeclaration(pointer(char), 's')).toBe('char *s')
      expect(renderDeclaration(array(int, '4'), 'v')).toBe('int v[4]')
      expect(renderDeclaration(functionPointer(void_, [param(int)]), 'cb')).toBe('void (*cb)(int)')
      expect(renderDeclaration(pointer(array(int, '3')), 'grid')).toBe('int (*grid)[3]')
      expect(renderDeclaration(pointer(char, ['const']), 'p')).toBe('char *const p')
    })

    it('renders abstract types', () => {
      expect(renderDeclaration(pointer(char))).toBe('char *')
      expect(renderDeclaration(array(int, '4'))).toBe('int[4]')
      expect(renderDeclaration(functionPointer(void_, [param(int)], true))).toBe('void (*)(int, ...)')
    })

    it('spells tagged and anonymous named types', () => {
      expect(renderDeclaration(pointer(named('node', 'struct')), 'n')).toBe('struct node *n')
      expect(renderDeclaration(named('', 'union'))).toBe('union')
      expect(renderDeclaration(named('size_t'), 'len')).toBe('size_t len')
    })
  })
})
