import { analyzeSource } from '../src/analyzer'
import { formatDiagnostic, formatJsonReport, formatReport, formatSummary, formatTextReport } from '../src/report'

const EXAMPLE = [
  '#define MAX_ITEMS 100',
  '#define SQ(x) ((x)*(x))',
  '#define CLAMP(v, lo, hi) ((v) < (lo) ? (lo) : (v) > (hi) ? (hi) : (v))',
  'typedef unsigned int uint;',
  'int add(int a, int b);',
  'void on_event(void (*cb)(int), void *user, ...);',
  'char *next_token(char **cursor, int[4]);',
].join('\n')

describe('report', () => {
  const analysis = analyzeSource('include/example.h', EXAMPLE)

  it('formats a summary block in the documented layout', () => {
    expect(formatSummary(analysis.summary, 1)).toBe(
      [
        '--- Summary 1 ---',
        'Header Path: include/example.h',
        'Description: Header file containing 3 functions, 1 types, and 3 macros',
        'Number of Functions: 3',
        'Number of Types: 1',
        'Number of Macros: 3',
        'Functions:',
        '  - add: int(int a, int b)',
        '  - on_event: void(void (*cb)(int), void *user, ...)',
        '  - next_token: char *(char **cursor, int[4])',
        'Macros:',
        '  - MAX_ITEMS: 100 (Parameters: None)',
        '  - SQ: ((x)*(x)) (Parameters: x)',
        '  - CLAMP: ((v) < (lo) ? (lo) : (v) > (hi) ? (hi) : (v)) (Parameters: v, lo, hi)',
      ].join('\n'),
    )
  })

  it('keeps the headings of empty listings', () => {
    const empty = analyzeSource('empty.h', '')
    expect(formatSummary(empty.summary, 2)).toBe(
      [
        '--- Summary 2 ---',
        'Header Path: empty.h',
        'Description: Header file containing 0 functions, 0 types, and 0 macros',
        'Number of Functions: 0',
        'Number of Types: 0',
        'Number of Macros: 0',
        'Functions:',
        'Macros:',
      ].join('\n'),
    )
  })

  it('numbers summaries from 1 and separates them with a blank line', () => {
    const a = analyzeSource('a.h', 'int a(void);')
    const b = analyzeSource('b.h', '#define B 2')
    const text = formatTextReport([a.summary, b.summary])
    expect(text.split('\n\n')).toEqual([formatSummary(a.summary, 1), formatSummary(b.summary, 2)])
    expect(formatReport([a, b])).toBe(text)
  })

  it('formats diagnostics as path:line:column', () => {
    expect(
      formatDiagnostic('src/x.h', {
        code: 'DeclarationSyntaxError',
        message: "expected ';' after declaration, found 'int'",
        line: 4,
        column: 1,
      }),
    ).toBe("src/x.h:4:1: DeclarationSyntaxError: expected ';' after declaration, found 'int'")
  })

  describe('json', () => {
    it('lists counts, rendered signatures, types and macros', () => {
      const report = JSON.parse(formatJsonReport([analysis]))
      const [file] = report.files
      expect(file.path).toBe('include/example.h')
      expect(file.counts).toEqual({ functions: 3, types: 1, macros: 3 })
      expect(file.functions[1]).toEqual({
        name: 'on_event',
        signature: 'void(void (*cb)(int), void *user, ...)',
        returnType: 'void',
        params: [
          { name: 'cb', type: 'void (*)(int)', declaration: 'void (*cb)(int)' },
          { name: 'user', type: 'void *', declaration: 'void *user' },
        ],
        variadic: true,
        definition: false,
        storage: null,
        line: 6,
      })
      expect(file.types).toEqual([
        { name: 'uint', kind: 'typedef', underlying: 'unsigned int', line: 4 },
      ])
      expect(file.macros[1]).toEqual({
        name: 'SQ',
        kind: 'function',
        params: ['x'],
        body: '((x)*(x))',
        line: 2,
        headerGuard: false,
        parameters: 'x',
      })
      expect(file.diagnostics).toEqual([])
    })

    it('is selected by formatReport', () => {
      expect(formatReport([analysis], 'json')).toBe(formatJsonReport([analysis]))
    })
  })
})
