import { readdirSync } from 'fs'
import path from 'path'
import { fileURLToPath } from 'url'
import { named, functionPointer, param, primitive, pointer } from '../src/ast/builders'
import { renderSignature } from '../src/ast/render'
import { analyzeFile, analyzeWithIncludes } from '../src/workspace'

const fixturesDir = fileURLToPath(new URL('../fixtures', import.meta.url))
const fixtureFiles = readdirSync(fixturesDir).filter((f) => f.endsWith('.h') || f.endsWith('.c'))

async function analyzeFixture(name: string) {
  return analyzeFile(path.join(fixturesDir, name))
}

describe('fixtures', () => {
  for (const file of fixtureFiles) {
    it(`${file} analyzes without diagnostics`, async () => {
      const analysis = await analyzeFixture(file)
      expect(analysis.diagnostics).toEqual([])
    })
  }

  it('vector.h', async () => {
    const { summary, includes } = await analyzeFixture('vector.h')
    expect(summary.description).toBe('Header file containing 5 functions, 2 types, and 3 macros')
    expect(summary.functions.map((fn) => `${fn.name}: ${renderSignature(fn)}`)).toEqual([
      'vector_new: vector_t *(size_t capacity)',
      'vector_free: void(vector_t *v)',
      'vector_push: int(vector_t *v, void *item)',
      'vector_sort: void(vector_t *v, vector_cmp cmp)',
      'vector_len: size_t(const vector_t *v)',
    ])
    expect(summary.types.map((t) => [t.name, t.kind, t.line])).toEqual([
      ['vector_t', 'struct', 13],
      ['vector_cmp', 'typedef', 15],
    ])
    expect(summary.macros.map((m) => [m.name, m.isHeaderGuard, m.body])).toEqual([
      ['VECTOR_H', true, ''],
      ['VECTOR_INITIAL_CAPACITY', false, '16'],
      ['VECTOR_AT', false, '((v)->items[(i)])'],
    ])
    expect(includes).toEqual([{ path: 'stddef.h', isSystem: true, line: 4 }])
  })

  it('callbacks.h', async () => {
    const { summary } = await analyzeFixture('callbacks.h')
    expect(summary.functions.map((fn) => `${fn.name}: ${renderSignature(fn)}`)).toEqual([
      'cb_register: cb_status(const char *name, cb_handler handler, void *user)',
      'cb_lookup: void (*)(int, void *)(const char *name)',
      'cb_emit: int(int event, ...)',
    ])
    expect(summary.functions[1].returnType).toEqual(
      functionPointer(primitive('void'), [param(primitive('int')), param(pointer(primitive('void')))]),
    )
    expect(summary.types).toEqual([
      { name: 'cb_status', kind: 'enum', underlying: named('cb_status', 'enum'), line: 10 },
      {
        name: 'cb_handler',
        kind: 'typedef',
        underlying: functionPointer(primitive('void'), [
          param(primitive('int'), 'event'),
          param(pointer(primitive('void')), 'user'),
        ]),
        line: 11,
      },
    ])
    expect(summary.macros.map((m) => [m.name, m.isHeaderGuard])).toEqual([
      ['CB_API', false],
      ['CB_VERSION', false],
    ])
  })

  it('platform.h', async () => {
    const { summary } = await analyzeFixture('platform.h')
    expect(summary.description).toBe('Header file containing 3 functions, 0 types, and 4 macros')
    expect(summary.functions.map((fn) => [fn.name, renderSignature(fn), fn.line])).toEqual([
      ['platform_init', 'int()', 12],
      ['platform_name', 'const char *()', 13],
      ['platform_ticks', 'unsigned long long()', 14],
    ])
    expect(summary.macros.map((m) => [m.name, m.body, m.line])).toEqual([
      ['PLATFORM_H', '', 2],
      ['PLATFORM_EXPORT', '__declspec(dllexport)', 5],
      ['PLATFORM_EXPORT', '__attribute__((visibility("default")))', 7],
      ['PLATFORM_UNUSED', '(void)(x)', 10],
    ])
  })

  it('legacy.c', async () => {
    const { summary } = await analyzeFixture('legacy.c')
    expect(
      summary.functions.map((fn) => [fn.name, renderSignature(fn), fn.isDefinition, fn.storage, fn.line]),
    ).toEqual([
      ['bump', 'int(int step)', true, 'static', 7],
      ['main', 'int(int argc, char **argv)', true, undefined, 14],
    ])
    expect(summary.types).toEqual([])
  })

  it('follows legacy.c into vector.h', async () => {
    const entry = path.join(fixturesDir, 'legacy.c')
    const result = await analyzeWithIncludes(entry)
    expect(result.analyses.map((a) => path.basename(a.summary.path))).toEqual(['vector.h', 'legacy.c'])
    expect(result.unresolved).toEqual([])
  })
})
