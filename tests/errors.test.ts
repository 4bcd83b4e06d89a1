import {
  AnalyzerError,
  ConfigError,
  DeclarationSyntaxError,
  IoError,
  LexError,
  getErrorMessage,
  isAnalyzerError,
  wrapError,
} from '../src/errors'

describe('errors', () => {
  it('turns source errors into diagnostics', () => {
    const error = new DeclarationSyntaxError("expected ';' after declaration, found 'int'", {
      line: 3,
      column: 7,
    })
    expect(error).toBeInstanceOf(AnalyzerError)
    expect(error.name).toBe('DeclarationSyntaxError')
    expect(error.toDiagnostic()).toEqual({
      code: 'DeclarationSyntaxError',
      message: "expected ';' after declaration, found 'int'",
      line: 3,
      column: 7,
    })
  })

  it('keeps the location in the error context', () => {
    const error = new LexError("unrecognized character '@'", { line: 1, column: 5 })
    expect(error.toJSON()).toEqual({
      error: "unrecognized character '@'",
      code: 'LexError',
      context: { line: 1, column: 5 },
    })
  })

  it('records the path of an IoError', () => {
    const error = new IoError("cannot read 'a.h': denied", 'a.h', { attempt: 1 })
    expect(error.path).toBe('a.h')
    expect(error.code).toBe('IoError')
    expect(error.context).toEqual({ attempt: 1, path: 'a.h' })
  })

  it('wraps unknown failures with a description', () => {
    const cause = new Error('boom')
    const wrapped = wrapError(cause, 'analyzing a.h', { file: 'a.h' })
    expect(wrapped.message).toBe('analyzing a.h: boom')
    expect(wrapped.code).toBe('InternalError')
    expect(wrapped.context).toEqual({ file: 'a.h' })
    expect(wrapped.stack).toContain('Caused by:')
    expect(wrapError('plain', 'loading').message).toBe('loading: plain')
  })

  it('recognizes analyzer errors', () => {
    expect(isAnalyzerError(new ConfigError('bad'))).toBe(true)
    expect(isAnalyzerError(new Error('bad'))).toBe(false)
  })

  it('reads a message from anything thrown', () => {
    expect(getErrorMessage(new Error('x'))).toBe('x')
    expect(getErrorMessage(42)).toBe('42')
  })
})
