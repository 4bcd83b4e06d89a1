import type { Diagnostic, DiagnosticCode } from './ast/nodes'

export type ErrorCode = DiagnosticCode | 'IoError' | 'ConfigError' | 'InternalError'

export interface ErrorLocation {
  line: number
  column: number
}

/**
 * Base error class for everything the analyzer raises or records.
 */
export class AnalyzerError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message)
    this.name = 'AnalyzerError'

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  toJSON(): { error: string; code: ErrorCode; context?: Record<string, unknown> } {
    return {
      error: this.message,
      code: this.code,
      context: this.context,
    }
  }
}

/**
 * Non-fatal problem tied to a source position. These never abort analysis of a
 * file; they are turned into diagnostics on the file's result.
 */
export abstract class SourceError extends AnalyzerError {
  constructor(
    message: string,
    public readonly diagnosticCode: DiagnosticCode,
    public readonly location: ErrorLocation,
  ) {
    super(message, diagnosticCode, { ...location })
  }

  toDiagnostic(): Diagnostic {
    return {
      code: this.diagnosticCode,
      message: this.message,
      line: this.location.line,
      column: this.location.column,
    }
  }
}

/** Unrecognized character sequence; the token is marked Unknown. */
export class LexError extends SourceError {
  constructor(message: string, location: ErrorLocation) {
    super(message, 'LexError', location)
    this.name = 'LexError'
  }
}

/** Malformed `#define`; the macro is skipped. */
export class MacroSyntaxError extends SourceError {
  constructor(message: string, location: ErrorLocation) {
    super(message, 'MacroSyntaxError', location)
    this.name = 'MacroSyntaxError'
  }
}

/** Unparseable declaration; the parser resynchronizes after it. */
export class DeclarationSyntaxError extends SourceError {
  constructor(message: string, location: ErrorLocation) {
    super(message, 'DeclarationSyntaxError', location)
    this.name = 'DeclarationSyntaxError'
  }
}

/** Missing or unreadable input path. Fatal for that file only. */
export class IoError extends AnalyzerError {
  constructor(
    message: string,
    public readonly path: string,
    context?: Record<string, unknown>,
  ) {
    super(message, 'IoError', { ...context, path })
    this.name = 'IoError'
  }
}

export class ConfigError extends AnalyzerError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'ConfigError', context)
    this.name = 'ConfigError'
  }
}

/**
 * Wrap an unknown thrown value with a message describing what failed.
 */
export function wrapError(
  error: unknown,
  context: string,
  additionalContext?: Record<string, unknown>,
): AnalyzerError {
  const message = getErrorMessage(error)
  const wrapped = new AnalyzerError(`${context}: ${message}`, 'InternalError', additionalContext)
  const stack = error instanceof Error ? error.stack : undefined
  if (stack) {
    wrapped.stack = `${wrapped.stack}\n\nCaused by:\n${stack}`
  }
  return wrapped
}

export function isAnalyzerError(error: unknown): error is AnalyzerError {
  return error instanceof AnalyzerError
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message
  }
  return String(error)
}
