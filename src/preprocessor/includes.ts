import { TokenKind } from '../lexer/token'
import type { Include } from '../ast/nodes'
import type { Directive } from './directives'

/**
 * `#include "x.h"` and `#include <x.h>` directives in source order. Computed
 * includes (`#include HEADER`) are ignored: resolving them needs macro
 * expansion.
 */
export function extractIncludes(directives: readonly Directive[], text: string): Include[] {
  const includes: Include[] = []
  for (const directive of directives) {
    if (directive.name !== 'include' && directive.name !== 'include_next') continue
    const toks = directive.tokens
    if (toks.length === 0) continue

    const first = toks[0]
    if (first.kind === TokenKind.StringLiteral && first.text.startsWith('"')) {
      includes.push({ path: first.text.slice(1, -1), isSystem: false, line: directive.hash.line })
      continue
    }

    if (first.kind === TokenKind.Punctuator && first.text === '<') {
      const close = toks.findIndex((t) => t.kind === TokenKind.Punctuator && t.text === '>')
      if (close === -1) continue
      // Header names are raw text, not tokens: `<sys/types.h>` keeps its slashes
      const path = text.substring(first.end, toks[close].start).trim()
      if (path.length > 0) {
        includes.push({ path, isSystem: true, line: directive.hash.line })
      }
    }
  }
  return includes
}
