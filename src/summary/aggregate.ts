import type { FunctionDecl, HeaderSummary, MacroDecl, TypeDecl } from '../ast/nodes'

export interface SummaryCounts {
  functions: number
  types: number
  macros: number
}

export function describeCounts(counts: SummaryCounts): string {
  return `Header file containing ${counts.functions} functions, ${counts.types} types, and ${counts.macros} macros`
}

/** Counts are always derived from the listings. */
export function summaryCounts(summary: HeaderSummary): SummaryCounts {
  return {
    functions: summary.functions.length,
    types: summary.types.length,
    macros: summary.macros.length,
  }
}

/**
 * Build the summary record for one file. Listings keep declaration order,
 * repeats included, and are frozen; the description is computed once from
 * their lengths.
 */
export function aggregate(
  path: string,
  functions: readonly FunctionDecl[],
  types: readonly TypeDecl[],
  macros: readonly MacroDecl[],
): HeaderSummary {
  const fns = Object.freeze([...functions])
  const tys = Object.freeze([...types])
  const mcs = Object.freeze([...macros])
  return Object.freeze({
    path,
    description: describeCounts({ functions: fns.length, types: tys.length, macros: mcs.length }),
    functions: fns,
    types: tys,
    macros: mcs,
  })
}
