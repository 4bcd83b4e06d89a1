const PREFIX = '[c-header-inventory]'

let enabled = false

// Keep this extremely low overhead when disabled.
export function isDebugEnabled(): boolean {
  return enabled || process.env.C_HEADER_INVENTORY_DEBUG === '1'
}

/**
 * Enable/disable debug logging programmatically. The CLI's `--verbose` and
 * tests use this.
 */
export function setDebugEnabled(v: boolean): void {
  enabled = v
}

// stdout carries the report, so everything here goes to stderr
export function logDebug(...args: unknown[]): void {
  if (!isDebugEnabled()) return
  console.error(PREFIX, ...args)
}

export function logInfo(...args: unknown[]): void {
  if (!isDebugEnabled()) return
  console.error(PREFIX, ...args)
}

export function logWarn(...args: unknown[]): void {
  if (!isDebugEnabled()) return
  console.warn(PREFIX, ...args)
}
