/**
 * Environment configuration for the analyzer and its CLI.
 */

import path from 'path'
import { z } from 'zod'
import { ConfigError } from './errors'

export const DEFAULT_CONCURRENCY = 8

export interface InventoryConfig {
  debug: boolean
  concurrency: number
  includeDirs: string[]
}

// ---------------------------------------------------------------------------
// Config Schema
// ---------------------------------------------------------------------------

const positiveInt = z.coerce
  .number({ invalid_type_error: 'must be a positive integer' })
  .int('must be a positive integer')
  .positive('must be a positive integer')

const envSchema = z.object({
  C_HEADER_INVENTORY_DEBUG: z
    .enum(['0', '1', 'true', 'false'], {
      errorMap: () => ({ message: 'must be one of 0, 1, true, false' }),
    })
    .transform((v) => v === '1' || v === 'true')
    .default('0'),
  C_HEADER_INVENTORY_CONCURRENCY: positiveInt.default(DEFAULT_CONCURRENCY),
  C_HEADER_INVENTORY_INCLUDE_PATH: z
    .string()
    .transform((v) => v.split(path.delimiter).filter((dir) => dir.length > 0))
    .default(''),
})

export type EnvironmentVariable = keyof z.input<typeof envSchema>

export const ENVIRONMENT_VARIABLES: readonly EnvironmentVariable[] = [
  'C_HEADER_INVENTORY_DEBUG',
  'C_HEADER_INVENTORY_CONCURRENCY',
  'C_HEADER_INVENTORY_INCLUDE_PATH',
]

// ---------------------------------------------------------------------------
// Config Loading
// ---------------------------------------------------------------------------

/**
 * Read and validate the environment. Unset and empty variables take their
 * defaults.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): InventoryConfig {
  const raw: Partial<Record<EnvironmentVariable, string>> = {}
  for (const name of ENVIRONMENT_VARIABLES) {
    const value = env[name]
    if (value !== undefined && value !== '') raw[name] = value
  }

  const result = envSchema.safeParse(raw)
  if (!result.success) {
    const issue = result.error.issues[0]
    const variable = String(issue.path[0])
    const value = env[variable]
    throw new ConfigError(`${variable} ${issue.message}, got "${value ?? ''}"`, {
      variable,
      value,
    })
  }

  return {
    debug: result.data.C_HEADER_INVENTORY_DEBUG,
    concurrency: result.data.C_HEADER_INVENTORY_CONCURRENCY,
    includeDirs: result.data.C_HEADER_INVENTORY_INCLUDE_PATH,
  }
}

/** Parse a `--concurrency`-style value. */
export function parsePositiveInt(value: string, name: string): number {
  const result = positiveInt.safeParse(value)
  if (!result.success) {
    throw new ConfigError(`${name} must be a positive integer, got "${value}"`, { name, value })
  }
  return result.data
}
