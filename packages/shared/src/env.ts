/**
 * Environment utilities
 *
 * Usage:
 *   import { getEnv, getEnvRecord } from '@tensorgate/shared';
 */

/**
 * Get an environment variable, treating empty strings as unset
 */
export function getEnv(key: string): string | undefined {
  const value = process.env[key]
  return value === undefined || value === '' ? undefined : value
}

/**
 * Whether the process runs with NODE_ENV=production
 */
export function isProduction(): boolean {
  return getEnv('NODE_ENV') === 'production'
}

/**
 * Snapshot the named environment variables (unset ones omitted)
 *
 * Used to hand a plain record to a zod schema for parsing.
 */
export function getEnvRecord(keys: readonly string[]): Record<string, string> {
  const record: Record<string, string> = {}
  for (const key of keys) {
    const value = getEnv(key)
    if (value !== undefined) record[key] = value
  }
  return record
}
