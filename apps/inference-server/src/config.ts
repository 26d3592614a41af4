/**
 * @fileoverview Inference server configuration
 *
 * Loads from environment variables and provides defaults.
 */

import { fileURLToPath } from 'node:url'
import { expectValid, getEnvRecord } from '@tensorgate/shared'
import { z } from 'zod'

export const DEFAULT_LATENCY_BUCKETS = [
  0.0005, 0.001, 0.0025, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5,
  10,
]

export const DEFAULT_WEIGHTS_PATH = fileURLToPath(
  new URL('../models/iris-classifier.json', import.meta.url),
)

const booleanString = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1')

const bucketList = z
  .string()
  .transform((value) => value.split(',').map((part) => Number(part.trim())))
  .pipe(
    z
      .array(z.number().positive().finite())
      .min(1, 'At least one bucket is required')
      .refine(
        (buckets) => buckets.every((b, i) => i === 0 || b > (buckets[i - 1] ?? 0)),
        'Buckets must be strictly increasing',
      ),
  )

const ConfigEnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  HOST: z.string().default('0.0.0.0'),
  MODEL_WEIGHTS_PATH: z.string().default(DEFAULT_WEIGHTS_PATH),
  MODEL_LOAD_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  MODEL_WARMUP: booleanString.default('true'),
  DEGRADED_FAILURE_THRESHOLD: z.coerce.number().int().positive().default(5),
  DEGRADED_WINDOW_MS: z.coerce.number().int().positive().default(60_000),
  LATENCY_BUCKETS: bucketList.optional(),
  CORS_ORIGINS: z.string().default('*'),
})

export interface ServerConfig {
  port: number
  host: string
  model: {
    weightsPath: string
    loadTimeoutMs: number
    warmUp: boolean
  }
  health: {
    degradedThreshold: number
    degradedWindowMs: number
  }
  metrics: {
    latencyBuckets: number[]
  }
  corsOrigins: string[]
}

const ENV_KEYS = Object.keys(ConfigEnvSchema.shape)

/**
 * Parse configuration from an environment record.
 * Throws the shared ValidationError on invalid values.
 */
export function parseConfig(env: Record<string, string | undefined>): ServerConfig {
  const parsed = expectValid(ConfigEnvSchema, env, 'Server configuration')
  return {
    port: parsed.PORT,
    host: parsed.HOST,
    model: {
      weightsPath: parsed.MODEL_WEIGHTS_PATH,
      loadTimeoutMs: parsed.MODEL_LOAD_TIMEOUT_MS,
      warmUp: parsed.MODEL_WARMUP,
    },
    health: {
      degradedThreshold: parsed.DEGRADED_FAILURE_THRESHOLD,
      degradedWindowMs: parsed.DEGRADED_WINDOW_MS,
    },
    metrics: {
      latencyBuckets: parsed.LATENCY_BUCKETS ?? [...DEFAULT_LATENCY_BUCKETS],
    },
    corsOrigins: parsed.CORS_ORIGINS.split(',')
      .map((origin) => origin.trim())
      .filter((origin) => origin.length > 0),
  }
}

export function loadConfig(): ServerConfig {
  return parseConfig(getEnvRecord(ENV_KEYS))
}
