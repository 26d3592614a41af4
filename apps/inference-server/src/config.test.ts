import { isValidationError } from '@tensorgate/shared'
import { describe, expect, test } from 'vitest'
import { DEFAULT_LATENCY_BUCKETS, DEFAULT_WEIGHTS_PATH, parseConfig } from './config'

describe('parseConfig', () => {
  test('applies defaults to an empty environment', () => {
    expect(parseConfig({})).toEqual({
      port: 8080,
      host: '0.0.0.0',
      model: {
        weightsPath: DEFAULT_WEIGHTS_PATH,
        loadTimeoutMs: 30_000,
        warmUp: true,
      },
      health: { degradedThreshold: 5, degradedWindowMs: 60_000 },
      metrics: { latencyBuckets: DEFAULT_LATENCY_BUCKETS },
      corsOrigins: ['*'],
    })
  })

  test('reads overrides from the environment', () => {
    const config = parseConfig({
      PORT: '9000',
      MODEL_WARMUP: 'false',
      DEGRADED_FAILURE_THRESHOLD: '2',
      LATENCY_BUCKETS: '0.01, 0.1,1',
      CORS_ORIGINS: 'http://a.test, http://b.test',
    })

    expect(config.port).toBe(9000)
    expect(config.model.warmUp).toBe(false)
    expect(config.health.degradedThreshold).toBe(2)
    expect(config.metrics.latencyBuckets).toEqual([0.01, 0.1, 1])
    expect(config.corsOrigins).toEqual(['http://a.test', 'http://b.test'])
  })

  test.each([
    ['PORT', '70000'],
    ['MODEL_LOAD_TIMEOUT_MS', '-5'],
    ['MODEL_WARMUP', 'yes'],
    ['DEGRADED_FAILURE_THRESHOLD', '0'],
    ['LATENCY_BUCKETS', '0.5,0.1'],
    ['LATENCY_BUCKETS', '0.1,abc'],
  ])('rejects %s=%s', (key, value) => {
    let caught: unknown
    try {
      parseConfig({ [key]: value })
    } catch (error) {
      caught = error
    }

    expect(isValidationError(caught)).toBe(true)
    if (!isValidationError(caught)) return
    expect(caught.message).toMatch(new RegExp(`^Server configuration: ${key}\\b`))
  })
})
