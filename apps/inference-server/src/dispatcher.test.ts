import { WireInferenceResponseSchema } from '@tensorgate/types'
import { describe, expect, test } from 'vitest'
import { DEFAULT_WEIGHTS_PATH } from './config'
import { InferenceDispatcher } from './dispatcher'
import { HealthMonitor } from './health'
import { InferenceMetrics } from './metrics'
import type { ModelRuntime } from './runtime/model-runtime'
import { IrisClassifier } from './runtime/iris-classifier'
import { StubRuntime, silentLogger } from './testing'

const SCENARIO = JSON.stringify({
  id: 'req-001',
  inputs: [
    { name: 'input', shape: [1, 4], datatype: 'FP32', data: [5.1, 3.5, 1.4, 0.2] },
  ],
})

function setup(runtime: ModelRuntime, options: { ready?: boolean; threshold?: number } = {}) {
  const health = new HealthMonitor({
    degradedThreshold: options.threshold ?? 3,
    degradedWindowMs: 60_000,
  })
  if (options.ready ?? true) {
    health.beginLoading()
    health.markLoaded()
  }
  const metrics = new InferenceMetrics()
  const dispatcher = new InferenceDispatcher({
    runtime,
    health,
    metrics,
    logger: silentLogger(),
  })
  return { dispatcher, health, metrics }
}

describe('InferenceDispatcher', () => {
  test('serves a single-row iris request', async () => {
    const runtime = new IrisClassifier({ weightsPath: DEFAULT_WEIGHTS_PATH })
    await runtime.load()
    const { dispatcher, metrics } = setup(runtime)

    const outcome = await dispatcher.dispatch('iris-classifier', SCENARIO)

    expect(outcome.status).toBe('success')
    if (outcome.status !== 'success') return
    const body = WireInferenceResponseSchema.parse(JSON.parse(outcome.body))
    expect(body.id).toBe('req-001')
    expect(body.model_name).toBe('iris-classifier')
    expect(body.model_version).toBe('v1.0.0')
    expect(body.outputs.find((o) => o.name === 'predicted_class')).toEqual({
      name: 'predicted_class',
      datatype: 'BYTES',
      shape: [1],
      data: ['setosa'],
    })
    expect(metrics.requestCount('iris-classifier', 'success')).toBe(1)
    expect(metrics.latencySnapshot('iris-classifier').count).toBe(1)
  })

  test('counts prediction failures by reason', async () => {
    const runtime = new IrisClassifier({ weightsPath: DEFAULT_WEIGHTS_PATH })
    await runtime.load()
    const { dispatcher, metrics } = setup(runtime)
    const raw = JSON.stringify({
      inputs: [{ name: 'input', shape: [1, 4], datatype: 'FP32', data: [5.1, -3.5, 1.4, 0.2] }],
    })

    const outcome = await dispatcher.dispatch('iris-classifier', raw)

    expect(outcome.status === 'error' && outcome.error.kind).toBe('prediction_failed')
    expect(metrics.errorCount('iris-classifier', 'prediction_failed')).toBe(1)
    expect(metrics.predictionFailureCount('iris-classifier', 'out_of_range')).toBe(1)
    expect(metrics.predictionFailureCount('iris-classifier', 'numerical')).toBe(0)
  })

  test('rejects a shape mismatch before prediction', async () => {
    const runtime = new StubRuntime()
    const { dispatcher, metrics } = setup(runtime)
    const raw = JSON.stringify({
      id: 'req-002',
      inputs: [{ name: 'input', shape: [1, 3], datatype: 'FP32', data: [5.1, 3.5, 1.4, 0.2] }],
    })

    expect(metrics.errorCount('stub-model', 'shape_mismatch')).toBe(0)
    const outcome = await dispatcher.dispatch('stub-model', raw)

    expect(outcome.status).toBe('error')
    if (outcome.status !== 'error') return
    expect(outcome.error.kind).toBe('shape_mismatch')
    expect(outcome.error.status).toBe(400)
    expect(runtime.predictCalls).toBe(0)
    expect(metrics.errorCount('stub-model', 'shape_mismatch')).toBe(1)
    expect(metrics.requestCount('stub-model', 'error')).toBe(1)
  })

  test('reports unknown models', async () => {
    const { dispatcher, metrics } = setup(new StubRuntime())

    const outcome = await dispatcher.dispatch('resnet', SCENARIO)

    expect(outcome.status === 'error' && outcome.error.kind).toBe('model_not_found')
    expect(metrics.errorCount('stub-model', 'model_not_found')).toBe(1)
  })

  test('refuses work until the model is loaded', async () => {
    const runtime = new StubRuntime()
    const { dispatcher } = setup(runtime, { ready: false })

    const outcome = await dispatcher.dispatch('stub-model', SCENARIO)

    expect(outcome.status === 'error' && outcome.error.toResponse()).toEqual({
      error: 'Model not ready (state: unloaded)',
      kind: 'service_unavailable',
    })
    expect(runtime.predictCalls).toBe(0)
  })

  test('degrades after repeated prediction failures and recovers', async () => {
    let failing = true
    const runtime = new StubRuntime({
      predict: async () => {
        if (failing) throw new Error('device lost')
        return [{ name: 'output', datatype: 'FP32', shape: [1, 1], data: [1] }]
      },
    })
    const { dispatcher, health, metrics } = setup(runtime, { threshold: 3 })

    for (let i = 0; i < 3; i++) {
      const outcome = await dispatcher.dispatch('stub-model', SCENARIO)
      expect(outcome.status === 'error' && outcome.error.toResponse()).toEqual({
        error: 'device lost',
        kind: 'prediction_failed',
      })
    }
    expect(health.state).toBe('degraded')
    expect(metrics.errorCount('stub-model', 'prediction_failed')).toBe(3)
    expect(metrics.predictionFailureCount('stub-model', 'runtime')).toBe(3)

    failing = false
    const recovered = await dispatcher.dispatch('stub-model', SCENARIO)

    expect(recovered.status).toBe('success')
    expect(health.state).toBe('ready')
  })

  test('counts every concurrent request exactly once', async () => {
    const runtime = new StubRuntime({
      predict: async (inputs) => {
        await new Promise((resolve) => setTimeout(resolve, 1))
        const first = inputs[0]
        const sum = first?.datatype === 'FP32' ? first.data.reduce((a, b) => a + b, 0) : 0
        return [{ name: 'output', datatype: 'FP32', shape: [1, 1], data: [sum] }]
      },
    })
    const { dispatcher, metrics } = setup(runtime)

    const outcomes = await Promise.all(
      Array.from({ length: 1000 }, () => dispatcher.dispatch('stub-model', SCENARIO)),
    )

    expect(outcomes.every((o) => o.status === 'success')).toBe(true)
    expect(metrics.requestCount('stub-model', 'success')).toBe(1000)
    expect(metrics.latencySnapshot('stub-model').count).toBe(1000)
    expect(metrics.activeRequests()).toBe(0)
  })

  test('drops the response of a cancelled request', async () => {
    const controller = new AbortController()
    const runtime = new StubRuntime({
      predict: async () => {
        controller.abort()
        return [{ name: 'output', datatype: 'FP32', shape: [1, 1], data: [0] }]
      },
    })
    const { dispatcher, metrics, health } = setup(runtime)

    const outcome = await dispatcher.dispatch('stub-model', SCENARIO, controller.signal)

    expect(outcome).toEqual({ status: 'cancelled' })
    expect(metrics.requestCount('stub-model', 'success')).toBe(0)
    expect(metrics.requestCount('stub-model', 'error')).toBe(0)
    expect(metrics.activeRequests()).toBe(0)
    expect(health.state).toBe('ready')
  })
})
