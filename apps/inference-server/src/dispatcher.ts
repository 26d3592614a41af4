/**
 * Inference Dispatcher
 *
 * Per request: model check -> decode -> validate -> state check -> predict
 * -> encode -> record metrics. Requests never wait on each other; the only
 * shared objects are the metrics, the health monitor and the runtime's
 * read-only weights.
 */

import type { Logger } from '@tensorgate/shared'
import type { InferenceResponse, Tensor } from '@tensorgate/types'
import { decodeRequest, encodeResponse } from './codec'
import {
  InferenceError,
  InternalError,
  ModelNotFoundError,
  PredictionError,
  ServiceUnavailableError,
  errorMessage,
  isInferenceError,
} from './errors'
import type { HealthMonitor } from './health'
import type { InferenceMetrics } from './metrics'
import type { ModelRuntime } from './runtime/model-runtime'
import { validateRequest } from './validation'

export type DispatchOutcome =
  | { status: 'success'; response: InferenceResponse; body: string }
  | { status: 'error'; error: InferenceError }
  | { status: 'cancelled' }

export interface DispatcherDeps {
  runtime: ModelRuntime
  health: HealthMonitor
  metrics: InferenceMetrics
  logger: Logger
}

const NS_PER_SECOND = 1e9

export class InferenceDispatcher {
  constructor(private readonly deps: DispatcherDeps) {}

  async dispatch(
    modelName: string,
    body: string | Uint8Array,
    signal?: AbortSignal,
  ): Promise<DispatchOutcome> {
    const { runtime, health, metrics, logger } = this.deps
    const descriptor = runtime.describe()
    const model = descriptor.name
    const started = process.hrtime.bigint()
    const elapsed = () => Number(process.hrtime.bigint() - started) / NS_PER_SECOND

    metrics.requestStarted()
    try {
      if (modelName !== model) {
        throw new ModelNotFoundError(modelName)
      }

      const request = decodeRequest(body)
      validateRequest(request, descriptor)

      if (!health.canServe()) {
        throw new ServiceUnavailableError(health.state)
      }

      let outputs: Tensor[]
      try {
        outputs = await runtime.predict(request.inputs)
      } catch (error) {
        health.recordFailure()
        throw error instanceof PredictionError
          ? error
          : new PredictionError('runtime', errorMessage(error))
      }
      health.recordSuccess()

      if (signal?.aborted) {
        logger.debug('Request cancelled before response', { id: request.id, model })
        return { status: 'cancelled' }
      }

      const response: InferenceResponse = {
        id: request.id,
        model_name: model,
        model_version: descriptor.versions[0] ?? '',
        outputs,
      }
      const encoded = encodeResponse(response)
      const duration = elapsed()
      metrics.record(model, { status: 'success' }, duration)
      logger.debug('Inference OK', {
        id: request.id,
        model,
        outputs: outputs.length,
        latencyMs: duration * 1000,
      })
      return { status: 'success', response, body: encoded }
    } catch (error) {
      if (signal?.aborted) {
        return { status: 'cancelled' }
      }

      if (!isInferenceError(error)) {
        const internal = new InternalError(errorMessage(error))
        metrics.record(model, { status: 'error', kind: internal.kind }, elapsed())
        logger.error('Unexpected dispatch error', { model, error: internal.message })
        throw error
      }

      const failure = error
      const reason = failure instanceof PredictionError ? failure.failure : undefined
      metrics.record(model, { status: 'error', kind: failure.kind, reason }, elapsed())
      const log = failure.status >= 500 ? logger.warn : logger.debug
      log('Inference failed', {
        model,
        kind: failure.kind,
        reason: reason ?? null,
        error: failure.message,
      })
      return { status: 'error', error: failure }
    } finally {
      metrics.requestFinished()
    }
  }
}
