/**
 * Model startup: load + warm-up bounded by a timeout, driving the health
 * monitor to `ready` or `failed`.
 */

import type { Logger } from '@tensorgate/shared'
import { LoadError, errorMessage } from './errors'
import type { HealthMonitor } from './health'
import type { InferenceMetrics } from './metrics'
import type { ModelRuntime } from './runtime/model-runtime'

export interface StartModelOptions {
  timeoutMs: number
  warmUp: boolean
}

export interface StartModelDeps {
  runtime: ModelRuntime
  health: HealthMonitor
  metrics: InferenceMetrics
  logger: Logger
}

function withTimeout<T>(work: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new LoadError(`Model load timed out after ${timeoutMs}ms`, 'timeout')),
      timeoutMs,
    )
  })
  return Promise.race([work, timeout]).finally(() => clearTimeout(timer))
}

/**
 * Load and warm up the runtime. Resolves once the model is ready; rejects
 * with LoadError after marking the model failed.
 */
export async function startModel(
  deps: StartModelDeps,
  options: StartModelOptions,
): Promise<void> {
  const { runtime, health, metrics, logger } = deps
  const model = runtime.describe().name
  const started = Date.now()

  health.beginLoading()
  metrics.setModelLoaded(model, false)
  logger.info('Loading model', { model, timeoutMs: options.timeoutMs })

  const work = (async () => {
    await runtime.load()
    if (options.warmUp) {
      await runtime.warmUp()
    }
  })()

  try {
    await withTimeout(work, options.timeoutMs)
  } catch (error) {
    const loadError =
      error instanceof LoadError
        ? error
        : new LoadError(`Model load failed: ${errorMessage(error)}`, 'error')
    health.markFailed(loadError.message)
    metrics.setModelLoaded(model, false)
    logger.error('Model load failed', {
      model,
      reason: loadError.reason,
      error: loadError.message,
    })
    throw loadError
  }

  health.markLoaded()
  metrics.setModelLoaded(model, true)
  logger.info('Model loaded', { model, durationMs: Date.now() - started })
}
