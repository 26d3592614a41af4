/**
 * Inference server entrypoint
 *
 * Probes are served while the model loads, so the orchestrator can see the
 * `loading` and `failed` states. A failed load is not retried here.
 */

import { serve } from '@hono/node-server'
import { createLogger } from '@tensorgate/shared'
import { loadConfig } from './config'
import { errorMessage } from './errors'
import { HealthMonitor } from './health'
import { startModel } from './loader'
import { InferenceMetrics } from './metrics'
import { IrisClassifier } from './runtime/iris-classifier'
import { createServer } from './server'

const logger = createLogger('inference-server')
const config = loadConfig()

const runtime = new IrisClassifier({ weightsPath: config.model.weightsPath })
const modelName = runtime.describe().name
const metrics = new InferenceMetrics({
  latencyBuckets: config.metrics.latencyBuckets,
})
const health = new HealthMonitor({
  degradedThreshold: config.health.degradedThreshold,
  degradedWindowMs: config.health.degradedWindowMs,
})

metrics.setModelState(modelName, health.state)
metrics.setModelLoaded(modelName, false)
health.onTransition((change) => {
  metrics.setModelState(modelName, change.to)
  const log = change.to === 'failed' || change.to === 'degraded' ? logger.warn : logger.info
  log('Model state changed', {
    model: modelName,
    from: change.from,
    to: change.to,
    reason: change.reason,
  })
})

const app = createServer({
  runtime,
  health,
  metrics,
  logger,
  corsOrigins: config.corsOrigins,
})

const server = serve(
  { fetch: app.fetch, port: config.port, hostname: config.host },
  (info) => {
    logger.info('Inference server listening', {
      host: config.host,
      port: info.port,
      model: modelName,
    })
  },
)

void startModel(
  { runtime, health, metrics, logger },
  { timeoutMs: config.model.loadTimeoutMs, warmUp: config.model.warmUp },
).catch((error: unknown) => {
  logger.error('Serving probes only; model unavailable', {
    model: modelName,
    error: errorMessage(error),
  })
})

function shutdown(signal: string): void {
  logger.info('Shutting down', { signal })
  server.close((error) => {
    if (error) {
      logger.error('Error while closing server', { error: error.message })
      process.exit(1)
    }
    process.exit(0)
  })
}

process.on('SIGINT', () => shutdown('SIGINT'))
process.on('SIGTERM', () => shutdown('SIGTERM'))
