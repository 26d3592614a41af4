/**
 * Inference Server - HTTP surface
 *
 * - POST /v2/models/:name/infer   V2 inference
 * - GET  /v2/models/:name         Model metadata
 * - GET  /v2/models/:name/ready   Model readiness
 * - GET  /v2                      Server metadata
 * - GET  /v2/health/live|ready    V2 probes
 * - GET  /health, /ready          Orchestrator probes
 * - GET  /metrics                 Prometheus exposition
 */

import type { Logger } from '@tensorgate/shared'
import type {
  ErrorResponse,
  HealthResponse,
  ReadinessResponse,
  ServerMetadata,
} from '@tensorgate/types'
import { Hono } from 'hono'
import { cors } from 'hono/cors'
import { InferenceDispatcher } from './dispatcher'
import { ModelNotFoundError } from './errors'
import type { HealthMonitor } from './health'
import { type InferenceMetrics, PROMETHEUS_CONTENT_TYPE } from './metrics'
import type { ModelRuntime } from './runtime/model-runtime'

export const SERVER_NAME = 'tensorgate'
export const SERVER_VERSION = '1.0.0'

export interface ServerDeps {
  runtime: ModelRuntime
  health: HealthMonitor
  metrics: InferenceMetrics
  logger: Logger
  corsOrigins?: string[]
}

interface AppEnv {
  Variables: {
    requestId: string
  }
}

export function createServer(deps: ServerDeps): Hono<AppEnv> {
  const { runtime, health, metrics, logger } = deps
  const dispatcher = new InferenceDispatcher({ runtime, health, metrics, logger })
  const app = new Hono<AppEnv>()

  const origins = deps.corsOrigins ?? ['*']
  app.use(
    '/*',
    cors({
      origin: origins.includes('*') ? '*' : origins,
      allowMethods: ['GET', 'POST', 'OPTIONS'],
      allowHeaders: ['Content-Type', 'X-Request-Id'],
      exposeHeaders: ['X-Request-Id'],
    }),
  )

  // Request ID + access log
  app.use('/*', async (c, next) => {
    const requestId =
      c.req.header('x-request-id') ??
      `req-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`
    c.set('requestId', requestId)
    c.header('X-Request-Id', requestId)
    const start = Date.now()
    await next()
    logger.debug('HTTP request', {
      requestId,
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Date.now() - start,
    })
  })

  app.onError((err, c) => {
    logger.error('Unhandled request error', {
      requestId: c.get('requestId'),
      error: err.message,
    })
    const body: ErrorResponse = {
      error: 'Internal server error',
      kind: 'internal',
    }
    return c.json(body, 500)
  })

  app.notFound((c) => c.json({ error: 'Not found' }, 404))

  // ============ Probes ============

  app.get('/health', (c) => {
    const live = health.isLive()
    const body: HealthResponse = {
      status: live ? 'ok' : 'unhealthy',
      model_loaded: health.canServe(),
      model: runtime.describe().name,
      state: health.state,
    }
    return c.json(body, live ? 200 : 503)
  })

  app.get('/ready', (c) => {
    const body: ReadinessResponse = health.isReady()
      ? { status: 'ready' }
      : { status: 'not_ready', state: health.state }
    return c.json(body, health.isReady() ? 200 : 503)
  })

  app.get('/metrics', (c) =>
    c.body(metrics.render(), 200, { 'Content-Type': PROMETHEUS_CONTENT_TYPE }),
  )

  // ============ V2 protocol ============

  app.get('/v2', (c) => {
    const body: ServerMetadata = {
      name: SERVER_NAME,
      version: SERVER_VERSION,
      extensions: [],
    }
    return c.json(body)
  })

  app.get('/v2/health/live', (c) => {
    const live = health.isLive()
    return c.json({ live }, live ? 200 : 503)
  })

  app.get('/v2/health/ready', (c) => {
    const ready = health.isReady()
    return c.json({ ready }, ready ? 200 : 503)
  })

  app.get('/v2/models/:name', (c) => {
    const descriptor = runtime.describe()
    const name = c.req.param('name')
    if (name !== descriptor.name) {
      const error = new ModelNotFoundError(name)
      return c.json(error.toResponse(), 404)
    }
    return c.json(descriptor)
  })

  app.get('/v2/models/:name/ready', (c) => {
    const descriptor = runtime.describe()
    const name = c.req.param('name')
    if (name !== descriptor.name) {
      const error = new ModelNotFoundError(name)
      return c.json(error.toResponse(), 404)
    }
    const ready = health.isReady()
    return c.json({ name, ready }, ready ? 200 : 503)
  })

  app.post('/v2/models/:name/infer', async (c) => {
    const body = new Uint8Array(await c.req.arrayBuffer())
    const outcome = await dispatcher.dispatch(
      c.req.param('name'),
      body,
      c.req.raw.signal,
    )

    switch (outcome.status) {
      case 'success':
        return c.body(outcome.body, 200, { 'Content-Type': 'application/json' })
      case 'error':
        return c.json(outcome.error.toResponse(), outcome.error.status)
      case 'cancelled':
        // Client is gone; nothing will read this
        return new Response(null, { status: 499 })
    }
  })

  return app
}
