/**
 * @fileoverview Model lifecycle and probe response types
 *
 * Endpoints:
 * - GET /health - Liveness (healthy unless the model failed to load)
 * - GET /ready - Readiness (only while the model state is `ready`)
 * - GET /v2/health/live, GET /v2/health/ready - V2 protocol equivalents
 */

import { z } from 'zod'

// ============ Model State ============

export const ModelStateSchema = z.enum([
  'unloaded',
  'loading',
  'ready',
  'degraded',
  'failed',
])
export type ModelState = z.infer<typeof ModelStateSchema>

// ============ Liveness ============

export const HealthResponseSchema = z.object({
  status: z.enum(['ok', 'unhealthy']),
  model_loaded: z.boolean(),
  model: z.string(),
  state: ModelStateSchema,
})
export type HealthResponse = z.infer<typeof HealthResponseSchema>

// ============ Readiness ============

export const ReadinessResponseSchema = z.union([
  z.object({ status: z.literal('ready') }),
  z.object({ status: z.literal('not_ready'), state: ModelStateSchema }),
])
export type ReadinessResponse = z.infer<typeof ReadinessResponseSchema>
