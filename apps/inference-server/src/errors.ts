/**
 * Inference error taxonomy
 *
 * Every failure a dispatch can produce is an InferenceError carrying the
 * `kind` reported to clients and used as the metrics label.
 */

import type { ErrorKind, ErrorResponse, ModelState } from '@tensorgate/types'

export type DecodeErrorKind = Extract<
  ErrorKind,
  'malformed_payload' | 'unsupported_datatype'
>

export type RequestValidationErrorKind = Extract<
  ErrorKind,
  'shape_mismatch' | 'datatype_mismatch' | 'unknown_input' | 'missing_input'
>

/** Sub-kinds a runtime may report inside a prediction_failed error */
export type PredictionFailure =
  | 'not_loaded'
  | 'out_of_range'
  | 'numerical'
  | 'runtime'

export type ErrorStatus = 400 | 404 | 500 | 503

const STATUS_BY_KIND: Record<ErrorKind, ErrorStatus> = {
  malformed_payload: 400,
  unsupported_datatype: 400,
  shape_mismatch: 400,
  datatype_mismatch: 400,
  unknown_input: 400,
  missing_input: 400,
  model_not_found: 404,
  service_unavailable: 503,
  prediction_failed: 500,
  internal: 500,
}

export class InferenceError extends Error {
  readonly status: ErrorStatus

  constructor(
    readonly kind: ErrorKind,
    message: string,
  ) {
    super(message)
    this.name = 'InferenceError'
    this.status = STATUS_BY_KIND[kind]
  }

  toResponse(): ErrorResponse {
    return { error: this.message, kind: this.kind }
  }
}

export class DecodeError extends InferenceError {
  constructor(kind: DecodeErrorKind, message: string) {
    super(kind, message)
    this.name = 'DecodeError'
  }
}

export class RequestValidationError extends InferenceError {
  constructor(
    kind: RequestValidationErrorKind,
    message: string,
    readonly input?: string,
  ) {
    super(kind, message)
    this.name = 'RequestValidationError'
  }
}

export class ModelNotFoundError extends InferenceError {
  constructor(readonly requested: string) {
    super('model_not_found', `Model '${requested}' is not served here`)
    this.name = 'ModelNotFoundError'
  }
}

export class ServiceUnavailableError extends InferenceError {
  constructor(readonly state: ModelState) {
    super('service_unavailable', `Model not ready (state: ${state})`)
    this.name = 'ServiceUnavailableError'
  }
}

export class PredictionError extends InferenceError {
  constructor(
    readonly failure: PredictionFailure,
    message: string,
  ) {
    super('prediction_failed', message)
    this.name = 'PredictionError'
  }
}

export class InternalError extends InferenceError {
  constructor(message: string) {
    super('internal', message)
    this.name = 'InternalError'
  }
}

/** Startup failure; leaves the model in the failed state */
export class LoadError extends Error {
  constructor(
    message: string,
    readonly reason: 'timeout' | 'error',
  ) {
    super(message)
    this.name = 'LoadError'
  }
}

export function isInferenceError(error: unknown): error is InferenceError {
  return error instanceof InferenceError
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
