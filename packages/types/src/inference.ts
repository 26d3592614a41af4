/**
 * @fileoverview V2 inference protocol wire types
 *
 * Request:  { id?, inputs: [{ name, shape, datatype, data }], parameters? }
 * Response: { id, model_name, model_version, outputs: [{ name, shape, datatype, data }] }
 */

import { z } from 'zod'

// ============ Datatypes ============

export const DatatypeSchema = z.enum([
  'FP32',
  'FP64',
  'INT32',
  'INT64',
  'BOOL',
  'BYTES',
])
export type Datatype = z.infer<typeof DatatypeSchema>

/** Wire names accepted on input; STRING is read as BYTES */
export const DATATYPE_ALIASES: Readonly<Record<string, Datatype>> = {
  STRING: 'BYTES',
}

// ============ Tensors ============

export type NumericDatatype = 'FP32' | 'FP64' | 'INT32' | 'INT64'

interface TensorBase {
  readonly name: string
  readonly shape: readonly number[]
}

export interface NumericTensor extends TensorBase {
  readonly datatype: NumericDatatype
  readonly data: readonly number[]
}

export interface BoolTensor extends TensorBase {
  readonly datatype: 'BOOL'
  readonly data: readonly boolean[]
}

export interface BytesTensor extends TensorBase {
  readonly datatype: 'BYTES'
  readonly data: readonly string[]
}

export type Tensor = NumericTensor | BoolTensor | BytesTensor

export const ShapeSchema = z.array(z.number().int().nonnegative())

/** `data` may be nested row-major arrays; the codec flattens them */
export const WireTensorSchema = z.object({
  name: z.string().min(1, 'Tensor name is required'),
  shape: ShapeSchema,
  datatype: z.string().min(1, 'Datatype is required'),
  data: z.array(z.unknown()),
  parameters: z.record(z.string(), z.unknown()).optional(),
})
export type WireTensor = z.infer<typeof WireTensorSchema>

export const WireInferenceRequestSchema = z.object({
  id: z.string().optional(),
  inputs: z.array(WireTensorSchema).min(1, 'At least one input is required'),
  parameters: z.record(z.string(), z.unknown()).optional(),
})

export const WireInferenceResponseSchema = z.object({
  id: z.string(),
  model_name: z.string(),
  model_version: z.string(),
  outputs: z.array(WireTensorSchema),
})
export type WireInferenceResponse = z.infer<typeof WireInferenceResponseSchema>

// ============ Request / Response ============

export interface InferenceRequest {
  readonly id: string
  readonly inputs: readonly Tensor[]
}

export interface InferenceResponse {
  readonly id: string
  readonly model_name: string
  readonly model_version: string
  readonly outputs: readonly Tensor[]
}

// ============ Model Metadata ============

export const TensorSpecSchema = z.object({
  name: z.string(),
  datatype: DatatypeSchema,
  /** -1 matches any size in that dimension */
  shape: z.array(z.number().int().min(-1)),
  optional: z.boolean().optional(),
})
export type TensorSpec = z.infer<typeof TensorSpecSchema>

export const ModelDescriptorSchema = z.object({
  name: z.string(),
  versions: z.array(z.string()),
  platform: z.string(),
  inputs: z.array(TensorSpecSchema),
  outputs: z.array(TensorSpecSchema),
})
export type ModelDescriptor = z.infer<typeof ModelDescriptorSchema>

export const ServerMetadataSchema = z.object({
  name: z.string(),
  version: z.string(),
  extensions: z.array(z.string()),
})
export type ServerMetadata = z.infer<typeof ServerMetadataSchema>

// ============ Errors ============

export const ErrorKindSchema = z.enum([
  'malformed_payload',
  'unsupported_datatype',
  'shape_mismatch',
  'datatype_mismatch',
  'unknown_input',
  'missing_input',
  'model_not_found',
  'service_unavailable',
  'prediction_failed',
  'internal',
])
export type ErrorKind = z.infer<typeof ErrorKindSchema>

export const ErrorResponseSchema = z.object({
  error: z.string(),
  kind: ErrorKindSchema,
})
export type ErrorResponse = z.infer<typeof ErrorResponseSchema>
