/**
 * Tensor Codec
 *
 * Converts between the V2 JSON wire format and immutable in-memory tensors.
 * Decoding checks structure and element types only; shape/length agreement
 * and model contracts belong to validation.
 */

import { randomUUID } from 'node:crypto'
import { formatZodError } from '@tensorgate/shared'
import {
  DATATYPE_ALIASES,
  type Datatype,
  DatatypeSchema,
  type InferenceRequest,
  type InferenceResponse,
  type Tensor,
  type WireTensor,
  WireInferenceRequestSchema,
} from '@tensorgate/types'
import { DecodeError } from './errors'

const INT32_MIN = -2_147_483_648
const INT32_MAX = 2_147_483_647

const textDecoder = new TextDecoder('utf-8', { fatal: true })

function toText(raw: string | Uint8Array): string {
  if (typeof raw === 'string') return raw
  try {
    return textDecoder.decode(raw)
  } catch {
    throw new DecodeError('malformed_payload', 'Payload is not valid UTF-8')
  }
}

/** Resolve a wire datatype name, applying aliases */
export function parseDatatype(name: string): Datatype | null {
  const upper = name.toUpperCase()
  const aliased = DATATYPE_ALIASES[upper] ?? upper
  const parsed = DatatypeSchema.safeParse(aliased)
  return parsed.success ? parsed.data : null
}

/** Product of dimensions; an empty shape is a scalar */
export function elementCount(shape: readonly number[]): number {
  return shape.reduce((count, dim) => count * dim, 1)
}

/** Flatten row-major nested arrays into a single list of leaf values */
function flatten(data: readonly unknown[]): unknown[] {
  const out: unknown[] = []
  const stack: Array<{ items: readonly unknown[]; index: number }> = [
    { items: data, index: 0 },
  ]
  while (stack.length > 0) {
    const top = stack[stack.length - 1]
    if (!top) break
    if (top.index >= top.items.length) {
      stack.pop()
      continue
    }
    const item = top.items[top.index]
    top.index += 1
    if (Array.isArray(item)) {
      stack.push({ items: item, index: 0 })
    } else {
      out.push(item)
    }
  }
  return out
}

function elementError(tensor: string, datatype: Datatype, index: number): DecodeError {
  return new DecodeError(
    'malformed_payload',
    `Input '${tensor}' element ${index} is not a valid ${datatype} value`,
  )
}

function readNumbers(
  name: string,
  datatype: Datatype,
  values: unknown[],
  accept: (value: number) => boolean,
): number[] {
  return values.map((value, index) => {
    if (typeof value !== 'number' || !accept(value)) {
      throw elementError(name, datatype, index)
    }
    return value
  })
}

function buildTensor(
  name: string,
  datatype: Datatype,
  shape: readonly number[],
  values: unknown[],
): Tensor {
  const frozenShape = Object.freeze([...shape])
  switch (datatype) {
    case 'FP32':
    case 'FP64':
      return Object.freeze({
        name,
        datatype,
        shape: frozenShape,
        data: Object.freeze(readNumbers(name, datatype, values, Number.isFinite)),
      })
    case 'INT32':
      return Object.freeze({
        name,
        datatype,
        shape: frozenShape,
        data: Object.freeze(
          readNumbers(
            name,
            datatype,
            values,
            (v) => Number.isInteger(v) && v >= INT32_MIN && v <= INT32_MAX,
          ),
        ),
      })
    case 'INT64':
      return Object.freeze({
        name,
        datatype,
        shape: frozenShape,
        data: Object.freeze(readNumbers(name, datatype, values, Number.isSafeInteger)),
      })
    case 'BOOL':
      return Object.freeze({
        name,
        datatype,
        shape: frozenShape,
        data: Object.freeze(
          values.map((value, index) => {
            if (typeof value !== 'boolean') throw elementError(name, datatype, index)
            return value
          }),
        ),
      })
    case 'BYTES':
      return Object.freeze({
        name,
        datatype,
        shape: frozenShape,
        data: Object.freeze(
          values.map((value, index) => {
            if (typeof value !== 'string') throw elementError(name, datatype, index)
            return value
          }),
        ),
      })
  }
}

function decodeTensor(input: WireTensor): Tensor {
  const datatype = parseDatatype(input.datatype)
  if (!datatype) {
    throw new DecodeError(
      'unsupported_datatype',
      `Input '${input.name}' has unsupported datatype '${input.datatype}'`,
    )
  }
  return buildTensor(input.name, datatype, input.shape, flatten(input.data))
}

/**
 * Decode one inbound payload into an InferenceRequest.
 * Missing ids are replaced with a generated UUID.
 */
export function decodeRequest(raw: string | Uint8Array): InferenceRequest {
  const text = toText(raw)
  if (text.trim().length === 0) {
    throw new DecodeError('malformed_payload', 'Empty payload')
  }

  let json: unknown
  try {
    json = JSON.parse(text)
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new DecodeError('malformed_payload', `Invalid JSON: ${reason}`)
  }

  const parsed = WireInferenceRequestSchema.safeParse(json)
  if (!parsed.success) {
    throw new DecodeError('malformed_payload', formatZodError(parsed.error))
  }

  const seen = new Set<string>()
  const inputs = parsed.data.inputs.map((input) => {
    if (seen.has(input.name)) {
      throw new DecodeError(
        'malformed_payload',
        `Duplicate input name '${input.name}'`,
      )
    }
    seen.add(input.name)
    return decodeTensor(input)
  })

  return Object.freeze({
    id: parsed.data.id ?? randomUUID(),
    inputs: Object.freeze(inputs),
  })
}

function tensorToWire(tensor: Tensor) {
  return {
    name: tensor.name,
    datatype: tensor.datatype,
    shape: tensor.shape,
    data: tensor.data,
  }
}

/** Serialize a request (client side of the protocol) */
export function encodeRequest(request: InferenceRequest): string {
  return JSON.stringify({
    id: request.id,
    inputs: request.inputs.map(tensorToWire),
  })
}

/** Serialize a response; infallible for tensors built by this package */
export function encodeResponse(response: InferenceResponse): string {
  return JSON.stringify({
    id: response.id,
    model_name: response.model_name,
    model_version: response.model_version,
    outputs: response.outputs.map(tensorToWire),
  })
}
