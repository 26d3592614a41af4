/**
 * Validation Engine
 *
 * Checks a decoded request against the loaded model's input contract before
 * any computation happens. The first failing check wins.
 */

import type {
  InferenceRequest,
  ModelDescriptor,
  Tensor,
  TensorSpec,
} from '@tensorgate/types'
import { elementCount } from './codec'
import { RequestValidationError } from './errors'

function formatShape(shape: readonly number[]): string {
  return `[${shape.join(',')}]`
}

/** True when every dimension matches, treating -1 as a wildcard */
export function shapeConforms(
  shape: readonly number[],
  declared: readonly number[],
): boolean {
  if (shape.length !== declared.length) return false
  return declared.every((dim, i) => dim === -1 || dim === shape[i])
}

function validateInput(input: Tensor, spec: TensorSpec | undefined): void {
  const expected = elementCount(input.shape)
  if (input.data.length !== expected) {
    throw new RequestValidationError(
      'shape_mismatch',
      `Input '${input.name}' has ${input.data.length} elements but shape ${formatShape(input.shape)} requires ${expected}`,
      input.name,
    )
  }

  if (spec && spec.datatype !== input.datatype) {
    throw new RequestValidationError(
      'datatype_mismatch',
      `Input '${input.name}' must be ${spec.datatype}, got ${input.datatype}`,
      input.name,
    )
  }

  if (!spec) {
    throw new RequestValidationError(
      'unknown_input',
      `Model does not accept an input named '${input.name}'`,
      input.name,
    )
  }

  if (!shapeConforms(input.shape, spec.shape)) {
    throw new RequestValidationError(
      'shape_mismatch',
      `Input '${input.name}' shape ${formatShape(input.shape)} does not match ${formatShape(spec.shape)}`,
      input.name,
    )
  }
}

/**
 * Validate every input of a request against a model descriptor.
 * Throws the first RequestValidationError found.
 */
export function validateRequest(
  request: InferenceRequest,
  descriptor: ModelDescriptor,
): void {
  const specs = new Map(descriptor.inputs.map((spec) => [spec.name, spec]))

  for (const input of request.inputs) {
    validateInput(input, specs.get(input.name))
  }

  const provided = new Set(request.inputs.map((input) => input.name))
  for (const spec of descriptor.inputs) {
    if (!spec.optional && !provided.has(spec.name)) {
      throw new RequestValidationError(
        'missing_input',
        `Required input '${spec.name}' is missing`,
        spec.name,
      )
    }
  }
}
