/**
 * Validation Utilities with Expect/Throw Patterns
 *
 * Fail-fast helpers that throw on invalid data.
 */

import type { ZodError, ZodType, ZodTypeDef } from 'zod'

/**
 * Validation error carrying the original ZodError for diagnostics.
 */
export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly zodError?: ZodError,
  ) {
    super(message)
    this.name = 'ValidationError'
    Object.setPrototypeOf(this, ValidationError.prototype)
  }
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError
}

/**
 * Formats a Zod error into a readable message.
 */
export function formatZodError(error: ZodError, context?: string): string {
  const issues = error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : 'root'
    return `${path}: ${issue.message}`
  })

  const message = issues.join('; ')
  return context ? `${context}: ${message}` : message
}

/**
 * Validates data against a schema and throws ValidationError if invalid.
 *
 * Output type O can differ from input type I when the schema has transforms.
 */
export function expectValid<O, D extends ZodTypeDef = ZodTypeDef, I = O>(
  schema: ZodType<O, D, I>,
  data: unknown,
  context?: string,
): O {
  const result = schema.safeParse(data)

  if (!result.success) {
    throw new ValidationError(formatZodError(result.error, context), result.error)
  }

  return result.data
}
