/**
 * Input Validation
 *
 * Runs the zod input schemas and reports the first problem as a
 * ValidationError, before any state is touched.
 */

import type { z } from "zod"
import { ValidationError } from "../errors"

/**
 * Parse an operation input.
 * @throws ValidationError if parsing fails
 */
export function parseInput<T extends z.ZodTypeAny>(schema: T, data: unknown, label: string): z.output<T> {
  const result: z.SafeParseReturnType<z.input<T>, z.output<T>> = schema.safeParse(data)
  if (result.success) {
    return result.data
  }

  const firstError = result.error.errors[0]
  const field = firstError?.path.join(".") ?? ""
  const message = firstError?.message ?? "validation failed"
  const received = firstError && "received" in firstError ? firstError.received : undefined

  throw new ValidationError(
    field ? `Invalid ${label} (${field}): ${message}` : `Invalid ${label}: ${message}`,
    field || undefined,
    received,
  )
}
