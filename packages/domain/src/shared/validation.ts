import type { z } from 'zod'
import { ValidationError } from './errors'

/** Flattens zod issues into `path: message` strings. */
export function formatIssues(error: z.ZodError): readonly string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.')
    return path === '' ? issue.message : `${path}: ${issue.message}`
  })
}

/**
 * Parses `input` against `schema`, converting a failure into a ValidationError
 * whose message names `what` and whose issues list every problem.
 */
export function parseOrThrow<S extends z.ZodTypeAny>(schema: S, input: unknown, what: string): z.output<S> {
  const result = schema.safeParse(input)
  if (!result.success) {
    const issues = formatIssues(result.error)
    throw new ValidationError(`Invalid ${what}: ${issues.join('; ')}`, issues)
  }
  return result.data
}
