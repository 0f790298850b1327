import type { z } from 'zod';
import { ValidationError } from '../errors.js';

export function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${path}: ${issue.message}`;
    })
    .join('; ');
}

/**
 * Validate `input` against `schema`, turning zod failures into a ValidationError
 * named after the first offending field.
 */
export function parseWithSchema<S extends z.ZodTypeAny>(schema: S, input: unknown, what: string): z.infer<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const first = result.error.issues[0];
    const field = first !== undefined && first.path.length > 0 ? first.path.join('.') : what;
    throw new ValidationError(`Invalid ${what}: ${formatZodIssues(result.error)}`, field, input);
  }
  return result.data;
}
