/**
 * Request Validation
 * Layer: Interfaces (HTTP)
 *
 * `parseInput(schema, value)` checks one part of a request (query, body,
 * params) against a Zod schema and hands back the parsed, coerced data:
 *
 *   const { limit } = parseInput(listQuerySchema, req.query);
 *
 * Express 5 exposes `req.query` through a getter, so parsed data is returned
 * to the controller rather than written back onto the request.
 *
 * On failure it throws a ValidationError (400) listing every issue; the
 * global error handler turns that into the response.
 */
import { ValidationError } from '@shared/errors/AppError';
import type { z } from 'zod/v4';

export function parseInput<T>(schema: z.ZodType<T>, value: unknown): T {
  const result = schema.safeParse(value);

  if (!result.success) {
    const messages = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new ValidationError(messages);
  }

  return result.data;
}
