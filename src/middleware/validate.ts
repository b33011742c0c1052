import { Request } from 'express';
import { z, ZodTypeAny } from 'zod';
import { ValidationError } from '../utils/errors';

/**
 * Validates request payload using a Zod schema over `{ body, params, query }`.
 * @param schema Zod schema to validate against.
 * @param req Express request.
 * @returns Parsed, typed request parts.
 * @throws {ValidationError} When validation fails.
 */
export function parseRequest<S extends ZodTypeAny>(schema: S, req: Request): z.infer<S> {
  const result = schema.safeParse({
    body: req.body,
    params: req.params,
    query: req.query
  });

  if (!result.success) {
    const message = result.error.issues
      .map((issue) => {
        const path = issue.path.slice(1).join('.');
        return path ? `${path}: ${issue.message}` : issue.message;
      })
      .join('; ');
    throw new ValidationError(message);
  }

  return result.data;
}
