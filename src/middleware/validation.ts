/**
 * Validation Middleware
 *
 * Validates request bodies with Zod schemas and answers with the standard
 * error shape when they do not match.
 */

import { createMiddleware } from 'hono/factory';
import type { z } from 'zod';
import { invalidJsonError, validationError, type ValidationErrorDetail } from '../utils/errors.js';

/**
 * Format Zod validation errors for API response
 */
export function formatValidationErrors(error: z.ZodError): ValidationErrorDetail[] {
  return error.issues.map((issue) => ({
    field: issue.path.join('.') || 'body',
    message: issue.message,
  }));
}

export type BodyValidationContext<T> = {
  validatedBody: T;
};

/**
 * Validate request body against a Zod schema
 *
 * On success the parsed value is available as `c.get('validatedBody')`.
 *
 * @example
 * ```ts
 * const createSchema = z.object({ theme: z.string().min(1) });
 *
 * app.post('/create', validateBody(createSchema), async (c) => {
 *   const { theme } = c.get('validatedBody');
 * });
 * ```
 */
export function validateBody<T extends z.ZodTypeAny>(schema: T) {
  return createMiddleware<{ Variables: BodyValidationContext<z.infer<T>> }>(async (c, next) => {
    let rawBody: unknown;
    try {
      rawBody = await c.req.json();
    } catch {
      return invalidJsonError(c);
    }

    const validationResult = schema.safeParse(rawBody);
    if (!validationResult.success) {
      return validationError(c, formatValidationErrors(validationResult.error));
    }

    c.set('validatedBody', validationResult.data);
    await next();
  });
}
