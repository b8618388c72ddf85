/**
 * Validation Middleware
 *
 * Validates request bodies and query parameters with Zod schemas and answers
 * invalid input with the standard 400 response.
 */

import type { MiddlewareHandler } from 'hono';
import type { z } from 'zod';
import { invalidJsonError, validationError, type ValidationErrorDetail } from '../utils/errors.js';

/**
 * Format Zod validation errors for API response
 *
 * @param error - Zod validation error
 * @returns Array of field-level error details
 */
export function formatValidationErrors(error: z.ZodError): ValidationErrorDetail[] {
  return error.issues.map((issue) => ({
    field: issue.path.join('.'),
    message: issue.message,
  }));
}

/**
 * Request body validation context type
 */
export type BodyValidationContext<T> = {
  validatedBody: T;
};

/**
 * Query parameters validation context type
 */
export type QueryValidationContext<T> = {
  validatedQuery: T;
};

/**
 * Validate request body against a Zod schema
 *
 * On success the parsed value is available as `c.get('validatedBody')`.
 *
 * @example
 * ```ts
 * app.post('/questions', validateBody(questionRequestSchema), async (c) => {
 *   const body = c.get('validatedBody');
 *   // ...
 * });
 * ```
 */
export function validateBody<T extends z.ZodTypeAny>(
  schema: T
): MiddlewareHandler<{ Variables: BodyValidationContext<z.infer<T>> }> {
  return async (c, next) => {
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
  };
}

/**
 * Validate query parameters against a Zod schema
 *
 * On success the parsed value is available as `c.get('validatedQuery')`.
 */
export function validateQuery<T extends z.ZodTypeAny>(
  schema: T
): MiddlewareHandler<{ Variables: QueryValidationContext<z.infer<T>> }> {
  return async (c, next) => {
    const validationResult = schema.safeParse(c.req.query());
    if (!validationResult.success) {
      return validationError(c, formatValidationErrors(validationResult.error));
    }

    c.set('validatedQuery', validationResult.data);
    await next();
  };
}
