/**
 * Error Utilities
 *
 * Error types shared by the services and the HTTP layer, plus helpers that
 * render them in the standard response format: { error: string, details?: unknown }
 */

import type { Context } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';

/**
 * Standard error response format
 */
export interface ErrorResponse {
  error: string;
  details?: unknown;
}

/**
 * Validation error detail format
 */
export interface ValidationErrorDetail {
  field: string;
  message: string;
}

/**
 * Error types with their HTTP status codes
 */
export enum ErrorType {
  BAD_REQUEST = 400,
  NOT_FOUND = 404,
  INTERNAL_SERVER_ERROR = 500,
  BAD_GATEWAY = 502,
  SERVICE_UNAVAILABLE = 503,
}

function statusFor(type: ErrorType): ContentfulStatusCode {
  switch (type) {
    case ErrorType.BAD_REQUEST:
      return 400;
    case ErrorType.NOT_FOUND:
      return 404;
    case ErrorType.BAD_GATEWAY:
      return 502;
    case ErrorType.SERVICE_UNAVAILABLE:
      return 503;
    case ErrorType.INTERNAL_SERVER_ERROR:
      return 500;
  }
}

/**
 * Custom API error class with type and details
 */
export class ApiError extends Error {
  constructor(
    public type: ErrorType,
    message: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

/**
 * Raised on the hot path when there is neither a cached set nor a successful
 * generation to serve
 */
export class QuestionGenerationError extends ApiError {
  constructor(details?: unknown, options?: { cause?: unknown }) {
    super(ErrorType.BAD_GATEWAY, 'Could not produce questions for this request', details);
    this.name = 'QuestionGenerationError';
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/**
 * The generator answered, but not with a usable list of questions
 */
export class GeneratorResponseError extends Error {
  constructor(
    message: string,
    public readonly status?: number
  ) {
    super(message);
    this.name = 'GeneratorResponseError';
  }
}

/**
 * Create a standardized error response
 *
 * @example
 * ```ts
 * return errorResponse(c, 'Task not found', ErrorType.NOT_FOUND, 'ID 01j...');
 * ```
 */
export function errorResponse(c: Context, message: string, type: ErrorType, details?: unknown): Response {
  const response: ErrorResponse = { error: message };

  if (details !== undefined) {
    response.details = details;
  }

  return c.json<ErrorResponse>(response, statusFor(type));
}

export function badRequestError(c: Context, message: string = 'Bad request', details?: unknown): Response {
  return errorResponse(c, message, ErrorType.BAD_REQUEST, details);
}

export function notFoundError(c: Context, resource: string, identifier?: string): Response {
  const message = identifier ? `${resource} with ${identifier} not found` : `${resource} not found`;
  return errorResponse(c, message, ErrorType.NOT_FOUND, identifier);
}

/**
 * Create a 500 Internal Server Error response
 *
 * The details passed in are only logged by the caller; the response carries
 * a generic message.
 */
export function internalServerError(c: Context, message: string = 'Internal server error'): Response {
  return errorResponse(
    c,
    message,
    ErrorType.INTERNAL_SERVER_ERROR,
    'An unexpected error occurred. Please try again later.'
  );
}

/**
 * Create a validation error response with field-level details
 */
export function validationError(c: Context, details: ValidationErrorDetail[]): Response {
  return badRequestError(c, 'Validation failed', details);
}

export function invalidJsonError(c: Context): Response {
  return badRequestError(c, 'Invalid JSON', [{ field: 'body', message: 'Request body contains invalid JSON' }]);
}

/**
 * Handle and format errors from error objects
 *
 * Known API errors keep their status code; anything else becomes a 500.
 */
export function handleApiError(c: Context, error: unknown, contextMessage?: string): Response {
  if (error instanceof ApiError) {
    return errorResponse(c, error.message, error.type, error.details);
  }

  return internalServerError(c, contextMessage);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
