/**
 * Error Response Utilities
 *
 * Standardized error response formatting for all API endpoints.
 * Every error body has the shape `{ error: string, details?: unknown }`.
 */

import type { Context } from 'hono';

export interface ErrorResponse {
  error: string;
  details?: unknown;
}

export interface ValidationErrorDetail {
  field: string;
  message: string;
}

/**
 * Error types with their HTTP status codes
 */
export const ErrorType = {
  BAD_REQUEST: 400,
  NOT_FOUND: 404,
  INTERNAL_SERVER_ERROR: 500,
} as const;

export type ErrorStatus = typeof ErrorType[keyof typeof ErrorType];

/**
 * Create a standardized error response
 *
 * @example
 * ```ts
 * return errorResponse(c, 'Resource not found', 404, 'Story ID 123 does not exist');
 * ```
 */
export function errorResponse(
  c: Context,
  message: string,
  statusCode: ErrorStatus,
  details?: unknown
): Response {
  const response: ErrorResponse = { error: message };

  if (details !== undefined) {
    response.details = details;
  }

  return c.json<ErrorResponse>(response, statusCode);
}

export function badRequestError(
  c: Context,
  message: string = 'Bad request',
  details?: unknown
): Response {
  return errorResponse(c, message, ErrorType.BAD_REQUEST, details);
}

/**
 * Create a 500 Internal Server Error response
 *
 * `logDetails` is logged, never sent. `exposeDetails` (debug mode) sends
 * the error message in `details` instead of the generic text.
 */
export function internalServerError(
  c: Context,
  message: string = 'Internal server error',
  logDetails?: unknown,
  exposeDetails: boolean = false
): Response {
  if (logDetails !== undefined) {
    console.error(`${message}:`, logDetails);
  }

  const details = exposeDetails && logDetails instanceof Error
    ? logDetails.message
    : 'An unexpected error occurred. Please try again later.';

  return errorResponse(c, message, ErrorType.INTERNAL_SERVER_ERROR, details);
}

/**
 * Create a validation error response with field-level details
 *
 * @example
 * ```ts
 * return validationError(c, [{ field: 'theme', message: 'Theme is required' }]);
 * ```
 */
export function validationError(
  c: Context,
  details: ValidationErrorDetail[]
): Response {
  return badRequestError(c, 'Validation failed', details);
}

export function invalidJsonError(c: Context): Response {
  return badRequestError(c, 'Invalid JSON', [
    { field: 'body', message: 'Request body contains invalid JSON' },
  ]);
}

/**
 * Handle and format errors from error objects
 *
 * `ApiError`s keep their status; anything else becomes a 500.
 *
 * @example
 * ```ts
 * app.onError((error, c) => handleApiError(c, error, 'An unexpected error occurred'));
 * ```
 */
export function handleApiError(
  c: Context,
  error: unknown,
  contextMessage?: string,
  exposeDetails: boolean = false
): Response {
  if (error instanceof ApiError) {
    return errorResponse(c, error.message, error.type, error.details);
  }

  return internalServerError(c, contextMessage, error, exposeDetails);
}

function notFoundMessage(resource: string, identifier?: string): string {
  return identifier
    ? `${resource} with ${identifier} not found`
    : `${resource} not found`;
}

/**
 * Custom API error class with type and details
 */
export class ApiError extends Error {
  constructor(
    public type: ErrorStatus,
    message: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

export function createNotFoundError(resource: string, identifier?: string): ApiError {
  return new ApiError(ErrorType.NOT_FOUND, notFoundMessage(resource, identifier), identifier);
}
