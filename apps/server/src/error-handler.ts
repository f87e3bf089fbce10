/**
 * Error Handling Utilities
 *
 * Standardized JSON error responses for the API.
 */

import {
  ValidationError, NotFoundError, PersistenceError,
  type Failure, type Logger, type ValidationIssue,
} from '@taskdeck/core';

export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    details?: { errors: ValidationIssue[] };
  };
  correlation_id?: string;
}

export function handleError(error: unknown, correlationId: string, logger: Logger): Response {
  // Request validation failures
  if (error instanceof ValidationError) {
    return jsonError(422, 'VALIDATION_ERROR', error.message, correlationId, { errors: error.issues });
  }

  if (error instanceof NotFoundError) {
    return jsonError(404, 'NOT_FOUND', error.message, correlationId);
  }

  if (error instanceof PersistenceError) {
    logger.error({ err: error, correlationId }, 'Database error');
    return jsonError(500, 'PERSISTENCE_ERROR', 'Database operation failed', correlationId);
  }

  logger.error({ err: error, correlationId }, 'Unhandled error');
  return jsonError(500, 'INTERNAL_ERROR', 'Internal server error', correlationId);
}

/** Map a service failure variant onto its HTTP response */
export function failureResponse(failure: Failure, correlationId: string): Response {
  switch (failure.type) {
    case 'not-found':
      return jsonError(404, 'NOT_FOUND', failure.message, correlationId);
    case 'validation-error':
      return jsonError(
        400,
        'VALIDATION_ERROR',
        failure.message,
        correlationId,
        failure.field === undefined
          ? undefined
          : { errors: [{ path: failure.field, message: failure.message, code: 'invalid' }] },
      );
  }
}

export function jsonError(
  status: number,
  code: string,
  message: string,
  correlationId?: string,
  details?: { errors: ValidationIssue[] },
): Response {
  const body: ErrorResponse = {
    error: details === undefined ? { code, message } : { code, message, details },
    correlation_id: correlationId,
  };

  return jsonResponse(body, status);
}

export function jsonResponse(data: unknown, status: number = 200): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}
