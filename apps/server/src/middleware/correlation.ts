/**
 * Correlation ID middleware
 *
 * Every request carries an id that ends up in the response header, the
 * error body and each log line for that request.
 */

import { randomUUID } from 'node:crypto';

export const CORRELATION_ID_HEADER = 'X-Correlation-ID';

const VALID_ID = /^[\w.:-]{1,128}$/;

export function getOrCreateCorrelationId(request: Request): string {
  const headerValue = request.headers.get(CORRELATION_ID_HEADER);
  // Unusable ids are replaced, not rejected
  return headerValue && VALID_ID.test(headerValue) ? headerValue : randomUUID();
}

export function addCorrelationIdToResponse(response: Response, correlationId: string): Response {
  const headers = new Headers(response.headers);
  headers.set(CORRELATION_ID_HEADER, correlationId);

  return new Response(response.body, {
    status: response.status,
    statusText: response.statusText,
    headers,
  });
}
