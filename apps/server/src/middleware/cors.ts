/**
 * CORS for the configured origins. `*` in the list admits any origin.
 * The request origin is reflected rather than answered with `*`, since
 * credentials are allowed.
 */

const ALLOWED_METHODS = 'GET, POST, PUT, PATCH, DELETE, OPTIONS';
const DEFAULT_ALLOWED_HEADERS = 'Content-Type, X-Correlation-ID';

export function isOriginAllowed(origin: string, allowed: readonly string[]): boolean {
  return allowed.includes('*') || allowed.includes(origin);
}

export function preflightResponse(request: Request, allowed: readonly string[]): Response {
  const origin = request.headers.get('Origin');
  if (!origin || !isOriginAllowed(origin, allowed)) {
    return new Response(null, { status: 204 });
  }

  return new Response(null, {
    status: 204,
    headers: {
      'Access-Control-Allow-Methods': ALLOWED_METHODS,
      'Access-Control-Allow-Headers':
        request.headers.get('Access-Control-Request-Headers') ?? DEFAULT_ALLOWED_HEADERS,
      'Access-Control-Max-Age': '600',
    },
  });
}

export function withCors(response: Response, request: Request, allowed: readonly string[]): Response {
  const origin = request.headers.get('Origin');
  if (!origin || !isOriginAllowed(origin, allowed)) return response;

  const headers = new Headers(response.headers);
  headers.set('Access-Control-Allow-Origin', origin);
  headers.set('Access-Control-Allow-Credentials', 'true');
  headers.append('Vary', 'Origin');

  return new Response(response.body, {
    status: response.status,
    statusText: response.statusText,
    headers,
  });
}
