/**
 * API Router
 *
 * Central routing for every endpoint. Runs on Web-standard Request and
 * Response; the node:http host lives in http.ts.
 */

import { handleError, jsonError } from './error-handler.js';
import { getOrCreateCorrelationId, addCorrelationIdToResponse } from './middleware/correlation.js';
import { preflightResponse, withCors } from './middleware/cors.js';
import { handleRoot, handleHealthCheck, handleDetailedHealthCheck } from './routes/health.js';
import {
  handleCreateTask, handleListTasks, handleSearchTasks, handleTaskStatistics,
  handleGetTask, handleUpdateTask, handleUpdateTaskStatus, handleUpdateTaskPriority, handleDeleteTask,
} from './routes/tasks.js';
import type { RouteHandler } from './routes/context.js';
import type { Container } from './container.js';

interface Route {
  pattern: RegExp;
  handlers: Partial<Record<string, RouteHandler>>;
}

const TASKS = '/api/v1/tasks';

// Literal segments (search, statistics) precede the {id} pattern
const ROUTES: Route[] = [
  { pattern: /^\/$/, handlers: { GET: handleRoot } },
  { pattern: /^\/health$/, handlers: { GET: handleHealthCheck } },
  { pattern: /^\/health\/detailed$/, handlers: { GET: handleDetailedHealthCheck } },
  { pattern: new RegExp(`^${TASKS}/?$`), handlers: { GET: handleListTasks, POST: handleCreateTask } },
  { pattern: new RegExp(`^${TASKS}/search$`), handlers: { GET: handleSearchTasks } },
  { pattern: new RegExp(`^${TASKS}/statistics$`), handlers: { GET: handleTaskStatistics } },
  {
    pattern: new RegExp(`^${TASKS}/([^/]+)$`),
    handlers: { GET: handleGetTask, PUT: handleUpdateTask, PATCH: handleUpdateTask, DELETE: handleDeleteTask },
  },
  { pattern: new RegExp(`^${TASKS}/([^/]+)/status$`), handlers: { PATCH: handleUpdateTaskStatus } },
  { pattern: new RegExp(`^${TASKS}/([^/]+)/priority$`), handlers: { PATCH: handleUpdateTaskPriority } },
];

export async function handleRequest(request: Request, container: Container): Promise<Response> {
  const started = performance.now();
  const correlationId = getOrCreateCorrelationId(request);
  const url = new URL(request.url);
  const { corsOrigins } = container.config;

  let response: Response;
  try {
    response = request.method === 'OPTIONS'
      ? preflightResponse(request, corsOrigins)
      : await dispatch(request, url, container, correlationId);
  } catch (error) {
    response = handleError(error, correlationId, container.logger);
  }

  container.logger.info({
    method: request.method,
    path: url.pathname,
    status: response.status,
    durationMs: Math.round((performance.now() - started) * 100) / 100,
    correlationId,
  }, 'Request completed');

  return withCors(addCorrelationIdToResponse(response, correlationId), request, corsOrigins);
}

async function dispatch(
  request: Request,
  url: URL,
  container: Container,
  correlationId: string,
): Promise<Response> {
  for (const route of ROUTES) {
    const match = route.pattern.exec(url.pathname);
    if (!match) continue;

    const handler = route.handlers[request.method];
    if (!handler) {
      const allow = Object.keys(route.handlers).join(', ');
      const response = jsonError(405, 'METHOD_NOT_ALLOWED', `Method ${request.method} not allowed`, correlationId);
      response.headers.set('Allow', allow);
      return response;
    }

    const params = match.slice(1).map(decodeSegment);
    return handler({ request, url, params, container, correlationId });
  }

  return jsonError(404, 'ROUTE_NOT_FOUND', `Route ${url.pathname} not found`, correlationId);
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    // Malformed escapes reach the handler as-is and fail its validation
    return segment;
  }
}
