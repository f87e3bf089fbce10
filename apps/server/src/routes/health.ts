/**
 * Health Check Routes
 *
 * GET /                  - service banner
 * GET /health            - liveness
 * GET /health/detailed   - liveness plus a database round-trip
 */

import { jsonResponse } from '../error-handler.js';
import type { RouteContext } from './context.js';

export function handleRoot({ container }: RouteContext): Response {
  return jsonResponse({
    name: container.config.appName,
    version: container.config.appVersion,
    status: 'running',
    health: '/health',
  });
}

export function handleHealthCheck(): Response {
  return jsonResponse({ status: 'healthy', timestamp: new Date().toISOString() });
}

export function handleDetailedHealthCheck({ container, correlationId }: RouteContext): Response {
  let database = 'connected';
  try {
    container.taskService.ping();
  } catch (error) {
    const reason = error instanceof Error && error.cause instanceof Error ? error.cause.message : String(error);
    container.logger.warn({ err: error, correlationId }, 'Database health check failed');
    database = `error: ${reason}`;
  }

  const healthy = database === 'connected';
  return jsonResponse(
    {
      status: healthy ? 'healthy' : 'unhealthy',
      timestamp: new Date().toISOString(),
      database,
      version: container.config.appVersion,
    },
    healthy ? 200 : 503,
  );
}
