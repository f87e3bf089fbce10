import type { Container } from '../container.js';

export interface RouteContext {
  request: Request;
  url: URL;
  /** Positional captures from the route pattern */
  params: string[];
  container: Container;
  correlationId: string;
}

export type RouteHandler = (ctx: RouteContext) => Response | Promise<Response>;
