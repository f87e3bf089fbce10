export { handleRequest } from './router.js';
export { createContainer } from './container.js';
export type { Container } from './container.js';
export { startServer, installShutdownHandlers } from './server.js';
export type { RunningServer, StartServerOptions } from './server.js';
export { handleError, jsonError, jsonResponse, failureResponse } from './error-handler.js';
export type { ErrorResponse } from './error-handler.js';
export { CORRELATION_ID_HEADER } from './middleware/correlation.js';
