/**
 * Web module hosting plugin endpoints
 */

export { WebServer, normalizeEndpointPath } from './server.js';
export type { EndpointHandler, EndpointRegistrar, WebServerOptions } from './server.js';
export { isAuthorized } from './auth.js';
