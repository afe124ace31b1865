/**
 * @endpointkit/http-server
 *
 * Serves generated endpoints: routes requests to injectable handlers, with
 * express for the socket and inversify for the handlers' collaborators.
 *
 * Architecture:
 * ```
 * http-api (definition surface)
 *    ↑
 *    ├── http-codegen (declaration → GeneratedEndpoint)
 *    ├── http-client  (GeneratedEndpoint → fetch)
 *    └── http-server  (GeneratedEndpoint → express)  ← YOU ARE HERE
 * ```
 */

export { EndpointServer } from './EndpointServer';
export { EndpointServerFactory } from './EndpointServerFactory';
export { EndpointServerImpl } from './EndpointServerImpl';
export { EndpointHandler, HandlerClass } from './EndpointHandler';
export { RouteRegistry, RouteConfig, ServerMeta } from './ServerMeta';
export { Route, RouteTable } from './RouteTable';
export { ErrorTranslator } from './ErrorTranslator';
export { EndpointServerConfig, SERVER_TYPES } from './config/EndpointServerConfig';
export { EndpointServerModule } from './modules/EndpointServerModule';
export { toWireRequest, sendWireResponse } from './express/ExpressWire';
