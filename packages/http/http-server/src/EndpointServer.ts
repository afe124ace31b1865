import { Container } from 'inversify';
import { AnyEndpoint, WireRequest, WireResponse } from '@endpointkit/http-api';
import { EndpointMethods } from '@endpointkit/http-client';
import { RouteRegistry } from './ServerMeta';

/**
 * EndpointServer - Public interface of the server.
 *
 * Created by EndpointServerFactory.create(), which hides initialisation.
 *
 * Usage:
 * ```typescript
 * // Production
 * const server = await EndpointServerFactory.create(new ChatServerMeta());
 * await server.start(8008);
 *
 * // Testing (no HTTP needed!)
 * const server = await EndpointServerFactory.create(new ChatServerMeta(), overrides);
 * const api = server.createApiClient({ sendMessage: SendMessage }, 'test-token');
 * const response = await api.sendMessage(request);
 * ```
 */
export interface EndpointServer extends RouteRegistry {
    /**
     * Dispatches one request: route lookup, access check, decoding, handler,
     * encoding. Never rejects; every failure becomes a ProtocolError response.
     */
    handle(wire: WireRequest): Promise<WireResponse>;

    /**
     * Start the HTTP server with Express.
     * Resolves once the server is listening.
     *
     * @param port - defaults to EndpointServerConfig.port
     */
    start(port?: number): Promise<void>;

    stop(): Promise<void>;

    /**
     * Client whose calls go straight to handle(), with no network in between.
     *
     * @param accessToken - sent to endpoints that need one
     */
    createApiClient<T extends Record<string, AnyEndpoint>>(endpoints: T, accessToken?: string): EndpointMethods<T>;

    getContainer(): Container;
}
