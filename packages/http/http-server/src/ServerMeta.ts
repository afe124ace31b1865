import { ContainerModule } from 'inversify';
import { GeneratedEndpoint } from '@endpointkit/http-api';
import { HandlerClass } from './EndpointHandler';

/**
 * Where handlers are registered against their endpoints.
 */
export interface RouteRegistry {
    route<Req extends object, Res extends object, E>(
        endpoint: GeneratedEndpoint<Req, Res, E>,
        handlerClass: HandlerClass<Req, Res>,
    ): void;
}

/**
 * A group of routes, registered together.
 */
export interface RouteConfig {
    configure(routes: RouteRegistry): void;
}

/**
 * Everything an application hands to EndpointServerFactory.create().
 */
export interface ServerMeta {
    /** Application bindings, loaded after the server's own module. */
    getDIModules(): ContainerModule[];

    getRoutes(): RouteConfig[];
}
