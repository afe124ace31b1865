import { Server } from 'http';
import express, { NextFunction, Request, Response } from 'express';
import { Container, ContainerModule, inject, injectable } from 'inversify';
import {
    AnyEndpoint,
    GeneratedEndpoint,
    HttpNotFoundError,
    HttpUnauthorizedError,
    LogApiCall,
    WireRequest,
    WireResponse,
} from '@endpointkit/http-api';
import { toError } from '@endpointkit/core-util';
import { EndpointMethods, EndpointSender, proxyFor } from '@endpointkit/http-client';
import { EndpointServerConfig, SERVER_TYPES } from './config/EndpointServerConfig';
import { EndpointServer } from './EndpointServer';
import { EndpointHandler, HandlerClass } from './EndpointHandler';
import { ErrorTranslator } from './ErrorTranslator';
import { sendWireResponse, toWireRequest } from './express/ExpressWire';
import { Route, RouteTable } from './RouteTable';
import { ServerMeta } from './ServerMeta';

// base URL of requests made by in-process clients; only the path is routed
const IN_PROCESS_BASE_URL = 'http://localhost';

/**
 * EndpointServerImpl - Internal server implementation.
 *
 * Resolved from the server container by EndpointServerFactory. Uses two
 * containers: the server container holds framework bindings (config, logging,
 * error translation); the application container, its child, holds the
 * application modules and every handler.
 */
@injectable()
export class EndpointServerImpl implements EndpointServer {
    /**
     * Application bindings and handlers. Child of the server container, so
     * handlers can inject anything the server binds.
     */
    private appContainer!: Container;

    private readonly routes = new RouteTable();
    private initialized = false;
    private server?: Server;

    constructor(
        @inject(SERVER_TYPES.EndpointServerConfig) private readonly config: EndpointServerConfig,
        @inject(LogApiCall) private readonly logApiCall: LogApiCall,
        @inject(ErrorTranslator) private readonly errorTranslator: ErrorTranslator,
    ) {}

    /**
     * Loads the application modules, then the overrides, then registers every
     * route. Called once by EndpointServerFactory.create().
     *
     * @param overrides - loaded LAST so tests can replace application bindings
     */
    async initialize(serverContainer: Container, meta: ServerMeta, overrides?: ContainerModule): Promise<void> {
        if (this.initialized) {
            return;
        }
        this.appContainer = new Container({ parent: serverContainer });

        for (const module of meta.getDIModules()) {
            await this.appContainer.load(module);
        }
        if (overrides) {
            await this.appContainer.load(overrides);
        }

        this.initialized = true;
        for (const routeConfig of meta.getRoutes()) {
            routeConfig.configure(this);
        }
    }

    route<Req extends object, Res extends object, E>(
        endpoint: GeneratedEndpoint<Req, Res, E>,
        handlerClass: HandlerClass<Req, Res>,
    ): void {
        if (!this.initialized) {
            throw new Error('Server not initialized. Call initialize() before route().');
        }
        if (!this.appContainer.isBound(handlerClass)) {
            this.appContainer.bind<EndpointHandler<Req, Res>>(handlerClass).toSelf().inSingletonScope();
        }

        const dispatch = async (wire: WireRequest): Promise<WireResponse> => {
            const request = endpoint.fromHttpRequest(wire);
            const handler = this.appContainer.get<EndpointHandler<Req, Res>>(handlerClass);
            const method = async (): Promise<Res> => handler.handle(request, wire);
            const response = this.config.loggingEnabled
                ? await this.logApiCall.execute('SVR', endpoint.metadata, request, wire.headers, method)
                : await method();
            return endpoint.intoHttpResponse(response);
        };

        this.routes.add(new Route(endpoint.metadata, handlerClass.name, dispatch));
        if (this.config.loggingEnabled) {
            const { name, method, path } = endpoint.metadata;
            console.log(`[EndpointServer] Registered ${name} ${method} ${path} -> ${handlerClass.name}`);
        }
    }

    async handle(wire: WireRequest): Promise<WireResponse> {
        try {
            const pathname = new URL(wire.uri, IN_PROCESS_BASE_URL).pathname;
            const route = this.routes.match(wire.method, pathname);
            if (route === undefined) {
                throw new HttpNotFoundError(`No endpoint for ${wire.method} ${pathname}`);
            }
            if (route.metadata.authentication === 'AccessToken' && !wire.headers.has('authorization')) {
                throw new HttpUnauthorizedError(`Endpoint '${route.metadata.name}' needs an access token`);
            }
            return await route.dispatch(wire);
        } catch (err: unknown) {
            return this.errorTranslator.translate(toError(err));
        }
    }

    async start(port: number = this.config.port): Promise<void> {
        if (!this.initialized) {
            throw new Error('Server not initialized. Call initialize() before start().');
        }

        const app = express();
        // buffer every body as is; the generated decoders do the parsing
        app.use(express.raw({ type: () => true }));
        app.use((req: Request, res: Response, next: NextFunction) => {
            this.dispatchExpress(req, res).catch((err: unknown) => {
                const error = toError(err);
                console.error('[EndpointServer] Failed to write response:', error);
                next(error);
            });
        });

        await new Promise<void>((resolve, reject) => {
            const server = app.listen(port, (error?: Error) => {
                if (error) {
                    console.error('[EndpointServer] Failed to start server:', error);
                    reject(error);
                    return;
                }
                console.log(`[EndpointServer] Server listening on http://localhost:${port}`);
                console.log(`[EndpointServer] Registered ${this.routes.size} endpoints`);
                resolve();
            });
            this.server = server;
        });
    }

    private async dispatchExpress(req: Request, res: Response): Promise<void> {
        const response = await this.handle(toWireRequest(req));
        sendWireResponse(res, response);
    }

    async stop(): Promise<void> {
        const server = this.server;
        if (!server) {
            return;
        }

        await new Promise<void>((resolve, reject) => {
            server.close((err?: Error) => {
                if (err) {
                    console.error('[EndpointServer] Error stopping server:', err);
                    reject(err);
                    return;
                }
                console.log('[EndpointServer] Server stopped');
                resolve();
            });
        });
        this.server = undefined;
    }

    createApiClient<T extends Record<string, AnyEndpoint>>(endpoints: T, accessToken?: string): EndpointMethods<T> {
        if (!this.initialized) {
            throw new Error('Server not initialized. Call initialize() before createApiClient().');
        }
        return proxyFor(endpoints, new InProcessSender(this, accessToken));
    }

    getContainer(): Container {
        return this.appContainer;
    }
}

/**
 * Runs the full encode → handle → decode cycle without a socket.
 */
class InProcessSender implements EndpointSender {
    constructor(
        private readonly server: EndpointServer,
        private readonly accessToken?: string,
    ) {}

    async send<Req extends object, Res extends object, E>(
        endpoint: GeneratedEndpoint<Req, Res, E>,
        request: Req,
    ): Promise<Res> {
        const wire = endpoint.intoHttpRequest(request, IN_PROCESS_BASE_URL, this.accessToken);
        return endpoint.fromHttpResponse(await this.server.handle(wire));
    }
}
