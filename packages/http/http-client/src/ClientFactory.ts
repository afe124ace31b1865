import {
    AnyEndpoint,
    GeneratedEndpoint,
    HeaderMap,
    LogApiCall,
    RequestOf,
    ResponseOf,
    WireRequest,
    WireResponse,
} from '@endpointkit/http-api';

/**
 * Configuration options for the endpoint client.
 */
export class ClientConfig {
    /** Base URL for all requests (e.g., 'http://localhost:8008') */
    baseUrl: string;

    /** Sent as a bearer token to endpoints that need one. */
    accessToken?: string;

    /** Log every call through LogApiCall. */
    loggingEnabled: boolean;

    constructor(baseUrl: string, accessToken?: string, loggingEnabled: boolean = true) {
        this.baseUrl = baseUrl;
        this.accessToken = accessToken;
        this.loggingEnabled = loggingEnabled;
    }
}

/**
 * One async method per endpoint of the record passed to createClient.
 */
export type EndpointMethods<T extends Record<string, AnyEndpoint>> = {
    [K in keyof T]: (request: RequestOf<T[K]>) => Promise<ResponseOf<T[K]>>;
};

/**
 * Creates a client with one method per endpoint.
 *
 * Usage:
 * ```typescript
 * const config = new ClientConfig('http://localhost:8008', 'my-token');
 * const client = createClient({ sendMessage: SendMessage, getMessages: GetMessages }, config);
 * const response = await client.sendMessage(request);
 * ```
 */
export function createClient<T extends Record<string, AnyEndpoint>>(
    endpoints: T,
    config: ClientConfig,
    logApiCall: LogApiCall = new LogApiCall(),
): EndpointMethods<T> {
    return proxyFor(endpoints, new EndpointClient(config, logApiCall));
}

/**
 * Proxy that turns `client.someEndpoint(request)` into `sender.send(endpoint, request)`.
 * Shared with the server's in-process client.
 */
export function proxyFor<T extends Record<string, AnyEndpoint>>(endpoints: T, sender: EndpointSender): EndpointMethods<T> {
    return new Proxy({} as EndpointMethods<T>, {
        get(target, prop: string | symbol) {
            if (typeof prop !== 'string') {
                throw new Error(`Method names must be strings, not ${typeof prop}`);
            }
            const endpoint = Object.prototype.hasOwnProperty.call(endpoints, prop) ? endpoints[prop] : undefined;
            if (endpoint === undefined) {
                throw new Error(`No endpoint found for method '${prop}'. Check for typos in the endpoint record.`);
            }
            return async (request: object) => sender.send(endpoint, request);
        },
    });
}

/**
 * Anything that can carry a request of a generated endpoint to its handler.
 */
export interface EndpointSender {
    send<Req extends object, Res extends object, E>(endpoint: GeneratedEndpoint<Req, Res, E>, request: Req): Promise<Res>;
}

/**
 * Sends requests over fetch.
 *
 * The generated routines do the encoding and decoding; this class only moves
 * bytes and logs:
 * - [API-CLIENT-req] outgoing request, authorization masked
 * - [API-CLIENT-resp-SUCCESS] decoded response
 * - [API-CLIENT-resp-OTHER] / [API-CLIENT-resp-FAIL] error responses
 */
export class EndpointClient implements EndpointSender {
    constructor(
        private readonly config: ClientConfig,
        private readonly logApiCall: LogApiCall = new LogApiCall(),
    ) {}

    async send<Req extends object, Res extends object, E>(
        endpoint: GeneratedEndpoint<Req, Res, E>,
        request: Req,
    ): Promise<Res> {
        const wire = endpoint.intoHttpRequest(request, this.config.baseUrl, this.config.accessToken);
        const method = async (): Promise<Res> => endpoint.fromHttpResponse(await this.executeFetch(wire));

        if (!this.config.loggingEnabled) {
            return method();
        }
        return this.logApiCall.execute('CLIENT', endpoint.metadata, request, wire.headers, method);
    }

    /**
     * Performs the request and buffers the whole response.
     */
    private async executeFetch(wire: WireRequest): Promise<WireResponse> {
        const options: RequestInit = {
            method: wire.method,
            headers: wire.headers.toRecord(),
        };
        if (wire.body.length > 0) {
            options.body = wire.body;
        }

        const response = await fetch(wire.uri, options);

        const headers = new HeaderMap();
        response.headers.forEach((value, name) => {
            headers.append(name, value);
        });
        const body = new Uint8Array(await response.arrayBuffer());
        return new WireResponse(response.status, headers, body);
    }
}
