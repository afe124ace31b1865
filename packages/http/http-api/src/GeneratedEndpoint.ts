import { EndpointErrorType, Void } from './EndpointError';
import { EndpointMetadata } from './metadata';
import { WireRequest, WireResponse } from './wire';

/**
 * The runtime surface produced for one endpoint.
 *
 * All four codec routines are synchronous and free of side effects; sending
 * and receiving is left to a transport.
 */
export interface GeneratedEndpoint<Req extends object, Res extends object, E = Void> {
    readonly metadata: EndpointMetadata;
    /** True when the endpoint is usable without credentials. */
    readonly isNonAuth: boolean;
    readonly errorType: EndpointErrorType<E>;
    readonly requestType: new () => Req;
    readonly responseType: new () => Res;

    /**
     * @throws IntoHttpError when a token is required but missing, or a value
     * cannot be put on the wire
     */
    intoHttpRequest(request: Req, baseUrl: string, accessToken?: string): WireRequest;

    /** @throws FromHttpRequestError */
    fromHttpRequest(request: WireRequest): Req;

    /** @throws IntoHttpError */
    intoHttpResponse(response: Res): WireResponse;

    /**
     * @throws FromHttpResponseError for undecodable success responses and for
     * every response with status >= 400
     */
    fromHttpResponse(response: WireResponse): Res;
}

export type AnyEndpoint = GeneratedEndpoint<object, object, unknown>;

export type RequestOf<T> = T extends GeneratedEndpoint<infer Req, object, unknown> ? Req : never;
export type ResponseOf<T> = T extends GeneratedEndpoint<object, infer Res, unknown> ? Res : never;
