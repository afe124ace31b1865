/**
 * HTTP methods an endpoint may declare.
 */
export const HTTP_METHODS = ['GET', 'POST', 'PUT', 'DELETE', 'PATCH', 'HEAD', 'OPTIONS'] as const;
export type HttpMethod = (typeof HTTP_METHODS)[number];

/**
 * Credential policy of an endpoint.
 *
 * - None: usable without credentials.
 * - AccessToken: the outgoing request carries `Authorization: Bearer <token>`.
 * - ServerSignatures: requests are signed by the transport; the codec adds nothing.
 */
export const AUTH_SCHEMES = ['None', 'AccessToken', 'ServerSignatures'] as const;
export type AuthScheme = (typeof AUTH_SCHEMES)[number];

/**
 * The metadata block of an endpoint declaration, as written by the author.
 * Checked by the metadata parser before anything is generated.
 */
export interface MetadataDeclaration {
    description: string;
    method: HttpMethod;
    name: string;
    path: string;
    rateLimited: boolean;
    authentication: AuthScheme;
}

/**
 * Parsed, immutable endpoint metadata.
 * Readable at runtime by routing, dispatch and client policy code.
 */
export class EndpointMetadata {
    readonly description: string;
    readonly method: HttpMethod;
    readonly name: string;
    /** Path template, e.g. `/_matrix/client/r0/rooms/{roomId}/state`. */
    readonly path: string;
    /** Clients should throttle calls to this endpoint. */
    readonly rateLimited: boolean;
    readonly authentication: AuthScheme;

    constructor(
        description: string,
        method: HttpMethod,
        name: string,
        path: string,
        rateLimited: boolean,
        authentication: AuthScheme,
    ) {
        this.description = description;
        this.method = method;
        this.name = name;
        this.path = path;
        this.rateLimited = rateLimited;
        this.authentication = authentication;
        Object.freeze(this);
    }
}

export function isHttpMethod(value: string): value is HttpMethod {
    return HTTP_METHODS.some((m) => m === value);
}

export function isAuthScheme(value: string): value is AuthScheme {
    return AUTH_SCHEMES.some((s) => s === value);
}
